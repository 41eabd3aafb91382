import { InvalidArgumentError } from "../errors/DomainError.js";

export enum Platform {
  YOUTUBE = "youtube",
  TIKTOK = "tiktok",
  INSTAGRAM = "instagram",
}

export const PLATFORMS = Object.values(Platform);

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

export function parsePlatform(value: string): Platform {
  const normalized = value.trim().toLowerCase();
  if (!isPlatform(normalized)) {
    throw new InvalidArgumentError(`Unsupported platform: ${value}`);
  }
  return normalized;
}
