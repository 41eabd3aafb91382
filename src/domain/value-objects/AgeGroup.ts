import { InvalidArgumentError } from "../errors/DomainError.js";

export enum AgeGroup {
  TEENS = "10대",
  TWENTIES = "20대",
  THIRTIES = "30대",
  FORTIES = "40대",
  FIFTIES_PLUS = "50대+",
}

export const AGE_GROUPS = Object.values(AgeGroup);

export function isAgeGroup(value: string): value is AgeGroup {
  return AGE_GROUPS.some((group) => group === value);
}

/**
 * Accepts the display label ("20대") or the enum key ("TWENTIES").
 */
export function parseAgeGroup(value: string): AgeGroup {
  const trimmed = value.trim();
  if (isAgeGroup(trimmed)) return trimmed;

  const byKey = Object.entries(AgeGroup).find(
    ([key]) => key.toLowerCase() === trimmed.toLowerCase()
  );
  if (byKey) return byKey[1];

  throw new InvalidArgumentError(`Unsupported age group: ${value}`);
}
