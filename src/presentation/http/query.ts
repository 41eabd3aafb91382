import { z } from "zod";
import type { Platform } from "../../domain/value-objects/Platform.js";
import { parsePlatform } from "../../domain/value-objects/Platform.js";
import { InvalidArgumentError } from "../../domain/errors/DomainError.js";

export function countParam(fallback: number, max: number) {
  return z.coerce.number().int().min(1).max(max).default(fallback);
}

/** "youtube,tiktok" -> [youtube, tiktok]; absent -> undefined */
export const platformsParam = z
  .string()
  .optional()
  .transform((value): Platform[] | undefined =>
    value === undefined
      ? undefined
      : value
          .split(",")
          .map((item) => item.trim())
          .filter(Boolean)
          .map(parsePlatform)
  );

export function parseQuery<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  query: Record<string, string>
): T {
  const result = schema.safeParse(query);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError("Invalid query parameters", detail);
  }
  return result.data;
}
