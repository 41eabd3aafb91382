import { z } from "zod";
import type { AffinityConfig } from "../../domain/entities/AgeGroupProfile.js";
import { AgeGroup } from "../../domain/value-objects/AgeGroup.js";
import { Platform } from "../../domain/value-objects/Platform.js";
import { readDataFile } from "../../shared/utils/dataFile.js";

export const AGE_GROUP_PROFILES_FILE = "ageGroupProfiles.json";

const profileSchema = z.object({
  ageGroup: z.nativeEnum(AgeGroup),
  keywords: z.array(z.string().trim().min(1)).min(1),
  preferredPlatforms: z.array(z.nativeEnum(Platform)).min(1),
  weight: z.number().positive(),
});

const affinityConfigSchema = z.object({
  platformWeights: z.object({
    [Platform.YOUTUBE]: z.number().positive(),
    [Platform.TIKTOK]: z.number().positive(),
    [Platform.INSTAGRAM]: z.number().positive(),
  }),
  profiles: z
    .array(profileSchema)
    .min(1)
    .refine(
      (profiles) =>
        new Set(profiles.map((p) => p.ageGroup)).size === profiles.length,
      { message: "Each age group may only be configured once" }
    ),
});

/**
 * Keyword dictionaries and weights per age group. Dictionaries are kept
 * as shipped: a repeated entry scores once per occurrence.
 */
export function parseAffinityConfig(data: unknown): AffinityConfig {
  return affinityConfigSchema.parse(data);
}

export function loadAffinityConfig(): AffinityConfig {
  return parseAffinityConfig(readDataFile(AGE_GROUP_PROFILES_FILE));
}
