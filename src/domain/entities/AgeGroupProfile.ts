import type { AgeGroup } from "../value-objects/AgeGroup.js";
import type { Platform } from "../value-objects/Platform.js";

export interface AgeGroupProfile {
  ageGroup: AgeGroup;
  keywords: string[];
  preferredPlatforms: Platform[];
  weight: number; // how strongly this cohort's matches count
}

export interface AffinityConfig {
  profiles: AgeGroupProfile[];
  platformWeights: Record<Platform, number>;
}
