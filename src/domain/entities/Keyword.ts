import type { Platform } from "../value-objects/Platform.js";

export interface KeywordStat {
  keyword: string;
  occurrenceCount: number;
  cumulativeViewCount: number;
  platforms: Set<Platform>;
}

export interface RankedKeyword {
  keyword: string;
  trendingScore: number;
  count: number;
  totalViews: number;
  platforms: Platform[];
  platformCount: number;
}
