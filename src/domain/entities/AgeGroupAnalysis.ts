import type { AgeGroup } from "../value-objects/AgeGroup.js";
import type { Platform } from "../value-objects/Platform.js";
import type {
  TrendDirection,
  TrendingLevel,
} from "../value-objects/TrendingLevel.js";

export interface AgeGroupKeyword {
  keyword: string;
  score: number;
  searchCount: number; // presentation proxy, not a measured volume
  trendingLevel: TrendingLevel;
}

export interface AgeGroupKeywordResult {
  ageGroup: AgeGroup;
  keywords: AgeGroupKeyword[];
  totalSearches: number;
  platformDistribution: Partial<Record<Platform, number>>;
  trendingScore: number;
  timestamp: Date;
}

export interface AgeGroupKeywordAnalysis {
  mentions: number;
  platformMentions: Partial<Record<Platform, number>>;
  engagementScore: number;
  relevanceScore: number;
  trendingLevel: TrendingLevel;
}

export interface KeywordAnalysis {
  keyword: string;
  ageGroups: Partial<Record<AgeGroup, AgeGroupKeywordAnalysis>>;
  totalMentions: number;
  platformBreakdown: Partial<Record<Platform, number>>;
  trendingTrend: TrendDirection;
  relatedKeywords: string[];
  sentimentScore: number;
  timestamp: Date;
}

export interface ScoredKeyword {
  keyword: string;
  score: number;
  trendingLevel: TrendingLevel;
}

export interface TrendingTopic {
  topic: string;
  count: number;
  engagement: number;
  avgEngagement: number;
}

export interface AgeGroupTrends {
  ageGroup: AgeGroup;
  topKeywords: ScoredKeyword[];
  trendingTopics: TrendingTopic[];
  platformPreferences: Partial<Record<Platform, number>>;
  contentCategories: Record<string, number>;
  timestamp: Date;
}
