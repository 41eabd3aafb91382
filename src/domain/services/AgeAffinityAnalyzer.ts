import { isAfter, subDays } from "date-fns";
import type { ContentBatches, ContentRecord } from "../entities/ContentRecord.js";
import type {
  AffinityConfig,
  AgeGroupProfile,
} from "../entities/AgeGroupProfile.js";
import type {
  AgeGroupKeyword,
  AgeGroupKeywordAnalysis,
  AgeGroupKeywordResult,
  AgeGroupTrends,
  KeywordAnalysis,
  ScoredKeyword,
  TrendingTopic,
} from "../entities/AgeGroupAnalysis.js";
import type { AgeGroup } from "../value-objects/AgeGroup.js";
import type { Platform } from "../value-objects/Platform.js";
import {
  TrendDirection,
  getTrendingLevel,
} from "../value-objects/TrendingLevel.js";
import { InvalidArgumentError } from "../errors/DomainError.js";
import { engagementScore } from "./EngagementScorer.js";
import { extractHangulTokens } from "./KeywordExtractor.js";
import { roundTo } from "../../shared/utils/numbers.js";

// Scoring policy
export const SEARCH_COUNT_MULTIPLIER = 100;
export const GROUP_SCORE_DIVISOR = 10;
export const MAX_GROUP_TRENDING_SCORE = 100;
export const RECENT_WINDOW_DAYS = 7;
export const TREND_DIRECTION_RATIOS = { rising: 0.6, steady: 0.3 } as const;
export const EXACT_RELEVANCE_FACTOR = 100;
export const PARTIAL_RELEVANCE_FACTOR = 50;
export const BASELINE_RELEVANCE = 10;
export const RELATED_KEYWORD_LIMIT = 10;
export const DEFAULT_PLATFORM_WEIGHT = 1.0;
const UNCATEGORIZED = "기타";

export const POSITIVE_WORDS = [
  "좋다", "최고", "대박", "완벽", "사랑", "추천", "인기", "성공",
];
export const NEGATIVE_WORDS = [
  "나쁘다", "최악", "실패", "별로", "싫다", "문제", "실망", "실패",
];

function flatten(batches: ContentBatches): ContentRecord[] {
  return Array.from(batches.values()).flat();
}

function headline(record: ContentRecord): string {
  return `${record.title} ${record.description ?? ""}`;
}

function fullText(record: ContentRecord): string {
  return [
    record.title,
    record.description ?? "",
    (record.tags ?? []).join(" "),
    (record.hashtags ?? []).join(" "),
  ].join(" ");
}

/** Descending by value; equal values keep insertion order. */
function rankEntries(scores: Map<string, number>): Array<[string, number]> {
  return Array.from(scores.entries()).sort((a, b) => b[1] - a[1]);
}

function increment<K>(map: Map<K, number>, key: K, by = 1): void {
  map.set(key, (map.get(key) ?? 0) + by);
}

function toRecord<K extends string>(map: Map<K, number>): Partial<Record<K, number>> {
  const result: Partial<Record<K, number>> = {};
  for (const [key, value] of map) result[key] = value;
  return result;
}

/**
 * Estimates which age cohort trending keywords resonate with, using the
 * curated dictionaries and weights of an AffinityConfig.
 */
export class AgeAffinityAnalyzer {
  constructor(private readonly config: AffinityConfig) {}

  get profiles(): AgeGroupProfile[] {
    return this.config.profiles;
  }

  getProfile(ageGroup: AgeGroup | string): AgeGroupProfile {
    const profile = this.config.profiles.find((p) => p.ageGroup === ageGroup);
    if (!profile) {
      throw new InvalidArgumentError(`Age group is not configured: ${ageGroup}`);
    }
    return profile;
  }

  platformWeight(platform: Platform): number {
    return this.config.platformWeights[platform] ?? DEFAULT_PLATFORM_WEIGHT;
  }

  affinitiesForAllGroups(
    batches: ContentBatches,
    limit: number,
    now: Date = new Date()
  ): AgeGroupKeywordResult[] {
    const records = flatten(batches);

    return this.config.profiles.map((profile) => {
      const keywords = this.keywordsForGroup(records, profile, limit);
      const totalScore = keywords.reduce((sum, kw) => sum + kw.score, 0);

      return {
        ageGroup: profile.ageGroup,
        keywords,
        totalSearches: keywords.reduce((sum, kw) => sum + kw.searchCount, 0),
        platformDistribution: this.platformDistribution(totalScore, profile),
        trendingScore:
          keywords.length === 0
            ? 0
            : Math.min(
                roundTo(totalScore / keywords.length / GROUP_SCORE_DIVISOR),
                MAX_GROUP_TRENDING_SCORE
              ),
        timestamp: now,
      };
    });
  }

  keywordsForGroup(
    records: ContentRecord[],
    profile: AgeGroupProfile,
    limit: number
  ): AgeGroupKeyword[] {
    // Repeated dictionary entries add their weight once per repeat
    const dictionary = profile.keywords;
    const scores = new Map<string, number>();

    for (const record of records) {
      // Plain substring containment: short entries can over-match
      const text = fullText(record).toLowerCase();
      const weighted =
        engagementScore(record) *
        this.platformWeight(record.platform) *
        profile.weight;

      for (const keyword of dictionary) {
        if (text.includes(keyword.toLowerCase())) {
          increment(scores, keyword, weighted);
        }
      }
    }

    return rankEntries(scores)
      .slice(0, limit)
      .map(([keyword, score]) => ({
        keyword,
        score: roundTo(score),
        searchCount: Math.floor(score * SEARCH_COUNT_MULTIPLIER),
        trendingLevel: getTrendingLevel(score),
      }));
  }

  /**
   * Estimated, not measured: the group's total score split by platform
   * weight across its preferred platforms.
   */
  private platformDistribution(
    totalScore: number,
    profile: AgeGroupProfile
  ): Partial<Record<Platform, number>> {
    const distribution: Partial<Record<Platform, number>> = {};
    const platformCount = profile.preferredPlatforms.length;

    for (const platform of profile.preferredPlatforms) {
      distribution[platform] =
        totalScore > 0
          ? Math.floor((totalScore * this.platformWeight(platform)) / platformCount)
          : 0;
    }
    return distribution;
  }

  analyzeKeyword(
    keyword: string,
    batches: ContentBatches,
    now: Date = new Date()
  ): KeywordAnalysis {
    const needle = keyword.trim().toLowerCase();
    if (!needle) {
      throw new InvalidArgumentError("Keyword must not be empty");
    }

    const matched = flatten(batches).filter(
      (record) =>
        record.title.toLowerCase().includes(needle) ||
        (record.description ?? "").toLowerCase().includes(needle)
    );

    const platformMentions = new Map<Platform, number>();
    for (const record of matched) increment(platformMentions, record.platform);

    const engagement = matched.reduce(
      (sum, record) => sum + engagementScore(record),
      0
    );

    const ageGroups: Partial<Record<AgeGroup, AgeGroupKeywordAnalysis>> = {};
    const platformBreakdown = new Map<Platform, number>();
    let totalMentions = 0;
    for (const profile of this.config.profiles) {
      ageGroups[profile.ageGroup] = {
        mentions: matched.length,
        platformMentions: toRecord(platformMentions),
        engagementScore: roundTo(engagement),
        relevanceScore: roundTo(this.relevance(needle, profile)),
        trendingLevel: getTrendingLevel(engagement),
      };
      // Summed per group, so a mention counts once for every configured group
      totalMentions += matched.length;
      for (const [platform, count] of platformMentions) {
        increment(platformBreakdown, platform, count);
      }
    }

    return {
      keyword: keyword.trim(),
      ageGroups,
      totalMentions,
      platformBreakdown: toRecord(platformBreakdown),
      trendingTrend: this.trendDirection(matched, now),
      relatedKeywords: this.relatedKeywords(matched),
      sentimentScore: this.sentimentScore(matched),
      timestamp: now,
    };
  }

  relevance(needle: string, profile: AgeGroupProfile): number {
    const dictionary = profile.keywords.map((entry) => entry.toLowerCase());

    if (dictionary.includes(needle)) {
      return profile.weight * EXACT_RELEVANCE_FACTOR;
    }
    if (dictionary.some((entry) => entry.includes(needle) || needle.includes(entry))) {
      return profile.weight * PARTIAL_RELEVANCE_FACTOR;
    }
    return BASELINE_RELEVANCE;
  }

  /**
   * Share of dated records published within the recent window.
   * Undated records are left out of both sides of the ratio.
   */
  trendDirection(records: ContentRecord[], now: Date): TrendDirection {
    const dated = records.filter((record) => record.publishedAt !== null);
    if (dated.length === 0) return TrendDirection.STEADY;

    const cutoff = subDays(now, RECENT_WINDOW_DAYS);
    const recent = dated.filter(
      (record) => record.publishedAt !== null && isAfter(record.publishedAt, cutoff)
    ).length;
    const ratio = recent / dated.length;

    if (ratio > TREND_DIRECTION_RATIOS.rising) return TrendDirection.RISING;
    if (ratio > TREND_DIRECTION_RATIOS.steady) return TrendDirection.STEADY;
    return TrendDirection.FALLING;
  }

  relatedKeywords(records: ContentRecord[]): string[] {
    const counts = new Map<string, number>();
    for (const record of records) {
      for (const token of extractHangulTokens(fullText(record))) {
        increment(counts, token);
      }
    }
    return rankEntries(counts)
      .slice(0, RELATED_KEYWORD_LIMIT)
      .map(([word]) => word);
  }

  /**
   * In [-1, 1]; exactly 0 when no sentiment word occurs. Each list entry
   * counts once when present, however often the text repeats it.
   */
  sentimentScore(records: ContentRecord[]): number {
    const text = records.map(headline).join(" ");
    const positive = POSITIVE_WORDS.filter((word) => text.includes(word)).length;
    const negative = NEGATIVE_WORDS.filter((word) => text.includes(word)).length;

    const total = positive + negative;
    if (total === 0) return 0;
    return roundTo((positive - negative) / total);
  }

  ageGroupTrends(
    ageGroup: AgeGroup | string,
    batches: ContentBatches,
    limit: number,
    now: Date = new Date()
  ): AgeGroupTrends {
    const profile = this.getProfile(ageGroup);
    const dictionary = profile.keywords.map((entry) => entry.toLowerCase());

    const records = flatten(batches)
      .filter((record) => {
        const text = headline(record).toLowerCase();
        return dictionary.some((entry) => text.includes(entry));
      })
      .slice(0, limit);

    return {
      ageGroup: profile.ageGroup,
      topKeywords: this.topHangulKeywords(records, limit),
      trendingTopics: this.trendingTopics(records),
      platformPreferences: this.platformPreferences(records, profile),
      contentCategories: this.contentCategories(records),
      timestamp: now,
    };
  }

  private topHangulKeywords(records: ContentRecord[], limit: number): ScoredKeyword[] {
    const scores = new Map<string, number>();
    for (const record of records) {
      const score = engagementScore(record);
      for (const token of extractHangulTokens(fullText(record))) {
        increment(scores, token, score);
      }
    }
    return rankEntries(scores)
      .slice(0, limit)
      .map(([keyword, score]) => ({
        keyword,
        score: roundTo(score),
        trendingLevel: getTrendingLevel(score),
      }));
  }

  private trendingTopics(records: ContentRecord[]): TrendingTopic[] {
    const topics = new Map<string, { count: number; engagement: number }>();
    for (const record of records) {
      const topic = record.category ?? UNCATEGORIZED;
      const entry = topics.get(topic) ?? { count: 0, engagement: 0 };
      entry.count += 1;
      entry.engagement += engagementScore(record);
      topics.set(topic, entry);
    }

    return Array.from(topics.entries())
      .sort((a, b) => b[1].engagement - a[1].engagement)
      .map(([topic, { count, engagement }]) => ({
        topic,
        count,
        engagement: roundTo(engagement),
        avgEngagement: roundTo(engagement / count),
      }));
  }

  private platformPreferences(
    records: ContentRecord[],
    profile: AgeGroupProfile
  ): Partial<Record<Platform, number>> {
    const counts = new Map<Platform, number>();
    for (const record of records) increment(counts, record.platform);

    const preferences: Partial<Record<Platform, number>> = {};
    for (const platform of profile.preferredPlatforms) {
      preferences[platform] =
        records.length > 0
          ? roundTo(((counts.get(platform) ?? 0) / records.length) * 100)
          : 0;
    }
    return preferences;
  }

  private contentCategories(records: ContentRecord[]): Record<string, number> {
    const categories: Record<string, number> = {};
    for (const record of records) {
      const category = record.category ?? UNCATEGORIZED;
      categories[category] = (categories[category] ?? 0) + 1;
    }
    return categories;
  }
}
