import type { ContentBatches, ContentRecord } from "../entities/ContentRecord.js";
import type { KeywordStat, RankedKeyword } from "../entities/Keyword.js";
import { extractKeywords } from "./KeywordExtractor.js";

export const TRENDING_SCORE_WEIGHTS = {
  occurrence: 10,
  viewsPerPoint: 1000,
  platform: 5,
} as const;

export function trendingScore(stat: KeywordStat): number {
  return (
    stat.occurrenceCount * TRENDING_SCORE_WEIGHTS.occurrence +
    Math.trunc(stat.cumulativeViewCount / TRENDING_SCORE_WEIGHTS.viewsPerPoint) +
    stat.platforms.size * TRENDING_SCORE_WEIGHTS.platform
  );
}

function recordText(record: ContentRecord): string {
  return `${record.title} ${record.description ?? ""}`;
}

export class TrendingAggregator {
  /**
   * Keyword statistics in first-seen order. A keyword counts once per
   * record no matter how often the record repeats it.
   */
  accumulate(batches: ContentBatches): Map<string, KeywordStat> {
    const stats = new Map<string, KeywordStat>();

    for (const [platform, records] of batches) {
      for (const record of records) {
        const keywords = new Set(extractKeywords(recordText(record)));

        for (const keyword of keywords) {
          let stat = stats.get(keyword);
          if (!stat) {
            stat = {
              keyword,
              occurrenceCount: 0,
              cumulativeViewCount: 0,
              platforms: new Set(),
            };
            stats.set(keyword, stat);
          }
          stat.occurrenceCount += 1;
          stat.cumulativeViewCount += record.viewCount ?? 0;
          stat.platforms.add(platform);
        }
      }
    }

    return stats;
  }

  /**
   * Full ranking by trending score; equal scores keep first-seen order.
   */
  rank(batches: ContentBatches, limit?: number): RankedKeyword[] {
    const ranked = Array.from(this.accumulate(batches).values(), (stat) => ({
      keyword: stat.keyword,
      trendingScore: trendingScore(stat),
      count: stat.occurrenceCount,
      totalViews: stat.cumulativeViewCount,
      platforms: Array.from(stat.platforms),
      platformCount: stat.platforms.size,
    }));

    // Array.prototype.sort is stable
    ranked.sort((a, b) => b.trendingScore - a.trendingScore);

    return limit === undefined ? ranked : ranked.slice(0, limit);
  }
}
