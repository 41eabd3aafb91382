import type { ContentRecord, HashtagStat } from "../entities/ContentRecord.js";
import type { Platform } from "../value-objects/Platform.js";

const RELATED_HASHTAG_LIMIT = 3;

function sortByCount(counts: Map<string, number>): string[] {
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([tag]) => tag);
}

/**
 * Derives trending hashtags from a sample of trending records, for
 * platforms that publish no hashtag chart of their own.
 */
export class HashtagRanker {
  rank(
    records: ContentRecord[],
    platform: Platform,
    maxResults: number
  ): HashtagStat[] {
    const counts = new Map<string, number>();
    const coOccurrences = new Map<string, Map<string, number>>();

    for (const record of records) {
      const tags = Array.from(new Set(record.hashtags ?? []));
      for (const tag of tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);

        const related = coOccurrences.get(tag) ?? new Map<string, number>();
        for (const other of tags) {
          if (other !== tag) related.set(other, (related.get(other) ?? 0) + 1);
        }
        coOccurrences.set(tag, related);
      }
    }

    return sortByCount(counts)
      .slice(0, maxResults)
      .map((hashtag) => {
        const count = counts.get(hashtag) ?? 0;
        const related = sortByCount(coOccurrences.get(hashtag) ?? new Map());
        return {
          hashtag,
          postCount: count,
          viewCount: null,
          platform,
          trendingScore: records.length > 0 ? count / records.length : 0,
          relatedHashtags: related.slice(0, RELATED_HASHTAG_LIMIT),
        };
      });
  }
}
