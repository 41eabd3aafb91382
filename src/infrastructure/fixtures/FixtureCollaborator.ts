import { subHours } from "date-fns";
import { z } from "zod";
import type {
  ContentRecord,
  HashtagStat,
  RawContentItem,
} from "../../domain/entities/ContentRecord.js";
import type { PlatformCollaborator } from "../../domain/repositories/PlatformCollaborator.js";
import type { Platform } from "../../domain/value-objects/Platform.js";
import { ContentNormalizer } from "../../domain/services/ContentNormalizer.js";
import { readDataFile } from "../../shared/utils/dataFile.js";
import { roundTo } from "../../shared/utils/numbers.js";
import { logger } from "../../shared/utils/logger.js";

const QUERY_PLACEHOLDER = /\{query\}/g;
const RELATED_HASHTAG_LIMIT = 3;

const fixtureItemSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().optional(),
  author: z.string().optional(),
  viewCount: z.number().int().nonnegative().optional(),
  likeCount: z.number().int().nonnegative().optional(),
  commentCount: z.number().int().nonnegative().optional(),
  shareCount: z.number().int().nonnegative().optional(),
  hashtags: z.array(z.string()).optional(),
  category: z.string().optional(),
  publishedHoursAgo: z.number().nonnegative(),
});

export const platformFixtureSchema = z.object({
  trending: z.array(fixtureItemSchema),
  searchTemplates: z.array(fixtureItemSchema),
  hashtags: z.array(
    z.object({
      hashtag: z.string().startsWith("#"),
      postCount: z.number().int().nonnegative(),
      viewCount: z.number().int().nonnegative(),
    })
  ),
});

export type FixtureItem = z.infer<typeof fixtureItemSchema>;
export type PlatformFixture = z.infer<typeof platformFixtureSchema>;

export function loadPlatformFixture(platform: Platform): PlatformFixture {
  return platformFixtureSchema.parse(readDataFile(`fixtures/${platform}.json`));
}

/**
 * Sample data for platforms without a usable public API. Publish times
 * are relative to the clock so the data never ages out of a time window.
 */
export class FixtureCollaborator implements PlatformCollaborator {
  constructor(
    readonly platform: Platform,
    private readonly fixture: PlatformFixture,
    private readonly normalizer: ContentNormalizer = new ContentNormalizer(),
    private readonly clock: () => Date = () => new Date(),
    private readonly language = "ko",
    private readonly region = "KR"
  ) {}

  async getTrending(maxResults: number): Promise<ContentRecord[]> {
    const items = this.fixture.trending.slice(0, maxResults);
    logger.debug({ platform: this.platform, count: items.length }, "Serving sample trending items");
    return this.toRecords(items);
  }

  async search(query: string, maxResults: number): Promise<ContentRecord[]> {
    const tag = query.replace(/\s+/g, "");
    const items = this.fixture.searchTemplates.slice(0, maxResults).map((template) => ({
      ...template,
      id: template.id.replace(QUERY_PLACEHOLDER, tag),
      title: template.title.replace(QUERY_PLACEHOLDER, query),
      description: template.description?.replace(QUERY_PLACEHOLDER, query),
      hashtags: template.hashtags?.map((hashtag) => hashtag.replace(QUERY_PLACEHOLDER, tag)),
    }));
    return this.toRecords(items);
  }

  async getTrendingHashtags(maxResults: number): Promise<HashtagStat[]> {
    const hashtags = this.fixture.hashtags;
    return hashtags.slice(0, maxResults).map((entry, index) => ({
      hashtag: entry.hashtag.toLowerCase(),
      postCount: entry.postCount,
      viewCount: entry.viewCount,
      platform: this.platform,
      // Chart position, 1.0 for the top entry
      trendingScore: roundTo(Math.max(0, 1 - index * 0.1)),
      relatedHashtags: hashtags
        .slice(index + 1, index + 1 + RELATED_HASHTAG_LIMIT)
        .map((related) => related.hashtag.toLowerCase()),
    }));
  }

  private toRecords(items: FixtureItem[]): ContentRecord[] {
    const now = this.clock();
    return items.map((item) => {
      const { publishedHoursAgo, ...fields } = item;
      const raw: RawContentItem = {
        ...fields,
        publishedAt: subHours(now, publishedHoursAgo),
        language: this.language,
        region: this.region,
      };
      return this.normalizer.normalize(raw, this.platform);
    });
  }
}
