import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import type {
  ContentRecord,
  HashtagStat,
  RawContentItem,
} from "../../domain/entities/ContentRecord.js";
import type { ChannelInfo } from "../../domain/entities/ChannelInfo.js";
import type { VideoPlatformCollaborator } from "../../domain/repositories/PlatformCollaborator.js";
import { Platform } from "../../domain/value-objects/Platform.js";
import { CollaboratorError, NotFoundError } from "../../domain/errors/DomainError.js";
import { ContentNormalizer } from "../../domain/services/ContentNormalizer.js";
import { HashtagRanker } from "../../domain/services/HashtagRanker.js";
import { safeCount } from "../../shared/utils/numbers.js";
import { delay } from "../../shared/utils/delay.js";
import { logger } from "../../shared/utils/logger.js";
import {
  channelListSchema,
  errorBodySchema,
  searchListSchema,
  videoListSchema,
  type YouTubeChannel,
  type YouTubeVideo,
} from "./schemas.js";

export const YOUTUBE_API_BASE_URL = "https://www.googleapis.com/youtube/v3";
const MAX_PAGE_SIZE = 50;
const THUMBNAIL_PREFERENCE = ["high", "medium", "default"];

export interface YouTubeCollaboratorOptions {
  apiKey?: string;
  region: string;
  timeoutMs: number;
  rateLimitDelayMs: number;
  hashtagSampleSize: number;
  baseUrl?: string;
}

type QueryParams = Record<string, string | number | undefined>;

type Thumbnails = Record<string, { url: string }>;

function pickThumbnail(
  thumbnails: Thumbnails = {},
  preference: string[] = THUMBNAIL_PREFERENCE
): string | undefined {
  for (const size of preference) {
    const thumbnail = thumbnails[size];
    if (thumbnail) return thumbnail.url;
  }
  return undefined;
}

export function videoToRawItem(video: YouTubeVideo, region: string): RawContentItem {
  return {
    id: video.id,
    title: video.snippet.title,
    description: video.snippet.description,
    thumbnailUrl: pickThumbnail(video.snippet.thumbnails),
    author: video.snippet.channelTitle,
    channelId: video.snippet.channelId,
    viewCount: video.statistics?.viewCount,
    likeCount: video.statistics?.likeCount,
    commentCount: video.statistics?.commentCount,
    publishedAt: video.snippet.publishedAt,
    duration: video.contentDetails?.duration,
    tags: video.snippet.tags,
    category: video.snippet.categoryId,
    language: video.snippet.defaultLanguage,
    region,
  };
}

export function channelToInfo(channel: YouTubeChannel): ChannelInfo {
  const snippet = channel.snippet;
  const statistics = channel.statistics;
  const createdAt = snippet?.publishedAt ? parseISO(snippet.publishedAt) : null;

  return {
    id: channel.id,
    name: snippet?.title ?? "",
    description: snippet?.description ?? "",
    url: `https://www.youtube.com/channel/${channel.id}`,
    avatarUrl: pickThumbnail(snippet?.thumbnails, ["default", "medium", "high"]) ?? null,
    platform: Platform.YOUTUBE,
    followerCount:
      statistics && !statistics.hiddenSubscriberCount
        ? safeCount(statistics.subscriberCount)
        : null,
    postCount: safeCount(statistics?.videoCount),
    createdAt: createdAt && isValid(createdAt) ? createdAt : null,
  };
}

/**
 * YouTube Data API v3 over fetch. Search hits are expanded to full video
 * resources with one videos.list call per page.
 */
export class YouTubeCollaborator implements VideoPlatformCollaborator {
  readonly platform = Platform.YOUTUBE;
  private readonly hashtagRanker = new HashtagRanker();

  constructor(
    private readonly options: YouTubeCollaboratorOptions,
    private readonly normalizer: ContentNormalizer = new ContentNormalizer()
  ) {}

  async getTrending(maxResults: number): Promise<ContentRecord[]> {
    const items = await this.trendingItems(maxResults, this.options.region);
    logger.debug({ count: items.length }, "Fetched YouTube trending videos");
    return this.normalizer.normalizeAll(items, this.platform);
  }

  async search(query: string, maxResults: number): Promise<ContentRecord[]> {
    const ids = await this.searchVideoIds({
      q: query,
      order: "relevance",
      maxResults,
      regionCode: this.options.region,
    });
    const items = await this.videoItems(ids, this.options.region);
    return this.normalizer.normalizeAll(items, this.platform);
  }

  async getTrendingHashtags(maxResults: number): Promise<HashtagStat[]> {
    const sample = await this.getTrending(this.options.hashtagSampleSize);
    return this.hashtagRanker.rank(sample, this.platform, maxResults);
  }

  async resolveChannelId(handle: string): Promise<string> {
    const query = handle.trim();
    const response = await this.request("search", searchListSchema, {
      part: "snippet",
      type: "channel",
      q: query,
      maxResults: 1,
    });

    const channelId = response.items[0]?.id.channelId;
    if (!channelId) {
      throw new NotFoundError(`Channel not found: ${query}`);
    }
    return channelId;
  }

  async recentItemsByChannel(
    channelId: string,
    maxResults: number,
    region: string
  ): Promise<RawContentItem[]> {
    const ids = await this.searchVideoIds({
      channelId,
      order: "date",
      maxResults,
    });
    return this.videoItems(ids, region);
  }

  async searchRecentItems(
    keyword: string,
    maxResults: number,
    region: string
  ): Promise<RawContentItem[]> {
    const ids = await this.searchVideoIds({
      q: keyword,
      order: "date",
      maxResults,
      regionCode: region,
    });
    return this.videoItems(ids, region);
  }

  async channelSubscriberCounts(ids: string[]): Promise<Map<string, number | null>> {
    const counts = new Map<string, number | null>();
    if (ids.length === 0) return counts;

    if (this.options.rateLimitDelayMs > 0) {
      await delay(this.options.rateLimitDelayMs);
    }

    const response = await this.request("channels", channelListSchema, {
      part: "statistics",
      id: ids.slice(0, MAX_PAGE_SIZE).join(","),
      maxResults: MAX_PAGE_SIZE,
    });

    for (const channel of response.items) {
      const statistics = channel.statistics;
      counts.set(
        channel.id,
        statistics && !statistics.hiddenSubscriberCount
          ? safeCount(statistics.subscriberCount)
          : null
      );
    }
    return counts;
  }

  async getChannelInfo(channelId: string): Promise<ChannelInfo> {
    const id = channelId.trim();
    if (this.options.rateLimitDelayMs > 0) {
      await delay(this.options.rateLimitDelayMs);
    }

    const response = await this.request("channels", channelListSchema, {
      part: "snippet,statistics",
      id,
    });

    const channel = response.items[0];
    if (!channel) {
      throw new NotFoundError(`Channel not found: ${id}`);
    }
    return channelToInfo(channel);
  }

  private async trendingItems(maxResults: number, region: string): Promise<RawContentItem[]> {
    const response = await this.request("videos", videoListSchema, {
      part: "snippet,statistics,contentDetails",
      chart: "mostPopular",
      regionCode: region,
      maxResults: Math.min(maxResults, MAX_PAGE_SIZE),
    });
    return response.items.map((video) => videoToRawItem(video, region));
  }

  private async searchVideoIds(params: QueryParams & { maxResults: number }): Promise<string[]> {
    const response = await this.request("search", searchListSchema, {
      part: "snippet",
      type: "video",
      ...params,
      maxResults: Math.min(params.maxResults, MAX_PAGE_SIZE),
    });
    return response.items
      .map((item) => item.id.videoId)
      .filter((id): id is string => typeof id === "string");
  }

  /** Full video resources in the order of the given ids. */
  private async videoItems(ids: string[], region: string): Promise<RawContentItem[]> {
    if (ids.length === 0) return [];

    const response = await this.request("videos", videoListSchema, {
      part: "snippet,statistics,contentDetails",
      id: ids.join(","),
      maxResults: MAX_PAGE_SIZE,
    });

    const byId = new Map(response.items.map((video) => [video.id, video]));
    return ids
      .map((id) => byId.get(id))
      .filter((video): video is YouTubeVideo => video !== undefined)
      .map((video) => videoToRawItem(video, region));
  }

  private async request<T>(
    resource: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: QueryParams
  ): Promise<T> {
    if (!this.options.apiKey) {
      throw new CollaboratorError(this.platform, "YOUTUBE_API_KEY is not configured");
    }

    const url = new URL(`${this.options.baseUrl ?? YOUTUBE_API_BASE_URL}/${resource}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    url.searchParams.set("key", this.options.apiKey);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw CollaboratorError.wrap(this.platform, error);
    }

    const body: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      throw this.toError(resource, response.status, body);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError(
        this.platform,
        `Unexpected YouTube ${resource} response`,
        parsed.error.message
      );
    }
    return parsed.data;
  }

  private toError(resource: string, status: number, body: unknown): CollaboratorError {
    const parsed = errorBodySchema.safeParse(body);
    const message = parsed.success ? parsed.data.error.message : undefined;
    const reasons = parsed.success
      ? (parsed.data.error.errors ?? []).map((e) => e.reason)
      : [];

    logger.warn({ resource, status, reasons }, "YouTube API request failed");

    if (status === 403 && reasons.includes("quotaExceeded")) {
      return new CollaboratorError(this.platform, "YouTube API quota exceeded", message);
    }
    return new CollaboratorError(
      this.platform,
      `YouTube API returned ${status}`,
      message ?? `HTTP ${status}`
    );
  }
}
