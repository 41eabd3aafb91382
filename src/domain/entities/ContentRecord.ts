import type { Platform } from "../value-objects/Platform.js";

export interface ContentRecord {
  id: string;
  title: string;
  description: string | null;
  url: string;
  thumbnailUrl: string | null;
  platform: Platform;
  author: string | null;
  authorUrl: string | null;
  viewCount: number | null;
  likeCount: number | null;
  commentCount: number | null;
  shareCount: number | null;
  publishedAt: Date | null;
  duration: string | null; // "H:MM:SS" or "M:SS"
  tags: string[] | null;
  hashtags: string[] | null; // lower-case, "#"-prefixed
  category: string | null;
  language: string | null;
  region: string | null;
}

/**
 * Platform item before normalization. Collaborators fill what they know;
 * the normalizer validates every field.
 */
export interface RawContentItem {
  id?: unknown;
  title?: unknown;
  description?: unknown;
  url?: unknown;
  thumbnailUrl?: unknown;
  author?: unknown;
  authorUrl?: unknown;
  channelId?: unknown;
  viewCount?: unknown;
  likeCount?: unknown;
  commentCount?: unknown;
  shareCount?: unknown;
  publishedAt?: unknown;
  duration?: unknown; // ISO-8601, e.g. "PT4M13S"
  tags?: unknown;
  hashtags?: unknown;
  category?: unknown;
  language?: unknown;
  region?: unknown;
}

/** Records per platform, in the order the platforms were requested. */
export type ContentBatches = Map<Platform, ContentRecord[]>;

export interface HashtagStat {
  hashtag: string;
  postCount: number | null;
  viewCount: number | null;
  platform: Platform;
  trendingScore: number;
  relatedHashtags: string[] | null;
}
