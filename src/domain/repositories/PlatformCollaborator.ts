import type {
  ContentRecord,
  HashtagStat,
  RawContentItem,
} from "../entities/ContentRecord.js";
import type { ChannelInfo } from "../entities/ChannelInfo.js";
import type { Platform } from "../value-objects/Platform.js";

/**
 * A source of trending and searchable content for one platform.
 * Failures surface as CollaboratorError.
 */
export interface PlatformCollaborator {
  readonly platform: Platform;
  getTrending(maxResults: number): Promise<ContentRecord[]>;
  search(query: string, maxResults: number): Promise<ContentRecord[]>;
  getTrendingHashtags(maxResults: number): Promise<HashtagStat[]>;
}

export interface VideoPlatformCollaborator extends PlatformCollaborator {
  /** Throws NotFoundError when no channel matches the handle. */
  resolveChannelId(handle: string): Promise<string>;
  recentItemsByChannel(
    channelId: string,
    maxResults: number,
    region: string
  ): Promise<RawContentItem[]>;
  /** Date-ordered keyword search. */
  searchRecentItems(
    keyword: string,
    maxResults: number,
    region: string
  ): Promise<RawContentItem[]>;
  /** At most one page of ids (50); hidden counts map to null. */
  channelSubscriberCounts(ids: string[]): Promise<Map<string, number | null>>;
  /** Throws NotFoundError for an unknown channel id. */
  getChannelInfo(channelId: string): Promise<ChannelInfo>;
}
