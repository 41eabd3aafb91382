import { differenceInMilliseconds, isBefore, subDays } from "date-fns";
import type { RawContentItem } from "../entities/ContentRecord.js";
import type { AnalyzeRequest, AnalyzeResult, AnalyzeRow } from "../entities/AnalyzeRow.js";
import type { VideoPlatformCollaborator } from "../repositories/PlatformCollaborator.js";
import { NotFoundError } from "../errors/DomainError.js";
import { ContentNormalizer } from "./ContentNormalizer.js";
import { durationToSeconds } from "../../shared/utils/duration.js";
import { roundTo } from "../../shared/utils/numbers.js";
import { logger } from "../../shared/utils/logger.js";

// Floor for the publish age so a just-published video has a finite rate
export const MIN_HOURS_SINCE_PUBLISH = 1 / 60;
export const SUBSCRIBER_BATCH_SIZE = 50;

const MS_PER_HOUR = 60 * 60 * 1000;

export type Clock = () => Date;

export function viewsPerHour(
  viewCount: number | null,
  publishedAt: Date | null,
  now: Date
): number | null {
  if (viewCount === null || publishedAt === null) return null;
  const hours = differenceInMilliseconds(now, publishedAt) / MS_PER_HOUR;
  return roundTo(viewCount / Math.max(hours, MIN_HOURS_SINCE_PUBLISH));
}

export function viewToSubscriberRatio(
  viewCount: number | null,
  subscriberCount: number | null
): number | null {
  if (viewCount === null || subscriberCount === null) return null;
  return roundTo(viewCount / Math.max(subscriberCount, 1));
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Recent videos of channels and keyword searches, filtered by age, form
 * and view thresholds. Runs COLLECT, FILTER_BY_TIME_AND_FORM,
 * ENRICH_WITH_CHANNEL_STATS and FILTER_BY_THRESHOLD in that order.
 */
export class TimeframeAnalyzer {
  constructor(
    private readonly collaborator: VideoPlatformCollaborator,
    private readonly normalizer: ContentNormalizer = new ContentNormalizer(),
    private readonly clock: Clock = () => new Date()
  ) {}

  async analyze(request: AnalyzeRequest): Promise<AnalyzeResult> {
    const now = this.clock();

    const collected = await this.collect(request, now);
    const inWindow = this.filterByTimeAndForm(collected, request, now);
    const enriched = await this.enrichWithChannelStats(inWindow);
    const rows = this.filterByThreshold(enriched, request);

    logger.info(
      { collected: collected.length, total: enriched.length, filtered: rows.length },
      "Timeframe analysis finished"
    );

    return {
      rows,
      total: enriched.length,
      filtered: rows.length,
      settings: request,
    };
  }

  async collect(request: AnalyzeRequest, now: Date): Promise<AnalyzeRow[]> {
    const channelItems = await Promise.all(
      request.channels.map((handle) => this.collectChannel(handle, request))
    );
    const keywordItems = await Promise.all(
      request.keywords.map((keyword) =>
        this.collaborator.searchRecentItems(
          keyword,
          request.maxResultsPerKeyword,
          request.region
        )
      )
    );

    const rows: AnalyzeRow[] = [];
    const seen = new Set<string>();
    for (const item of [...channelItems.flat(), ...keywordItems.flat()]) {
      const row = this.toRow(item, now);
      if (!row.videoId || seen.has(row.videoId)) continue;
      seen.add(row.videoId);
      rows.push(row);
    }
    return rows;
  }

  private async collectChannel(
    handle: string,
    request: AnalyzeRequest
  ): Promise<RawContentItem[]> {
    let channelId: string;
    try {
      channelId = await this.collaborator.resolveChannelId(handle);
    } catch (error) {
      if (error instanceof NotFoundError) {
        logger.warn({ handle }, "Channel handle did not resolve, skipping");
        return [];
      }
      throw error;
    }

    return this.collaborator.recentItemsByChannel(
      channelId,
      request.maxResultsPerChannel,
      request.region
    );
  }

  toRow(item: RawContentItem, now: Date): AnalyzeRow {
    const record = this.normalizer.normalize(item, this.collaborator.platform);
    const channelId =
      typeof item.channelId === "string" && item.channelId.trim()
        ? item.channelId
        : null;

    return {
      videoId: record.id,
      channelId,
      channelName: record.author ?? "",
      title: record.title,
      publishedAt: record.publishedAt,
      viewCount: record.viewCount,
      viewsPerHour: viewsPerHour(record.viewCount, record.publishedAt, now),
      subscriberCount: null,
      viewToSubscriberRatio: null,
      duration: record.duration,
      durationSeconds: durationToSeconds(record.duration),
      videoUrl: record.url,
      thumbnailUrl: record.thumbnailUrl,
    };
  }

  filterByTimeAndForm(
    rows: AnalyzeRow[],
    request: AnalyzeRequest,
    now: Date
  ): AnalyzeRow[] {
    const cutoff = subDays(now, request.timeframeDays);

    return rows.filter((row) => {
      if (row.publishedAt !== null && isBefore(row.publishedAt, cutoff)) {
        return false;
      }
      // Form is unknown without a duration
      if (row.durationSeconds === null || request.form === "both") return true;

      const isShort = row.durationSeconds <= request.shortFormMaxSeconds;
      return request.form === "shorts" ? isShort : !isShort;
    });
  }

  async enrichWithChannelStats(rows: AnalyzeRow[]): Promise<AnalyzeRow[]> {
    const channelIds = Array.from(
      new Set(
        rows
          .map((row) => row.channelId)
          .filter((id): id is string => id !== null)
      )
    );
    if (channelIds.length === 0) return rows;

    // One page at a time so the collaborator can space its requests
    const subscribers = new Map<string, number | null>();
    for (const ids of chunk(channelIds, SUBSCRIBER_BATCH_SIZE)) {
      try {
        const counts = await this.collaborator.channelSubscriberCounts(ids);
        for (const [id, count] of counts) subscribers.set(id, count);
      } catch (error) {
        logger.warn(
          { channels: ids.length, error },
          "Subscriber lookup failed, leaving channel stats empty"
        );
      }
    }

    return rows.map((row) => {
      const subscriberCount =
        row.channelId === null ? null : subscribers.get(row.channelId) ?? null;
      return {
        ...row,
        subscriberCount,
        viewToSubscriberRatio: viewToSubscriberRatio(row.viewCount, subscriberCount),
      };
    });
  }

  filterByThreshold(rows: AnalyzeRow[], request: AnalyzeRequest): AnalyzeRow[] {
    return rows.filter(
      (row) =>
        row.viewCount !== null &&
        row.viewCount >= request.minViewCount &&
        (row.viewsPerHour ?? 0) >= request.minViewsPerHour
    );
  }
}
