import type { ContentRecord } from "../domain/entities/ContentRecord.js";
import { Platform } from "../domain/value-objects/Platform.js";

export function makeRecord(overrides: Partial<ContentRecord> = {}): ContentRecord {
  return {
    id: "record-1",
    title: "",
    description: null,
    url: "https://example.com/record-1",
    thumbnailUrl: null,
    platform: Platform.YOUTUBE,
    author: null,
    authorUrl: null,
    viewCount: null,
    likeCount: null,
    commentCount: null,
    shareCount: null,
    publishedAt: null,
    duration: null,
    tags: null,
    hashtags: null,
    category: null,
    language: null,
    region: null,
    ...overrides,
  };
}

export function batchesOf(
  entries: Array<[Platform, ContentRecord[]]>
): Map<Platform, ContentRecord[]> {
  return new Map(entries);
}
