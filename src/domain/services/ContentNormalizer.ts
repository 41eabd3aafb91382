import { parseISO, isValid } from "date-fns";
import type {
  ContentRecord,
  RawContentItem,
} from "../entities/ContentRecord.js";
import { Platform } from "../value-objects/Platform.js";
import { parseDuration } from "../../shared/utils/duration.js";
import { safeCount } from "../../shared/utils/numbers.js";

export const DEFAULT_DESCRIPTION_MAX_LENGTH = 200;

const ELLIPSIS = "...";
const HASHTAG_PATTERN = /#[\p{L}\p{N}_]+/gu;

/**
 * Cap text at maxLength characters, ellipsis included.
 */
export function truncateText(
  text: string,
  maxLength: number = DEFAULT_DESCRIPTION_MAX_LENGTH
): string {
  if (!text) return "";
  if (text.length <= maxLength) return text;

  const keep = Math.max(0, maxLength - ELLIPSIS.length);
  return text.slice(0, keep) + ELLIPSIS.slice(0, maxLength - keep);
}

/**
 * Hashtags in first-seen order, lower-cased. Repeats are kept.
 */
export function extractHashtags(text: string): string[] {
  if (!text) return [];
  return Array.from(text.matchAll(HASHTAG_PATTERN), (match) =>
    match[0].toLowerCase()
  );
}

function normalizeHashtag(tag: string): string | null {
  const trimmed = tag.trim().toLowerCase();
  if (!trimmed || trimmed === "#") return null;
  return trimmed.startsWith("#") ? trimmed : `#${trimmed}`;
}

function asString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function optionalString(value: unknown): string | null {
  const text = asString(value);
  return text && text.trim() ? text : null;
}

function asStringArray(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  return value.filter((item): item is string => typeof item === "string");
}

function asDate(value: unknown): Date | null {
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value === "string" && value.trim()) {
    const parsed = parseISO(value.trim());
    return isValid(parsed) ? parsed : null;
  }
  return null;
}

interface UrlTemplate {
  content(id: string, author: string | null): string;
  author(author: string | null, channelId: string | null): string | null;
}

const URL_TEMPLATES: Record<Platform, UrlTemplate> = {
  [Platform.YOUTUBE]: {
    content: (id) => `https://www.youtube.com/watch?v=${id}`,
    author: (_author, channelId) =>
      channelId ? `https://www.youtube.com/channel/${channelId}` : null,
  },
  [Platform.TIKTOK]: {
    content: (id, author) =>
      author
        ? `https://www.tiktok.com/@${author}/video/${id}`
        : `https://www.tiktok.com/video/${id}`,
    author: (author) => (author ? `https://www.tiktok.com/@${author}` : null),
  },
  [Platform.INSTAGRAM]: {
    content: (id) => `https://www.instagram.com/p/${id}/`,
    author: (author) =>
      author ? `https://www.instagram.com/${author}/` : null,
  },
};

export interface NormalizerOptions {
  descriptionMaxLength: number;
}

/**
 * Turns a platform item into a ContentRecord. Never throws: fields that
 * are missing or fail conversion become null.
 */
export class ContentNormalizer {
  constructor(
    private readonly options: NormalizerOptions = {
      descriptionMaxLength: DEFAULT_DESCRIPTION_MAX_LENGTH,
    }
  ) {}

  normalize(raw: RawContentItem, platform: Platform): ContentRecord {
    const id = asString(raw.id) ?? "";
    const title = asString(raw.title) ?? "";
    const rawDescription = asString(raw.description);
    const author = optionalString(raw.author);
    const channelId = optionalString(raw.channelId);
    const template = URL_TEMPLATES[platform];

    const suppliedHashtags = asStringArray(raw.hashtags);
    const hashtags = suppliedHashtags
      ? suppliedHashtags
          .map(normalizeHashtag)
          .filter((tag): tag is string => tag !== null)
      : extractHashtags(`${title} ${rawDescription ?? ""}`);

    const duration = asString(raw.duration);

    return {
      id,
      title,
      description:
        rawDescription === null
          ? null
          : truncateText(rawDescription, this.options.descriptionMaxLength),
      url: optionalString(raw.url) ?? template.content(id, author),
      thumbnailUrl: optionalString(raw.thumbnailUrl),
      platform,
      author,
      authorUrl:
        optionalString(raw.authorUrl) ?? template.author(author, channelId),
      viewCount: safeCount(raw.viewCount),
      likeCount: safeCount(raw.likeCount),
      commentCount: safeCount(raw.commentCount),
      shareCount: safeCount(raw.shareCount),
      publishedAt: asDate(raw.publishedAt),
      duration: duration === null ? null : parseDuration(duration),
      tags: asStringArray(raw.tags),
      hashtags,
      category: optionalString(raw.category),
      language: optionalString(raw.language),
      region: optionalString(raw.region),
    };
  }

  normalizeAll(items: RawContentItem[], platform: Platform): ContentRecord[] {
    return items.map((item) => this.normalize(item, platform));
  }
}
