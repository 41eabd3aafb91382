import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import type {
  SearchTrendsSource,
  TrendingSearch,
} from "../../domain/repositories/SearchTrendsSource.js";
import { readDataFile } from "../../shared/utils/dataFile.js";
import { logger } from "../../shared/utils/logger.js";

const text = z.union([z.string(), z.number()]).transform(String);

const newsItemSchema = z.object({ "ht:news_item_title": text.optional() });

const feedSchema = z.object({
  rss: z.object({
    channel: z.object({
      // A single item is not wrapped in an array by the parser
      item: z
        .unknown()
        .transform((item): unknown[] =>
          item === undefined ? [] : Array.isArray(item) ? item : [item]
        ),
    }),
  }),
});

const itemSchema = z.object({
  title: text,
  "ht:approx_traffic": text.optional(),
  "ht:news_item": z.union([newsItemSchema, z.array(newsItemSchema)]).optional(),
});

const fallbackSchema = z.object({ keywords: z.array(z.string().min(1)) });

export const FALLBACK_KEYWORDS_FILE = "fixtures/trendingSearches.json";

export interface GoogleTrendsOptions {
  rssUrl: string;
  timeoutMs: number;
  fallbackKeywords: string[];
}

/** "200,000+" -> 200000 */
export function parseTraffic(traffic: string | undefined): number | null {
  if (!traffic) return null;
  const parsed = Number.parseInt(traffic.replace(/[,+]/g, ""), 10);
  return Number.isNaN(parsed) ? null : parsed;
}

export function loadFallbackKeywords(): string[] {
  return fallbackSchema.parse(readDataFile(FALLBACK_KEYWORDS_FILE)).keywords;
}

export function parseTrendingFeed(xml: string, region: string): TrendingSearch[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    processEntities: true,
    parseTagValue: false,
  });
  const feed = feedSchema.parse(parser.parse(xml));

  const searches: TrendingSearch[] = [];
  for (const entry of feed.rss.channel.item) {
    const item = itemSchema.safeParse(entry);
    if (!item.success || !item.data.title.trim()) continue;

    const news = item.data["ht:news_item"];
    const newsList = news === undefined ? [] : Array.isArray(news) ? news : [news];

    searches.push({
      keyword: item.data.title.trim(),
      rank: searches.length + 1,
      region,
      approxTraffic: parseTraffic(item.data["ht:approx_traffic"]),
      relatedNews: newsList
        .map((n) => n["ht:news_item_title"] ?? "")
        .filter(Boolean),
      source: "google_trends",
    });
  }
  return searches;
}

/**
 * Realtime search trends from the public Google Trends RSS feed. Any
 * failure falls back to a static keyword list.
 */
export class GoogleTrendsSource implements SearchTrendsSource {
  constructor(private readonly options: GoogleTrendsOptions) {}

  async getRealtimeTrendingSearches(region: string): Promise<TrendingSearch[]> {
    const geo = region.toUpperCase();
    try {
      const url = new URL(this.options.rssUrl);
      url.searchParams.set("geo", geo);

      const response = await fetch(url, {
        headers: { Accept: "application/rss+xml" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`Google Trends RSS returned ${response.status}`);
      }

      const searches = parseTrendingFeed(await response.text(), geo);
      if (searches.length === 0) {
        throw new Error("Google Trends RSS contained no items");
      }
      return searches;
    } catch (error) {
      logger.warn({ region: geo, error }, "Google Trends unavailable, using fallback keywords");
      return this.fallback(geo);
    }
  }

  fallback(region: string): TrendingSearch[] {
    return this.options.fallbackKeywords.map((keyword, index) => ({
      keyword,
      rank: index + 1,
      region,
      approxTraffic: null,
      relatedNews: [],
      source: "google_trends_fallback",
    }));
  }
}
