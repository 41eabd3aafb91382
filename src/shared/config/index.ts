import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  YOUTUBE_API_KEY: z.string().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  DEFAULT_REGION: z.string().length(2).default("KR"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  RATE_LIMIT_DELAY_MS: z.coerce.number().int().min(0).default(0),
  DESCRIPTION_MAX_LENGTH: z.coerce.number().int().min(1).default(200),
  SHORT_FORM_MAX_SECONDS: z.coerce.number().int().positive().default(180),
  GOOGLE_TRENDS_RSS_URL: z
    .string()
    .url()
    .default("https://trends.google.com/trending/rss"),
});

// Empty strings in .env mean "unset"
const blankToUndefined = (value: string | undefined) =>
  value === undefined || value.trim() === "" ? undefined : value;

export const env = envSchema.parse({
  YOUTUBE_API_KEY: blankToUndefined(process.env.YOUTUBE_API_KEY),
  PORT: blankToUndefined(process.env.PORT),
  HOST: blankToUndefined(process.env.HOST),
  DEFAULT_REGION: blankToUndefined(process.env.DEFAULT_REGION),
  HTTP_TIMEOUT_MS: blankToUndefined(process.env.HTTP_TIMEOUT_MS),
  RATE_LIMIT_DELAY_MS: blankToUndefined(process.env.RATE_LIMIT_DELAY_MS),
  DESCRIPTION_MAX_LENGTH: blankToUndefined(process.env.DESCRIPTION_MAX_LENGTH),
  SHORT_FORM_MAX_SECONDS: blankToUndefined(process.env.SHORT_FORM_MAX_SECONDS),
  GOOGLE_TRENDS_RSS_URL: blankToUndefined(process.env.GOOGLE_TRENDS_RSS_URL),
});

// Per-request result caps
export const COLLECTION_CONFIG = {
  trendingPerPlatform: 25,
  searchPerPlatform: 20,
  keywordRankingPerPlatform: 50,
  hashtagSampleSize: 50,
  // YouTube Data API page-size ceiling
  maxPageSize: 50,
} as const;

export const ANALYZE_DEFAULTS = {
  timeframeDays: 7,
  form: "both",
  shortFormMaxSeconds: env.SHORT_FORM_MAX_SECONDS,
  minViewCount: 0,
  minViewsPerHour: 0,
  maxResultsPerChannel: 25,
  maxResultsPerKeyword: 25,
  region: env.DEFAULT_REGION,
} as const;
