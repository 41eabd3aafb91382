export type ContentForm = "shorts" | "long" | "both";

export interface AnalyzeRow {
  videoId: string;
  channelId: string | null;
  channelName: string;
  title: string;
  publishedAt: Date | null;
  viewCount: number | null;
  viewsPerHour: number | null;
  subscriberCount: number | null;
  viewToSubscriberRatio: number | null;
  duration: string | null;
  durationSeconds: number | null;
  videoUrl: string;
  thumbnailUrl: string | null;
}

export interface AnalyzeRequest {
  channels: string[];
  keywords: string[];
  timeframeDays: number;
  form: ContentForm;
  shortFormMaxSeconds: number;
  minViewCount: number;
  minViewsPerHour: number;
  maxResultsPerChannel: number;
  maxResultsPerKeyword: number;
  region: string;
}

export interface AnalyzeResult {
  rows: AnalyzeRow[];
  total: number; // rows before the threshold filter
  filtered: number; // rows after it
  settings: AnalyzeRequest;
}
