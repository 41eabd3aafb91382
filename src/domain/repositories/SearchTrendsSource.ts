export interface TrendingSearch {
  keyword: string;
  rank: number;
  region: string;
  approxTraffic: number | null;
  relatedNews: string[];
  source: "google_trends" | "google_trends_fallback";
}

export interface SearchTrendsSource {
  getRealtimeTrendingSearches(region: string): Promise<TrendingSearch[]>;
}
