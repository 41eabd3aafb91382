import type { ContentRecord } from "../entities/ContentRecord.js";

export type EngagementCounters = Pick<
  ContentRecord,
  "viewCount" | "likeCount" | "commentCount" | "shareCount"
>;

export const ENGAGEMENT_WEIGHTS = {
  views: 0.1,
  likes: 0.3,
  comments: 0.4,
  shares: 0.2,
} as const;

// One viral record must not decide the whole ranking
export const MAX_ENGAGEMENT_SCORE = 1000;

export function engagementScore(counters: EngagementCounters): number {
  const score =
    (counters.viewCount ?? 0) * ENGAGEMENT_WEIGHTS.views +
    (counters.likeCount ?? 0) * ENGAGEMENT_WEIGHTS.likes +
    (counters.commentCount ?? 0) * ENGAGEMENT_WEIGHTS.comments +
    (counters.shareCount ?? 0) * ENGAGEMENT_WEIGHTS.shares;

  return Math.min(score, MAX_ENGAGEMENT_SCORE);
}
