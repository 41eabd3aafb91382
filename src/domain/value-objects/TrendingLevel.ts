export enum TrendingLevel {
  HOT = "🔥 매우 인기",
  RISING = "📈 인기 상승",
  GROWING = "📊 관심 증가",
  NORMAL = "📋 일반",
}

export enum TrendDirection {
  RISING = "상승",
  STEADY = "유지",
  FALLING = "하락",
}

// Thresholds are exclusive lower bounds
export const TRENDING_LEVEL_THRESHOLDS = {
  hot: 500,
  rising: 200,
  growing: 50,
} as const;

export function getTrendingLevel(score: number): TrendingLevel {
  if (score > TRENDING_LEVEL_THRESHOLDS.hot) return TrendingLevel.HOT;
  if (score > TRENDING_LEVEL_THRESHOLDS.rising) return TrendingLevel.RISING;
  if (score > TRENDING_LEVEL_THRESHOLDS.growing) return TrendingLevel.GROWING;
  return TrendingLevel.NORMAL;
}
