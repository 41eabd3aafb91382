import type { ContentBatches } from "../../domain/entities/ContentRecord.js";
import type { RankedKeyword } from "../../domain/entities/Keyword.js";
import type { Platform } from "../../domain/value-objects/Platform.js";
import { TrendingAggregator } from "../../domain/services/TrendingAggregator.js";
import type { CollectBatchesUseCase } from "./CollectBatchesUseCase.js";
import { COLLECTION_CONFIG } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

export interface RankedKeywords {
  keywords: RankedKeyword[];
  totalKeywords: number;
  timestamp: Date;
}

export const REALTIME_ITEMS_PER_PLATFORM = 10;

export interface RealtimeTrends {
  timestamp: Date;
  /** Full ranking, not sliced. */
  trendingKeywords: RankedKeyword[];
  /** Leading records per platform, in collection order. */
  topItems: ContentBatches;
  totalTrends: number;
}

export class RankTrendingKeywordsUseCase {
  private readonly aggregator = new TrendingAggregator();

  constructor(
    private readonly collect: CollectBatchesUseCase,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async execute(platforms: Platform[], limit: number): Promise<RankedKeywords> {
    const batches = await this.collect.trending(
      platforms,
      COLLECTION_CONFIG.keywordRankingPerPlatform
    );
    return this.rankBatches(batches, limit);
  }

  /**
   * The full keyword ranking alongside the leading records of each
   * platform. Failing platforms contribute nothing.
   */
  async realtime(platforms: Platform[], maxResults: number): Promise<RealtimeTrends> {
    const batches = await this.collect.trending(platforms, maxResults, { degrade: true });
    const topItems: ContentBatches = new Map();
    let totalTrends = 0;
    for (const [platform, records] of batches) {
      topItems.set(platform, records.slice(0, REALTIME_ITEMS_PER_PLATFORM));
      totalTrends += records.length;
    }

    return {
      timestamp: this.clock(),
      trendingKeywords: this.aggregator.rank(batches),
      topItems,
      totalTrends,
    };
  }

  /** Ranks an already collected batch. */
  rankBatches(batches: ContentBatches, limit: number): RankedKeywords {
    const ranking = this.aggregator.rank(batches);

    logger.info(
      { platforms: Array.from(batches.keys()), totalKeywords: ranking.length },
      "Ranked trending keywords"
    );

    return {
      keywords: ranking.slice(0, limit),
      totalKeywords: ranking.length,
      timestamp: this.clock(),
    };
  }
}
