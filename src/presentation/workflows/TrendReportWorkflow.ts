import type { Platform } from "../../domain/value-objects/Platform.js";
import type { RankedKeyword } from "../../domain/entities/Keyword.js";
import type { AgeGroupKeywordResult } from "../../domain/entities/AgeGroupAnalysis.js";
import type { TrendServices } from "../../infrastructure/di/container.js";
import { container } from "../../infrastructure/di/container.js";
import { COLLECTION_CONFIG } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

export interface TrendReport {
  generatedAt: Date;
  platforms: Platform[];
  recordCounts: Partial<Record<Platform, number>>;
  topKeywords: RankedKeyword[];
  totalKeywords: number;
  ageGroups: AgeGroupKeywordResult[];
}

/**
 * One-shot report over the configured platforms: what is trending,
 * which keywords lead and how each age group leans. Every figure comes
 * from the same collected batch.
 */
export class TrendReportWorkflow {
  private readonly services: TrendServices;

  constructor(services?: TrendServices) {
    this.services = services ?? container.getServices();
  }

  async execute(platforms?: Platform[], limit = 10): Promise<TrendReport> {
    const selected = platforms ?? this.services.collect.platforms;
    logger.info({ platforms: selected, limit }, "Starting trend report workflow");

    // Step 1: Collect trending content
    logger.debug("Step 1: Collecting trending content");
    const batches = await this.services.collect.trending(
      selected,
      COLLECTION_CONFIG.keywordRankingPerPlatform
    );
    const recordCounts: Partial<Record<Platform, number>> = {};
    for (const [platform, records] of batches) {
      recordCounts[platform] = records.length;
    }

    const collected = Object.values(recordCounts).reduce((sum, n) => sum + n, 0);
    if (collected === 0) {
      logger.warn({ platforms: selected }, "No trending content collected");
    }

    // Step 2: Rank keywords
    logger.debug("Step 2: Ranking trending keywords");
    const ranked = this.services.rankKeywords.rankBatches(batches, limit);

    // Step 3: Age-group affinities
    logger.debug("Step 3: Computing age-group affinities");
    const ageGroups = this.services.ageGroupAffinities.fromBatches(batches, limit);

    const report: TrendReport = {
      generatedAt: ranked.timestamp,
      platforms: selected,
      recordCounts,
      topKeywords: ranked.keywords,
      totalKeywords: ranked.totalKeywords,
      ageGroups,
    };

    logger.info(
      {
        recordCounts,
        totalKeywords: ranked.totalKeywords,
        topKeyword: ranked.keywords[0]?.keyword ?? null,
        hottestGroup: hottestGroup(ageGroups),
      },
      "Trend report workflow completed"
    );
    return report;
  }
}

function hottestGroup(results: AgeGroupKeywordResult[]): string | null {
  let best: AgeGroupKeywordResult | null = null;
  for (const result of results) {
    if (!best || result.trendingScore > best.trendingScore) best = result;
  }
  return best && best.trendingScore > 0 ? best.ageGroup : null;
}
