import type { ContentBatches } from "../../domain/entities/ContentRecord.js";
import type { AgeGroupKeywordResult } from "../../domain/entities/AgeGroupAnalysis.js";
import type { Platform } from "../../domain/value-objects/Platform.js";
import type { AgeAffinityAnalyzer } from "../../domain/services/AgeAffinityAnalyzer.js";
import type { CollectBatchesUseCase } from "./CollectBatchesUseCase.js";
import { COLLECTION_CONFIG } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

export class AgeGroupAffinitiesUseCase {
  constructor(
    private readonly collect: CollectBatchesUseCase,
    private readonly analyzer: AgeAffinityAnalyzer,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async execute(platforms: Platform[], limit: number): Promise<AgeGroupKeywordResult[]> {
    const batches = await this.collect.trending(
      platforms,
      COLLECTION_CONFIG.keywordRankingPerPlatform
    );
    return this.fromBatches(batches, limit);
  }

  fromBatches(batches: ContentBatches, limit: number): AgeGroupKeywordResult[] {
    const results = this.analyzer.affinitiesForAllGroups(batches, limit, this.clock());

    logger.debug(
      { groups: results.length, platforms: Array.from(batches.keys()) },
      "Computed age-group keyword affinities"
    );
    return results;
  }
}
