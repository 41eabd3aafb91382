import type { KeywordAnalysis } from "../../domain/entities/AgeGroupAnalysis.js";
import type { Platform } from "../../domain/value-objects/Platform.js";
import type { AgeAffinityAnalyzer } from "../../domain/services/AgeAffinityAnalyzer.js";
import type { CollectBatchesUseCase } from "./CollectBatchesUseCase.js";
import { InvalidArgumentError } from "../../domain/errors/DomainError.js";
import { COLLECTION_CONFIG } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

export class KeywordAffinityReportUseCase {
  constructor(
    private readonly collect: CollectBatchesUseCase,
    private readonly analyzer: AgeAffinityAnalyzer,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async execute(keyword: string, platforms: Platform[]): Promise<KeywordAnalysis> {
    const query = keyword.trim();
    if (!query) {
      throw new InvalidArgumentError("Keyword must not be empty");
    }

    const batches = await this.collect.search(
      platforms,
      query,
      COLLECTION_CONFIG.searchPerPlatform
    );
    const report = this.analyzer.analyzeKeyword(query, batches, this.clock());

    logger.info(
      { keyword: query, totalMentions: report.totalMentions },
      "Built keyword affinity report"
    );
    return report;
  }
}
