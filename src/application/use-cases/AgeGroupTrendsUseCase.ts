import type { AgeGroupTrends } from "../../domain/entities/AgeGroupAnalysis.js";
import type { AgeAffinityAnalyzer } from "../../domain/services/AgeAffinityAnalyzer.js";
import { parseAgeGroup } from "../../domain/value-objects/AgeGroup.js";
import type { CollectBatchesUseCase } from "./CollectBatchesUseCase.js";

export class AgeGroupTrendsUseCase {
  constructor(
    private readonly collect: CollectBatchesUseCase,
    private readonly analyzer: AgeAffinityAnalyzer,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Collects twice the limit from the group's preferred platforms, since
   * only records mentioning the group's dictionary are kept. A platform
   * that fails leaves an empty view rather than failing the request.
   */
  async execute(ageGroupLabel: string, limit: number): Promise<AgeGroupTrends> {
    const profile = this.analyzer.getProfile(parseAgeGroup(ageGroupLabel));
    const batches = await this.collect.trending(
      profile.preferredPlatforms,
      limit * 2,
      { degrade: true }
    );
    return this.analyzer.ageGroupTrends(profile.ageGroup, batches, limit, this.clock());
  }
}
