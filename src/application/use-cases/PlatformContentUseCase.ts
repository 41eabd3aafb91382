import type { ContentRecord, HashtagStat } from "../../domain/entities/ContentRecord.js";
import type { Platform } from "../../domain/value-objects/Platform.js";
import type { CollectBatchesUseCase } from "./CollectBatchesUseCase.js";
import { toCollaboratorError } from "./CollectBatchesUseCase.js";
import { logger } from "../../shared/utils/logger.js";

/**
 * Single-platform reads. Failures are not degraded.
 */
export class PlatformContentUseCase {
  constructor(private readonly collect: CollectBatchesUseCase) {}

  async trending(platform: Platform, maxResults: number): Promise<ContentRecord[]> {
    const batches = await this.collect.trending([platform], maxResults);
    return batches.get(platform) ?? [];
  }

  async search(
    platform: Platform,
    query: string,
    maxResults: number
  ): Promise<ContentRecord[]> {
    const batches = await this.collect.search([platform], query, maxResults);
    return batches.get(platform) ?? [];
  }

  async hashtags(platform: Platform, maxResults: number): Promise<HashtagStat[]> {
    const collaborator = this.collect.collaboratorFor(platform);
    try {
      const hashtags = await collaborator.getTrendingHashtags(maxResults);
      logger.debug({ platform, count: hashtags.length }, "Fetched trending hashtags");
      return hashtags;
    } catch (error) {
      throw toCollaboratorError(platform, error);
    }
  }
}
