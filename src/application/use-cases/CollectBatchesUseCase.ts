import type { ContentBatches, ContentRecord } from "../../domain/entities/ContentRecord.js";
import type { PlatformCollaborator } from "../../domain/repositories/PlatformCollaborator.js";
import type { Platform } from "../../domain/value-objects/Platform.js";
import {
  CollaboratorError,
  DomainError,
  InvalidArgumentError,
} from "../../domain/errors/DomainError.js";
import { logger } from "../../shared/utils/logger.js";

type Load = (collaborator: PlatformCollaborator) => Promise<ContentRecord[]>;

export interface CollectOptions {
  /** Degrade a failing platform to an empty batch even when it is the only one. */
  degrade?: boolean;
}

export function toCollaboratorError(platform: Platform, error: unknown): DomainError {
  return error instanceof DomainError ? error : CollaboratorError.wrap(platform, error);
}

/**
 * Fans one request out to several platforms. With more than one platform
 * a failing platform contributes an empty batch; with exactly one the
 * failure reaches the caller unless `degrade` is set.
 */
export class CollectBatchesUseCase {
  private readonly collaborators: Map<Platform, PlatformCollaborator>;

  constructor(collaborators: PlatformCollaborator[]) {
    this.collaborators = new Map(collaborators.map((c) => [c.platform, c]));
  }

  get platforms(): Platform[] {
    return Array.from(this.collaborators.keys());
  }

  collaboratorFor(platform: Platform): PlatformCollaborator {
    const collaborator = this.collaborators.get(platform);
    if (!collaborator) {
      throw new InvalidArgumentError(`No collaborator registered for ${platform}`);
    }
    return collaborator;
  }

  trending(
    platforms: Platform[],
    maxResults: number,
    options: CollectOptions = {}
  ): Promise<ContentBatches> {
    return this.collect(platforms, "trending", (c) => c.getTrending(maxResults), options);
  }

  search(
    platforms: Platform[],
    query: string,
    maxResults: number,
    options: CollectOptions = {}
  ): Promise<ContentBatches> {
    return this.collect(platforms, "search", (c) => c.search(query, maxResults), options);
  }

  private async collect(
    platforms: Platform[],
    operation: string,
    load: Load,
    options: CollectOptions
  ): Promise<ContentBatches> {
    const requested = Array.from(new Set(platforms));
    const collaborators = requested.map((platform) => this.collaboratorFor(platform));
    const batches: ContentBatches = new Map();

    if (collaborators.length === 1 && !options.degrade) {
      const [collaborator] = collaborators;
      try {
        batches.set(collaborator.platform, await load(collaborator));
      } catch (error) {
        throw toCollaboratorError(collaborator.platform, error);
      }
      return batches;
    }

    const results = await Promise.allSettled(collaborators.map(load));
    results.forEach((result, index) => {
      const platform = requested[index];
      if (result.status === "fulfilled") {
        batches.set(platform, result.value);
        logger.debug({ platform, operation, count: result.value.length }, "Collected batch");
      } else {
        logger.warn(
          { platform, operation, error: result.reason },
          "Platform collection failed, continuing without it"
        );
        batches.set(platform, []);
      }
    });

    return batches;
  }
}
