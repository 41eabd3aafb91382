import { YouTubeCollaborator } from "../youtube/YouTubeCollaborator.js";
import { FixtureCollaborator, loadPlatformFixture } from "../fixtures/FixtureCollaborator.js";
import { GoogleTrendsSource, loadFallbackKeywords } from "../google-trends/GoogleTrendsSource.js";
import type {
  PlatformCollaborator,
  VideoPlatformCollaborator,
} from "../../domain/repositories/PlatformCollaborator.js";
import type { SearchTrendsSource } from "../../domain/repositories/SearchTrendsSource.js";
import { Platform } from "../../domain/value-objects/Platform.js";
import { ContentNormalizer } from "../../domain/services/ContentNormalizer.js";
import { AgeAffinityAnalyzer } from "../../domain/services/AgeAffinityAnalyzer.js";
import type { AffinityConfig } from "../../domain/entities/AgeGroupProfile.js";
import { TimeframeAnalyzer } from "../../domain/services/TimeframeAnalyzer.js";
import { loadAffinityConfig } from "../../application/config/ageGroupProfiles.js";
import { CollectBatchesUseCase } from "../../application/use-cases/CollectBatchesUseCase.js";
import { PlatformContentUseCase } from "../../application/use-cases/PlatformContentUseCase.js";
import { RankTrendingKeywordsUseCase } from "../../application/use-cases/RankTrendingKeywordsUseCase.js";
import { AgeGroupAffinitiesUseCase } from "../../application/use-cases/AgeGroupAffinitiesUseCase.js";
import { KeywordAffinityReportUseCase } from "../../application/use-cases/KeywordAffinityReportUseCase.js";
import { AgeGroupTrendsUseCase } from "../../application/use-cases/AgeGroupTrendsUseCase.js";
import { AnalyzeTimeframeUseCase } from "../../application/use-cases/AnalyzeTimeframeUseCase.js";
import { ChannelInfoUseCase } from "../../application/use-cases/ChannelInfoUseCase.js";
import { COLLECTION_CONFIG, env } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

/**
 * Use cases and the search-trends source, wired for one process.
 */
export interface TrendServices {
  collect: CollectBatchesUseCase;
  platformContent: PlatformContentUseCase;
  rankKeywords: RankTrendingKeywordsUseCase;
  ageGroupAffinities: AgeGroupAffinitiesUseCase;
  keywordReport: KeywordAffinityReportUseCase;
  ageGroupTrends: AgeGroupTrendsUseCase;
  analyzeTimeframe: AnalyzeTimeframeUseCase;
  channelInfo: ChannelInfoUseCase;
  searchTrends: SearchTrendsSource;
}

/**
 * Dependency Injection Container
 * Provides instances of infrastructure implementations
 */
export class Container {
  private normalizer: ContentNormalizer | null = null;
  private youtube: VideoPlatformCollaborator | null = null;
  private collaborators: PlatformCollaborator[] | null = null;
  private searchTrends: SearchTrendsSource | null = null;
  private services: TrendServices | null = null;

  getNormalizer(): ContentNormalizer {
    if (!this.normalizer) {
      this.normalizer = new ContentNormalizer({
        descriptionMaxLength: env.DESCRIPTION_MAX_LENGTH,
      });
    }
    return this.normalizer;
  }

  getYouTubeCollaborator(): VideoPlatformCollaborator {
    if (!this.youtube) {
      if (!env.YOUTUBE_API_KEY) {
        logger.warn("YOUTUBE_API_KEY is not set; YouTube requests will fail");
      }
      this.youtube = new YouTubeCollaborator(
        {
          apiKey: env.YOUTUBE_API_KEY,
          region: env.DEFAULT_REGION,
          timeoutMs: env.HTTP_TIMEOUT_MS,
          rateLimitDelayMs: env.RATE_LIMIT_DELAY_MS,
          hashtagSampleSize: COLLECTION_CONFIG.hashtagSampleSize,
        },
        this.getNormalizer()
      );
    }
    return this.youtube;
  }

  getPlatformCollaborators(): PlatformCollaborator[] {
    if (!this.collaborators) {
      this.collaborators = [
        this.getYouTubeCollaborator(),
        new FixtureCollaborator(
          Platform.TIKTOK,
          loadPlatformFixture(Platform.TIKTOK),
          this.getNormalizer()
        ),
        new FixtureCollaborator(
          Platform.INSTAGRAM,
          loadPlatformFixture(Platform.INSTAGRAM),
          this.getNormalizer()
        ),
      ];
    }
    return this.collaborators;
  }

  getSearchTrendsSource(): SearchTrendsSource {
    if (!this.searchTrends) {
      this.searchTrends = new GoogleTrendsSource({
        rssUrl: env.GOOGLE_TRENDS_RSS_URL,
        timeoutMs: env.HTTP_TIMEOUT_MS,
        fallbackKeywords: loadFallbackKeywords(),
      });
    }
    return this.searchTrends;
  }

  getServices(): TrendServices {
    if (!this.services) {
      this.services = buildTrendServices({
        collaborators: this.getPlatformCollaborators(),
        youtube: this.getYouTubeCollaborator(),
        searchTrends: this.getSearchTrendsSource(),
        affinityConfig: loadAffinityConfig(),
        normalizer: this.getNormalizer(),
      });
    }
    return this.services;
  }
}

export interface TrendServiceDependencies {
  collaborators: PlatformCollaborator[];
  youtube: VideoPlatformCollaborator;
  searchTrends: SearchTrendsSource;
  affinityConfig: AffinityConfig;
  normalizer?: ContentNormalizer;
  clock?: () => Date;
}

export function buildTrendServices(deps: TrendServiceDependencies): TrendServices {
  const clock = deps.clock ?? (() => new Date());
  const collect = new CollectBatchesUseCase(deps.collaborators);
  const affinityAnalyzer = new AgeAffinityAnalyzer(deps.affinityConfig);
  const timeframeAnalyzer = new TimeframeAnalyzer(
    deps.youtube,
    deps.normalizer ?? new ContentNormalizer(),
    clock
  );

  return {
    collect,
    platformContent: new PlatformContentUseCase(collect),
    rankKeywords: new RankTrendingKeywordsUseCase(collect, clock),
    ageGroupAffinities: new AgeGroupAffinitiesUseCase(collect, affinityAnalyzer, clock),
    keywordReport: new KeywordAffinityReportUseCase(collect, affinityAnalyzer, clock),
    ageGroupTrends: new AgeGroupTrendsUseCase(collect, affinityAnalyzer, clock),
    analyzeTimeframe: new AnalyzeTimeframeUseCase(timeframeAnalyzer),
    channelInfo: new ChannelInfoUseCase(deps.youtube),
    searchTrends: deps.searchTrends,
  };
}

// Singleton instance
export const container = new Container();
