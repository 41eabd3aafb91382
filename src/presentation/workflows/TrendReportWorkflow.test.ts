import { describe, it, expect, vi, beforeEach } from "vitest";
import { TrendReportWorkflow } from "./TrendReportWorkflow.js";
import type { TrendServices } from "../../infrastructure/di/container.js";
import type { SearchTrendsSource } from "../../domain/repositories/SearchTrendsSource.js";
import { CollectBatchesUseCase } from "../../application/use-cases/CollectBatchesUseCase.js";
import { PlatformContentUseCase } from "../../application/use-cases/PlatformContentUseCase.js";
import { RankTrendingKeywordsUseCase } from "../../application/use-cases/RankTrendingKeywordsUseCase.js";
import { AgeGroupAffinitiesUseCase } from "../../application/use-cases/AgeGroupAffinitiesUseCase.js";
import { KeywordAffinityReportUseCase } from "../../application/use-cases/KeywordAffinityReportUseCase.js";
import { AgeGroupTrendsUseCase } from "../../application/use-cases/AgeGroupTrendsUseCase.js";
import { AnalyzeTimeframeUseCase } from "../../application/use-cases/AnalyzeTimeframeUseCase.js";
import { ChannelInfoUseCase } from "../../application/use-cases/ChannelInfoUseCase.js";
import { AgeAffinityAnalyzer } from "../../domain/services/AgeAffinityAnalyzer.js";
import { TimeframeAnalyzer } from "../../domain/services/TimeframeAnalyzer.js";
import { AgeGroup } from "../../domain/value-objects/AgeGroup.js";
import { Platform } from "../../domain/value-objects/Platform.js";
import { makeRecord } from "../../test-utils/records.js";
import {
  fakePlatformCollaborator,
  fakeVideoCollaborator,
} from "../../test-utils/collaborators.js";

// Mock dependencies
vi.mock("../../infrastructure/di/container.js", () => ({
  container: {
    getServices: vi.fn(),
  },
}));

vi.mock("../../shared/utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { container } from "../../infrastructure/di/container.js";
import { logger } from "../../shared/utils/logger.js";

const now = new Date("2026-05-01T00:00:00Z");

function buildServices({ empty = false } = {}) {
  const youtube = fakeVideoCollaborator({
    getTrending: vi.fn().mockResolvedValue(
      empty
        ? []
        : [
            makeRecord({ id: "a", title: "game night", viewCount: 1000 }),
            makeRecord({ id: "b", title: "game review", viewCount: 0 }),
          ]
    ),
  });
  const tiktok = fakePlatformCollaborator(Platform.TIKTOK, {
    getTrending: vi.fn().mockResolvedValue(
      empty
        ? []
        : [makeRecord({ id: "c", platform: Platform.TIKTOK, title: "dance game" })]
    ),
  });
  const analyzer = new AgeAffinityAnalyzer({
    platformWeights: { youtube: 1, tiktok: 1, instagram: 1 },
    profiles: [
      {
        ageGroup: AgeGroup.FORTIES,
        keywords: ["game"],
        preferredPlatforms: [Platform.YOUTUBE],
        weight: 1,
      },
    ],
  });
  const searchTrends: SearchTrendsSource = {
    getRealtimeTrendingSearches: vi.fn().mockResolvedValue([]),
  };
  const collect = new CollectBatchesUseCase([youtube, tiktok]);
  const clock = () => now;

  const services: TrendServices = {
    collect,
    platformContent: new PlatformContentUseCase(collect),
    rankKeywords: new RankTrendingKeywordsUseCase(collect, clock),
    ageGroupAffinities: new AgeGroupAffinitiesUseCase(collect, analyzer, clock),
    keywordReport: new KeywordAffinityReportUseCase(collect, analyzer, clock),
    ageGroupTrends: new AgeGroupTrendsUseCase(collect, analyzer, clock),
    analyzeTimeframe: new AnalyzeTimeframeUseCase(
      new TimeframeAnalyzer(youtube, undefined, clock)
    ),
    channelInfo: new ChannelInfoUseCase(youtube),
    searchTrends,
  };
  return { services, youtube, tiktok };
}

describe("TrendReportWorkflow", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("takes its services from the container by default", () => {
    vi.mocked(container.getServices).mockReturnValue(buildServices().services);

    new TrendReportWorkflow();

    expect(container.getServices).toHaveBeenCalledTimes(1);
  });

  it("reports keywords and age-group affinities across all platforms", async () => {
    const workflow = new TrendReportWorkflow(buildServices().services);

    const report = await workflow.execute(undefined, 2);

    expect(report.generatedAt).toBe(now);
    expect(report.platforms).toEqual([Platform.YOUTUBE, Platform.TIKTOK]);
    expect(report.recordCounts).toEqual({ youtube: 2, tiktok: 1 });
    expect(report.topKeywords.map((kw) => [kw.keyword, kw.trendingScore])).toEqual([
      ["game", 41],
      ["night", 16],
    ]);
    expect(report.totalKeywords).toBe(4);
    expect(report.ageGroups).toHaveLength(1);
    expect(report.ageGroups[0]).toMatchObject({
      ageGroup: AgeGroup.FORTIES,
      keywords: [{ keyword: "game", score: 100, searchCount: 10000 }],
      trendingScore: 10,
    });
    expect(logger.info).toHaveBeenLastCalledWith(
      {
        recordCounts: { youtube: 2, tiktok: 1 },
        totalKeywords: 4,
        topKeyword: "game",
        hottestGroup: "40대",
      },
      "Trend report workflow completed"
    );
  });

  it("collects each platform once for the whole report", async () => {
    const { services, youtube, tiktok } = buildServices();

    const report = await new TrendReportWorkflow(services).execute(undefined, 2);

    expect(youtube.getTrending).toHaveBeenCalledTimes(1);
    expect(youtube.getTrending).toHaveBeenCalledWith(50);
    expect(tiktok.getTrending).toHaveBeenCalledTimes(1);
    expect(report.recordCounts).toEqual({ youtube: 2, tiktok: 1 });
  });

  it("warns when nothing was collected", async () => {
    const workflow = new TrendReportWorkflow(buildServices({ empty: true }).services);

    const report = await workflow.execute([Platform.TIKTOK], 5);

    expect(report.recordCounts).toEqual({ tiktok: 0 });
    expect(report.topKeywords).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      { platforms: [Platform.TIKTOK] },
      "No trending content collected"
    );
  });
});
