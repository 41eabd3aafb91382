import { describe, it, expect } from "vitest";
import { subDays } from "date-fns";
import { AgeAffinityAnalyzer } from "./AgeAffinityAnalyzer.js";
import type { AffinityConfig } from "../entities/AgeGroupProfile.js";
import { AgeGroup } from "../value-objects/AgeGroup.js";
import { Platform } from "../value-objects/Platform.js";
import { TrendDirection, TrendingLevel } from "../value-objects/TrendingLevel.js";
import { InvalidArgumentError } from "../errors/DomainError.js";
import { batchesOf, makeRecord } from "../../test-utils/records.js";

const config: AffinityConfig = {
  platformWeights: {
    [Platform.YOUTUBE]: 1,
    [Platform.TIKTOK]: 1.5,
    [Platform.INSTAGRAM]: 2,
  },
  profiles: [
    {
      ageGroup: AgeGroup.TEENS,
      keywords: ["게임", "아이돌"],
      preferredPlatforms: [Platform.TIKTOK, Platform.YOUTUBE],
      weight: 1,
    },
    {
      ageGroup: AgeGroup.TWENTIES,
      keywords: ["취업", "게임"],
      preferredPlatforms: [Platform.INSTAGRAM, Platform.YOUTUBE],
      weight: 1.5,
    },
  ],
};

const now = new Date("2026-03-01T00:00:00Z");

describe("AgeAffinityAnalyzer", () => {
  const analyzer = new AgeAffinityAnalyzer(config);

  describe("affinitiesForAllGroups", () => {
    const batches = batchesOf([
      [
        Platform.YOUTUBE,
        [
          makeRecord({
            id: "yt-1",
            title: "게임 대박 리뷰",
            viewCount: 1000,
            likeCount: 100,
            category: "Gaming",
          }),
        ],
      ],
      [
        Platform.TIKTOK,
        [
          makeRecord({
            id: "tt-1",
            platform: Platform.TIKTOK,
            title: "아이돌 직캠",
            viewCount: 500,
          }),
        ],
      ],
      [
        Platform.INSTAGRAM,
        [
          makeRecord({
            id: "ig-1",
            platform: Platform.INSTAGRAM,
            title: "취업 준비 실패",
            viewCount: 2000,
          }),
        ],
      ],
    ]);

    it("scores dictionary matches by engagement and weights", () => {
      const [teens, twenties] = analyzer.affinitiesForAllGroups(batches, 10, now);

      expect(teens).toEqual({
        ageGroup: AgeGroup.TEENS,
        keywords: [
          {
            keyword: "게임",
            score: 130,
            searchCount: 13000,
            trendingLevel: TrendingLevel.GROWING,
          },
          {
            keyword: "아이돌",
            score: 75,
            searchCount: 7500,
            trendingLevel: TrendingLevel.GROWING,
          },
        ],
        totalSearches: 20500,
        platformDistribution: { tiktok: 153, youtube: 102 },
        trendingScore: 10.25,
        timestamp: now,
      });

      expect(twenties.keywords.map((kw) => [kw.keyword, kw.score])).toEqual([
        ["취업", 600],
        ["게임", 195],
      ]);
      expect(twenties.keywords[0].trendingLevel).toBe(TrendingLevel.HOT);
      expect(twenties.totalSearches).toBe(79500);
      expect(twenties.platformDistribution).toEqual({
        instagram: 795,
        youtube: 397,
      });
      expect(twenties.trendingScore).toBe(39.75);
    });

    it("keeps only the top keywords per group", () => {
      const [teens] = analyzer.affinitiesForAllGroups(batches, 1, now);
      expect(teens.keywords.map((kw) => kw.keyword)).toEqual(["게임"]);
      expect(teens.totalSearches).toBe(13000);
    });

    it("matches tags and hashtags case-insensitively", () => {
      const custom = new AgeAffinityAnalyzer({
        ...config,
        profiles: [{ ...config.profiles[0], keywords: ["BTS"] }],
      });
      const [teens] = custom.affinitiesForAllGroups(
        batchesOf([
          [
            Platform.YOUTUBE,
            [makeRecord({ title: "무대 영상", tags: ["bts"], viewCount: 100 })],
          ],
        ]),
        10,
        now
      );

      expect(teens.keywords).toEqual([
        {
          keyword: "BTS",
          score: 10,
          searchCount: 1000,
          trendingLevel: TrendingLevel.NORMAL,
        },
      ]);
    });

    it("reports zeros for a group without matches", () => {
      const [teens] = analyzer.affinitiesForAllGroups(new Map(), 10, now);
      expect(teens.keywords).toEqual([]);
      expect(teens.totalSearches).toBe(0);
      expect(teens.trendingScore).toBe(0);
      expect(teens.platformDistribution).toEqual({ tiktok: 0, youtube: 0 });
    });
  });

  describe("analyzeKeyword", () => {
    const batches = batchesOf([
      [
        Platform.YOUTUBE,
        [
          makeRecord({
            id: "yt-1",
            title: "게임 신작 최고",
            description: "완벽한 게임",
            viewCount: 1000,
            publishedAt: subDays(now, 1),
          }),
        ],
      ],
      [
        Platform.TIKTOK,
        [
          makeRecord({
            id: "tt-1",
            platform: Platform.TIKTOK,
            title: "모바일 게임 실망",
            viewCount: 200,
            publishedAt: subDays(now, 10),
          }),
          makeRecord({
            id: "tt-2",
            platform: Platform.TIKTOK,
            title: "게임 추천",
            viewCount: 300,
          }),
        ],
      ],
      [
        Platform.INSTAGRAM,
        [makeRecord({ id: "ig-1", platform: Platform.INSTAGRAM, title: "요리" })],
      ],
    ]);

    it("summarises mentions, engagement and relevance per group", () => {
      const report = analyzer.analyzeKeyword("게임", batches, now);

      // Summed over both configured groups
      expect(report.totalMentions).toBe(6);
      expect(report.platformBreakdown).toEqual({ youtube: 2, tiktok: 4 });
      expect(report.ageGroups[AgeGroup.TEENS]).toEqual({
        mentions: 3,
        platformMentions: { youtube: 1, tiktok: 2 },
        engagementScore: 150,
        relevanceScore: 100,
        trendingLevel: TrendingLevel.GROWING,
      });
      expect(report.ageGroups[AgeGroup.TWENTIES]?.relevanceScore).toBe(150);
      expect(report.trendingTrend).toBe(TrendDirection.STEADY);
      expect(report.timestamp).toBe(now);
    });

    it("mines related Hangul tokens and sentiment", () => {
      const report = analyzer.analyzeKeyword("게임", batches, now);

      expect(report.relatedKeywords).toEqual([
        "게임",
        "신작",
        "최고",
        "완벽한",
        "모바일",
        "실망",
        "추천",
      ]);
      expect(report.sentimentScore).toBe(0.5);
    });

    it("returns an empty report for a keyword nobody mentions", () => {
      const report = analyzer.analyzeKeyword("헬스", batches, now);

      expect(report.totalMentions).toBe(0);
      expect(report.platformBreakdown).toEqual({});
      expect(report.relatedKeywords).toEqual([]);
      expect(report.sentimentScore).toBe(0);
      expect(report.trendingTrend).toBe(TrendDirection.STEADY);
      expect(report.ageGroups[AgeGroup.TEENS]).toEqual({
        mentions: 0,
        platformMentions: {},
        engagementScore: 0,
        relevanceScore: 10,
        trendingLevel: TrendingLevel.NORMAL,
      });
    });

    it("rejects a blank keyword", () => {
      expect(() => analyzer.analyzeKeyword("  ", batches, now)).toThrow(
        InvalidArgumentError
      );
    });
  });

  describe("keywordsForGroup", () => {
    it("scores a repeated dictionary entry once per repeat", () => {
      const profile = {
        ageGroup: AgeGroup.FIFTIES_PLUS,
        keywords: ["은퇴", "연금", "은퇴"],
        preferredPlatforms: [Platform.YOUTUBE],
        weight: 1,
      };
      const records = [makeRecord({ title: "은퇴 준비", viewCount: 1000 })];

      expect(analyzer.keywordsForGroup(records, profile, 10)).toEqual([
        {
          keyword: "은퇴",
          score: 200,
          searchCount: 20000,
          trendingLevel: TrendingLevel.GROWING,
        },
      ]);
    });
  });

  describe("relevance", () => {
    it("halves the weight for a partial dictionary overlap", () => {
      const twenties = analyzer.getProfile(AgeGroup.TWENTIES);
      expect(analyzer.relevance("게임기", twenties)).toBe(75);
      expect(analyzer.relevance("취업", twenties)).toBe(150);
      expect(analyzer.relevance("요리", twenties)).toBe(10);
    });
  });

  describe("trendDirection", () => {
    const dated = (daysAgo: number) =>
      makeRecord({ publishedAt: subDays(now, daysAgo) });

    it("is rising when most dated records are recent", () => {
      expect(
        analyzer.trendDirection([dated(1), dated(2), dated(3), dated(30)], now)
      ).toBe(TrendDirection.RISING);
    });

    it("is falling when few dated records are recent", () => {
      expect(
        analyzer.trendDirection([dated(1), dated(20), dated(30), dated(40)], now)
      ).toBe(TrendDirection.FALLING);
    });

    it("ignores undated records", () => {
      expect(
        analyzer.trendDirection([dated(1), makeRecord(), makeRecord()], now)
      ).toBe(TrendDirection.RISING);
    });
  });

  describe("sentimentScore", () => {
    it("is negative when complaints dominate", () => {
      // "실패" is listed twice among the negative words
      const records = [makeRecord({ title: "최악 실패", description: "추천" })];
      expect(analyzer.sentimentScore(records)).toBe(-0.5);
    });

    it("counts each listed word once however often it appears", () => {
      const records = [makeRecord({ title: "최고 최고 최고 실망" })];
      expect(analyzer.sentimentScore(records)).toBe(0);
    });
  });

  describe("ageGroupTrends", () => {
    const batches = batchesOf([
      [
        Platform.YOUTUBE,
        [
          makeRecord({
            id: "yt-1",
            title: "게임 대박 리뷰",
            viewCount: 1000,
            likeCount: 100,
            category: "Gaming",
          }),
        ],
      ],
      [
        Platform.TIKTOK,
        [
          makeRecord({
            id: "tt-1",
            platform: Platform.TIKTOK,
            title: "아이돌 직캠",
            viewCount: 500,
          }),
          makeRecord({
            id: "tt-2",
            platform: Platform.TIKTOK,
            title: "주식 공부",
            viewCount: 900,
          }),
        ],
      ],
    ]);

    it("builds the group's trend view from matching records", () => {
      const trends = analyzer.ageGroupTrends(AgeGroup.TEENS, batches, 10, now);

      expect(trends.ageGroup).toBe(AgeGroup.TEENS);
      expect(trends.topKeywords).toEqual([
        { keyword: "게임", score: 130, trendingLevel: TrendingLevel.GROWING },
        { keyword: "대박", score: 130, trendingLevel: TrendingLevel.GROWING },
        { keyword: "리뷰", score: 130, trendingLevel: TrendingLevel.GROWING },
        { keyword: "아이돌", score: 50, trendingLevel: TrendingLevel.NORMAL },
        { keyword: "직캠", score: 50, trendingLevel: TrendingLevel.NORMAL },
      ]);
      expect(trends.trendingTopics).toEqual([
        { topic: "Gaming", count: 1, engagement: 130, avgEngagement: 130 },
        { topic: "기타", count: 1, engagement: 50, avgEngagement: 50 },
      ]);
      expect(trends.platformPreferences).toEqual({ tiktok: 50, youtube: 50 });
      expect(trends.contentCategories).toEqual({ Gaming: 1, 기타: 1 });
    });

    it("rejects an age group that is not configured", () => {
      expect(() =>
        analyzer.ageGroupTrends(AgeGroup.FORTIES, batches, 10, now)
      ).toThrow(InvalidArgumentError);
    });
  });
});
