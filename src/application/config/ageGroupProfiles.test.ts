import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadAffinityConfig, parseAffinityConfig } from "./ageGroupProfiles.js";
import { AGE_GROUPS, AgeGroup } from "../../domain/value-objects/AgeGroup.js";
import { Platform } from "../../domain/value-objects/Platform.js";

describe("loadAffinityConfig", () => {
  it("loads a profile for every age group", () => {
    const config = loadAffinityConfig();

    expect(config.profiles.map((p) => p.ageGroup)).toEqual(AGE_GROUPS);
    expect(config.platformWeights).toEqual({
      youtube: 1.0,
      tiktok: 1.2,
      instagram: 1.1,
    });
  });

  it("keeps the repeated entries of the oldest group's dictionary", () => {
    const config = loadAffinityConfig();
    const oldest = config.profiles.find(
      (p) => p.ageGroup === AgeGroup.FIFTIES_PLUS
    );
    const keywords = oldest?.keywords ?? [];
    expect(keywords.filter((k) => k === "은퇴")).toHaveLength(2);
    expect(keywords.filter((k) => k === "연금")).toHaveLength(2);
    expect(keywords.filter((k) => k === "보험")).toHaveLength(2);
  });

  it("limits the oldest group to the video platform", () => {
    const config = loadAffinityConfig();
    const oldest = config.profiles.find(
      (p) => p.ageGroup === AgeGroup.FIFTIES_PLUS
    );
    expect(oldest?.preferredPlatforms).toEqual([Platform.YOUTUBE]);
    expect(oldest?.weight).toBe(0.8);
  });
});

describe("parseAffinityConfig", () => {
  const platformWeights = { youtube: 1, tiktok: 1, instagram: 1 };

  it("keeps repeated dictionary entries", () => {
    const config = parseAffinityConfig({
      platformWeights,
      profiles: [
        {
          ageGroup: "50대+",
          keywords: ["연금", "보험", "연금"],
          preferredPlatforms: ["youtube"],
          weight: 0.8,
        },
      ],
    });

    expect(config.profiles[0].keywords).toEqual(["연금", "보험", "연금"]);
  });

  it("rejects unknown platforms", () => {
    expect(() =>
      parseAffinityConfig({
        platformWeights,
        profiles: [
          {
            ageGroup: "10대",
            keywords: ["게임"],
            preferredPlatforms: ["myspace"],
            weight: 1,
          },
        ],
      })
    ).toThrow(ZodError);
  });

  it("rejects a group configured twice", () => {
    const profile = {
      ageGroup: "10대",
      keywords: ["게임"],
      preferredPlatforms: ["youtube"],
      weight: 1,
    };
    expect(() =>
      parseAffinityConfig({ platformWeights, profiles: [profile, profile] })
    ).toThrow(ZodError);
  });
});
