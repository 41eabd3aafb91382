import { vi } from "vitest";
import type {
  PlatformCollaborator,
  VideoPlatformCollaborator,
} from "../domain/repositories/PlatformCollaborator.js";
import type { ChannelInfo } from "../domain/entities/ChannelInfo.js";
import { Platform } from "../domain/value-objects/Platform.js";

export function makeChannelInfo(overrides: Partial<ChannelInfo> = {}): ChannelInfo {
  return {
    id: "channel-1",
    name: "Test Channel",
    description: "",
    url: "https://www.youtube.com/channel/channel-1",
    avatarUrl: null,
    platform: Platform.YOUTUBE,
    followerCount: null,
    postCount: null,
    createdAt: null,
    ...overrides,
  };
}

/** Every method resolves empty unless overridden. */
export function fakeVideoCollaborator(
  overrides: Partial<Omit<VideoPlatformCollaborator, "platform">> = {}
): VideoPlatformCollaborator {
  return {
    platform: Platform.YOUTUBE,
    getTrending: vi.fn().mockResolvedValue([]),
    search: vi.fn().mockResolvedValue([]),
    getTrendingHashtags: vi.fn().mockResolvedValue([]),
    resolveChannelId: vi.fn().mockResolvedValue("channel-1"),
    recentItemsByChannel: vi.fn().mockResolvedValue([]),
    searchRecentItems: vi.fn().mockResolvedValue([]),
    channelSubscriberCounts: vi.fn().mockResolvedValue(new Map()),
    getChannelInfo: vi.fn().mockResolvedValue(makeChannelInfo()),
    ...overrides,
  };
}

export function fakePlatformCollaborator(
  platform: Platform,
  overrides: Partial<Omit<PlatformCollaborator, "platform">> = {}
): PlatformCollaborator {
  return {
    platform,
    getTrending: vi.fn().mockResolvedValue([]),
    search: vi.fn().mockResolvedValue([]),
    getTrendingHashtags: vi.fn().mockResolvedValue([]),
    ...overrides,
  };
}
