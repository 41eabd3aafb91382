import type { Platform } from "../value-objects/Platform.js";

export interface ChannelInfo {
  id: string;
  name: string;
  description: string;
  url: string;
  avatarUrl: string | null;
  platform: Platform;
  followerCount: number | null; // null when the owner hides it
  postCount: number | null;
  createdAt: Date | null;
}
