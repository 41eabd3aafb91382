import { z } from "zod";

// YouTube Data API v3 resources, reduced to the fields we read

const thumbnailSchema = z.object({ url: z.string() });

export const videoSchema = z.object({
  id: z.string(),
  snippet: z.object({
    title: z.string(),
    description: z.string().optional(),
    channelId: z.string().optional(),
    channelTitle: z.string().optional(),
    publishedAt: z.string().optional(),
    tags: z.array(z.string()).optional(),
    categoryId: z.string().optional(),
    defaultLanguage: z.string().optional(),
    thumbnails: z.record(thumbnailSchema).optional(),
  }),
  // Counters arrive as strings and are absent when the owner hides them
  statistics: z
    .object({
      viewCount: z.string().optional(),
      likeCount: z.string().optional(),
      commentCount: z.string().optional(),
    })
    .optional(),
  contentDetails: z.object({ duration: z.string().optional() }).optional(),
});

export type YouTubeVideo = z.infer<typeof videoSchema>;

export const videoListSchema = z.object({
  items: z.array(videoSchema).default([]),
});

export const searchListSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({
          kind: z.string(),
          videoId: z.string().optional(),
          channelId: z.string().optional(),
        }),
      })
    )
    .default([]),
});

export const channelSchema = z.object({
  id: z.string(),
  snippet: z
    .object({
      title: z.string(),
      description: z.string().optional(),
      customUrl: z.string().optional(),
      publishedAt: z.string().optional(),
      thumbnails: z.record(thumbnailSchema).optional(),
    })
    .optional(),
  statistics: z
    .object({
      subscriberCount: z.string().optional(),
      hiddenSubscriberCount: z.boolean().optional(),
      videoCount: z.string().optional(),
    })
    .optional(),
});

export type YouTubeChannel = z.infer<typeof channelSchema>;

export const channelListSchema = z.object({
  items: z.array(channelSchema).default([]),
});

export const errorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});
