import { Hono } from "hono";
import { z } from "zod";
import type { TrendServices } from "../../../infrastructure/di/container.js";
import { parsePlatform } from "../../../domain/value-objects/Platform.js";
import { COLLECTION_CONFIG } from "../../../shared/config/index.js";
import { countParam, parseQuery } from "../query.js";
import { toWire } from "../serialize.js";

const trendsQuery = z.object({
  max_results: countParam(COLLECTION_CONFIG.trendingPerPlatform, COLLECTION_CONFIG.maxPageSize),
});

const searchQuery = z.object({
  query: z.string().trim().min(1),
  max_results: countParam(COLLECTION_CONFIG.searchPerPlatform, COLLECTION_CONFIG.maxPageSize),
});

const hashtagsQuery = z.object({
  max_results: countParam(20, COLLECTION_CONFIG.maxPageSize),
});

/**
 * Single-platform reads under /api/:platform. A failing platform is an
 * error here, not an empty list.
 */
export function platformRoutes(services: TrendServices): Hono {
  const router = new Hono();

  router.get("/:platform/trends", async (c) => {
    const platform = parsePlatform(c.req.param("platform"));
    const { max_results } = parseQuery(trendsQuery, c.req.query());
    const records = await services.platformContent.trending(platform, max_results);
    return c.json(toWire(records));
  });

  router.get("/:platform/search", async (c) => {
    const platform = parsePlatform(c.req.param("platform"));
    const { query, max_results } = parseQuery(searchQuery, c.req.query());
    const records = await services.platformContent.search(platform, query, max_results);
    return c.json(toWire(records));
  });

  router.get("/:platform/hashtags", async (c) => {
    const platform = parsePlatform(c.req.param("platform"));
    const { max_results } = parseQuery(hashtagsQuery, c.req.query());
    const hashtags = await services.platformContent.hashtags(platform, max_results);
    return c.json(toWire(hashtags));
  });

  return router;
}
