import { Hono } from "hono";
import { z } from "zod";
import type { TrendServices } from "../../../infrastructure/di/container.js";
import { COLLECTION_CONFIG, env } from "../../../shared/config/index.js";
import { countParam, parseQuery, platformsParam } from "../query.js";
import { toWire } from "../serialize.js";

// Cross-platform listings stay small per platform
const GLOBAL_MAX_RESULTS = 20;

const globalQuery = z.object({
  platforms: platformsParam,
  max_results: countParam(10, GLOBAL_MAX_RESULTS),
});

const globalSearchQuery = globalQuery.extend({
  query: z.string().trim().min(1),
});

const realtimeQuery = z.object({
  platforms: platformsParam,
  max_results: countParam(COLLECTION_CONFIG.maxPageSize, COLLECTION_CONFIG.maxPageSize),
});

const keywordsQuery = z.object({
  platforms: platformsParam,
  limit: countParam(20, 50),
});

const searchesQuery = z.object({
  region: z
    .string()
    .trim()
    .length(2)
    .transform((region) => region.toUpperCase())
    .default(env.DEFAULT_REGION),
});

export function trendRoutes(services: TrendServices): Hono {
  const router = new Hono();

  router.get("/trends/global", async (c) => {
    const { platforms, max_results } = parseQuery(globalQuery, c.req.query());
    const batches = await services.collect.trending(
      platforms ?? services.collect.platforms,
      max_results
    );
    return c.json(toWire(batches));
  });

  router.get("/search/global", async (c) => {
    const { platforms, max_results, query } = parseQuery(globalSearchQuery, c.req.query());
    const batches = await services.collect.search(
      platforms ?? services.collect.platforms,
      query,
      max_results
    );
    return c.json(toWire(batches));
  });

  router.get("/trends/realtime", async (c) => {
    const { platforms, max_results } = parseQuery(realtimeQuery, c.req.query());
    const realtime = await services.rankKeywords.realtime(
      platforms ?? services.collect.platforms,
      max_results
    );

    // One "<platform>Trends" list per collected platform
    const body: Record<string, unknown> = {
      timestamp: realtime.timestamp,
      trendingKeywords: realtime.trendingKeywords,
    };
    for (const [platform, records] of realtime.topItems) {
      body[`${platform}Trends`] = records;
    }
    body.totalTrends = realtime.totalTrends;
    return c.json(toWire(body));
  });

  router.get("/trends/keywords", async (c) => {
    const { platforms, limit } = parseQuery(keywordsQuery, c.req.query());
    const ranked = await services.rankKeywords.execute(
      platforms ?? services.collect.platforms,
      limit
    );
    return c.json(
      toWire({
        timestamp: ranked.timestamp,
        trendingKeywords: ranked.keywords,
        totalKeywords: ranked.totalKeywords,
      })
    );
  });

  router.get("/trends/searches", async (c) => {
    const { region } = parseQuery(searchesQuery, c.req.query());
    const searches = await services.searchTrends.getRealtimeTrendingSearches(region);
    return c.json(
      toWire({
        timestamp: new Date(),
        region,
        searches,
        total: searches.length,
      })
    );
  });

  return router;
}
