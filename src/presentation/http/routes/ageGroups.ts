import { Hono } from "hono";
import { z } from "zod";
import type { TrendServices } from "../../../infrastructure/di/container.js";
import { countParam, parseQuery, platformsParam } from "../query.js";
import { toWire } from "../serialize.js";

const affinitiesQuery = z.object({
  platforms: platformsParam,
  limit: countParam(10, 50),
});

const groupTrendsQuery = z.object({
  limit: countParam(10, 50),
});

const keywordQuery = z.object({
  platforms: platformsParam,
});

export function ageGroupRoutes(services: TrendServices): Hono {
  const router = new Hono();

  router.get("/age-groups/keywords", async (c) => {
    const { platforms, limit } = parseQuery(affinitiesQuery, c.req.query());
    const results = await services.ageGroupAffinities.execute(
      platforms ?? services.collect.platforms,
      limit
    );
    return c.json(toWire(results));
  });

  router.get("/age-groups/:group/trends", async (c) => {
    const { limit } = parseQuery(groupTrendsQuery, c.req.query());
    const trends = await services.ageGroupTrends.execute(c.req.param("group"), limit);
    return c.json(toWire(trends));
  });

  router.get("/keywords/:keyword/analysis", async (c) => {
    const { platforms } = parseQuery(keywordQuery, c.req.query());
    const report = await services.keywordReport.execute(
      c.req.param("keyword"),
      platforms ?? services.collect.platforms
    );
    return c.json(toWire(report));
  });

  return router;
}
