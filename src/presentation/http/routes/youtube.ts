import { Hono } from "hono";
import type { TrendServices } from "../../../infrastructure/di/container.js";
import { InvalidArgumentError } from "../../../domain/errors/DomainError.js";
import { camelizeKeys, toWire } from "../serialize.js";

export function youtubeRoutes(services: TrendServices): Hono {
  const router = new Hono();

  router.post("/youtube/analyze", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      throw new InvalidArgumentError(
        "Request body must be JSON",
        error instanceof Error ? error.message : String(error)
      );
    }

    const result = await services.analyzeTimeframe.execute(camelizeKeys(body));
    return c.json(toWire(result));
  });

  router.get("/youtube/channels/:channelId", async (c) => {
    const info = await services.channelInfo.execute(c.req.param("channelId"));
    return c.json(toWire(info));
  });

  return router;
}
