import { Hono } from "hono";
import { cors } from "hono/cors";
import type { TrendServices } from "../../infrastructure/di/container.js";
import { DomainError } from "../../domain/errors/DomainError.js";
import { logger } from "../../shared/utils/logger.js";
import { platformRoutes } from "./routes/platforms.js";
import { trendRoutes } from "./routes/trends.js";
import { ageGroupRoutes } from "./routes/ageGroups.js";
import { youtubeRoutes } from "./routes/youtube.js";

export const SERVICE_NAME = "trend-radar";

export function createApp(services: TrendServices): Hono {
  const app = new Hono();

  app.use("*", cors());

  app.use("*", async (c, next) => {
    const startedAt = Date.now();
    await next();
    logger.debug(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Date.now() - startedAt,
      },
      "Request handled"
    );
  });

  app.get("/", (c) =>
    c.json({
      name: SERVICE_NAME,
      endpoints: [
        "GET /health",
        "GET /api/:platform/trends",
        "GET /api/:platform/search",
        "GET /api/:platform/hashtags",
        "GET /api/trends/global",
        "GET /api/search/global",
        "GET /api/trends/realtime",
        "GET /api/trends/keywords",
        "GET /api/trends/searches",
        "GET /api/age-groups/keywords",
        "GET /api/age-groups/:group/trends",
        "GET /api/keywords/:keyword/analysis",
        "GET /api/youtube/channels/:channelId",
        "POST /api/youtube/analyze",
      ],
    })
  );

  app.get("/health", (c) =>
    c.json({ status: "healthy", timestamp: new Date().toISOString() })
  );

  // Fixed paths before the /:platform patterns
  app.route("/api", trendRoutes(services));
  app.route("/api", ageGroupRoutes(services));
  app.route("/api", youtubeRoutes(services));
  app.route("/api", platformRoutes(services));

  app.notFound((c) =>
    c.json({ error: "Not found", detail: c.req.path, code: "not_found" }, 404)
  );

  app.onError((error, c) => {
    if (error instanceof DomainError) {
      logger.warn(
        { path: c.req.path, code: error.code, detail: error.detail },
        error.message
      );
      return c.json(
        { error: error.message, detail: error.detail ?? error.message, code: error.code },
        error.statusCode
      );
    }

    logger.error({ path: c.req.path, error }, "Unhandled request error");
    return c.json(
      { error: "Internal server error", detail: error.message, code: "internal_error" },
      500
    );
  });

  return app;
}
