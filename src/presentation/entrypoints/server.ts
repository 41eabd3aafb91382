import { serve } from "@hono/node-server";
import { createApp } from "../http/app.js";
import { container } from "../../infrastructure/di/container.js";
import { env } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

function main() {
  const app = createApp(container.getServices());

  const server = serve(
    { fetch: app.fetch, port: env.PORT, hostname: env.HOST },
    (info) => {
      logger.info({ host: env.HOST, port: info.port }, "HTTP server listening");
    }
  );

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down HTTP server");
    server.close((error) => {
      if (error) {
        logger.error({ error: error.message }, "HTTP server did not close cleanly");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
