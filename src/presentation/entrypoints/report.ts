import { TrendReportWorkflow } from "../workflows/TrendReportWorkflow.js";
import { parsePlatform } from "../../domain/value-objects/Platform.js";
import { toWire } from "../http/serialize.js";
import { logger } from "../../shared/utils/logger.js";

async function main() {
  const platformsEnv = process.env.PLATFORMS;
  const limit = process.env.LIMIT ? parseInt(process.env.LIMIT, 10) : 10;

  try {
    if (!Number.isInteger(limit) || limit < 1) {
      logger.error({ limit: process.env.LIMIT }, "Invalid LIMIT");
      process.exit(1);
    }

    const platforms = platformsEnv
      ? platformsEnv
          .split(",")
          .map((p) => p.trim())
          .filter(Boolean)
          .map(parsePlatform)
      : undefined;

    const workflow = new TrendReportWorkflow();
    const report = await workflow.execute(platforms, limit);
    process.stdout.write(`${JSON.stringify(toWire(report), null, 2)}\n`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(
      { error: errorMessage, stack: errorStack },
      "Trend report workflow failed"
    );
    process.exit(1);
  }

  process.exit(0);
}

void main();
