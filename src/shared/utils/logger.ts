import pino, { type LoggerOptions } from "pino";

type Environment = Record<string, string | undefined>;

export function loggerOptions(environment: Environment = process.env): LoggerOptions {
  const isDevelopment =
    environment.NODE_ENV !== "production" && environment.NODE_ENV !== "test";
  const isCI = environment.CI === "true" || environment.GITHUB_ACTIONS === "true";

  return {
    name: "trend-radar",
    level: environment.LOG_LEVEL || (isDevelopment ? "debug" : "info"),
    // Failures are logged under `error`, not pino's `err`
    serializers: { error: pino.stdSerializers.err },
    redact: { paths: ["apiKey", "*.apiKey"], censor: "[redacted]" },
    transport:
      isDevelopment && !isCI
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
              ignore: "pid,hostname,name",
              singleLine: true,
            },
          }
        : undefined,
  };
}

export const logger = pino(loggerOptions());
