import { pino, type Logger } from "pino";
import type { LogLevel } from "@backup-exporter/shared";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

/** Paths scrubbed from every log line */
const REDACT_PATHS = [
  "req.headers.authorization",
  "req.headers.cookie",
  "credential",
  "*.credential",
];

/**
 * Build the root logger. Pretty-printed in development, structured JSON
 * in production. The same instance is handed to Fastify so request logs
 * and collector logs share one stream.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  if (!isProduction && !isTest) {
    return pino({
      level,
      redact: REDACT_PATHS,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }
  return pino({ level, redact: REDACT_PATHS });
}

/** Default for components constructed without a logger (tests, scripts) */
export const silentLogger: Logger = pino({ level: "silent" });
