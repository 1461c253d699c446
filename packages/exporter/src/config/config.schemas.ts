/**
 * Typebox schema for raw configuration input (env variables merged over
 * the optional JSON file), before durations are parsed.
 */

import { Type, type Static } from "@sinclair/typebox";

/** One or more number+unit pairs, e.g. "90s", "1h30m", "250ms" */
export const DURATION_PATTERN = "^(\\d+(\\.\\d+)?(ms|s|m|h))+$";

const Duration = (defaultValue: string) =>
  Type.String({ pattern: DURATION_PATTERN, default: defaultValue });

export const LogLevel = Type.Union(
  [
    Type.Literal("fatal"),
    Type.Literal("error"),
    Type.Literal("warn"),
    Type.Literal("info"),
    Type.Literal("debug"),
    Type.Literal("trace"),
    Type.Literal("silent"),
  ],
  { default: "info" },
);

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const ApiSection = Type.Object({
  url: Type.String({ minLength: 1 }),
  apiKey: Type.String({ minLength: 1 }),
  /** Omit to negotiate */
  apiVersion: Type.Optional(Type.String({ pattern: "^\\d+\\.\\d+$" })),
  insecureSkipVerify: Type.Boolean({ default: false }),
  minTlsVersion: Type.Union([Type.Literal("TLSv1.2"), Type.Literal("TLSv1.3")], {
    default: "TLSv1.2",
  }),
});

export const ServerSection = Type.Object(
  {
    host: Type.String({ minLength: 1, default: "0.0.0.0" }),
    port: Type.Integer({ minimum: 1, maximum: 65535, default: 2112 }),
    metricsPath: Type.String({ pattern: "^/", default: "/metrics" }),
  },
  { default: {} },
);

export const PoolSection = Type.Object(
  {
    maxConnections: Type.Integer({ minimum: 1, default: 20 }),
    idleTimeout: Duration("90s"),
  },
  { default: {} },
);

export const TimeoutsSection = Type.Object(
  {
    request: Duration("1m"),
    collection: Duration("2m"),
    drain: Duration("30s"),
    healthCheck: Duration("5s"),
  },
  { default: {} },
);

export const RetrySection = Type.Object(
  {
    count: Type.Integer({ minimum: 0, maximum: 10, default: 3 }),
    initialWait: Duration("5s"),
    maxWait: Duration("60s"),
  },
  { default: {} },
);

const TracingSection = Type.Object(
  {
    enabled: Type.Boolean({ default: false }),
    endpoint: Type.String({ minLength: 1, default: "localhost:4317" }),
    insecure: Type.Boolean({ default: false }),
    samplingRate: Type.Number({ minimum: 0, maximum: 1, default: 1 }),
  },
  { default: {} },
);

// ---------------------------------------------------------------------------
// Root
// ---------------------------------------------------------------------------

export const RawConfig = Type.Object({
  api: ApiSection,
  server: ServerSection,
  /** Jobs that ended within this window are collected */
  scrapeWindow: Duration("5m"),
  cacheTtl: Duration("5m"),
  pool: PoolSection,
  timeouts: TimeoutsSection,
  retry: RetrySection,
  logLevel: LogLevel,
  tracing: TracingSection,
});

export type RawConfig = Static<typeof RawConfig>;
