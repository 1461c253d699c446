/**
 * Configuration loader.
 *
 * Sources, lowest precedence first:
 *  1. schema defaults
 *  2. the JSON file named by EXPORTER_CONFIG (optional)
 *  3. environment variables
 *
 * The merged input is defaulted, converted (env values are strings),
 * checked against RawConfig, and turned into a deep-frozen ConfigSnapshot.
 */

import { readFileSync } from "node:fs";
import { Value } from "@sinclair/typebox/value";
import type { ConfigSnapshot } from "@backup-exporter/shared";
import { ConfigError, errorMessage } from "../errors.js";
import { RawConfig } from "./config.schemas.js";
import { deepFreeze } from "./snapshot.js";

export type Env = Record<string, string | undefined>;

/** Environment variable → path in the raw config */
export const ENV_KEYS: Record<string, readonly string[]> = {
  BACKUP_API_URL: ["api", "url"],
  BACKUP_API_KEY: ["api", "apiKey"],
  BACKUP_API_VERSION: ["api", "apiVersion"],
  TLS_INSECURE_SKIP_VERIFY: ["api", "insecureSkipVerify"],
  TLS_MIN_VERSION: ["api", "minTlsVersion"],
  HOST: ["server", "host"],
  PORT: ["server", "port"],
  METRICS_PATH: ["server", "metricsPath"],
  SCRAPE_WINDOW: ["scrapeWindow"],
  CACHE_TTL: ["cacheTtl"],
  MAX_CONNECTIONS: ["pool", "maxConnections"],
  IDLE_TIMEOUT: ["pool", "idleTimeout"],
  REQUEST_TIMEOUT: ["timeouts", "request"],
  COLLECTION_TIMEOUT: ["timeouts", "collection"],
  DRAIN_TIMEOUT: ["timeouts", "drain"],
  HEALTH_CHECK_TIMEOUT: ["timeouts", "healthCheck"],
  RETRY_COUNT: ["retry", "count"],
  RETRY_INITIAL_WAIT: ["retry", "initialWait"],
  RETRY_MAX_WAIT: ["retry", "maxWait"],
  LOG_LEVEL: ["logLevel"],
  OTEL_ENABLED: ["tracing", "enabled"],
  OTEL_ENDPOINT: ["tracing", "endpoint"],
  OTEL_INSECURE: ["tracing", "insecure"],
  OTEL_SAMPLING_RATE: ["tracing", "samplingRate"],
};

/** Max validation problems quoted in one ConfigError */
const MAX_REPORTED_ERRORS = 5;

const DURATION_PART_RE = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

const UNIT_MS: Record<string, number> = { ms: 1, s: 1_000, m: 60_000, h: 3_600_000 };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** "1h30m" → 5_400_000 */
export function parseDuration(text: string): number {
  const trimmed = text.trim();
  let total = 0;
  let consumed = 0;
  for (const match of trimmed.matchAll(DURATION_PART_RE)) {
    if (match.index !== consumed) break;
    total += Number(match[1]) * UNIT_MS[match[2]];
    consumed += match[0].length;
  }
  if (consumed === 0 || consumed !== trimmed.length) {
    throw new ConfigError(`invalid duration "${text}" (expected e.g. "90s", "5m", "1h30m")`);
  }
  return Math.round(total);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Recursively merge plain objects; `overlay` wins */
function merge(base: Record<string, unknown>, overlay: Record<string, unknown>) {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? merge(current, value) : value;
  }
  return out;
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: string) {
  let node = target;
  path.slice(0, -1).forEach((segment) => {
    const next = node[segment];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[segment] = created;
      node = created;
    }
  });
  node[path[path.length - 1]] = value;
}

/** Raw config from the environment; unset and empty variables are skipped */
export function fromEnv(env: Env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  for (const [name, path] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") setPath(raw, path, value);
  }
  return raw;
}

export function readConfigFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config file ${path}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`config file ${path} is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(parsed)) throw new ConfigError(`config file ${path} must hold a JSON object`);
  return parsed;
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/** Validate merged raw input and build the snapshot */
export function buildSnapshot(input: Record<string, unknown>): ConfigSnapshot {
  const converted = Value.Convert(RawConfig, Value.Default(RawConfig, input));

  if (!Value.Check(RawConfig, converted)) {
    const problems = [...Value.Errors(RawConfig, converted)]
      .slice(0, MAX_REPORTED_ERRORS)
      .map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError(`invalid configuration: ${problems.join("; ")}`);
  }
  const raw = converted;

  let url: URL;
  try {
    url = new URL(raw.api.url);
  } catch {
    throw new ConfigError(`invalid API URL "${raw.api.url}"`);
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ConfigError(`API URL must use http or https, got ${url.protocol}`);
  }

  const retry = {
    count: raw.retry.count,
    initialWaitMs: parseDuration(raw.retry.initialWait),
    maxWaitMs: parseDuration(raw.retry.maxWait),
  };
  if (retry.maxWaitMs < retry.initialWaitMs) {
    throw new ConfigError("retry.maxWait must not be shorter than retry.initialWait");
  }

  return deepFreeze({
    baseUrl: url.toString().replace(/\/+$/, ""),
    credential: raw.api.apiKey,
    apiVersion: raw.api.apiVersion ?? null,
    scrapeWindowMs: parseDuration(raw.scrapeWindow),
    cacheTtlMs: parseDuration(raw.cacheTtl),
    pool: {
      maxConnections: raw.pool.maxConnections,
      idleTimeoutMs: parseDuration(raw.pool.idleTimeout),
    },
    timeouts: {
      requestMs: parseDuration(raw.timeouts.request),
      collectionMs: parseDuration(raw.timeouts.collection),
      drainMs: parseDuration(raw.timeouts.drain),
      healthCheckMs: parseDuration(raw.timeouts.healthCheck),
    },
    retry,
    tls: {
      insecureSkipVerify: raw.api.insecureSkipVerify,
      minVersion: raw.api.minTlsVersion,
    },
    server: {
      host: raw.server.host,
      port: raw.server.port,
      metricsPath: raw.server.metricsPath,
    },
    logLevel: raw.logLevel,
    tracing: { ...raw.tracing },
  });
}

/**
 * Load the configuration snapshot. `file` defaults to EXPORTER_CONFIG;
 * without either, the environment alone must carry the API settings.
 * @throws ConfigError
 */
export function loadConfig(env: Env = process.env, file?: string): ConfigSnapshot {
  const path = file ?? env.EXPORTER_CONFIG;
  const fromFile = path ? readConfigFile(path) : {};
  return buildSnapshot(merge(fromFile, fromEnv(env)));
}
