/**
 * Types for the health endpoint.
 */

export type MetricSource = "storage" | "jobs";

/** ISO 8601 time of the last successful collection per source */
export type LastScrape = Record<MetricSource, string | null>;

export type HealthStatus = "ok" | "unhealthy" | "starting";

export interface HealthResponse {
  status: HealthStatus;
  /** True if any source succeeded in the most recent cycle */
  live: boolean;
  apiVersion: string | null;
  lastScrape: LastScrape;
  /** Connectivity check failure message, when unhealthy */
  error?: string;
  /** ISO 8601 */
  timestamp: string;
}
