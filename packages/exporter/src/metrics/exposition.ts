/**
 * Prometheus exposition of a collection cycle.
 *
 * Each render resets the gauges and refills them from one result, so a
 * series that vanished upstream (a deleted storage unit, a job type not
 * seen in the window) disappears from the next scrape.
 */

import type { Gauge, Registry } from "prom-client";
import client from "prom-client";
import {
  jobKeySchema,
  jobStatusKeySchema,
  labelRecord,
  storageKeySchema,
  type KeySchema,
  type LastScrape,
  type MetricSource,
  type MetricValue,
} from "@backup-exporter/shared";
import type { CollectionResult } from "../collector/index.js";

export interface ExpositionOptions {
  /** Also export the process metrics prom-client collects by default */
  defaultMetrics?: boolean;
}

const SOURCES: readonly MetricSource[] = ["storage", "jobs"];

export class Exposition {
  readonly registry: Registry;

  private diskBytes: Gauge<string>;
  private jobsBytes: Gauge<string>;
  private jobsCount: Gauge<string>;
  private statusCount: Gauge<string>;
  private apiVersion: Gauge<string>;
  private scrapeSuccess: Gauge<string>;
  private lastScrapeTimestamp: Gauge<string>;

  constructor(options?: ExpositionOptions) {
    this.registry = new client.Registry();
    if (options?.defaultMetrics) {
      client.collectDefaultMetrics({ register: this.registry });
    }

    const gauge = (name: string, help: string, labelNames: readonly string[]) =>
      new client.Gauge({ name, help, labelNames: [...labelNames], registers: [this.registry] });

    this.diskBytes = gauge(
      "nbu_disk_bytes",
      "Storage unit capacity in bytes, by free/used",
      storageKeySchema.labelNames,
    );
    this.jobsBytes = gauge(
      "nbu_jobs_bytes",
      "Bytes transferred by jobs that ended in the scrape window",
      jobKeySchema.labelNames,
    );
    this.jobsCount = gauge(
      "nbu_jobs_count",
      "Number of jobs that ended in the scrape window",
      jobKeySchema.labelNames,
    );
    this.statusCount = gauge(
      "nbu_status_count",
      "Number of jobs that ended in the scrape window, by type and exit status",
      jobStatusKeySchema.labelNames,
    );
    this.apiVersion = gauge("nbu_api_version", "API version in use (always 1)", ["version"]);
    this.scrapeSuccess = gauge(
      "nbu_scrape_success",
      "Whether the last collection of each source succeeded",
      ["source"],
    );
    this.lastScrapeTimestamp = gauge(
      "nbu_last_scrape_timestamp_seconds",
      "Unix time of the last successful collection of each source",
      ["source"],
    );
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /** Replace every gauge's series with `result` and render the registry */
  async render(
    result: CollectionResult,
    apiVersion: string,
    lastScrape: LastScrape,
  ): Promise<string> {
    this.registry.resetMetrics();

    this.fill(this.diskBytes, storageKeySchema, result.storage);
    this.fill(this.jobsBytes, jobKeySchema, result.jobs.bytes);
    this.fill(this.jobsCount, jobKeySchema, result.jobs.count);
    this.fill(this.statusCount, jobStatusKeySchema, result.jobs.statusCount);

    this.apiVersion.set({ version: apiVersion }, 1);

    const errors: Record<MetricSource, Error | null> = {
      storage: result.storageError,
      jobs: result.jobsError,
    };
    for (const source of SOURCES) {
      this.scrapeSuccess.set({ source }, errors[source] === null ? 1 : 0);
      const last = lastScrape[source];
      if (last !== null) {
        this.lastScrapeTimestamp.set({ source }, Date.parse(last) / 1000);
      }
    }

    return this.registry.metrics();
  }

  private fill<K>(gauge: Gauge<string>, schema: KeySchema<K>, values: MetricValue<K>[]): void {
    for (const { key, value } of values) {
      gauge.set(labelRecord(schema, key), value);
    }
  }
}
