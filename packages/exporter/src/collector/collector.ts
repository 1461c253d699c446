/**
 * Parallel Collector: runs one collection cycle over both data sources.
 *
 * Storage goes through the TTL cache (fetch on miss, store on success);
 * jobs are fetched fresh for the configured window every cycle. The two
 * units run concurrently and fail independently: a failure in one never
 * cancels the other, and the result carries whatever succeeded.
 *
 * A cycle aborted by the caller rejects with CancelledError and leaves
 * the cache and timestamps as they were.
 */

import type { Logger } from "pino";
import type {
  JobsMetrics,
  LastScrape,
  MetricSource,
  NegotiatedSnapshot,
  StorageMetricValue,
} from "@backup-exporter/shared";
import type { ApiClient } from "../client/fetch-client.js";
import { checkVersion } from "../client/version-negotiator.js";
import {
  CancelledError,
  LifecycleError,
  TransientError,
  throwIfAborted,
} from "../errors.js";
import type { FetchRequest, JobsFetchRequest } from "../fetchers/index.js";
import { JobsFetcher, StorageFetcher } from "../fetchers/index.js";
import {
  noopInstrumentation,
  type Instrumentation,
} from "../instrumentation/index.js";
import { silentLogger } from "../logger.js";
import type { TtlCache } from "./ttl-cache.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StorageSource {
  fetch(client: ApiClient, request: FetchRequest): Promise<StorageMetricValue[]>;
}

export interface JobsSource {
  fetch(client: ApiClient, request: JobsFetchRequest): Promise<JobsMetrics>;
}

export interface CollectionResult {
  storage: StorageMetricValue[];
  jobs: JobsMetrics;
  storageError: Error | null;
  jobsError: Error | null;
  /** True when storage came from the cache instead of the API */
  storageFromCache: boolean;
  startedAt: Date;
  durationMs: number;
}

export type CycleStatus = "success" | "partial_failure" | "failure";

export interface CollectorDeps {
  client: ApiClient;
  snapshot: NegotiatedSnapshot;
  cache: TtlCache<StorageMetricValue[]>;
  storage?: StorageSource;
  jobs?: JobsSource;
  instrumentation?: Instrumentation;
  logger?: Logger;
  now?: () => number;
}

export interface CollectOptions {
  signal?: AbortSignal;
}

interface StorageOutcome {
  values: StorageMetricValue[];
  fromCache: boolean;
}

const EMPTY_JOBS: JobsMetrics = { bytes: [], count: [], statusCount: [] };

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export function cycleStatus(result: CollectionResult): CycleStatus {
  const failures = Number(result.storageError !== null) + Number(result.jobsError !== null);
  if (failures === 0) return "success";
  return failures === 2 ? "failure" : "partial_failure";
}

// ---------------------------------------------------------------------------
// Collector
// ---------------------------------------------------------------------------

export class Collector {
  private client: ApiClient;
  private snapshot: NegotiatedSnapshot;
  private cache: TtlCache<StorageMetricValue[]>;
  private storage: StorageSource;
  private jobs: JobsSource;
  private instrumentation: Instrumentation;
  private logger: Logger;
  private now: () => number;

  private accepting = true;
  private cycles = new Set<Promise<CollectionResult>>();
  private live = false;
  private lastSuccess: Record<MetricSource, number | null> = { storage: null, jobs: null };
  private last: CollectionResult | null = null;

  constructor(deps: CollectorDeps) {
    this.client = deps.client;
    this.snapshot = deps.snapshot;
    this.cache = deps.cache;
    this.instrumentation = deps.instrumentation ?? noopInstrumentation;
    this.logger = (deps.logger ?? silentLogger).child({ component: "collector" });
    this.now = deps.now ?? Date.now;
    this.storage =
      deps.storage ??
      new StorageFetcher({ logger: deps.logger, instrumentation: this.instrumentation });
    this.jobs =
      deps.jobs ?? new JobsFetcher({ logger: deps.logger, instrumentation: this.instrumentation });
  }

  get apiVersion(): string {
    return this.snapshot.apiVersion;
  }

  /** True iff any source succeeded in the most recent completed cycle */
  isHealthy(): boolean {
    return this.live;
  }

  lastScrape(): LastScrape {
    const iso = (t: number | null) => (t === null ? null : new Date(t).toISOString());
    return { storage: iso(this.lastSuccess.storage), jobs: iso(this.lastSuccess.jobs) };
  }

  get lastResult(): CollectionResult | null {
    return this.last;
  }

  get activeCycles(): number {
    return this.cycles.size;
  }

  /** Run one cycle. Never rejects for a source failure, only on abort or after stopAccepting(). */
  async collect(options?: CollectOptions): Promise<CollectionResult> {
    if (!this.accepting) throw new LifecycleError("collector is shutting down");

    const cycle = this.runCycle(options?.signal);
    this.cycles.add(cycle);
    try {
      return await cycle;
    } finally {
      this.cycles.delete(cycle);
    }
  }

  /**
   * Check the API with the negotiated version, bounded by the health
   * check timeout. Rejects with the check's error.
   */
  async testConnectivity(options?: CollectOptions): Promise<void> {
    const { healthCheckMs } = this.snapshot.timeouts;
    const timeout = AbortSignal.timeout(healthCheckMs);
    const signal = options?.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    try {
      await checkVersion(
        this.client,
        this.snapshot.baseUrl,
        this.snapshot.credential,
        this.snapshot.apiVersion,
        signal,
      );
    } catch (err) {
      if (timeout.aborted && !options?.signal?.aborted) {
        throw new TransientError(`connectivity check timed out after ${healthCheckMs}ms`, null, {
          cause: err,
        });
      }
      throw err;
    }
  }

  /** Refuse new cycles from now on */
  stopAccepting(): void {
    this.accepting = false;
  }

  /** Wait for cycles already running */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.cycles]);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async runCycle(parent: AbortSignal | undefined): Promise<CollectionResult> {
    throwIfAborted(parent, "collection");

    const { collectionMs } = this.snapshot.timeouts;
    const timeout = AbortSignal.timeout(collectionMs);
    const signal = parent ? AbortSignal.any([parent, timeout]) : timeout;
    const started = this.now();

    // Timeouts become per-source transient errors; caller aborts stay cancellations
    const guard = async <T>(source: MetricSource, unit: Promise<T>): Promise<T> => {
      try {
        return await unit;
      } catch (err) {
        if (timeout.aborted && !parent?.aborted) {
          throw new TransientError(
            `${source} collection timed out after ${collectionMs}ms`,
            null,
            { cause: err },
          );
        }
        throw err;
      }
    };

    return this.instrumentation.trace(
      "scrape",
      { "api.version": this.snapshot.apiVersion },
      async (span) => {
        const [storage, jobs] = await Promise.allSettled([
          guard("storage", this.collectStorage(signal)),
          guard("jobs", this.collectJobs(signal, started)),
        ]);

        if (parent?.aborted) {
          throw new CancelledError("collection cancelled", { cause: parent.reason });
        }

        const finished = this.now();
        const result: CollectionResult = {
          storage: storage.status === "fulfilled" ? storage.value.values : [],
          jobs: jobs.status === "fulfilled" ? jobs.value : EMPTY_JOBS,
          storageError: storage.status === "rejected" ? toError(storage.reason) : null,
          jobsError: jobs.status === "rejected" ? toError(jobs.reason) : null,
          storageFromCache: storage.status === "fulfilled" && storage.value.fromCache,
          startedAt: new Date(started),
          durationMs: finished - started,
        };

        if (storage.status === "fulfilled") {
          if (!storage.value.fromCache) this.cache.set(storage.value.values);
          this.lastSuccess.storage = finished;
        } else {
          this.logger.warn({ err: result.storageError, source: "storage" }, "storage collection failed");
        }
        if (jobs.status === "fulfilled") {
          this.lastSuccess.jobs = finished;
        } else {
          this.logger.warn({ err: result.jobsError, source: "jobs" }, "jobs collection failed");
        }

        this.live = result.storageError === null || result.jobsError === null;
        this.last = result;

        const status = cycleStatus(result);
        span.setAttributes({
          duration_ms: result.durationMs,
          storage_metrics: result.storage.length,
          job_metrics: result.jobs.count.length,
          storage_cached: result.storageFromCache,
          status,
        });
        this.logger.debug({ status, durationMs: result.durationMs }, "collection cycle finished");
        return result;
      },
    );
  }

  private async collectStorage(signal: AbortSignal): Promise<StorageOutcome> {
    const cached = this.cache.get();
    if (cached.hit) return { values: cached.value, fromCache: true };

    const values = await this.storage.fetch(this.client, { target: this.snapshot, signal });
    return { values, fromCache: false };
  }

  private collectJobs(signal: AbortSignal, started: number): Promise<JobsMetrics> {
    const since = new Date(started - this.snapshot.scrapeWindowMs);
    return this.jobs.fetch(this.client, { target: this.snapshot, signal, since });
  }
}
