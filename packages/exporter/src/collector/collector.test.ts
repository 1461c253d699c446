import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { JobsMetrics, StorageMetricValue } from "@backup-exporter/shared";
import { Collector, type JobsSource, type StorageSource } from "./collector.js";
import { TtlCache } from "./ttl-cache.js";
import { FetchClient, type ApiClient } from "../client/fetch-client.js";
import type { FetchRequest } from "../fetchers/index.js";
import {
  CancelledError,
  HttpStatusError,
  LifecycleError,
  TransientError,
} from "../errors.js";
import {
  JSON_HEADERS,
  acceptsVersion,
  createMockBackupApi,
  envelope,
  pathIs,
  testSnapshot,
  type MockBackupApi,
} from "../test/mock-backup-api.js";
import { createRecordingInstrumentation } from "../test/recording-instrumentation.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const STORAGE: StorageMetricValue[] = [
  { key: { name: "disk-a", type: "MEDIA_SERVER", size: "free" }, value: 100 },
  { key: { name: "disk-a", type: "MEDIA_SERVER", size: "used" }, value: 50 },
];

const JOBS: JobsMetrics = {
  bytes: [{ key: { action: "BACKUP", policyType: "VMWARE", status: "0" }, value: 2048 }],
  count: [{ key: { action: "BACKUP", policyType: "VMWARE", status: "0" }, value: 1 }],
  statusCount: [{ key: { action: "BACKUP", status: "0" }, value: 1 }],
};

const T0 = Date.parse("2026-10-19T12:00:00.000Z");

// ---------------------------------------------------------------------------
// Mock factories
// ---------------------------------------------------------------------------

function createClock(start = T0) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

function createMockStorage(impl?: StorageSource["fetch"]) {
  const fetch = vi.fn<StorageSource["fetch"]>(impl ?? (async () => STORAGE));
  return { fetch };
}

function createMockJobs(impl?: JobsSource["fetch"]) {
  const fetch = vi.fn<JobsSource["fetch"]>(impl ?? (async () => JOBS));
  return { fetch };
}

/** A source that only settles when its signal fires */
function hangUntilAborted(_client: ApiClient, request: FetchRequest): Promise<never> {
  return new Promise((_resolve, reject) => {
    request.signal?.addEventListener(
      "abort",
      () => reject(new CancelledError("request cancelled")),
      { once: true },
    );
  });
}

const fakeClient: ApiClient = { fetchData: vi.fn() };

function createCollector(overrides?: {
  storage?: StorageSource;
  jobs?: JobsSource;
  clock?: ReturnType<typeof createClock>;
  snapshot?: ReturnType<typeof testSnapshot>;
  client?: ApiClient;
}) {
  const clock = overrides?.clock ?? createClock();
  const snapshot = overrides?.snapshot ?? testSnapshot();
  const cache = new TtlCache<StorageMetricValue[]>(snapshot.cacheTtlMs, { now: clock.now });
  const instrumentation = createRecordingInstrumentation();
  const collector = new Collector({
    client: overrides?.client ?? fakeClient,
    snapshot,
    cache,
    storage: overrides?.storage ?? createMockStorage(),
    jobs: overrides?.jobs ?? createMockJobs(),
    instrumentation,
    now: clock.now,
  });
  return { collector, cache, clock, instrumentation };
}

// ---------------------------------------------------------------------------
// collect
// ---------------------------------------------------------------------------

describe("Collector.collect", () => {
  it("merges both sources and records their timestamps", async () => {
    const { collector, cache } = createCollector();

    const result = await collector.collect();

    expect(result.storage).toEqual(STORAGE);
    expect(result.jobs).toEqual(JOBS);
    expect(result.storageError).toBeNull();
    expect(result.jobsError).toBeNull();
    expect(result.startedAt).toEqual(new Date(T0));
    expect(collector.isHealthy()).toBe(true);
    expect(collector.lastScrape()).toEqual({
      storage: "2026-10-19T12:00:00.000Z",
      jobs: "2026-10-19T12:00:00.000Z",
    });
    expect(cache.get()).toEqual({ hit: true, value: STORAGE });
  });

  it("keeps jobs when storage fails", async () => {
    const storage = createMockStorage(async () => {
      throw new HttpStatusError(500, "https://backup.test", null);
    });
    const { collector, cache } = createCollector({ storage });

    const result = await collector.collect();

    expect(result.storage).toEqual([]);
    expect(result.storageError).toBeInstanceOf(HttpStatusError);
    expect(result.jobs).toEqual(JOBS);
    expect(result.jobsError).toBeNull();
    expect(collector.isHealthy()).toBe(true);
    expect(collector.lastScrape().storage).toBeNull();
    expect(cache.get()).toEqual({ hit: false });
  });

  it("keeps storage when jobs fail", async () => {
    const jobs = createMockJobs(async () => {
      throw new TransientError("HTTP 503", 503);
    });
    const { collector } = createCollector({ jobs });

    const result = await collector.collect();

    expect(result.storage).toEqual(STORAGE);
    expect(result.storageError).toBeNull();
    expect(result.jobs).toEqual({ bytes: [], count: [], statusCount: [] });
    expect(result.jobsError).toBeInstanceOf(TransientError);
    expect(collector.isHealthy()).toBe(true);
    expect(collector.lastScrape().jobs).toBeNull();
  });

  it("is not live when both sources fail", async () => {
    const { collector } = createCollector({
      storage: createMockStorage(async () => {
        throw new Error("down");
      }),
      jobs: createMockJobs(async () => {
        throw new Error("down");
      }),
    });

    const result = await collector.collect();

    expect(result.storageError).toHaveProperty("message", "down");
    expect(result.jobsError).toHaveProperty("message", "down");
    expect(collector.isHealthy()).toBe(false);
  });

  it("wraps non-Error rejections", async () => {
    const { collector } = createCollector({
      jobs: createMockJobs(() => Promise.reject("nope")),
    });

    const result = await collector.collect();
    expect(result.jobsError).toEqual(new Error("nope"));
  });

  it("serves storage from the cache within the ttl and counts it as fresh", async () => {
    const storage = createMockStorage();
    const { collector, clock } = createCollector({ storage });

    await collector.collect();
    clock.advance(60_000);
    const second = await collector.collect();

    expect(storage.fetch).toHaveBeenCalledOnce();
    expect(second.storage).toEqual(STORAGE);
    expect(second.storageFromCache).toBe(true);
    expect(collector.lastScrape().storage).toBe("2026-10-19T12:01:00.000Z");
  });

  it("fetches storage exactly once more after the ttl elapses", async () => {
    const storage = createMockStorage();
    const { collector, clock } = createCollector({ storage });

    await collector.collect();
    clock.advance(5 * 60_000);
    await collector.collect();
    await collector.collect();

    expect(storage.fetch).toHaveBeenCalledTimes(2);
  });

  it("asks for jobs that ended within the scrape window", async () => {
    const jobs = createMockJobs();
    const { collector } = createCollector({ jobs });

    await collector.collect();

    const [, request] = jobs.fetch.mock.calls[0];
    expect(request.since).toEqual(new Date("2026-10-19T11:55:00.000Z"));
    expect(request.target.apiVersion).toBe("13.0");
  });

  it("runs both sources concurrently", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const storage = createMockStorage(async () => {
      await gate;
      return STORAGE;
    });
    const jobs = createMockJobs(async () => {
      release();
      return JOBS;
    });
    const { collector } = createCollector({ storage, jobs });

    const result = await collector.collect();
    expect(result.storageError).toBeNull();
    expect(jobs.fetch).toHaveBeenCalledOnce();
  });

  it("turns the cycle timeout into a per-source transient error", async () => {
    const { collector } = createCollector({
      storage: { fetch: hangUntilAborted },
      snapshot: testSnapshot({
        timeouts: { requestMs: 1_000, collectionMs: 20, drainMs: 100, healthCheckMs: 100 },
      }),
    });

    const result = await collector.collect();

    expect(result.storageError).toBeInstanceOf(TransientError);
    expect(result.storageError).toHaveProperty(
      "message",
      "storage collection timed out after 20ms",
    );
    expect(result.jobs).toEqual(JOBS);
    expect(collector.isHealthy()).toBe(true);
  });

  it("rejects on caller abort and leaves state untouched", async () => {
    const { collector, cache } = createCollector({ storage: { fetch: hangUntilAborted } });
    const ac = new AbortController();

    const pending = collector.collect({ signal: ac.signal });
    ac.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(cache.get()).toEqual({ hit: false });
    expect(collector.lastScrape()).toEqual({ storage: null, jobs: null });
    expect(collector.lastResult).toBeNull();
    expect(collector.isHealthy()).toBe(false);
  });

  it("traces the cycle status", async () => {
    const { collector, instrumentation } = createCollector({
      jobs: createMockJobs(async () => {
        throw new Error("down");
      }),
    });

    await collector.collect();

    const [scrape] = instrumentation.named("scrape");
    expect(scrape.attributes).toMatchObject({
      status: "partial_failure",
      storage_metrics: 2,
      job_metrics: 0,
    });
  });
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe("Collector lifecycle", () => {
  it("refuses new cycles after stopAccepting()", async () => {
    const { collector } = createCollector();
    collector.stopAccepting();
    await expect(collector.collect()).rejects.toBeInstanceOf(LifecycleError);
  });

  it("drain waits for a running cycle", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const storage = createMockStorage(async () => {
      await gate;
      return STORAGE;
    });
    const { collector } = createCollector({ storage });

    const pending = collector.collect();
    expect(collector.activeCycles).toBe(1);
    collector.stopAccepting();

    let drained = false;
    const draining = collector.drain().then(() => {
      drained = true;
    });
    await Promise.resolve();
    expect(drained).toBe(false);

    release();
    await draining;
    await pending;
    expect(drained).toBe(true);
    expect(collector.activeCycles).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// testConnectivity
// ---------------------------------------------------------------------------

describe("Collector.testConnectivity", () => {
  let api: MockBackupApi;

  beforeEach(() => {
    api = createMockBackupApi();
  });

  afterEach(async () => {
    await api.close();
  });

  it("checks connectivity with the negotiated version", async () => {
    api.pool
      .intercept({ path: pathIs("/admin/jobs"), headers: acceptsVersion("13.0") })
      .reply(200, envelope([]), { headers: JSON_HEADERS });
    const client = new FetchClient(testSnapshot(), { dispatcher: api.agent });
    const { collector } = createCollector({ client });

    await expect(collector.testConnectivity()).resolves.toBeUndefined();
  });

  it("rejects when the API is unreachable", async () => {
    api.pool.intercept({ path: pathIs("/admin/jobs") }).reply(503, "").persist();
    const client = new FetchClient(testSnapshot(), { dispatcher: api.agent });
    const { collector } = createCollector({ client });

    await expect(collector.testConnectivity()).rejects.toBeInstanceOf(TransientError);
  });
});
