/**
 * Runtime: owns the live client/collector pair ("generation") built
 * around one negotiated config snapshot.
 *
 * - create() negotiates the API version (unless configured) before any
 *   collection can run
 * - reload() builds a complete new generation first, swaps it in, then
 *   retires the old one in the background (stop, drain, close)
 * - shutdown() runs once: stop accepting, wait for cycles, wait for
 *   retiring generations, close the client, flush instrumentation
 */

import type { Dispatcher } from "undici";
import type { Logger } from "pino";
import type {
  ConfigSnapshot,
  LastScrape,
  NegotiatedSnapshot,
  StorageMetricValue,
} from "@backup-exporter/shared";
import { FetchClient } from "../client/fetch-client.js";
import { detectVersion } from "../client/version-negotiator.js";
import { Collector, type CollectOptions, type CollectionResult } from "../collector/collector.js";
import { TtlCache } from "../collector/ttl-cache.js";
import { withApiVersion } from "../config/snapshot.js";
import { LifecycleError } from "../errors.js";
import {
  noopInstrumentation,
  type Instrumentation,
} from "../instrumentation/index.js";
import { silentLogger } from "../logger.js";

/** Upper bound for version detection at startup and on reload */
export const NEGOTIATION_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RuntimeDeps {
  logger?: Logger;
  instrumentation?: Instrumentation;
  /** Dispatcher shared by every generation's client. The caller owns it. */
  dispatcher?: Dispatcher;
  now?: () => number;
  negotiationTimeoutMs?: number;
}

interface Generation {
  snapshot: NegotiatedSnapshot;
  client: FetchClient;
  collector: Collector;
  cache: TtlCache<StorageMetricValue[]>;
}

function sameTarget(a: ConfigSnapshot, b: ConfigSnapshot): boolean {
  return a.baseUrl === b.baseUrl && a.credential === b.credential;
}

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

export class Runtime {
  private current: Generation;
  private deps: RuntimeDeps;
  private logger: Logger;
  private instrumentation: Instrumentation;
  private retiring = new Set<Promise<void>>();
  private reloading = false;
  private closing: Promise<void> | null = null;

  private constructor(generation: Generation, deps: RuntimeDeps) {
    this.current = generation;
    this.deps = deps;
    this.logger = (deps.logger ?? silentLogger).child({ component: "runtime" });
    this.instrumentation = deps.instrumentation ?? noopInstrumentation;
  }

  /**
   * Build the first generation. Rejects with the negotiation error
   * (e.g. VersionIncompatibleError) after releasing the client.
   */
  static async create(snapshot: ConfigSnapshot, deps: RuntimeDeps = {}): Promise<Runtime> {
    const generation = await buildGeneration(snapshot, deps);
    return new Runtime(generation, deps);
  }

  get snapshot(): NegotiatedSnapshot {
    return this.current.snapshot;
  }

  get collector(): Collector {
    return this.current.collector;
  }

  get client(): FetchClient {
    return this.current.client;
  }

  get apiVersion(): string {
    return this.current.snapshot.apiVersion;
  }

  get isClosing(): boolean {
    return this.closing !== null;
  }

  collect(options?: CollectOptions): Promise<CollectionResult> {
    return this.current.collector.collect(options);
  }

  testConnectivity(options?: CollectOptions): Promise<void> {
    return this.current.collector.testConnectivity(options);
  }

  isHealthy(): boolean {
    return this.current.collector.isHealthy();
  }

  lastScrape(): LastScrape {
    return this.current.collector.lastScrape();
  }

  /**
   * Swap in a generation built around `next`. The storage cache carries
   * over unless the upstream target or the TTL changed.
   * @throws LifecycleError while shutting down or during another reload
   */
  async reload(next: ConfigSnapshot): Promise<NegotiatedSnapshot> {
    if (this.closing) throw new LifecycleError("runtime is shutting down");
    if (this.reloading) throw new LifecycleError("reload already in progress");
    this.reloading = true;

    try {
      const previous = this.current;
      const targetChanged = !sameTarget(previous.snapshot, next);
      const keepCache = !targetChanged && previous.cache.ttl === next.cacheTtlMs;

      const generation = await buildGeneration(
        next,
        this.deps,
        keepCache ? previous.cache : undefined,
      );

      if (this.closing) {
        await generation.client.close();
        throw new LifecycleError("runtime is shutting down");
      }

      if (targetChanged) {
        previous.cache.flush();
        this.logger.info({ baseUrl: next.baseUrl }, "upstream target changed; storage cache flushed");
      }

      this.current = generation;
      this.retire(previous);
      this.logger.info({ apiVersion: generation.snapshot.apiVersion }, "configuration reloaded");
      return generation.snapshot;
    } finally {
      this.reloading = false;
    }
  }

  /** Ordered shutdown; later calls return the same promise */
  shutdown(): Promise<void> {
    this.closing ??= this.runShutdown();
    return this.closing;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async runShutdown(): Promise<void> {
    const { collector, client } = this.current;

    collector.stopAccepting();
    await collector.drain();
    await Promise.allSettled([...this.retiring]);

    try {
      await client.close();
    } catch (err) {
      this.logger.error({ err }, "failed to close API client");
    }

    try {
      await this.instrumentation.flush();
    } catch (err) {
      this.logger.error({ err }, "failed to flush instrumentation");
    }
    this.logger.info("runtime stopped");
  }

  private retire(generation: Generation): void {
    const done: Promise<void> = (async () => {
      generation.collector.stopAccepting();
      await generation.collector.drain();
      await generation.client.close();
    })()
      .catch((err: unknown) => {
        this.logger.error({ err }, "failed to retire previous client");
      })
      .finally(() => {
        this.retiring.delete(done);
      });
    this.retiring.add(done);
  }
}

// ---------------------------------------------------------------------------
// Generations
// ---------------------------------------------------------------------------

async function negotiate(
  client: FetchClient,
  snapshot: ConfigSnapshot,
  deps: RuntimeDeps,
  logger: Logger,
): Promise<NegotiatedSnapshot> {
  if (snapshot.apiVersion !== null) {
    logger.info({ apiVersion: snapshot.apiVersion }, "using configured API version");
    return withApiVersion(snapshot, snapshot.apiVersion);
  }

  const version = await detectVersion(client, snapshot.baseUrl, snapshot.credential, {
    signal: AbortSignal.timeout(deps.negotiationTimeoutMs ?? NEGOTIATION_TIMEOUT_MS),
    instrumentation: deps.instrumentation,
    logger: deps.logger,
  });
  return withApiVersion(snapshot, version);
}

async function buildGeneration(
  snapshot: ConfigSnapshot,
  deps: RuntimeDeps,
  cache?: TtlCache<StorageMetricValue[]>,
): Promise<Generation> {
  const logger = (deps.logger ?? silentLogger).child({ component: "runtime" });
  const client = new FetchClient(snapshot, {
    dispatcher: deps.dispatcher,
    logger: deps.logger,
    instrumentation: deps.instrumentation,
    now: deps.now,
  });

  let negotiated: NegotiatedSnapshot;
  try {
    negotiated = await negotiate(client, snapshot, deps, logger);
  } catch (err) {
    await client.close();
    throw err;
  }

  const storageCache =
    cache ?? new TtlCache<StorageMetricValue[]>(snapshot.cacheTtlMs, { now: deps.now });
  const collector = new Collector({
    client,
    snapshot: negotiated,
    cache: storageCache,
    instrumentation: deps.instrumentation,
    logger: deps.logger,
    now: deps.now,
  });

  return { snapshot: negotiated, client, collector, cache: storageCache };
}

/** What the HTTP surface needs from a runtime */
export type RuntimeHandle = Pick<
  Runtime,
  "apiVersion" | "collect" | "testConnectivity" | "isHealthy" | "lastScrape" | "shutdown"
>;
