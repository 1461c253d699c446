/**
 * Fetch Client: authenticated, retrying HTTP transport for the backup
 * API, backed by one pooled undici Agent.
 *
 * Lifecycle:
 *  - every call bumps an in-flight counter for its whole duration
 *  - once close() starts, new calls reject with "client is closed"
 *  - close() waits for the counter to reach zero (bounded by the drain
 *    timeout or the caller's signal), then releases the pool
 *  - a second close() rejects with "client already closed"
 *
 * Like the collector, this is independent of the web framework. It
 * receives its dependencies via constructor injection.
 */

import { setTimeout as delay } from "node:timers/promises";
import { Agent, fetch, type Dispatcher } from "undici";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Logger } from "pino";
import type {
  ConfigSnapshot,
  NegotiatedSnapshot,
  RetrySettings,
} from "@backup-exporter/shared";
import {
  AuthenticationError,
  CancelledError,
  HttpStatusError,
  LifecycleError,
  ResponseShapeError,
  TransientError,
  VersionNotAcceptableError,
  errorMessage,
} from "../errors.js";
import {
  noopInstrumentation,
  type Instrumentation,
} from "../instrumentation/index.js";
import { silentLogger } from "../logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MEDIA_TYPE = "application/vnd.netbackup+json";

/** Characters of an unexpected body quoted in error messages */
const PREVIEW_LENGTH = 200;

const JSON_CONTENT_TYPE_RE = /[/+]json\b/i;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FetchClientSettings = Pick<ConfigSnapshot, "pool" | "timeouts" | "retry" | "tls">;

/** Where and as whom a fetcher talks to the API */
export type ApiTarget = Pick<NegotiatedSnapshot, "baseUrl" | "credential" | "apiVersion">;

export interface FetchOptions {
  /** Version sent in the Accept header; null sends the bare media type */
  apiVersion: string | null;
  credential: string;
  signal?: AbortSignal;
}

export interface CloseOptions {
  /** Stop waiting for the drain early */
  signal?: AbortSignal;
  /** Overrides timeouts.drainMs */
  drainTimeoutMs?: number;
}

export interface FetchClientOptions {
  /**
   * Use this dispatcher instead of building an Agent from the pool and
   * TLS settings. The caller owns it: close() leaves it open.
   */
  dispatcher?: Dispatcher;
  logger?: Logger;
  instrumentation?: Instrumentation;
  /** Clock used for Retry-After dates (default: Date.now) */
  now?: () => number;
  /** Timer used between retries (default: setTimeout from node:timers/promises) */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** The slice of the client the fetchers and negotiator depend on */
export interface ApiClient {
  fetchData<S extends TSchema>(
    url: string,
    schema: S,
    options: FetchOptions,
  ): Promise<Static<S>>;
}

/** A fully read HTTP response */
interface RawResponse {
  status: number;
  contentType: string | null;
  retryAfter: string | null;
  body: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Exponential backoff for the given retry (1-based), capped at maxWaitMs */
export function backoffDelay(attempt: number, retry: RetrySettings): number {
  return Math.min(retry.initialWaitMs * 2 ** (attempt - 1), retry.maxWaitMs);
}

/**
 * Parse a Retry-After header (delay-seconds or HTTP-date) into a wait in
 * milliseconds. Returns null when absent or unparseable.
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now(),
): number | null {
  if (!header) return null;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

/** Join a path onto the base URL's path and append an encoded query */
export function buildUrl(
  baseUrl: string,
  path: string,
  query?: Record<string, string | number>,
): string {
  const url = new URL(baseUrl);
  url.pathname = url.pathname.replace(/\/+$/, "") + path;
  url.search = query
    ? Object.entries(query)
        .map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(String(v))}`)
        .join("&")
    : "";
  return url.toString();
}

export function acceptHeader(apiVersion: string | null): string {
  return apiVersion ? `${MEDIA_TYPE};version=${apiVersion}` : MEDIA_TYPE;
}

function preview(body: string): string {
  return body.length > PREVIEW_LENGTH ? `${body.slice(0, PREVIEW_LENGTH)}...` : body;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

// ---------------------------------------------------------------------------
// FetchClient
// ---------------------------------------------------------------------------

export class FetchClient implements ApiClient {
  private settings: FetchClientSettings;
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private logger: Logger;
  private instrumentation: Instrumentation;
  private now: () => number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private closed = false;
  private inFlight = 0;
  private drainWaiters = new Set<() => void>();

  constructor(settings: FetchClientSettings, options?: FetchClientOptions) {
    this.settings = settings;
    this.logger = (options?.logger ?? silentLogger).child({ component: "fetch-client" });
    this.instrumentation = options?.instrumentation ?? noopInstrumentation;
    this.now = options?.now ?? Date.now;
    this.sleep = options?.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));

    if (settings.tls.insecureSkipVerify) {
      this.logger.warn(
        "TLS certificate verification is disabled; connections to the API are not authenticated",
      );
    }

    if (options?.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connections: settings.pool.maxConnections,
        keepAliveTimeout: settings.pool.idleTimeoutMs,
        connect: {
          minVersion: settings.tls.minVersion,
          rejectUnauthorized: !settings.tls.insecureSkipVerify,
        },
      });
      this.ownsDispatcher = true;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get activeRequests(): number {
    return this.inFlight;
  }

  /**
   * GET `url`, validate the JSON body against `schema` and return it.
   * Retries transport failures, 429 and 5xx responses with backoff.
   */
  async fetchData<S extends TSchema>(
    url: string,
    schema: S,
    options: FetchOptions,
  ): Promise<Static<S>> {
    if (this.closed) throw new LifecycleError("client is closed");

    this.inFlight++;
    try {
      return await this.instrumentation.trace(
        "http_request",
        { "http.request.method": "GET", "url.full": url },
        async (span) => {
          const started = this.now();
          const res = await this.request(url, options);
          span.setAttributes({
            "http.response.status_code": res.status,
            "http.response.body.size": Buffer.byteLength(res.body),
            duration_ms: this.now() - started,
          });
          return this.decode(url, res, schema, options.apiVersion);
        },
      );
    } finally {
      this.inFlight--;
      if (this.inFlight === 0) {
        for (const resolve of [...this.drainWaiters]) resolve();
      }
    }
  }

  /**
   * Stop accepting calls, wait for in-flight ones, release the pool.
   * Rejects with CancelledError if `signal` fired while waiting; the pool
   * is released either way.
   */
  async close(options?: CloseOptions): Promise<void> {
    if (this.closed) throw new LifecycleError("client already closed");
    this.closed = true;

    const drainMs = options?.drainTimeoutMs ?? this.settings.timeouts.drainMs;
    const drained = await this.waitForDrain(drainMs, options?.signal);

    if (!drained) {
      this.logger.warn(
        { activeRequests: this.inFlight, drainMs },
        "closing client with requests still in flight",
      );
    }

    if (this.ownsDispatcher) {
      if (drained) {
        await this.dispatcher.close();
      } else {
        await this.dispatcher.destroy();
      }
    }
    this.logger.debug("client closed");

    if (options?.signal?.aborted) {
      throw new CancelledError("client close cancelled", { cause: options.signal.reason });
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** One logical request: the first attempt plus up to retry.count retries */
  private async request(url: string, options: FetchOptions): Promise<RawResponse> {
    const { retry } = this.settings;
    let lastError: TransientError | undefined;
    let retryAfterMs: number | null = null;

    for (let attempt = 0; attempt <= retry.count; attempt++) {
      if (attempt > 0) {
        const waitMs = Math.min(retryAfterMs ?? backoffDelay(attempt, retry), retry.maxWaitMs);
        this.logger.warn(
          { url, attempt, waitMs, err: lastError?.message },
          "retrying request",
        );
        await this.wait(waitMs, url, options.signal);
      }

      let res: RawResponse;
      try {
        res = await this.attempt(url, options);
      } catch (err) {
        if (options.signal?.aborted) {
          throw new CancelledError(`request cancelled: ${url}`, { cause: err });
        }
        lastError = new TransientError(`request failed: ${url}: ${errorMessage(err)}`, null, {
          cause: err,
        });
        retryAfterMs = null;
        continue;
      }

      if (!isRetryableStatus(res.status)) return res;

      lastError = new TransientError(`HTTP ${res.status} from ${url}`, res.status);
      retryAfterMs = parseRetryAfter(res.retryAfter, this.now());
    }

    throw lastError ?? new TransientError(`request failed: ${url}`, null);
  }

  /** Single HTTP attempt bounded by the per-call timeout */
  private async attempt(url: string, options: FetchOptions): Promise<RawResponse> {
    const timeout = AbortSignal.timeout(this.settings.timeouts.requestMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    const res = await fetch(url, {
      method: "GET",
      headers: {
        Accept: acceptHeader(options.apiVersion),
        Authorization: options.credential,
      },
      signal,
      dispatcher: this.dispatcher,
    });

    return {
      status: res.status,
      contentType: res.headers.get("content-type"),
      retryAfter: res.headers.get("retry-after"),
      body: await res.text(),
    };
  }

  private decode<S extends TSchema>(
    url: string,
    res: RawResponse,
    schema: S,
    apiVersion: string | null,
  ): Static<S> {
    if (res.status === 406) throw new VersionNotAcceptableError(apiVersion, url);
    if (res.status === 401 || res.status === 403) {
      throw new AuthenticationError(res.status, url);
    }
    if (res.status < 200 || res.status >= 300) {
      throw new HttpStatusError(res.status, url, res.contentType);
    }
    if (!res.contentType || !JSON_CONTENT_TYPE_RE.test(res.contentType)) {
      throw new ResponseShapeError(
        `unexpected content type ${res.contentType ?? "(none)"} from ${url}: ${preview(res.body)}`,
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(res.body);
    } catch (err) {
      throw new ResponseShapeError(`invalid JSON from ${url}: ${preview(res.body)}`, {
        cause: err,
      });
    }

    if (!Value.Check(schema, payload)) {
      const first = Value.Errors(schema, payload).First();
      const detail = first ? `${first.path || "/"}: ${first.message}` : "schema mismatch";
      throw new ResponseShapeError(`unexpected response shape from ${url} (${detail})`);
    }
    return payload;
  }

  private async wait(ms: number, url: string, signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (err) {
      throw new CancelledError(`request cancelled: ${url}`, { cause: err });
    }
  }

  /** Resolves true once idle, false on timeout or abort */
  private waitForDrain(timeoutMs: number, signal: AbortSignal | undefined): Promise<boolean> {
    if (this.inFlight === 0) return Promise.resolve(true);
    if (signal?.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const finish = (drained: boolean) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.drainWaiters.delete(onDrain);
        resolve(drained);
      };
      const onDrain = () => finish(true);
      const onAbort = () => finish(false);

      timer = setTimeout(() => finish(false), timeoutMs);
      this.drainWaiters.add(onDrain);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
