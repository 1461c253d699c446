/**
 * Configuration snapshot shape.
 *
 * A snapshot is built once from validated input and deep-frozen. Nothing
 * in the exporter mutates it; a reload builds a new one.
 */

export type TlsVersion = "TLSv1.2" | "TLSv1.3";

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface PoolSettings {
  /** Max open connections to the API origin */
  readonly maxConnections: number;
  /** Keep-alive timeout for idle pooled connections */
  readonly idleTimeoutMs: number;
}

export interface TimeoutSettings {
  /** Per-call timeout for one HTTP attempt */
  readonly requestMs: number;
  /** Upper bound for one whole collection cycle */
  readonly collectionMs: number;
  /** How long close() waits for in-flight requests */
  readonly drainMs: number;
  /** Timeout for the /health connectivity check */
  readonly healthCheckMs: number;
}

export interface RetrySettings {
  /** Retries after the first attempt */
  readonly count: number;
  readonly initialWaitMs: number;
  readonly maxWaitMs: number;
}

export interface TlsSettings {
  readonly insecureSkipVerify: boolean;
  readonly minVersion: TlsVersion;
}

export interface ServerSettings {
  readonly host: string;
  readonly port: number;
  readonly metricsPath: string;
}

export interface TracingSettings {
  readonly enabled: boolean;
  /** OTLP/gRPC collector, host:port */
  readonly endpoint: string;
  /** Plaintext gRPC instead of TLS */
  readonly insecure: boolean;
  /** Fraction of root traces kept, 0 to 1 */
  readonly samplingRate: number;
}

export interface ConfigSnapshot {
  /** API base URL, e.g. https://backup-master:1556/netbackup */
  readonly baseUrl: string;
  /** API key sent in the Authorization header */
  readonly credential: string;
  /** Fixed API version, or null to negotiate one */
  readonly apiVersion: string | null;
  /** Jobs that ended within this window are collected */
  readonly scrapeWindowMs: number;
  readonly cacheTtlMs: number;
  readonly pool: PoolSettings;
  readonly timeouts: TimeoutSettings;
  readonly retry: RetrySettings;
  readonly tls: TlsSettings;
  readonly server: ServerSettings;
  readonly logLevel: LogLevel;
  readonly tracing: TracingSettings;
}

/** A snapshot whose API version is settled */
export interface NegotiatedSnapshot extends ConfigSnapshot {
  readonly apiVersion: string;
}
