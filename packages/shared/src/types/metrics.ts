/**
 * Types for the metric model.
 *
 * These describe the labeled series produced by the collector and
 * consumed by the exposition layer. Keys are plain value objects; their
 * label projection lives in the matching KeySchema (see metric-model.ts).
 */

// ---------------------------------------------------------------------------
// Metric keys
// ---------------------------------------------------------------------------

/** Capacity dimension reported for a storage unit */
export type SizeClass = "free" | "used";

/** One storage-unit capacity series */
export interface StorageKey {
  /** Storage unit name (e.g. "disk-pool-1") */
  readonly name: string;
  /** Storage server type (e.g. "MEDIA_SERVER") */
  readonly type: string;
  readonly size: SizeClass;
}

/** One job series, split by job type, policy type and exit status */
export interface JobKey {
  /** Job type (e.g. "BACKUP", "RESTORE") */
  readonly action: string;
  /** Policy type (e.g. "VMWARE", "STANDARD") */
  readonly policyType: string;
  /** Exit status code as a string ("0" = success) */
  readonly status: string;
}

/** Job counts split by job type and exit status only */
export interface JobStatusKey {
  readonly action: string;
  readonly status: string;
}

// ---------------------------------------------------------------------------
// Metric values
// ---------------------------------------------------------------------------

export interface MetricValue<K> {
  readonly key: K;
  readonly value: number;
}

export type StorageMetricValue = MetricValue<StorageKey>;
export type JobMetricValue = MetricValue<JobKey>;
export type JobStatusMetricValue = MetricValue<JobStatusKey>;

/** Everything one jobs sequence folds into */
export interface JobsMetrics {
  /** Bytes transferred per job key */
  bytes: JobMetricValue[];
  /** Number of jobs per job key */
  count: JobMetricValue[];
  /** Number of jobs per (action, status) */
  statusCount: JobStatusMetricValue[];
}

/**
 * Ordered label projection for one key kind. `labels(key)` returns the
 * values in the same order as `labelNames`.
 */
export interface KeySchema<K> {
  readonly kind: string;
  readonly labelNames: readonly string[];
  labels(key: K): string[];
}
