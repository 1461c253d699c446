export type {
  SizeClass,
  StorageKey,
  JobKey,
  JobStatusKey,
  MetricValue,
  StorageMetricValue,
  JobMetricValue,
  JobStatusMetricValue,
  JobsMetrics,
  KeySchema,
} from "./types/metrics.js";
export type {
  TlsVersion,
  LogLevel,
  PoolSettings,
  TimeoutSettings,
  RetrySettings,
  TlsSettings,
  ServerSettings,
  TracingSettings,
  ConfigSnapshot,
  NegotiatedSnapshot,
} from "./types/config.js";
export type {
  MetricSource,
  LastScrape,
  HealthStatus,
  HealthResponse,
} from "./types/health.js";
export {
  storageKeySchema,
  jobKeySchema,
  jobStatusKeySchema,
  keyId,
  sameKey,
  labelRecord,
  MetricAccumulator,
} from "./metric-model.js";
