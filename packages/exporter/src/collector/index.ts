export { Collector, cycleStatus } from "./collector.js";
export type {
  CollectionResult,
  CollectOptions,
  CollectorDeps,
  CycleStatus,
  JobsSource,
  StorageSource,
} from "./collector.js";
export { TtlCache, DEFAULT_CACHE_TTL_MS } from "./ttl-cache.js";
export type { CacheLookup, TtlCacheOptions } from "./ttl-cache.js";
