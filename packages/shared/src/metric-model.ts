/**
 * Metric model helpers: key schemas and the accumulator that folds
 * API items into per-key buckets.
 *
 * Bucket identity is the JSON encoding of a key's ordered label list.
 * The encoding is injective (label values containing any delimiter stay
 * distinct) and is only ever used as a lookup handle: the original key
 * object is stored next to its value and handed back as-is.
 */

import type {
  JobKey,
  JobStatusKey,
  KeySchema,
  MetricValue,
  StorageKey,
} from "./types/metrics.js";

// ---------------------------------------------------------------------------
// Key schemas
// ---------------------------------------------------------------------------

export const storageKeySchema: KeySchema<StorageKey> = {
  kind: "storage",
  labelNames: ["name", "type", "size"],
  labels: (key) => [key.name, key.type, key.size],
};

export const jobKeySchema: KeySchema<JobKey> = {
  kind: "job",
  labelNames: ["action", "policy_type", "status"],
  labels: (key) => [key.action, key.policyType, key.status],
};

export const jobStatusKeySchema: KeySchema<JobStatusKey> = {
  kind: "job_status",
  labelNames: ["action", "status"],
  labels: (key) => [key.action, key.status],
};

/** Lookup handle for a key. Never parsed back into a key. */
export function keyId<K>(schema: KeySchema<K>, key: K): string {
  return JSON.stringify(schema.labels(key));
}

/** Structural equality over the ordered label list */
export function sameKey<K>(schema: KeySchema<K>, a: K, b: K): boolean {
  const left = schema.labels(a);
  const right = schema.labels(b);
  return left.length === right.length && left.every((v, i) => v === right[i]);
}

/** Zip a key's labels with the schema's label names */
export function labelRecord<K>(
  schema: KeySchema<K>,
  key: K,
): Record<string, string> {
  const values = schema.labels(key);
  const record: Record<string, string> = {};
  schema.labelNames.forEach((name, i) => {
    record[name] = values[i] ?? "";
  });
  return record;
}

// ---------------------------------------------------------------------------
// Accumulator
// ---------------------------------------------------------------------------

interface Bucket<K> {
  key: K;
  value: number;
}

export class MetricAccumulator<K> {
  private buckets = new Map<string, Bucket<K>>();

  constructor(private readonly schema: KeySchema<K>) {}

  /** Add `delta` to the key's bucket, creating it at zero if needed */
  add(key: K, delta: number): void {
    const id = keyId(this.schema, key);
    const bucket = this.buckets.get(id);
    if (bucket) {
      bucket.value += delta;
      return;
    }
    this.buckets.set(id, { key, value: delta });
  }

  increment(key: K): void {
    this.add(key, 1);
  }

  get(key: K): number | undefined {
    return this.buckets.get(keyId(this.schema, key))?.value;
  }

  /** Number of distinct keys */
  get size(): number {
    return this.buckets.size;
  }

  /** Sum of all bucket values */
  total(): number {
    let sum = 0;
    for (const bucket of this.buckets.values()) sum += bucket.value;
    return sum;
  }

  values(): MetricValue<K>[] {
    return Array.from(this.buckets.values(), (b) => ({
      key: b.key,
      value: b.value,
    }));
  }
}
