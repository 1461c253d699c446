import { describe, it, expect } from "vitest";
import {
  MetricAccumulator,
  jobKeySchema,
  jobStatusKeySchema,
  keyId,
  labelRecord,
  sameKey,
  storageKeySchema,
} from "./metric-model.js";
import type { JobKey, StorageKey } from "./types/metrics.js";

// ---------------------------------------------------------------------------
// Key schemas
// ---------------------------------------------------------------------------

describe("key schemas", () => {
  it("projects storage keys in label order", () => {
    const key: StorageKey = { name: "disk-pool-1", type: "MEDIA_SERVER", size: "free" };
    expect(storageKeySchema.labels(key)).toEqual(["disk-pool-1", "MEDIA_SERVER", "free"]);
    expect(storageKeySchema.labelNames).toEqual(["name", "type", "size"]);
  });

  it("projects job keys with the exposition label names", () => {
    const key: JobKey = { action: "BACKUP", policyType: "VMWARE", status: "0" };
    expect(jobKeySchema.labels(key)).toEqual(["BACKUP", "VMWARE", "0"]);
    expect(labelRecord(jobKeySchema, key)).toEqual({
      action: "BACKUP",
      policy_type: "VMWARE",
      status: "0",
    });
  });

  it("projects job status keys", () => {
    expect(jobStatusKeySchema.labels({ action: "RESTORE", status: "150" })).toEqual([
      "RESTORE",
      "150",
    ]);
  });
});

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

describe("keyId / sameKey", () => {
  it("treats structurally equal keys as the same", () => {
    const a: JobKey = { action: "BACKUP", policyType: "STANDARD", status: "0" };
    const b: JobKey = { action: "BACKUP", policyType: "STANDARD", status: "0" };
    expect(a).not.toBe(b);
    expect(sameKey(jobKeySchema, a, b)).toBe(true);
    expect(keyId(jobKeySchema, a)).toBe(keyId(jobKeySchema, b));
  });

  it("keeps label values containing delimiters distinct", () => {
    const a: JobKey = { action: "A|B", policyType: "C", status: "0" };
    const b: JobKey = { action: "A", policyType: "B|C", status: "0" };
    expect(sameKey(jobKeySchema, a, b)).toBe(false);
    expect(keyId(jobKeySchema, a)).not.toBe(keyId(jobKeySchema, b));
  });
});

// ---------------------------------------------------------------------------
// MetricAccumulator
// ---------------------------------------------------------------------------

describe("MetricAccumulator", () => {
  it("increments counters per key", () => {
    const acc = new MetricAccumulator(jobKeySchema);
    acc.increment({ action: "BACKUP", policyType: "VMWARE", status: "0" });
    acc.increment({ action: "BACKUP", policyType: "VMWARE", status: "0" });
    acc.increment({ action: "BACKUP", policyType: "VMWARE", status: "1" });

    expect(acc.size).toBe(2);
    expect(acc.get({ action: "BACKUP", policyType: "VMWARE", status: "0" })).toBe(2);
    expect(acc.get({ action: "BACKUP", policyType: "VMWARE", status: "1" })).toBe(1);
    expect(acc.total()).toBe(3);
  });

  it("sums sizes per key", () => {
    const acc = new MetricAccumulator(storageKeySchema);
    acc.add({ name: "pool", type: "MEDIA_SERVER", size: "used" }, 100);
    acc.add({ name: "pool", type: "MEDIA_SERVER", size: "used" }, 50);
    expect(acc.get({ name: "pool", type: "MEDIA_SERVER", size: "used" })).toBe(150);
  });

  it("returns undefined for unknown keys", () => {
    const acc = new MetricAccumulator(jobStatusKeySchema);
    expect(acc.get({ action: "BACKUP", status: "0" })).toBeUndefined();
  });

  it("hands back the original key objects", () => {
    const acc = new MetricAccumulator(jobStatusKeySchema);
    const key = { action: "A|B", status: "0" };
    acc.increment(key);
    const [value] = acc.values();
    expect(value.key).toBe(key);
    expect(value.value).toBe(1);
  });
});
