import type { ConfigSnapshot, NegotiatedSnapshot } from "@backup-exporter/shared";

/** Freeze `value` and everything reachable from it */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** A new frozen snapshot carrying the settled API version */
export function withApiVersion(snapshot: ConfigSnapshot, apiVersion: string): NegotiatedSnapshot {
  return deepFreeze({ ...snapshot, apiVersion });
}

/** Render a credential for logs: first and last four characters only */
export function maskCredential(credential: string): string {
  if (credential.length <= 8) return "****";
  return `${credential.slice(0, 4)}****${credential.slice(-4)}`;
}

/** Snapshot fields safe to log */
export function describeSnapshot(snapshot: ConfigSnapshot) {
  return {
    baseUrl: snapshot.baseUrl,
    credentialMask: maskCredential(snapshot.credential),
    apiVersion: snapshot.apiVersion ?? "auto",
    scrapeWindowMs: snapshot.scrapeWindowMs,
    cacheTtlMs: snapshot.cacheTtlMs,
    insecureSkipVerify: snapshot.tls.insecureSkipVerify,
  };
}
