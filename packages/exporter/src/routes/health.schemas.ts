/**
 * Typebox schemas for the health route.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Query params
// ---------------------------------------------------------------------------

export const HealthQuery = Type.Object({
  /** false: report liveness from the last cycle without calling the API */
  check: Type.Boolean({ default: true }),
});

export type HealthQuery = Static<typeof HealthQuery>;

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

const Timestamp = Type.Union([Type.String(), Type.Null()]);

export const HealthBody = Type.Object({
  status: Type.Union([
    Type.Literal("ok"),
    Type.Literal("unhealthy"),
    Type.Literal("starting"),
  ]),
  live: Type.Boolean(),
  apiVersion: Type.Union([Type.String(), Type.Null()]),
  lastScrape: Type.Object({ storage: Timestamp, jobs: Timestamp }),
  error: Type.Optional(Type.String()),
  timestamp: Type.String(),
});

export type HealthBody = Static<typeof HealthBody>;
