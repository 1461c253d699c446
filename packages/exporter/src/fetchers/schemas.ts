/**
 * Typebox schemas for the backup API payloads.
 *
 * The envelope is checked as a whole; items are decoded one by one so a
 * single malformed item is skipped instead of failing the page.
 */

import { Type, type Static } from "@sinclair/typebox";

/** Cursor fields may be sent as null; null means the same as absent */
const CursorField = Type.Optional(Type.Union([Type.Integer(), Type.Null()]));

export const Pagination = Type.Object({
  offset: CursorField,
  next: CursorField,
  last: CursorField,
  limit: Type.Optional(Type.Integer()),
  count: Type.Optional(Type.Integer()),
});
export type Pagination = Static<typeof Pagination>;

export const PageEnvelope = Type.Object({
  data: Type.Array(Type.Unknown()),
  meta: Type.Optional(
    Type.Object({
      pagination: Type.Optional(Pagination),
    }),
  ),
});
export type PageEnvelope = Static<typeof PageEnvelope>;

export const StorageUnit = Type.Object({
  id: Type.Optional(Type.String()),
  attributes: Type.Object({
    name: Type.String(),
    storageType: Type.String(),
    storageServerType: Type.String(),
    freeCapacityBytes: Type.Number(),
    usedCapacityBytes: Type.Number(),
  }),
});
export type StorageUnit = Static<typeof StorageUnit>;

export const Job = Type.Object({
  id: Type.Optional(Type.String()),
  attributes: Type.Object({
    jobId: Type.Integer(),
    jobType: Type.String(),
    policyType: Type.Optional(Type.String()),
    status: Type.Integer(),
    kilobytesTransferred: Type.Optional(Type.Number()),
    endTime: Type.Optional(Type.String()),
  }),
});
export type Job = Static<typeof Job>;
