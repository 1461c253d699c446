/**
 * Storage fetcher: walks the storage-unit listing and folds each disk
 * unit into free/used capacity series. Tape units report no meaningful
 * capacity and are skipped.
 */

import type { Logger } from "pino";
import {
  MetricAccumulator,
  storageKeySchema,
  type StorageMetricValue,
} from "@backup-exporter/shared";
import { buildUrl, type ApiClient, type ApiTarget } from "../client/fetch-client.js";
import {
  noopInstrumentation,
  type Instrumentation,
} from "../instrumentation/index.js";
import { silentLogger } from "../logger.js";
import {
  decodeItems,
  nextCursor,
  paginate,
  type Page,
  type PageCursor,
} from "./pagination.js";
import { PageEnvelope, StorageUnit } from "./schemas.js";

export const STORAGE_PATH = "/storage/storage-units";

const TAPE_STORAGE_TYPE = "Tape";

export interface FetcherOptions {
  logger?: Logger;
  instrumentation?: Instrumentation;
}

export interface FetchRequest {
  target: ApiTarget;
  signal?: AbortSignal;
}

export class StorageFetcher {
  private logger: Logger;
  private instrumentation: Instrumentation;

  constructor(options?: FetcherOptions) {
    this.logger = (options?.logger ?? silentLogger).child({ component: "storage-fetcher" });
    this.instrumentation = options?.instrumentation ?? noopInstrumentation;
  }

  async fetchPage(
    client: ApiClient,
    cursor: PageCursor,
    request: FetchRequest,
  ): Promise<Page<StorageUnit>> {
    const { target, signal } = request;
    const url = buildUrl(target.baseUrl, STORAGE_PATH, {
      "page[limit]": cursor.limit,
      "page[offset]": cursor.offset,
    });
    const envelope = await client.fetchData(url, PageEnvelope, {
      apiVersion: target.apiVersion,
      credential: target.credential,
      signal,
    });
    return {
      items: decodeItems(StorageUnit, envelope.data, this.logger, "storage unit"),
      next: nextCursor(cursor, envelope.meta?.pagination, envelope.data.length, this.logger),
    };
  }

  /** Every page of storage units, folded into capacity series */
  async fetch(client: ApiClient, request: FetchRequest): Promise<StorageMetricValue[]> {
    return this.instrumentation.trace(
      "fetch_storage",
      { endpoint: STORAGE_PATH, "api.version": request.target.apiVersion },
      async (span) => {
        const acc = new MetricAccumulator(storageKeySchema);
        let tapeUnits = 0;

        const totals = await paginate(
          (cursor) => this.fetchPage(client, cursor, request),
          (page) => {
            for (const { attributes: unit } of page.items) {
              if (unit.storageType === TAPE_STORAGE_TYPE) {
                tapeUnits++;
                continue;
              }
              const base = { name: unit.name, type: unit.storageServerType };
              acc.add({ ...base, size: "free" }, unit.freeCapacityBytes);
              acc.add({ ...base, size: "used" }, unit.usedCapacityBytes);
            }
          },
          { signal: request.signal, logger: this.logger },
        );

        span.setAttributes({
          pages: totals.pages,
          storage_units: totals.items,
          tape_units_skipped: tapeUnits,
          metric_count: acc.size,
        });
        this.logger.debug(
          { units: totals.items, tapeUnits, pages: totals.pages },
          "fetched storage units",
        );
        return acc.values();
      },
    );
  }
}
