/**
 * Jobs fetcher: walks the job listing for jobs that ended after `since`
 * and folds each job into byte/count series per (type, policy, status)
 * plus a count per (type, status).
 */

import type { Logger } from "pino";
import {
  MetricAccumulator,
  jobKeySchema,
  jobStatusKeySchema,
  type JobKey,
  type JobsMetrics,
} from "@backup-exporter/shared";
import { buildUrl, type ApiClient } from "../client/fetch-client.js";
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
import { Job, PageEnvelope } from "./schemas.js";
import type { FetcherOptions, FetchRequest } from "./storage-fetcher.js";

export const JOBS_PATH = "/admin/jobs";

export interface JobsFetchRequest extends FetchRequest {
  /** Only jobs with an end time after this are listed */
  since: Date;
}

export function jobsQuery(cursor: PageCursor, since: Date): Record<string, string | number> {
  return {
    "page[limit]": cursor.limit,
    "page[offset]": cursor.offset,
    sort: "jobId",
    filter: `endTime gt ${since.toISOString()}`,
  };
}

export class JobsFetcher {
  private logger: Logger;
  private instrumentation: Instrumentation;

  constructor(options?: FetcherOptions) {
    this.logger = (options?.logger ?? silentLogger).child({ component: "jobs-fetcher" });
    this.instrumentation = options?.instrumentation ?? noopInstrumentation;
  }

  async fetchPage(
    client: ApiClient,
    cursor: PageCursor,
    request: JobsFetchRequest,
  ): Promise<Page<Job>> {
    const { target, signal, since } = request;
    return this.instrumentation.trace(
      "fetch_job_page",
      { "page.offset": cursor.offset, "page.limit": cursor.limit },
      async (span) => {
        const url = buildUrl(target.baseUrl, JOBS_PATH, jobsQuery(cursor, since));
        const envelope = await client.fetchData(url, PageEnvelope, {
          apiVersion: target.apiVersion,
          credential: target.credential,
          signal,
        });
        const items = decodeItems(Job, envelope.data, this.logger, "job");
        const next = nextCursor(cursor, envelope.meta?.pagination, envelope.data.length, this.logger);
        span.setAttributes({ "page.items": items.length, "page.last": next === null });
        return { items, next };
      },
    );
  }

  /** Every page of jobs in the window, folded into job series */
  async fetch(client: ApiClient, request: JobsFetchRequest): Promise<JobsMetrics> {
    return this.instrumentation.trace(
      "fetch_jobs",
      {
        endpoint: JOBS_PATH,
        "api.version": request.target.apiVersion,
        "window.start": request.since.toISOString(),
      },
      async (span) => {
        const bytes = new MetricAccumulator(jobKeySchema);
        const count = new MetricAccumulator(jobKeySchema);
        const statusCount = new MetricAccumulator(jobStatusKeySchema);

        const totals = await paginate(
          (cursor) => this.fetchPage(client, cursor, request),
          (page) => {
            for (const { attributes: job } of page.items) {
              const key: JobKey = {
                action: job.jobType,
                policyType: job.policyType ?? "",
                status: String(job.status),
              };
              count.increment(key);
              bytes.add(key, (job.kilobytesTransferred ?? 0) * 1024);
              statusCount.increment({ action: key.action, status: key.status });
            }
          },
          { signal: request.signal, logger: this.logger },
        );

        span.setAttributes({
          pages: totals.pages,
          jobs: totals.items,
          metric_count: count.size,
        });
        this.logger.debug({ jobs: totals.items, pages: totals.pages }, "fetched jobs");
        return {
          bytes: bytes.values(),
          count: count.values(),
          statusCount: statusCount.values(),
        };
      },
    );
  }
}
