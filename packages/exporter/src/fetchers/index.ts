export { StorageFetcher, STORAGE_PATH } from "./storage-fetcher.js";
export type { FetcherOptions, FetchRequest } from "./storage-fetcher.js";
export { JobsFetcher, JOBS_PATH, jobsQuery } from "./jobs-fetcher.js";
export type { JobsFetchRequest } from "./jobs-fetcher.js";
export { PAGE_LIMIT, MAX_PAGES, firstCursor, nextCursor, paginate, decodeItems } from "./pagination.js";
export type { Page, PageCursor, PaginationTotals } from "./pagination.js";
