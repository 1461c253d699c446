export {
  FetchClient,
  MEDIA_TYPE,
  acceptHeader,
  backoffDelay,
  buildUrl,
  parseRetryAfter,
} from "./fetch-client.js";
export type {
  ApiClient,
  ApiTarget,
  CloseOptions,
  FetchClientOptions,
  FetchClientSettings,
  FetchOptions,
} from "./fetch-client.js";
export {
  CHECK_PATH,
  SUPPORTED_API_VERSIONS,
  detectVersion,
  checkUrl,
  checkVersion,
} from "./version-negotiator.js";
export type { DetectVersionOptions } from "./version-negotiator.js";
