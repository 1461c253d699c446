/**
 * Protocol version negotiation.
 *
 * Tries the candidate versions in priority order with a one-item jobs
 * listing. A 406 means "try the next one"; any other failure ends the
 * negotiation at once.
 */

import type { Logger } from "pino";
import { PageEnvelope } from "../fetchers/schemas.js";
import {
  VersionIncompatibleError,
  VersionNotAcceptableError,
  errorCode,
  throwIfAborted,
} from "../errors.js";
import {
  noopInstrumentation,
  type Instrumentation,
} from "../instrumentation/index.js";
import { silentLogger } from "../logger.js";
import { buildUrl, type ApiClient } from "./fetch-client.js";

/** Highest priority first */
export const SUPPORTED_API_VERSIONS: readonly string[] = ["13.0", "12.0", "3.0"];

export const CHECK_PATH = "/admin/jobs";

export interface DetectVersionOptions {
  signal?: AbortSignal;
  /** Override the candidate list (default: SUPPORTED_API_VERSIONS) */
  candidates?: readonly string[];
  instrumentation?: Instrumentation;
  logger?: Logger;
}

export function checkUrl(baseUrl: string): string {
  return buildUrl(baseUrl, CHECK_PATH, { "page[limit]": 1 });
}

/** Cheapest authenticated request the API answers; rejects on any failure */
export async function checkVersion(
  client: ApiClient,
  baseUrl: string,
  credential: string,
  version: string,
  signal?: AbortSignal,
): Promise<void> {
  await client.fetchData(checkUrl(baseUrl), PageEnvelope, {
    apiVersion: version,
    credential,
    signal,
  });
}

/**
 * Return the first candidate the server accepts.
 * @throws VersionIncompatibleError when every candidate got a 406
 */
export async function detectVersion(
  client: ApiClient,
  baseUrl: string,
  credential: string,
  options?: DetectVersionOptions,
): Promise<string> {
  const candidates = options?.candidates ?? SUPPORTED_API_VERSIONS;
  const instrumentation = options?.instrumentation ?? noopInstrumentation;
  const logger = (options?.logger ?? silentLogger).child({ component: "version-negotiator" });
  const signal = options?.signal;

  return instrumentation.trace(
    "detect_version",
    { "server.address": baseUrl, candidates: candidates.join(",") },
    async (span) => {
      const attempted: string[] = [];

      for (const version of candidates) {
        throwIfAborted(signal, "version detection");
        attempted.push(version);

        try {
          await checkVersion(client, baseUrl, credential, version, signal);
        } catch (err) {
          if (err instanceof VersionNotAcceptableError) {
            span.addEvent("version_attempt", {
              version,
              outcome: "not_acceptable",
              "http.response.status_code": 406,
            });
            logger.debug({ version }, "API version not accepted, trying next");
            continue;
          }
          span.addEvent("version_attempt", {
            version,
            outcome: "error",
            "error.code": errorCode(err),
          });
          throw err;
        }

        span.addEvent("version_attempt", {
          version,
          outcome: "accepted",
          "http.response.status_code": 200,
        });
        span.setAttributes({ "api.version": version, attempts: attempted.length });
        logger.info({ version, attempts: attempted.length }, "detected API version");
        return version;
      }

      throw new VersionIncompatibleError(attempted, baseUrl);
    },
  );
}
