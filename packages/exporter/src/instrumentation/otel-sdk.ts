/**
 * OpenTelemetry SDK bootstrap.
 *
 * Starts a NodeSDK once per process that exports spans over OTLP/gRPC
 * and keeps a configurable fraction of root traces. The returned
 * instrumentation shuts the SDK down on flush(), which sends whatever
 * the batch processor still holds.
 */

import { NodeSDK, resources, tracing } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import type { Logger } from "pino";
import type { TracingSettings } from "@backup-exporter/shared";
import { silentLogger } from "../logger.js";
import { OtelInstrumentation, TRACER_NAME } from "./otel-instrumentation.js";

export const SERVICE_VERSION = "0.1.0";

export interface StartTracingOptions {
  logger?: Logger;
  /** Replaces the OTLP exporter (for testing) */
  exporter?: tracing.SpanExporter;
}

/** "localhost:4317" → "http://localhost:4317" when insecure */
export function exporterUrl(settings: Pick<TracingSettings, "endpoint" | "insecure">): string {
  if (/^https?:\/\//.test(settings.endpoint)) return settings.endpoint;
  return `${settings.insecure ? "http" : "https"}://${settings.endpoint}`;
}

/** Child spans follow their parent; root spans are kept at `rate` */
export function createSampler(rate: number): tracing.Sampler {
  const root = rate >= 1 ? new tracing.AlwaysOnSampler() : new tracing.TraceIdRatioBasedSampler(rate);
  return new tracing.ParentBasedSampler({ root });
}

/**
 * Start the SDK and register it globally. Call once, before the first
 * span is opened.
 */
export function startTracing(
  settings: TracingSettings,
  options?: StartTracingOptions,
): OtelInstrumentation {
  const logger = (options?.logger ?? silentLogger).child({ component: "tracing" });
  const url = exporterUrl(settings);

  const sdk = new NodeSDK({
    resource: new resources.Resource({
      [ATTR_SERVICE_NAME]: TRACER_NAME,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    }),
    // An http:// URL makes the gRPC exporter use plaintext credentials
    traceExporter: options?.exporter ?? new OTLPTraceExporter({ url }),
    sampler: createSampler(settings.samplingRate),
    instrumentations: [],
  });
  sdk.start();
  logger.info({ endpoint: url, samplingRate: settings.samplingRate }, "tracing started");

  return new OtelInstrumentation(undefined, {
    onFlush: async () => {
      await sdk.shutdown();
      logger.info("tracing stopped");
    },
  });
}
