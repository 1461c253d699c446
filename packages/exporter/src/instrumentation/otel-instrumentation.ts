/**
 * OpenTelemetry adapter for the Instrumentation capability.
 *
 * Wraps a `Tracer` from @opentelemetry/api. startTracing() in
 * otel-sdk.ts registers the SDK that records and exports the spans;
 * without it the API hands out non-recording spans.
 */

import {
  SpanKind,
  SpanStatusCode,
  trace,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type {
  Attributes,
  Instrumentation,
  OperationName,
  OperationSpan,
} from "./instrumentation.js";

export const TRACER_NAME = "backup-exporter";

/** Span name prefix; operation "scrape" becomes span "backup.scrape" */
const SPAN_PREFIX = "backup.";

export interface OtelInstrumentationOptions {
  /** Called by flush(), e.g. an SDK provider's forceFlush */
  onFlush?: () => Promise<void>;
}

export class OtelInstrumentation implements Instrumentation {
  private tracer: Tracer;
  private onFlush: (() => Promise<void>) | null;

  constructor(tracer?: Tracer, options?: OtelInstrumentationOptions) {
    this.tracer = tracer ?? trace.getTracer(TRACER_NAME);
    this.onFlush = options?.onFlush ?? null;
  }

  trace<T>(
    operation: OperationName,
    attributes: Attributes,
    fn: (span: OperationSpan) => Promise<T>,
  ): Promise<T> {
    return this.tracer.startActiveSpan(
      SPAN_PREFIX + operation,
      { kind: SpanKind.CLIENT, attributes },
      async (span: Span) => {
        try {
          const result = await fn({
            setAttributes: (attrs) => {
              span.setAttributes(attrs);
            },
            addEvent: (name, attrs) => {
              span.addEvent(name, attrs);
            },
          });
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (err) {
          span.recordException(err instanceof Error ? err : new Error(String(err)));
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: err instanceof Error ? err.message : String(err),
          });
          throw err;
        } finally {
          span.end();
        }
      },
    );
  }

  async flush(): Promise<void> {
    if (this.onFlush) await this.onFlush();
  }
}
