/**
 * Instrumentation capability handed to the core components.
 *
 * The core never looks up a global tracer: every component receives an
 * `Instrumentation` through its constructor options and falls back to
 * `noopInstrumentation` when none is given.
 */

export type OperationName =
  | "detect_version"
  | "fetch_storage"
  | "fetch_jobs"
  | "fetch_job_page"
  | "http_request"
  | "scrape";

export type AttributeValue = string | number | boolean;
export type Attributes = Record<string, AttributeValue>;

/** Handle for the operation currently being traced */
export interface OperationSpan {
  setAttributes(attributes: Attributes): void;
  addEvent(name: string, attributes?: Attributes): void;
}

export interface Instrumentation {
  /**
   * Run `fn` inside a span named after `operation`. A rejection from `fn`
   * is recorded on the span and rethrown unchanged.
   */
  trace<T>(
    operation: OperationName,
    attributes: Attributes,
    fn: (span: OperationSpan) => Promise<T>,
  ): Promise<T>;
  /** Export whatever is still buffered */
  flush(): Promise<void>;
}

// ---------------------------------------------------------------------------
// No-op
// ---------------------------------------------------------------------------

const noopSpan: OperationSpan = {
  setAttributes() {},
  addEvent() {},
};

export const noopInstrumentation: Instrumentation = {
  trace: (_operation, _attributes, fn) => fn(noopSpan),
  flush: async () => {},
};
