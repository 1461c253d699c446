/**
 * Error classes raised by the exporter.
 *
 * Each carries a stable `code` so callers (the collector, the health
 * route, logs) can classify failures without matching on messages.
 */

export type ExporterErrorCode =
  | "VERSION_INCOMPATIBLE"
  | "VERSION_NOT_ACCEPTABLE"
  | "TRANSIENT"
  | "AUTHENTICATION"
  | "HTTP_STATUS"
  | "RESPONSE_SHAPE"
  | "LIFECYCLE"
  | "CANCELLED"
  | "CONFIG";

export class ExporterError extends Error {
  readonly code: ExporterErrorCode;

  constructor(code: ExporterErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No candidate API version was accepted by the server */
export class VersionIncompatibleError extends ExporterError {
  readonly attempted: readonly string[];

  constructor(attempted: readonly string[], baseUrl: string) {
    super(
      "VERSION_INCOMPATIBLE",
      `no compatible API version found at ${baseUrl} (attempted: ${attempted.join(", ")})`,
    );
    this.attempted = [...attempted];
  }
}

/** The server answered 406 for the requested API version */
export class VersionNotAcceptableError extends ExporterError {
  constructor(
    readonly version: string | null,
    readonly url: string,
  ) {
    super(
      "VERSION_NOT_ACCEPTABLE",
      `API version ${version ?? "(unset)"} not accepted by server (HTTP 406): ${url}`,
    );
  }
}

/** Network, timeout, 429 or 5xx failure that outlived the retries */
export class TransientError extends ExporterError {
  constructor(
    message: string,
    readonly status: number | null,
    options?: ErrorOptions,
  ) {
    super("TRANSIENT", message, options);
  }
}

export class AuthenticationError extends ExporterError {
  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super("AUTHENTICATION", `authentication failed (HTTP ${status}): ${url}`);
  }
}

export class HttpStatusError extends ExporterError {
  constructor(
    readonly status: number,
    readonly url: string,
    contentType: string | null,
  ) {
    super(
      "HTTP_STATUS",
      `HTTP request failed: url=${url}, status=${status}, content-type=${contentType ?? "none"}`,
    );
  }
}

/** The payload did not have the expected shape */
export class ResponseShapeError extends ExporterError {
  constructor(message: string, options?: ErrorOptions) {
    super("RESPONSE_SHAPE", message, options);
  }
}

/** Operation attempted on a closed (or closing) component */
export class LifecycleError extends ExporterError {
  constructor(message: string) {
    super("LIFECYCLE", message);
  }
}

export class CancelledError extends ExporterError {
  constructor(message: string, options?: ErrorOptions) {
    super("CANCELLED", message, options);
  }
}

export class ConfigError extends ExporterError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Throw a CancelledError if the signal has fired */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`${operation} cancelled`, { cause: signal.reason });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string {
  return err instanceof ExporterError ? err.code : "UNKNOWN";
}
