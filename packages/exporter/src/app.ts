import Fastify, { type FastifyError } from "fastify";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

import { CancelledError, LifecycleError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { Exposition } from "./metrics/index.js";
import { healthRoutes } from "./routes/health.js";
import { metricsRoutes } from "./routes/metrics.js";
import type { RuntimeHandle } from "./runtime/index.js";

const isDev = process.env.NODE_ENV !== "production";

/** Holder for the runtime; empty until startup has negotiated */
export interface RuntimeRef {
  current: RuntimeHandle | null;
}

export interface BuildAppOptions {
  /** Root logger (default: silent) */
  logger?: Logger;
  /** Attach a runtime up front (tests); otherwise set app.runtime.current later */
  runtime?: RuntimeHandle;
  /** Override the exposition (for testing) */
  exposition?: Exposition;
  metricsPath?: string;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const app = Fastify({
    loggerInstance: opts?.logger ?? silentLogger,
    // Reuse the caller's request ID when there is one
    genReqId: (req) => {
      const header = req.headers["x-request-id"];
      return typeof header === "string" && header !== "" ? header : randomUUID();
    },
  });

  const runtime: RuntimeRef = { current: opts?.runtime ?? null };
  app.decorate("runtime", runtime);
  app.decorate("exposition", opts?.exposition ?? new Exposition());

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || "query",
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    // Shutting down or the scrape was abandoned
    if (error instanceof LifecycleError || error instanceof CancelledError) {
      reply.status(503).send({ error: error.message });
      return;
    }

    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    // Unexpected errors: log, then hide the message in production
    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { prefix: opts?.metricsPath ?? "/metrics" });
  await app.register(healthRoutes, { prefix: "/health" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Stop collection, drain the client and flush traces on close
  app.addHook("onClose", async () => {
    await runtime.current?.shutdown();
  });

  return app;
}
