import type { ConfigSnapshot } from "@backup-exporter/shared";
import { buildApp } from "./app.js";
import { describeSnapshot, loadConfig } from "./config/index.js";
import {
  noopInstrumentation,
  startTracing,
  type Instrumentation,
} from "./instrumentation/index.js";
import { createLogger } from "./logger.js";
import { Exposition } from "./metrics/index.js";
import { Runtime } from "./runtime/index.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

let config: ConfigSnapshot;
try {
  config = loadConfig();
} catch (err) {
  createLogger().fatal({ err }, "invalid configuration");
  process.exit(1);
}

const logger = createLogger(config.logLevel);
logger.info(describeSnapshot(config), "configuration loaded");

const instrumentation: Instrumentation = config.tracing.enabled
  ? startTracing(config.tracing, { logger })
  : noopInstrumentation;

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

const app = await buildApp({
  logger,
  exposition: new Exposition({ defaultMetrics: true }),
  metricsPath: config.server.metricsPath,
});

const { host, port, metricsPath } = config.server;

try {
  await app.listen({ port, host });
  app.log.info(`Exporter listening on ${host}:${port}${metricsPath}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

// Health reports "starting" until negotiation finishes
let runtime: Runtime;
try {
  runtime = await Runtime.create(config, { logger, instrumentation });
} catch (err) {
  logger.fatal({ err }, "failed to start collection runtime");
  await app.close();
  await instrumentation.flush();
  process.exit(1);
}
app.runtime.current = runtime;

// ---------------------------------------------------------------------------
// Signals
// ---------------------------------------------------------------------------

let stopping = false;

async function stop(signal: NodeJS.Signals) {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, "shutting down");
  try {
    await app.close();
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "shutdown failed");
    process.exit(1);
  }
}

async function reload() {
  try {
    const next = loadConfig();
    if (
      next.server.host !== host ||
      next.server.port !== port ||
      next.server.metricsPath !== metricsPath
    ) {
      logger.warn("server settings changed; restart to apply them");
    }
    logger.level = next.logLevel;
    const negotiated = await runtime.reload(next);
    logger.info(describeSnapshot(negotiated), "configuration reloaded");
  } catch (err) {
    logger.error({ err }, "configuration reload failed; keeping the current configuration");
  }
}

process.on("SIGINT", (signal) => void stop(signal));
process.on("SIGTERM", (signal) => void stop(signal));
process.on("SIGHUP", () => void reload());
