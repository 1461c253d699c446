import type { FastifyPluginAsync } from "fastify";

/**
 * Prometheus scrape endpoint. Every request runs one collection cycle;
 * a source that fails shows up as nbu_scrape_success{source} 0 rather
 * than as an HTTP error.
 */
export const metricsRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (request, reply) => {
    const runtime = app.runtime.current;
    if (!runtime) {
      return reply.status(503).send({ error: "exporter is starting" });
    }

    const result = await runtime.collect();
    if (result.storageError || result.jobsError) {
      request.log.warn(
        {
          storageError: result.storageError?.message,
          jobsError: result.jobsError?.message,
        },
        "scrape finished with failures",
      );
    }

    const body = await app.exposition.render(result, runtime.apiVersion, runtime.lastScrape());
    return reply.type(app.exposition.contentType).send(body);
  });
};
