import type { FastifyPluginAsync } from "fastify";
import type { HealthResponse } from "@backup-exporter/shared";
import { errorMessage } from "../errors.js";
import { HealthBody, HealthQuery } from "./health.schemas.js";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get<{ Querystring: HealthQuery }>(
    "/",
    { schema: { querystring: HealthQuery, response: { 200: HealthBody, 503: HealthBody } } },
    async (request, reply) => {
      const runtime = app.runtime.current;
      const timestamp = new Date().toISOString();

      if (!runtime) {
        const payload: HealthResponse = {
          status: "starting",
          live: false,
          apiVersion: null,
          lastScrape: { storage: null, jobs: null },
          timestamp,
        };
        return reply.status(200).send(payload);
      }

      const base = {
        live: runtime.isHealthy(),
        apiVersion: runtime.apiVersion,
        lastScrape: runtime.lastScrape(),
        timestamp,
      };

      if (!request.query.check) {
        const payload: HealthResponse = { ...base, status: base.live ? "ok" : "unhealthy" };
        return reply.status(base.live ? 200 : 503).send(payload);
      }

      try {
        await runtime.testConnectivity();
      } catch (err) {
        request.log.warn({ err }, "health check failed");
        const payload: HealthResponse = { ...base, status: "unhealthy", error: errorMessage(err) };
        return reply.status(503).send(payload);
      }

      const payload: HealthResponse = { ...base, status: "ok" };
      return reply.status(200).send(payload);
    },
  );
};
