import "fastify";
import type { RuntimeRef } from "../app.js";
import type { Exposition } from "../metrics/index.js";

declare module "fastify" {
  interface FastifyInstance {
    runtime: RuntimeRef;
    exposition: Exposition;
  }
}
