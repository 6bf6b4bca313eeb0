// src/routes/metrics.ts
// Prometheus metrics endpoint.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { registry } from "../observability/metrics";
import { createLogger } from "../observability/logger";

const log = createLogger("routes/metrics");

/* ---------- Route Registration ---------- */
export default async function metricsRoutes(app: FastifyInstance) {
  /**
   * GET /metrics
   * Returns all registered metrics in Prometheus format
   */
  app.get(
    "/metrics",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      try {
        const metrics = await registry.metrics();
        return reply.header("Content-Type", registry.contentType).send(metrics);
      } catch (err) {
        log.error({ err }, "Failed to collect metrics");
        return reply.code(500).send({ error: "metrics_unavailable", message: "Failed to collect metrics" });
      }
    }
  );
}
