// src/observability/metricsCollector.ts
// Fastify hooks that collect HTTP metrics at request lifecycle points.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { recordHttpRequest, METRICS_ENABLED } from "./metrics";
import { createLogger } from "./logger";

const log = createLogger("metrics");

const requestStartTimes = new WeakMap<FastifyRequest, number>();

export function registerMetricsCollector(app: FastifyInstance): void {
  if (!METRICS_ENABLED) {
    log.debug("Metrics collection disabled");
    return;
  }

  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      // Route pattern keeps label cardinality bounded; unmatched URLs share one label
      const routePattern = req.routeOptions.url ?? "unmatched";

      recordHttpRequest(req.method, routePattern, reply.statusCode, duration);
      requestStartTimes.delete(req);
    }
  );
}
