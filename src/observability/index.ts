// src/observability/index.ts
// Central export point for observability functionality.

import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";
import { registerMetricsCollector } from "./metricsCollector";

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
  REQUEST_ID_LENGTH,
} from "./requestId";

/* ---------- Request Logger ---------- */
export {
  createRequestLogger,
  registerRequestLogger,
  getRequestLogger,
} from "./requestLogger";

/* ---------- Metrics ---------- */
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  evaluationsTotal,
  evaluationDuration,
  recordHttpRequest,
  recordEvaluation,
  METRICS_ENABLED,
} from "./metrics";

export { registerMetricsCollector } from "./metricsCollector";

/**
 * Register all observability hooks with Fastify.
 * Call this right after creating the Fastify instance.
 */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
  registerMetricsCollector(app);
}
