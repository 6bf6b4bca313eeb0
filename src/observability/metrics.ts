// src/observability/metrics.ts
// Prometheus metrics collection
//
// Defines application metrics using prom-client.
// Metrics are exposed via GET /metrics endpoint.

import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import { config } from "../config";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = config.metrics.prefix;
export const METRICS_ENABLED = config.metrics.enabled;

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "compliance-engine",
});

// Default Node.js metrics (memory, CPU, event loop, etc.)
if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

/* ---------- Evaluation Metrics ---------- */

export const evaluationsTotal = new Counter({
  name: `${METRICS_PREFIX}_evaluations_total`,
  help: "Total number of compliance evaluations by resulting status",
  labelNames: ["status", "checklist_source"] as const,
  registers: [registry],
});

export const evaluationDuration = new Histogram({
  name: `${METRICS_PREFIX}_evaluation_duration_seconds`,
  help: "Compliance evaluation duration in seconds",
  labelNames: ["checklist_source"] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5],
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  httpRequestsTotal.inc({
    method,
    route,
    status_code: statusCode.toString(),
  });

  httpRequestDuration.observe({ method, route }, durationMs / 1000);
}

export function recordEvaluation(
  status: string,
  checklistSource: string,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  evaluationsTotal.inc({ status, checklist_source: checklistSource });
  evaluationDuration.observe({ checklist_source: checklistSource }, durationMs / 1000);
}
