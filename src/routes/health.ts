// src/routes/health.ts
// Liveness endpoint. The engine has no external dependencies to probe.

import type { FastifyInstance } from "fastify";
import { BUILTIN_CHECKLIST } from "../compliance";

/* ---------- Route Registration ---------- */
export default async function healthRoutes(app: FastifyInstance) {
  /**
   * GET /health
   */
  app.get("/health", async () => ({
    status: "ok",
    builtinRules: BUILTIN_CHECKLIST.rules.length,
    uptimeSeconds: Math.round(process.uptime()),
  }));
}
