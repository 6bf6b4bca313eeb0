// src/observability/requestLogger.ts
// Request/response logging with timing.
//
// Each request gets a child logger bound to its request ID and client ID
// (X-Client-Id, set by the calling portal). Handlers read it back through
// getRequestLogger().

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { createLogger, createChildLogger } from "./logger";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  clientId?: string;
  [key: string]: unknown;
}

/* ---------- Context Extraction ---------- */

function extractClientId(req: FastifyRequest): string | undefined {
  const clientId = req.headers["x-client-id"];
  return typeof clientId === "string" ? clientId : undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    clientId: extractClientId(req),
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

// Request-scoped loggers and start times, released with the request
const requestLoggers = new WeakMap<FastifyRequest, Logger>();
const requestStartTimes = new WeakMap<FastifyRequest, number>();

export function createRequestLogger(req: FastifyRequest): Logger {
  return createChildLogger(baseLogger, buildRequestContext(req));
}

/* ---------- Fastify Hook Registration ---------- */

/**
 * Register request logging hooks with Fastify
 *
 * Logs:
 * - Request start (debug)
 * - Request completion with status code and duration
 * - Request errors with error details
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());

    const log = createRequestLogger(req);
    requestLoggers.set(req, log);

    log.debug("request started");
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      const log = createChildLogger(getRequestLogger(req), {
        statusCode: reply.statusCode,
        duration,
      });

      if (reply.statusCode >= 500) {
        log.error("request failed");
      } else if (reply.statusCode >= 400) {
        log.warn("request error");
      } else {
        log.info("request completed");
      }

      requestStartTimes.delete(req);
      requestLoggers.delete(req);
    }
  );

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    getRequestLogger(req).error(
      {
        err: {
          message: error.message,
          name: error.name,
          stack: error.stack,
        },
      },
      "request error"
    );
  });
}

/* ---------- Request Logger Access ---------- */

/**
 * Get the request-scoped logger.
 * Falls back to the base HTTP logger if the hook has not run.
 */
export function getRequestLogger(req: FastifyRequest): Logger {
  return requestLoggers.get(req) ?? baseLogger;
}
