// src/observability/requestId.ts
// Request ID generation and X-Request-ID passthrough for log correlation.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { IncomingMessage } from "node:http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21; // nanoid default
const MAX_INCOMING_ID_LENGTH = 128;

/* ---------- Request ID Generation ---------- */

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Use the upstream X-Request-ID when present, otherwise generate one.
 * Fastify's genReqId hands us the raw IncomingMessage, not a FastifyRequest.
 */
export function requestIdGenerator(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (
    typeof incomingId === "string" &&
    incomingId.length > 0 &&
    incomingId.length <= MAX_INCOMING_ID_LENGTH
  ) {
    return incomingId;
  }

  return generateRequestId();
}

/* ---------- Fastify Hook Registration ---------- */

/**
 * Echo the request ID back on every response.
 */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}
