// src/observability/requestId.ts
// Request IDs for log correlation. An upstream X-Request-ID is passed through.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { IncomingMessage } from "node:http";
import { nanoid } from "nanoid";

export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21; // nanoid default

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Custom request ID generator for Fastify configuration.
 * Use this in Fastify({ genReqId: requestIdGenerator })
 */
export function requestIdGenerator(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];
  if (typeof incomingId === "string" && incomingId.length > 0) {
    return incomingId;
  }
  return generateRequestId();
}

/** Echo the request ID on every response. */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}
