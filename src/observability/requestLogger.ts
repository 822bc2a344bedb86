// src/observability/requestLogger.ts
// Request/response logging with timing, through the shared pino logger.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { createLogger, createChildLogger } from "./logger";

const baseLogger = createLogger("http");

// Request start times for duration calculation
const requestStartTimes = new WeakMap<FastifyRequest, number>();

function requestContext(req: FastifyRequest) {
  return { requestId: req.id, method: req.method, url: req.url };
}

/**
 * Logs request start (debug), completion with status and duration, and errors.
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
    createChildLogger(baseLogger, requestContext(req)).debug("request started");
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const log = createChildLogger(baseLogger, {
      ...requestContext(req),
      statusCode: reply.statusCode,
      duration: startTime ? Date.now() - startTime : 0,
    });

    if (reply.statusCode >= 500) {
      log.error("request failed");
    } else if (reply.statusCode >= 400) {
      log.warn("request error");
    } else {
      log.info("request completed");
    }
    requestStartTimes.delete(req);
  });

  app.addHook("onError", async (req: FastifyRequest, _reply: FastifyReply, error: Error) => {
    createChildLogger(baseLogger, requestContext(req)).error(
      { err: { message: error.message, name: error.name, stack: error.stack } },
      "request error"
    );
  });
}
