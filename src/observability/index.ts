// src/observability/index.ts
// Central export point for observability functionality.

import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
  type Logger,
} from "./logger";

/* ---------- Request Tracking ---------- */
export { requestIdGenerator, REQUEST_ID_HEADER } from "./requestId";

/* ---------- Health Checks ---------- */
export { getHealthStatus, type HealthStatus, type HealthDeps } from "./healthCheck";

/** Request ID echo and request logging hooks. */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
}
