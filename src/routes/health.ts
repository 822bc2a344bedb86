// src/routes/health.ts
// Health Check Endpoints
// - GET /health - status with vector store and profile checks

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { getHealthStatus, type HealthDeps } from "../observability";

export function createHealthRoutes(deps: HealthDeps) {
  return async function healthRoutes(app: FastifyInstance) {
    app.get("/health", async (_req: FastifyRequest, reply: FastifyReply) => {
      const health = await getHealthStatus(deps);

      const statusCode = health.status === "unhealthy" ? 503 : 200;
      return reply.code(statusCode).send(health);
    });
  };
}
