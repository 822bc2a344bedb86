// src/app.ts
// Fastify application: observability hooks, health and search routes.

import Fastify, { type FastifyInstance } from "fastify";
import { registerObservability, requestIdGenerator } from "./observability";
import { createHealthRoutes } from "./routes/health";
import { createSearchRoutes } from "./routes/search";
import type { SearchEngine } from "./search/engine";
import type { VectorStore } from "./store/vectorStore";

export interface AppDeps {
  engine: SearchEngine;
  store: VectorStore;
  defaultTopK?: number;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  // Request logging goes through our pino logger via the observability hooks.
  const app = Fastify({
    logger: false,
    genReqId: requestIdGenerator,
  });

  registerObservability(app);

  await app.register(createHealthRoutes({ store: deps.store, profileCount: () => deps.engine.profileCount }));
  await app.register(createSearchRoutes(deps.engine, { defaultTopK: deps.defaultTopK ?? 10 }));

  return app;
}
