// src/routes/search.ts
// People search API
//
// Endpoints:
// - POST /search   { query, topK?, rerank?, evaluate? } -> search response (+ evaluation)

import type { FastifyInstance } from "fastify";
import { isRecord } from "../ai/json";
import type { SearchEngine } from "../search/engine";
import type { EvaluationOutcome, SearchResponse } from "../search/types";

const MAX_TOP_K = 50;

export interface SearchRouteOptions {
  defaultTopK: number;
}

export interface SearchRouteResponse extends SearchResponse {
  evaluation?: EvaluationOutcome;
}

export function createSearchRoutes(engine: SearchEngine, opts: SearchRouteOptions) {
  return async function searchRoutes(app: FastifyInstance) {
    /**
     * POST /search
     * Query-level failures come back as 200 with status "error";
     * only a missing query is a 400.
     */
    app.post<{ Body: unknown }>("/search", async (req, reply) => {
      const body = isRecord(req.body) ? req.body : {};

      if (typeof body.query !== "string" || body.query.trim().length === 0) {
        return reply.code(400).send({
          error: "query_required",
          message: "Query text is required and must be a non-empty string",
        });
      }

      const topK = Math.min(Math.max(Math.floor(Number(body.topK)) || opts.defaultTopK, 1), MAX_TOP_K);
      const rerank = body.rerank !== false;
      const evaluate = body.evaluate === true;
      const debug = body.debug === true;

      const result: SearchRouteResponse = await engine.search(body.query.trim(), { topK, rerank, debug });
      if (evaluate) {
        result.evaluation = await engine.evaluate(result);
      }
      return reply.code(200).send(result);
    });
  };
}
