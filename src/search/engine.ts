// src/search/engine.ts
// Retrieval & combination engine.
//
// Pipeline for one query:
//   1. Intent parsing (LLM oracle, cached; falls back to skills = [query])
//   2. Concurrent per-category searches against their namespaces
//   3. AND across categories, mean score per surviving actor
//   4. LLM rerank of the top 20 (falls back to the heuristic order)
//   5. Deterministic sort, truncate to topK
//
// A whole-search deadline bounds every oracle call. A category that runs past
// it is left out of the intersection and reported in `timedOutCategories`; a
// category that returns nothing empties the intersection.

import { nanoid } from "nanoid";
import type { Embedder } from "../ai/embeddings";
import type { VectorStore } from "../store/vectorStore";
import type { ProfileMap } from "../store/profileCache";
import type { NormalizedProfile } from "../actors/types";
import { createChildLogger, createLogger, type Logger } from "../observability";
import { TimeoutError, errorMessage } from "../errors";
import { remainingMs, withTimeout } from "../utils/async";
import {
  searchCompanies,
  searchEducation,
  searchGeneric,
  searchLocations,
  searchSkills,
  type CategoryResult,
  type CategorySearchContext,
} from "./categorySearch";
import { combineCategoryResults, compareHits, roundScore } from "./combine";
import { IntentParser, fallbackIntent } from "./intentParser";
import { Reranker, applyJudgments, MAX_RERANK_CANDIDATES } from "./reranker";
import { Evaluator } from "./evaluator";
import type {
  Candidate,
  Category,
  CategoryDebug,
  CategoryOutcome,
  EvaluationOutcome,
  ParsedIntent,
  ResultDetail,
  SearchOptions,
  SearchResponse,
} from "./types";

const log = createLogger("search/engine");

/* ============= Constants ============= */

const DEFAULT_TOP_K = 10;
const DEFAULT_TIMEOUT_MS = 30_000;
const RERANK_HEADROOM = 2; // keep topK * 2 candidates for the reranker

/* ============= Types ============= */

export interface SearchEngineDeps {
  embedder: Embedder;
  store: VectorStore;
  profiles: ProfileMap;
  parser?: IntentParser;
  reranker?: Reranker;
  evaluator?: Evaluator;
  defaults?: { topK?: number; timeoutMs?: number };
}

interface CategoryTask {
  category: Category;
  run: () => Promise<CategoryResult>;
}

/* ============= Helpers ============= */

/** Category searches the intent activates, in a fixed order. */
export function planCategoryTasks(
  ctx: CategorySearchContext,
  intent: ParsedIntent
): CategoryTask[] {
  const tasks: CategoryTask[] = [];
  if (intent.education.length > 0) {
    tasks.push({
      category: "education",
      run: () => searchEducation(ctx, intent.education, intent.educationLogic, intent.educationGroups),
    });
  }
  if (intent.skills.length > 0) {
    tasks.push({ category: "skills", run: () => searchSkills(ctx, intent.skills, intent.normalizedQuery) });
  }
  if (intent.companies.length > 0) {
    tasks.push({
      category: "companies",
      run: () => searchCompanies(ctx, intent.companies, intent.companiesLogic, intent.companiesGroups),
    });
  }
  if (intent.locations.length > 0) {
    tasks.push({ category: "location", run: () => searchLocations(ctx, intent.locations, intent.locationsLogic) });
  }
  return tasks;
}

function toDetail(c: Candidate, profile: NormalizedProfile): ResultDetail {
  const detail: ResultDetail = {
    actor_id: c.actorId,
    score: roundScore(c.score),
    name: profile.name,
    headline: profile.headline,
    location: profile.location,
    education: profile.education,
    companies: profile.companies,
    current_role: profile.currentRole,
  };
  if (c.reason !== undefined) detail.reason = c.reason;
  return detail;
}

function debugEntry(outcome: CategoryOutcome): CategoryDebug {
  switch (outcome.status) {
    case "ok":
      return { category: outcome.category, outcome: "ok", rawCount: outcome.rawCount, keptCount: outcome.hits.length };
    case "timeout":
      return { category: outcome.category, outcome: "timeout", rawCount: 0, keptCount: 0 };
    case "error":
      return { category: outcome.category, outcome: "error", rawCount: 0, keptCount: 0, error: outcome.error };
  }
}

/* ============= Engine ============= */

export class SearchEngine {
  private readonly ctx: CategorySearchContext;
  private readonly profiles: ProfileMap;
  private readonly parser: IntentParser;
  private readonly reranker: Reranker;
  private readonly evaluator: Evaluator;
  private readonly defaultTopK: number;
  private readonly defaultTimeoutMs: number;

  constructor(deps: SearchEngineDeps) {
    this.ctx = { embedder: deps.embedder, store: deps.store };
    this.profiles = deps.profiles;
    this.parser = deps.parser ?? new IntentParser();
    this.reranker = deps.reranker ?? new Reranker();
    this.evaluator = deps.evaluator ?? new Evaluator();
    this.defaultTopK = deps.defaults?.topK ?? DEFAULT_TOP_K;
    this.defaultTimeoutMs = deps.defaults?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get profileCount(): number {
    return this.profiles.size;
  }

  /** Never throws for a query-level problem; see `SearchResponse.status`. */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const searchId = nanoid(12);
    const started = Date.now();
    const topK = Math.max(1, Math.floor(options.topK ?? this.defaultTopK));
    const deadline = started + (options.timeoutMs ?? this.defaultTimeoutMs);
    const qLog = createChildLogger(log, { searchId });

    const response: SearchResponse = {
      searchId,
      query,
      status: "no_results",
      parsedIntent: null,
      intentSource: null,
      results: [],
      resultsWithDetails: [],
      timedOutCategories: [],
      reranked: false,
      durationMs: 0,
    };
    const finish = (): SearchResponse => {
      response.durationMs = Date.now() - started;
      qLog.info(
        { status: response.status, results: response.results.length, durationMs: response.durationMs },
        "Search completed"
      );
      return response;
    };

    if (!query.trim()) return finish();

    try {
      /* ---------- 1. Intent ---------- */
      const { intent, source } = await this.parser.parse(query, { timeoutMs: remainingMs(deadline) });
      response.parsedIntent = intent;
      response.intentSource = source;
      qLog.debug({ source, intent }, "Intent resolved");

      /* ---------- 2. Category fan-out ---------- */
      let tasks = planCategoryTasks(this.ctx, intent);
      if (tasks.length === 0) {
        const text = intent.normalizedQuery.trim() || query.trim();
        qLog.debug({ text }, "No category filters, running generic search");
        tasks = [{ category: "skills", run: () => searchGeneric(this.ctx, text) }];
      }

      const outcomes = await Promise.all(tasks.map((t) => this.runCategory(t, deadline, qLog)));
      if (options.debug) response.debug = outcomes.map(debugEntry);

      const failed = outcomes.find(
        (o): o is Extract<CategoryOutcome, { status: "error" }> => o.status === "error"
      );
      if (failed) {
        response.status = "error";
        response.error = `${failed.category} search failed: ${failed.error}`;
        return finish();
      }
      response.timedOutCategories = outcomes.filter((o) => o.status === "timeout").map((o) => o.category);

      const hitSets = outcomes.flatMap((o) => (o.status === "ok" ? [o.hits] : []));
      if (hitSets.length === 0) return finish();

      /* ---------- 3. Combination ---------- */
      const combined = combineCategoryResults(hitSets);
      const candidates: Candidate[] = [];
      let missingProfiles = 0;
      for (const hit of combined) {
        const profile = this.profiles.get(hit.actorId);
        if (!profile) {
          missingProfiles++;
          continue;
        }
        candidates.push({ actorId: hit.actorId, score: hit.score, profile });
        if (candidates.length >= topK * RERANK_HEADROOM) break;
      }
      if (missingProfiles > 0) qLog.warn({ missingProfiles }, "Hits without a cached profile were dropped");

      /* ---------- 4. Rerank ---------- */
      let ranked = candidates;
      if (options.rerank !== false && candidates.length > 0) {
        const outcome = await this.reranker.rerank(query, intent, candidates, {
          timeoutMs: remainingMs(deadline),
        });
        if (outcome.status === "ok") {
          ranked = applyJudgments(candidates.slice(0, MAX_RERANK_CANDIDATES), outcome.judgments);
          response.reranked = true;
        } else {
          qLog.warn({ reason: outcome.reason }, "Rerank unavailable, keeping heuristic order");
        }
      }

      /* ---------- 5. Final ordering ---------- */
      const final = [...ranked].sort(compareHits).slice(0, topK);
      response.results = final.map((c) => ({ actor_id: c.actorId, score: roundScore(c.score) }));
      response.resultsWithDetails = final.flatMap((c) => (c.profile ? [toDetail(c, c.profile)] : []));
      response.status = final.length > 0 ? "ok" : "no_results";
      return finish();
    } catch (err) {
      qLog.error({ err: errorMessage(err) }, "Search failed");
      response.status = "error";
      response.error = errorMessage(err);
      return finish();
    }
  }

  /** Advisory quality report for a finished search. */
  evaluate(response: SearchResponse): Promise<EvaluationOutcome> {
    const intent = response.parsedIntent ?? fallbackIntent(response.query);
    return this.evaluator.evaluate(response.query, response.resultsWithDetails, intent);
  }

  private async runCategory(
    task: CategoryTask,
    deadline: number,
    qLog: Logger
  ): Promise<CategoryOutcome> {
    const label = `${task.category} search`;
    try {
      const result = await withTimeout(task.run(), remainingMs(deadline), label);
      return { status: "ok", category: task.category, hits: result.hits, rawCount: result.rawCount };
    } catch (err) {
      if (err instanceof TimeoutError) {
        qLog.warn({ category: task.category }, "Category search timed out");
        return { status: "timeout", category: task.category };
      }
      qLog.error({ category: task.category, err: errorMessage(err) }, "Category search failed");
      return { status: "error", category: task.category, error: errorMessage(err) };
    }
  }
}
