// src/search/types.ts
// Tagged records shared by the parser, the per-category searches, the
// combiner, the reranker and the evaluator.

import type { CanonicalGroup } from "../actors/aliases";
import type { NormalizedProfile } from "../actors/types";
import type { Namespace } from "../store/vectorStore";

/* ============= Intent ============= */

export type Logic = "AND" | "OR";

export interface ParsedIntent {
  education: string[];
  educationLogic: Logic;
  /** Canonical school groups; consulted only for AND with two or more groups */
  educationGroups: CanonicalGroup[];
  skills: string[];
  skillsLogic: Logic;
  companies: string[];
  companiesLogic: Logic;
  /** Canonical company groups; consulted only for AND with two or more groups */
  companiesGroups: CanonicalGroup[];
  locations: string[];
  locationsLogic: Logic;
  normalizedQuery: string;
  rawIntent: string;
}

export type IntentSource = "oracle" | "cache" | "fallback";

export interface ParseOutcome {
  intent: ParsedIntent;
  source: IntentSource;
}

/* ============= Category Search ============= */

export type Category = Namespace;

export interface CategoryHit {
  actorId: string;
  score: number;
}

export type CategoryOutcome =
  | { status: "ok"; category: Category; hits: CategoryHit[]; rawCount: number }
  | { status: "timeout"; category: Category }
  | { status: "error"; category: Category; error: string };

/* ============= Candidates & Results ============= */

export interface Candidate {
  actorId: string;
  score: number;
  profile?: NormalizedProfile;
  /** Reranker rationale, when the oracle judged this candidate */
  reason?: string;
}

export interface ResultEntry {
  actor_id: string;
  score: number;
}

export interface ResultDetail extends ResultEntry {
  name: string;
  headline: string;
  location: string;
  education: string[];
  companies: string[];
  current_role: string;
  reason?: string;
}

export interface CategoryDebug {
  category: Category;
  outcome: CategoryOutcome["status"];
  rawCount: number;
  keptCount: number;
  error?: string;
}

export type SearchStatus = "ok" | "no_results" | "error";

export interface SearchOptions {
  topK?: number;
  rerank?: boolean;
  /** Whole-search deadline */
  timeoutMs?: number;
  debug?: boolean;
}

export interface SearchResponse {
  searchId: string;
  query: string;
  status: SearchStatus;
  error?: string;
  parsedIntent: ParsedIntent | null;
  intentSource: IntentSource | null;
  results: ResultEntry[];
  resultsWithDetails: ResultDetail[];
  timedOutCategories: Category[];
  reranked: boolean;
  durationMs: number;
  debug?: CategoryDebug[];
}

/* ============= Oracles ============= */

export interface RerankJudgment {
  index: number;
  score: number;
  reason: string;
}

export type RerankOutcome =
  | { status: "ok"; judgments: RerankJudgment[] }
  | { status: "malformed"; reason: string }
  | { status: "error"; reason: string };

export interface EvaluationReport {
  overallScore: number;
  precision: number;
  issues: string[];
  feedback: string;
  suggestions: string[];
}

export type EvaluationOutcome =
  | { status: "ok"; report: EvaluationReport }
  | { status: "unavailable"; reason: string };
