// src/search/reranker.ts
// LLM relevance judge over the top candidates. The oracle returns
// [{index, score, reason}] for the candidates it considers relevant.

import { composeText, type ComposeFn } from "../ai/modelRouter";
import { extractJsonFromResponse, isRecord } from "../ai/json";
import { createLogger } from "../observability";
import { errorMessage } from "../errors";
import { withTimeout } from "../utils/async";
import type { Candidate, ParsedIntent, RerankJudgment, RerankOutcome } from "./types";

const log = createLogger("search/reranker");

/* ============= Constants ============= */

export const MAX_RERANK_CANDIDATES = 20;
const RERANK_TIMEOUT_MS = 20_000;
const RERANK_MAX_TOKENS = 2000;
const DEFAULT_SCORE = 0.5;

const RERANK_SYSTEM_PROMPT = `You are a relevance judge for a people search system.
Score each candidate on how well they match the query intent.

SCORING RULES:
1. Score 0.0-1.0 where 1.0 is a perfect match
2. Education queries: the candidate MUST have studied at the school (working there is not enough)
3. Skill queries: look for evidence in the headline, role titles and company context
4. Location queries: current location must match
5. Company queries: must have worked at the company
6. Be STRICT about AND logic: for "Stanford AND MIT" score 0 when either is missing
7. For OR logic any one match is sufficient

Only include relevant candidates. Output a JSON array, indexes are the candidate numbers shown:
[{"index": 0, "score": 0.85, "reason": "Stanford grad, has ML experience"}]`;

/* ============= Prompt ============= */

function describeCandidate(c: Candidate, index: number): string {
  const p = c.profile;
  return [
    `Candidate ${index} (ID: ${c.actorId}):`,
    `- Name: ${p?.name ?? "Unknown"}`,
    `- Headline: ${p?.headline ?? ""}`,
    `- Location: ${p?.location ?? ""}`,
    `- Education: ${p?.education.join(", ") ?? ""}`,
    `- Companies: ${p?.companies.join(", ") ?? ""}`,
    `- Current Role: ${p?.currentRole ?? ""}`,
  ].join("\n");
}

export function buildRerankPrompt(query: string, intent: ParsedIntent, candidates: readonly Candidate[]): string {
  return `Query: "${query}"

Parsed Intent:
- Education filter: ${intent.education.join(", ")} (logic: ${intent.educationLogic})
- Skills filter: ${intent.skills.join(", ")} (logic: ${intent.skillsLogic})
- Companies filter: ${intent.companies.join(", ")} (logic: ${intent.companiesLogic})
- Locations filter: ${intent.locations.join(", ")} (logic: ${intent.locationsLogic})

Candidates:
${candidates.map(describeCandidate).join("\n\n")}

Score each candidate. Return ONLY a valid JSON array.`;
}

/* ============= Response Parsing ============= */

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

/**
 * Validate the oracle reply against `count` submitted candidates.
 * `[]` is a valid "none relevant" judgment. Entries with an out-of-range or
 * repeated index are ignored; a non-empty reply with no usable entry is malformed.
 */
export function parseRerankResponse(text: string, count: number): RerankOutcome {
  const { json, parseError } = extractJsonFromResponse(text, "array");
  if (!Array.isArray(json)) {
    return { status: "malformed", reason: parseError ?? "response is not a JSON array" };
  }
  if (json.length === 0) return { status: "ok", judgments: [] };

  const seen = new Set<number>();
  const judgments: RerankJudgment[] = [];
  for (const item of json) {
    if (!isRecord(item)) continue;
    const index = item.index;
    if (typeof index !== "number" || !Number.isInteger(index) || index < 0 || index >= count) continue;
    if (seen.has(index)) continue;
    seen.add(index);
    const score = typeof item.score === "number" && Number.isFinite(item.score) ? clamp01(item.score) : DEFAULT_SCORE;
    const reason = typeof item.reason === "string" ? item.reason : "";
    judgments.push({ index, score, reason });
  }
  if (judgments.length === 0) {
    return { status: "malformed", reason: "no valid judgments in response" };
  }
  return { status: "ok", judgments };
}

/* ============= Reranker ============= */

export interface RerankerOptions {
  compose?: ComposeFn;
  timeoutMs?: number;
}

export class Reranker {
  private readonly compose: ComposeFn;
  private readonly timeoutMs: number;

  constructor(opts: RerankerOptions = {}) {
    this.compose = opts.compose ?? composeText;
    this.timeoutMs = opts.timeoutMs ?? RERANK_TIMEOUT_MS;
  }

  /**
   * Judge up to the first 20 candidates. Never throws: oracle failures and
   * timeouts come back as `error`, unusable replies as `malformed`.
   */
  async rerank(
    query: string,
    intent: ParsedIntent,
    candidates: readonly Candidate[],
    opts: { timeoutMs?: number } = {}
  ): Promise<RerankOutcome> {
    const submitted = candidates.slice(0, MAX_RERANK_CANDIDATES);
    if (submitted.length === 0) return { status: "ok", judgments: [] };

    const timeoutMs = Math.min(opts.timeoutMs ?? this.timeoutMs, this.timeoutMs);
    try {
      const result = await withTimeout(
        this.compose(buildRerankPrompt(query, intent, submitted), {
          systemPrompt: RERANK_SYSTEM_PROMPT,
          maxTokens: RERANK_MAX_TOKENS,
          temperature: 0.1,
        }),
        timeoutMs,
        "Reranking"
      );
      const outcome = parseRerankResponse(result.text, submitted.length);
      if (outcome.status !== "ok") log.warn({ query, reason: outcome.reason }, "Rerank reply malformed");
      return outcome;
    } catch (err) {
      log.warn({ query, err: errorMessage(err) }, "Rerank oracle failed");
      return { status: "error", reason: errorMessage(err) };
    }
  }
}

/**
 * Apply judgments: judged candidates take the oracle's score and reason,
 * everything else is dropped.
 */
export function applyJudgments(candidates: readonly Candidate[], judgments: readonly RerankJudgment[]): Candidate[] {
  const out: Candidate[] = [];
  for (const j of judgments) {
    const c = candidates[j.index];
    if (c) out.push({ ...c, score: j.score, reason: j.reason });
  }
  return out;
}
