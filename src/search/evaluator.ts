// src/search/evaluator.ts
// Advisory LLM quality report over a finished result list. Used by the batch
// runner and the optional `evaluate` flag of the API; never gates results.

import { composeText, type ComposeFn } from "../ai/modelRouter";
import { extractJsonFromResponse, isRecord, normalizeStringArray } from "../ai/json";
import { createLogger } from "../observability";
import { errorMessage } from "../errors";
import { withTimeout } from "../utils/async";
import type { EvaluationOutcome, EvaluationReport, ParsedIntent, ResultDetail } from "./types";

const log = createLogger("search/evaluator");

const EVALUATE_TIMEOUT_MS = 30_000;
const EVALUATE_MAX_TOKENS = 1500;
const MAX_SUMMARIZED_RESULTS = 10;
const HEADLINE_CHARS = 80;

const EVALUATE_SYSTEM_PROMPT = `You are evaluating search result quality. Be critical and identify issues.

Check for these problems:
1. EDUCATION LEAKAGE: a person returned for a school query because they worked with its alumni, not because they studied there
2. SKILL MISMATCH: someone without the requested skills
3. AND/OR CONFUSION: for "A and B", results with only A or only B
4. LOCATION MISMATCH: wrong city or country
5. SEMANTIC GAPS: relevant people missed because of different terminology

Output JSON:
{
  "overall_score": 0-10,
  "precision": 0-1 (fraction of results that are relevant),
  "issues": ["specific issues found"],
  "feedback": "detailed feedback for improvement",
  "suggestions": ["specific suggestions to improve retrieval"]
}`;

export const EMPTY_RESULTS_REPORT: EvaluationReport = {
  overallScore: 0,
  precision: 0,
  issues: ["empty_results"],
  feedback: "No results returned",
  suggestions: [],
};

export function summarizeResults(results: readonly ResultDetail[]): string {
  return results
    .slice(0, MAX_SUMMARIZED_RESULTS)
    .map((r, i) => `#${i + 1}: ${r.name} - ${r.headline.slice(0, HEADLINE_CHARS)} (score: ${r.score.toFixed(2)})`)
    .join("\n");
}

export function buildEvaluationPrompt(query: string, results: readonly ResultDetail[], intent: ParsedIntent): string {
  return `Query: "${query}"

Intent: ${JSON.stringify(intent)}

Top Results:
${summarizeResults(results)}

Evaluate these results. Return ONLY valid JSON.`;
}

function clamp(n: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, n));
}

/** A reply without a numeric overall_score is unusable. */
export function parseEvaluationResponse(text: string): EvaluationOutcome {
  const { json, parseError } = extractJsonFromResponse(text, "object");
  if (!isRecord(json)) {
    return { status: "unavailable", reason: parseError ?? "response is not a JSON object" };
  }
  const overall = json.overall_score;
  if (typeof overall !== "number" || !Number.isFinite(overall)) {
    return { status: "unavailable", reason: "overall_score missing or not a number" };
  }
  const precision = typeof json.precision === "number" && Number.isFinite(json.precision) ? json.precision : 0;
  return {
    status: "ok",
    report: {
      overallScore: clamp(overall, 0, 10),
      precision: clamp(precision, 0, 1),
      issues: normalizeStringArray(json.issues),
      feedback: typeof json.feedback === "string" ? json.feedback : "",
      suggestions: normalizeStringArray(json.suggestions),
    },
  };
}

export interface EvaluatorOptions {
  compose?: ComposeFn;
  timeoutMs?: number;
}

export class Evaluator {
  private readonly compose: ComposeFn;
  private readonly timeoutMs: number;

  constructor(opts: EvaluatorOptions = {}) {
    this.compose = opts.compose ?? composeText;
    this.timeoutMs = opts.timeoutMs ?? EVALUATE_TIMEOUT_MS;
  }

  async evaluate(query: string, results: readonly ResultDetail[], intent: ParsedIntent): Promise<EvaluationOutcome> {
    if (results.length === 0) return { status: "ok", report: { ...EMPTY_RESULTS_REPORT, issues: ["empty_results"] } };

    try {
      const result = await withTimeout(
        this.compose(buildEvaluationPrompt(query, results, intent), {
          systemPrompt: EVALUATE_SYSTEM_PROMPT,
          maxTokens: EVALUATE_MAX_TOKENS,
          temperature: 0.1,
        }),
        this.timeoutMs,
        "Evaluation"
      );
      const outcome = parseEvaluationResponse(result.text);
      if (outcome.status === "unavailable") log.warn({ query, reason: outcome.reason }, "Evaluation reply unusable");
      return outcome;
    } catch (err) {
      log.warn({ query, err: errorMessage(err) }, "Evaluation oracle failed");
      return { status: "unavailable", reason: errorMessage(err) };
    }
  }
}
