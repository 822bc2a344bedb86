// src/search/intentParser.ts
// Natural-language query -> ParsedIntent through the LLM oracle.
//
// Never throws: oracle errors, timeouts and unparseable replies all yield the
// fallback intent (skills = [query], everything else empty, OR logic), which is
// not cached.

import { composeText, type ComposeFn } from "../ai/modelRouter";
import { extractJsonFromResponse, isRecord, normalizeStringArray } from "../ai/json";
import {
  deriveCanonicalGroups,
  getAliasContextForPrompt,
  getCanonicalCompany,
  getCanonicalSchool,
  type CanonicalGroup,
} from "../actors/aliases";
import { createLogger } from "../observability";
import { errorMessage } from "../errors";
import { withTimeout } from "../utils/async";
import { IntentCache, type CacheCompute } from "./intentCache";
import type { Logic, ParsedIntent, ParseOutcome } from "./types";

const log = createLogger("search/intentParser");

/* ============= Constants ============= */

const PARSE_TIMEOUT_MS = 15_000;
const PARSE_MAX_TOKENS = 2000;

/* ============= AI System Prompt ============= */

function buildSystemPrompt(): string {
  return `You are a query normalizer for a people search system. Your job is to:
1. Extract structured filters from natural language
2. EXPAND abbreviations, acronyms and aliases to their full forms AND common variations
3. Apply correct AND/OR logic based on user intent
4. Provide CANONICAL groupings for schools and companies (used to verify AND logic)

${getAliasContextForPrompt()}

## RULES

### School canonicalization
When several schools are joined with AND, group them by canonical id:
- "Stanford and MIT" -> education_groups: [
    {"canonical": "stanford", "variations": ["Stanford", "Stanford University"]},
    {"canonical": "mit", "variations": ["MIT", "Massachusetts Institute of Technology"]}
  ]

### Company canonicalization
When several companies are joined with AND, group them the same way; subsidiaries
and tickers go in their parent's group:
- "Google and Microsoft" -> companies_groups: [
    {"canonical": "google", "variations": ["Google", "Alphabet"]},
    {"canonical": "microsoft", "variations": ["Microsoft", "MSFT"]}
  ]

### Expansion
LOCATIONS: all variations (blr -> Bangalore, Bengaluru; sf -> San Francisco, Bay Area)
SCHOOLS: short form, full name, common nicknames
SKILLS: semantic expansion (frontend -> react, vue, angular, javascript)
COMPANIES: subsidiaries and variations

### AND/OR
- "Stanford AND MIT" -> education_logic "AND" (needs BOTH)
- "Stanford OR MIT" -> education_logic "OR" (either)
- Default "OR" within a category; categories are always combined with AND

## OUTPUT FORMAT
Return valid JSON only:
{
  "education": [],
  "education_logic": "OR",
  "education_groups": [],
  "skills": [],
  "skills_logic": "OR",
  "companies": [],
  "companies_logic": "OR",
  "companies_groups": [],
  "locations": [],
  "locations_logic": "OR",
  "normalized_query": "",
  "raw_intent": ""
}

## EXAMPLE
Query: "folks from IISc"
{
  "education": ["IISc", "Indian Institute of Science", "IISc Bangalore"],
  "education_logic": "OR",
  "education_groups": [{"canonical": "iisc", "variations": ["IISc", "Indian Institute of Science", "IISc Bangalore"]}],
  "skills": [],
  "skills_logic": "OR",
  "companies": [],
  "companies_logic": "OR",
  "companies_groups": [],
  "locations": [],
  "locations_logic": "OR",
  "normalized_query": "Indian Institute of Science alumni",
  "raw_intent": "IISc graduates"
}`;
}

function buildUserPrompt(query: string): string {
  return `Parse and normalize this query: "${query}"\n\nReturn ONLY valid JSON, no markdown or explanation.`;
}

/* ============= Normalization ============= */

export function fallbackIntent(query: string): ParsedIntent {
  return {
    education: [],
    educationLogic: "OR",
    educationGroups: [],
    skills: [query],
    skillsLogic: "OR",
    companies: [],
    companiesLogic: "OR",
    companiesGroups: [],
    locations: [],
    locationsLogic: "OR",
    normalizedQuery: query,
    rawIntent: query,
  };
}

function toLogic(value: unknown): Logic {
  return typeof value === "string" && value.trim().toUpperCase() === "AND" ? "AND" : "OR";
}

function toGroups(value: unknown, canonicalOf: (name: string) => string): CanonicalGroup[] {
  if (!Array.isArray(value)) return [];
  const groups: CanonicalGroup[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const variations = normalizeStringArray(item.variations);
    if (variations.length === 0) continue;
    const canonical =
      typeof item.canonical === "string" && item.canonical.trim()
        ? item.canonical.trim()
        : canonicalOf(variations[0]);
    groups.push({ canonical, variations });
  }
  return groups;
}

function toText(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

/**
 * Validate an oracle reply into a ParsedIntent. Non-string list entries are
 * dropped, unknown logic becomes OR, groups without variations are dropped.
 * With AND logic and no groups, education and company groups are derived from
 * the alias table when the terms span two or more canonical ids; company terms
 * the table does not know join a neighbouring group.
 */
export function normalizeIntent(raw: Record<string, unknown>, query: string): ParsedIntent {
  const education = normalizeStringArray(raw.education);
  const educationLogic = toLogic(raw.education_logic);
  let educationGroups = toGroups(raw.education_groups, getCanonicalSchool);

  if (educationLogic === "AND" && educationGroups.length === 0) {
    const derived = deriveCanonicalGroups(education, "schools");
    if (derived.length >= 2) educationGroups = derived;
  }

  const companies = normalizeStringArray(raw.companies);
  const companiesLogic = toLogic(raw.companies_logic);
  let companiesGroups = toGroups(raw.companies_groups, getCanonicalCompany);

  if (companiesLogic === "AND" && companiesGroups.length === 0) {
    const derived = deriveCanonicalGroups(companies, "companies", { attachUnknown: true });
    if (derived.length >= 2) companiesGroups = derived;
  }

  return {
    education,
    educationLogic,
    educationGroups,
    skills: normalizeStringArray(raw.skills),
    skillsLogic: toLogic(raw.skills_logic),
    companies,
    companiesLogic,
    companiesGroups,
    locations: normalizeStringArray(raw.locations),
    locationsLogic: toLogic(raw.locations_logic),
    normalizedQuery: toText(raw.normalized_query, query),
    rawIntent: toText(raw.raw_intent, query),
  };
}

/* ============= Parser ============= */

export interface IntentParserOptions {
  compose?: ComposeFn;
  cache?: IntentCache;
  timeoutMs?: number;
}

export class IntentParser {
  private readonly compose: ComposeFn;
  private readonly timeoutMs: number;
  readonly cache: IntentCache | null;

  constructor(opts: IntentParserOptions = {}) {
    this.compose = opts.compose ?? composeText;
    this.cache = opts.cache ?? null;
    this.timeoutMs = opts.timeoutMs ?? PARSE_TIMEOUT_MS;
  }

  async parse(query: string, opts: { timeoutMs?: number } = {}): Promise<ParseOutcome> {
    const timeoutMs = Math.min(opts.timeoutMs ?? this.timeoutMs, this.timeoutMs);
    const compute = () => this.callOracle(query, timeoutMs);

    if (!this.cache) {
      const result = await compute();
      return { intent: result.intent, source: result.cacheable ? "oracle" : "fallback" };
    }
    const result = await this.cache.getOrCompute(query, compute);
    return {
      intent: result.intent,
      source: result.hit ? "cache" : result.cacheable ? "oracle" : "fallback",
    };
  }

  private async callOracle(query: string, timeoutMs: number): Promise<CacheCompute> {
    try {
      const result = await withTimeout(
        this.compose(buildUserPrompt(query), {
          systemPrompt: buildSystemPrompt(),
          maxTokens: PARSE_MAX_TOKENS,
          temperature: 0.1,
        }),
        timeoutMs,
        "Intent parsing"
      );
      const { json, parseError } = extractJsonFromResponse(result.text, "object");
      if (!isRecord(json)) {
        log.warn({ query, parseError }, "Intent reply was not JSON, using fallback intent");
        return { intent: fallbackIntent(query), cacheable: false };
      }
      const intent = normalizeIntent(json, query);
      log.debug({ query, intent }, "Intent parsed");
      return { intent, cacheable: true };
    } catch (err) {
      log.warn({ query, err: errorMessage(err) }, "Intent parsing failed, using fallback intent");
      return { intent: fallbackIntent(query), cacheable: false };
    }
  }
}
