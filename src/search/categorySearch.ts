// src/search/categorySearch.ts
// Per-category retrieval: embed a synthetic query, fetch the top 100 from the
// category's namespace, then drop embedding false positives with a
// bidirectional substring check against the hit's own field.
//
// Education (and companies) with AND logic over two or more canonical groups
// additionally require every group to be matched by the actor's raw hits.

import type { Embedder } from "../ai/embeddings";
import { deriveCanonicalGroups, type CanonicalGroup } from "../actors/aliases";
import { OracleError } from "../errors";
import { createLogger } from "../observability";
import {
  metaString,
  metaStringList,
  type Metadata,
  type QueryMatch,
  type VectorStore,
} from "../store/vectorStore";
import type { CategoryHit, Logic } from "./types";

const log = createLogger("search/categorySearch");

/* ============= Constants ============= */

export const RAW_TOP_K = 100;
export const GENERIC_TOP_K = 50;

/* ============= Types ============= */

export interface CategorySearchContext {
  embedder: Embedder;
  store: VectorStore;
}

export interface CategoryResult {
  hits: CategoryHit[];
  /** Matches returned by the store before local filtering */
  rawCount: number;
}

type FieldReader = (metadata: Metadata) => string[];

const schoolOf: FieldReader = (m) => [metaString(m, "school")];
const companiesOf: FieldReader = (m) => metaStringList(m, "companies");
const locationOf: FieldReader = (m) => [metaString(m, "location")];

/* ============= Pure Helpers ============= */

/** Case-insensitive; true when either string contains the other. Blank never matches. */
export function bidirectionalContains(a: string, b: string): boolean {
  const x = a.trim().toLowerCase();
  const y = b.trim().toLowerCase();
  if (!x || !y) return false;
  return x.includes(y) || y.includes(x);
}

function actorIdOf(match: QueryMatch): string {
  return metaString(match.metadata, "actorId");
}

/** First occurrence per actor, store order preserved. Matches without an actor id are dropped. */
export function dedupeByActor(matches: readonly QueryMatch[]): CategoryHit[] {
  const seen = new Set<string>();
  const hits: CategoryHit[] = [];
  for (const m of matches) {
    const actorId = actorIdOf(m);
    if (!actorId || seen.has(actorId)) continue;
    seen.add(actorId);
    hits.push({ actorId, score: m.score });
  }
  return hits;
}

/** Keep matches whose field contains, or is contained in, at least one term. */
export function filterByContainment(
  matches: readonly QueryMatch[],
  terms: readonly string[],
  fieldsOf: FieldReader
): QueryMatch[] {
  return matches.filter((m) =>
    fieldsOf(m.metadata).some((field) => terms.some((term) => bidirectionalContains(term, field)))
  );
}

/**
 * Actors (from the unfiltered matches) whose fields cover every group: for each
 * group at least one field matches at least one variation.
 */
export function actorsMatchingAllGroups(
  rawMatches: readonly QueryMatch[],
  groups: readonly CanonicalGroup[],
  fieldsOf: FieldReader
): Set<string> {
  const fieldsByActor = new Map<string, Set<string>>();
  for (const m of rawMatches) {
    const actorId = actorIdOf(m);
    if (!actorId) continue;
    let fields = fieldsByActor.get(actorId);
    if (!fields) {
      fields = new Set();
      fieldsByActor.set(actorId, fields);
    }
    for (const f of fieldsOf(m.metadata)) if (f.trim()) fields.add(f);
  }

  const valid = new Set<string>();
  for (const [actorId, fields] of fieldsByActor) {
    const all = groups.every((group) =>
      group.variations.some((variation) => [...fields].some((f) => bidirectionalContains(variation, f)))
    );
    if (all) valid.add(actorId);
  }
  return valid;
}

/* ============= Query Text ============= */

export function educationQueryText(terms: readonly string[]): string {
  return `Studied at ${terms.join(" ")}`;
}

export function skillsQueryText(terms: readonly string[], normalizedQuery: string): string {
  return normalizedQuery.trim()
    ? `Skills: ${normalizedQuery.trim()}`
    : `Skills and expertise in: ${terms.join(", ")}`;
}

export function companiesQueryText(terms: readonly string[]): string {
  return `Worked at ${terms.join(" ")}`;
}

export function locationQueryText(terms: readonly string[]): string {
  return `Located in ${terms.join(" ")}`;
}

/* ============= Store Access ============= */

async function embedQuery(embedder: Embedder, text: string): Promise<number[]> {
  const [vector] = await embedder.embed([text]);
  if (!vector) throw new OracleError("embedding", "embedder returned no vector for query text");
  return vector;
}

async function fetchRaw(
  ctx: CategorySearchContext,
  namespace: string,
  text: string,
  topK: number
): Promise<QueryMatch[]> {
  const vector = await embedQuery(ctx.embedder, text);
  return ctx.store.query(namespace, vector, topK);
}

function withGroupVerification(
  raw: readonly QueryMatch[],
  filtered: CategoryHit[],
  groups: readonly CanonicalGroup[],
  fieldsOf: FieldReader
): CategoryHit[] {
  const valid = actorsMatchingAllGroups(raw, groups, fieldsOf);
  return filtered.filter((h) => valid.has(h.actorId));
}

/* ============= Category Searches ============= */

export async function searchEducation(
  ctx: CategorySearchContext,
  terms: readonly string[],
  logic: Logic,
  groups: readonly CanonicalGroup[]
): Promise<CategoryResult> {
  const raw = await fetchRaw(ctx, "education", educationQueryText(terms), RAW_TOP_K);
  let hits = dedupeByActor(filterByContainment(raw, terms, schoolOf));

  if (logic === "AND" && groups.length > 1) {
    const before = hits.length;
    hits = withGroupVerification(raw, hits, groups, schoolOf);
    log.debug({ groups: groups.map((g) => g.canonical), before, after: hits.length }, "Education AND groups verified");
  }
  return { hits, rawCount: raw.length };
}

/** No containment filter: skills are free-form, the similarity score is trusted as is. */
export async function searchSkills(
  ctx: CategorySearchContext,
  terms: readonly string[],
  normalizedQuery: string
): Promise<CategoryResult> {
  const raw = await fetchRaw(ctx, "skills", skillsQueryText(terms, normalizedQuery), RAW_TOP_K);
  return { hits: dedupeByActor(raw), rawCount: raw.length };
}

/**
 * Without groups from the intent, AND groups come from the alias table; terms
 * the table does not know (tickers, subsidiaries) join a neighbouring group.
 */
export async function searchCompanies(
  ctx: CategorySearchContext,
  terms: readonly string[],
  logic: Logic,
  groups: readonly CanonicalGroup[] = []
): Promise<CategoryResult> {
  const raw = await fetchRaw(ctx, "companies", companiesQueryText(terms), RAW_TOP_K);
  let hits = dedupeByActor(filterByContainment(raw, terms, companiesOf));

  if (logic === "AND") {
    if (groups.length === 0) groups = deriveCanonicalGroups(terms, "companies", { attachUnknown: true });
    if (groups.length > 1) {
      const before = hits.length;
      hits = withGroupVerification(raw, hits, groups, companiesOf);
      log.debug({ groups: groups.map((g) => g.canonical), before, after: hits.length }, "Company AND groups verified");
    }
  }
  return { hits, rawCount: raw.length };
}

export async function searchLocations(
  ctx: CategorySearchContext,
  terms: readonly string[],
  logic: Logic
): Promise<CategoryResult> {
  if (logic === "AND" && terms.length > 1) {
    // One location per profile: AND across places is evaluated as OR.
    log.debug({ terms }, "Location AND treated as OR");
  }
  const raw = await fetchRaw(ctx, "location", locationQueryText(terms), RAW_TOP_K);
  return { hits: dedupeByActor(filterByContainment(raw, terms, locationOf)), rawCount: raw.length };
}

/** Unfiltered skills-namespace search used when the intent names no category. */
export async function searchGeneric(ctx: CategorySearchContext, text: string): Promise<CategoryResult> {
  const raw = await fetchRaw(ctx, "skills", text, GENERIC_TOP_K);
  return { hits: dedupeByActor(raw), rawCount: raw.length };
}
