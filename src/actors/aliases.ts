// src/actors/aliases.ts
// Canonicalization table for schools, locations, skills and companies.
//
// Lookup order for every table: case-insensitive exact match on a variation,
// then bidirectional substring match. Variations of three characters or fewer
// ("MIT", "SF", "DU") only match as whole tokens, so "mit" does not hit "Smith".

import aliasData from "../../data/aliases.json";

/* ============= Types ============= */

export type AliasKind = "schools" | "locations" | "skills" | "companies";

/** canonical id -> surface variations (first entry is the display form) */
export type AliasTable = Readonly<Record<string, readonly string[]>>;

export interface CanonicalGroup {
  canonical: string;
  variations: string[];
}

const TABLES: Readonly<Record<AliasKind, AliasTable>> = {
  schools: aliasData.schools,
  locations: aliasData.locations,
  skills: aliasData.skills,
  companies: aliasData.companies,
};

const SHORT_VARIATION_LEN = 3;

/* ============= Matching ============= */

function tokens(s: string): string[] {
  return s.split(/[^a-z0-9]+/).filter(Boolean);
}

/** Bidirectional, case-insensitive, with whole-token matching for short forms. */
export function aliasMatches(a: string, b: string): boolean {
  const x = a.trim().toLowerCase();
  const y = b.trim().toLowerCase();
  if (!x || !y) return false;
  if (x === y) return true;
  const [shorter, longer] = x.length <= y.length ? [x, y] : [y, x];
  if (shorter.length <= SHORT_VARIATION_LEN) {
    return tokens(longer).includes(shorter);
  }
  return longer.includes(shorter);
}

/** Lowercase underscore slug, truncated to 20 characters. */
export function slugifyCanonical(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "_").slice(0, 20);
}

function lookup(kind: AliasKind, name: string): [string, readonly string[]] | null {
  const needle = name.trim().toLowerCase();
  if (!needle) return null;
  const entries = Object.entries(TABLES[kind]);

  for (const [canonical, variations] of entries) {
    if (variations.some((v) => v.toLowerCase() === needle)) return [canonical, variations];
  }
  for (const [canonical, variations] of entries) {
    if (variations.some((v) => aliasMatches(v, needle))) return [canonical, variations];
  }
  return null;
}

/* ============= Lookups ============= */

export function getCanonicalSchool(name: string): string {
  return lookup("schools", name)?.[0] ?? slugifyCanonical(name);
}

export function getSchoolVariations(name: string): string[] {
  const hit = lookup("schools", name);
  return hit ? [...hit[1]] : [name];
}

export function expandLocation(location: string): string[] {
  const hit = lookup("locations", location);
  return hit ? [...hit[1]] : [location];
}

export function expandSkill(skill: string): string[] {
  const hit = lookup("skills", skill);
  return hit ? [...hit[1]] : [skill];
}

export function getCanonicalCompany(name: string): string {
  return lookup("companies", name)?.[0] ?? slugifyCanonical(name);
}

export function getCompanyVariations(name: string): string[] {
  const hit = lookup("companies", name);
  return hit ? [...hit[1]] : [name];
}

export interface DeriveGroupsOptions {
  /**
   * Fold terms the table does not know into the group of the nearest known
   * term (the preceding one, else the first) instead of opening a group per
   * term. Applies only when at least one term is known.
   */
  attachUnknown?: boolean;
}

function addVariation(group: CanonicalGroup, term: string): void {
  const existing = group.variations.map((v) => v.toLowerCase());
  if (!existing.includes(term.toLowerCase())) group.variations.push(term);
}

/**
 * Group terms by canonical id in first-seen order. Each group's variations are
 * the table's variations plus the terms that mapped to it (case-insensitive dedupe).
 */
export function deriveCanonicalGroups(
  terms: readonly string[],
  kind: AliasKind,
  opts: DeriveGroupsOptions = {}
): CanonicalGroup[] {
  const resolved = terms
    .map((t) => t.trim())
    .filter(Boolean)
    .map((term) => ({ term, hit: lookup(kind, term) }));
  const attach = opts.attachUnknown === true && resolved.some((r) => r.hit !== null);

  const groups = new Map<string, CanonicalGroup>();
  const pending: string[] = [];
  let last: CanonicalGroup | null = null;
  for (const { term, hit } of resolved) {
    if (!hit && attach) {
      if (last) addVariation(last, term);
      else pending.push(term);
      continue;
    }
    const canonical = hit ? hit[0] : slugifyCanonical(term);
    let group = groups.get(canonical);
    if (!group) {
      group = { canonical, variations: hit ? [...hit[1]] : [] };
      groups.set(canonical, group);
    }
    addVariation(group, term);
    last = group;
  }

  const first = groups.values().next();
  if (!first.done) for (const term of pending) addVariation(first.value, term);
  return [...groups.values()];
}

/* ============= Prompt Context ============= */

/** Quick-reference block for the intent parser's system prompt. */
export function getAliasContextForPrompt(): string {
  const lines = ["## Quick Reference (use these, expand further as needed):"];

  lines.push("\nSCHOOLS:");
  for (const variations of Object.values(TABLES.schools).slice(0, 10)) {
    lines.push(`  ${variations[0]} = ${variations.slice(1, 3).join(", ")}`);
  }

  lines.push("\nLOCATIONS:");
  for (const variations of Object.values(TABLES.locations).slice(0, 8)) {
    lines.push(`  ${variations[0]} = ${variations.slice(1, 3).join(", ")}`);
  }

  lines.push("\nSKILLS:");
  for (const [group, skills] of Object.entries(TABLES.skills).slice(0, 5)) {
    lines.push(`  ${group} = ${skills.slice(0, 5).join(", ")}`);
  }

  return lines.join("\n");
}
