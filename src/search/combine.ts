// src/search/combine.ts
// Cross-category combination (always AND) and deterministic ranking.

import type { CategoryHit } from "./types";

/** Descending score; ties by actor id ascending. */
export function compareHits(a: CategoryHit, b: CategoryHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.actorId < b.actorId ? -1 : a.actorId > b.actorId ? 1 : 0;
}

function firstScores(hits: readonly CategoryHit[]): Map<string, number> {
  const scores = new Map<string, number>();
  for (const h of hits) if (!scores.has(h.actorId)) scores.set(h.actorId, h.score);
  return scores;
}

/**
 * Combine per-category hit lists.
 * - none: empty (the caller runs the generic search instead)
 * - one: that list's scores unchanged
 * - several: actors present in every list, scored by the mean of their
 *   per-list scores
 * Output is ranked by `compareHits`.
 */
export function combineCategoryResults(sets: readonly (readonly CategoryHit[])[]): CategoryHit[] {
  if (sets.length === 0) return [];

  const maps = sets.map(firstScores);
  if (maps.length === 1) {
    return [...maps[0]].map(([actorId, score]) => ({ actorId, score })).sort(compareHits);
  }

  const [first] = maps;
  const combined: CategoryHit[] = [];
  for (const actorId of first.keys()) {
    const scores: number[] = [];
    for (const m of maps) {
      const s = m.get(actorId);
      if (s !== undefined) scores.push(s);
    }
    // Intersection: only actors scored by every list.
    if (scores.length !== maps.length) continue;
    const sum = scores.reduce((acc, s) => acc + s, 0);
    combined.push({ actorId, score: sum / scores.length });
  }
  return combined.sort(compareHits);
}

export function roundScore(score: number): number {
  return Math.round(score * 1000) / 1000;
}
