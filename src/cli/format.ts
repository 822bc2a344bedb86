// src/cli/format.ts
// Console rendering of search responses for the operator scripts.

import type { CategoryDebug, SearchResponse } from "../search/types";

export function formatResults(response: SearchResponse, limit = 10): string {
  if (response.status === "error") return `  Error: ${response.error ?? "unknown error"}`;
  if (response.resultsWithDetails.length === 0) return "  No results.";

  const lines: string[] = [];
  response.resultsWithDetails.slice(0, limit).forEach((r, i) => {
    lines.push(`\n  ${i + 1}. ${r.name} (score: ${r.score.toFixed(2)})`);
    if (r.headline) lines.push(`     ${r.headline.slice(0, 60)}`);
    if (r.location) lines.push(`     ${r.location}`);
    if (r.education.length > 0) lines.push(`     ${r.education.slice(0, 2).join(", ")}`);
    if (r.reason) lines.push(`     why: ${r.reason}`);
  });
  if (response.timedOutCategories.length > 0) {
    lines.push(`\n  (timed out: ${response.timedOutCategories.join(", ")})`);
  }
  return lines.join("\n");
}

export function formatDebug(response: SearchResponse): string {
  const lines = [
    `  intent (${response.intentSource ?? "none"}): ${JSON.stringify(response.parsedIntent)}`,
    ...(response.debug ?? []).map(
      (d: CategoryDebug) =>
        `  ${d.category}: ${d.outcome}, raw ${d.rawCount}, kept ${d.keptCount}${d.error ? ` (${d.error})` : ""}`
    ),
    `  reranked: ${response.reranked}, ${response.durationMs}ms`,
  ];
  return lines.join("\n");
}
