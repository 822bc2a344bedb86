// src/cli/queries.ts
// Query list for the batch runner: first column of a CSV file.

import fs from "node:fs/promises";
import Papa from "papaparse";
import { createLogger } from "../observability";

const log = createLogger("cli/queries");

/** Non-empty first-column values; a leading "query" header row is skipped. */
export function parseQueriesCsv(text: string): string[] {
  const parsed = Papa.parse<string[]>(text, { delimiter: ",", skipEmptyLines: "greedy" });
  if (parsed.errors.length > 0) {
    log.warn({ errors: parsed.errors.map((e) => `row ${e.row}: ${e.message}`) }, "CSV parse reported problems");
  }
  const queries = parsed.data
    .map((row) => (row[0] ?? "").trim())
    .filter((q) => q.length > 0);
  if (queries.length > 0 && queries[0].toLowerCase() === "query") queries.shift();
  return queries;
}

export async function readQueries(filePath: string): Promise<string[]> {
  return parseQueriesCsv(await fs.readFile(filePath, "utf8"));
}
