#!/usr/bin/env tsx
// scripts/runQueries.ts
// Batch runner: reads queries from a CSV file, runs each through the engine,
// and writes results.json plus evaluations.json into the output directory.
//
// Usage:
//   npm run run-queries
//   npm run run-queries -- --queries data/queries.csv --output output/results.json
//   npm run run-queries -- --no-eval --debug

import fs from "node:fs/promises";
import path from "node:path";
import { config } from "../src/config";
import { createRuntime } from "../src/runtime";
import { loadProfiles } from "../src/store/profileCache";
import { readQueries } from "../src/cli/queries";
import { parseFlags, UsageError } from "../src/cli/args";
import { formatDebug, formatResults } from "../src/cli/format";
import type { EvaluationReport, ResultEntry } from "../src/search/types";
import { errorMessage } from "../src/errors";

const HELP = `
Batch query runner

Usage:
  npm run run-queries -- [options]

Options:
  --queries <path>   CSV of queries, first column (default: data/queries.csv)
  --actors <path>    Actor corpus used to rebuild a missing profile cache
  --output <path>    Results file (default: output/results.json)
  --no-eval          Skip the LLM evaluator
  --debug            Print parsed intent and per-category diagnostics
  --help, -h         Show this help
`;

interface QueryResultRecord {
  query: string;
  results: ResultEntry[];
  error?: string;
}

interface QueryEvaluationRecord {
  query: string;
  evaluation: EvaluationReport | null;
  error?: string;
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
}

async function main(): Promise<void> {
  const flags = parseFlags(process.argv.slice(2), {
    queries: { type: "string" },
    actors: { type: "string" },
    output: { type: "string" },
    "no-eval": { type: "boolean" },
    debug: { type: "boolean" },
    help: { type: "boolean", alias: "h" },
  });
  if (flags.bool("help")) {
    console.log(HELP);
    return;
  }

  const queriesPath = path.resolve(flags.str("queries") ?? path.join(config.storage.root, "queries.csv"));
  const outputPath = path.resolve(flags.str("output") ?? path.join("output", "results.json"));
  const evaluationsPath = path.join(path.dirname(outputPath), "evaluations.json");
  const runEval = !flags.bool("no-eval");
  const debug = flags.bool("debug");

  const queries = await readQueries(queriesPath);
  console.log(`Loaded ${queries.length} queries from ${queriesPath}`);

  const profiles = await loadProfiles(config.storage.profileCache, flags.str("actors") ?? config.storage.actors);
  const runtime = await createRuntime({ profiles });

  const results: QueryResultRecord[] = [];
  const evaluations: QueryEvaluationRecord[] = [];
  const scores: number[] = [];

  try {
    for (const [i, query] of queries.entries()) {
      console.log(`\n[${i + 1}/${queries.length}] ${query}`);
      const response = await runtime.engine.search(query, { debug });
      if (debug) console.log(formatDebug(response));
      console.log(formatResults(response, 5));

      results.push(
        response.status === "error"
          ? { query, results: [], error: response.error ?? "search failed" }
          : { query, results: response.results }
      );

      if (!runEval) continue;
      if (response.status === "error") {
        evaluations.push({ query, evaluation: null, error: response.error ?? "search failed" });
        continue;
      }
      const outcome = await runtime.engine.evaluate(response);
      if (outcome.status === "ok") {
        evaluations.push({ query, evaluation: outcome.report });
        scores.push(outcome.report.overallScore);
        console.log(`  Evaluation: ${outcome.report.overallScore}/10`);
      } else {
        evaluations.push({ query, evaluation: null, error: outcome.reason });
        console.log(`  Evaluation unavailable: ${outcome.reason}`);
      }
    }
  } finally {
    await runtime.close();
  }

  await writeJson(outputPath, results);
  console.log(`\nResults saved to ${outputPath}`);

  if (runEval) {
    await writeJson(evaluationsPath, evaluations);
    console.log(`Evaluations saved to ${evaluationsPath}`);
    if (scores.length > 0) {
      const avg = scores.reduce((a, b) => a + b, 0) / scores.length;
      console.log(`\nAverage evaluation score: ${avg.toFixed(2)}/10 (${scores.length} evaluated)`);
    } else {
      console.log("\nNo evaluations available.");
    }
  }
}

main().catch((err) => {
  if (err instanceof UsageError) {
    console.error(err.message);
    console.log(HELP);
  } else {
    console.error(`Batch run failed: ${errorMessage(err)}`);
  }
  process.exit(1);
});
