#!/usr/bin/env tsx
// scripts/search.ts
// Search CLI: optional ingestion, then one query or an interactive session.
//
// Usage:
//   npm run search -- --query "frontend devs in Bangalore"
//   npm run search -- --interactive --skip-ingest
//   npm run search -- --reset --query "Stanford and MIT grads" --debug

import readline from "node:readline/promises";
import { config, assertProviderCredentials } from "../src/config";
import { createEmbedder } from "../src/ai/embeddings";
import { loadCorpus } from "../src/actors/loader";
import { ingestCorpus } from "../src/ingestion/ingest";
import { SqliteVectorStore } from "../src/store/sqliteVectorStore";
import { createRuntime } from "../src/runtime";
import type { SearchEngine } from "../src/search/engine";
import type { ProfileMap } from "../src/store/profileCache";
import { intFlag, parseFlags, UsageError } from "../src/cli/args";
import { formatDebug, formatResults } from "../src/cli/format";
import { errorMessage } from "../src/errors";

const HELP = `
People search

Usage:
  npm run search -- [options]

Options:
  --query, -q <text>   Run a single query
  --interactive, -i    Read queries from stdin
  --skip-ingest, -s    Use the existing index and profile cache
  --actors <path>      Actor corpus JSON (default: ${config.storage.actors})
  --reset              Clear all namespaces before ingesting
  --top-k <n>          Results per query (default: ${config.search.topK})
  --no-rerank          Skip the LLM reranker
  --debug              Print parsed intent and per-category diagnostics
  --help, -h           Show this help

Examples:
  npm run search -- --query "frontend devs"
  npm run search -- --interactive --skip-ingest
`;

interface QueryOptions {
  topK: number;
  rerank: boolean;
  debug: boolean;
}

async function runSingleQuery(engine: SearchEngine, query: string, opts: QueryOptions): Promise<void> {
  console.log(`\nQuery: ${query}`);
  console.log("-".repeat(50));
  const response = await engine.search(query, opts);
  if (opts.debug) console.log(formatDebug(response));
  console.log("\nTop Results:");
  console.log(formatResults(response, opts.topK));
}

async function interactiveMode(engine: SearchEngine, opts: QueryOptions): Promise<void> {
  console.log("\nEnter queries to search. Type 'quit' or 'exit' to stop.");
  console.log("Type 'debug' to toggle debug mode.");
  console.log("-".repeat(60));

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let debug = opts.debug;
  try {
    for (;;) {
      const query = (await rl.question("\nQuery: ")).trim();
      if (!query) continue;
      const lower = query.toLowerCase();
      if (lower === "quit" || lower === "exit" || lower === "q") {
        console.log("\nGoodbye!");
        break;
      }
      if (lower === "debug") {
        debug = !debug;
        console.log(`Debug mode: ${debug ? "ON" : "OFF"}`);
        continue;
      }
      await runSingleQuery(engine, query, { ...opts, debug });
    }
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const flags = parseFlags(process.argv.slice(2), {
    query: { type: "string", alias: "q" },
    interactive: { type: "boolean", alias: "i" },
    "skip-ingest": { type: "boolean", alias: "s" },
    actors: { type: "string" },
    reset: { type: "boolean" },
    "top-k": { type: "string" },
    "no-rerank": { type: "boolean" },
    debug: { type: "boolean" },
    help: { type: "boolean", alias: "h" },
  });
  if (flags.bool("help")) {
    console.log(HELP);
    return;
  }

  assertProviderCredentials();
  const opts: QueryOptions = {
    topK: intFlag(flags.str("top-k"), "top-k", config.search.topK),
    rerank: !flags.bool("no-rerank"),
    debug: flags.bool("debug"),
  };
  const embedder = createEmbedder();
  const store = SqliteVectorStore.open(config.storage.vectorDb);

  let profiles: ProfileMap | undefined;
  if (!flags.bool("skip-ingest")) {
    const actorsPath = flags.str("actors") ?? config.storage.actors;
    console.log(`\nIngesting ${actorsPath}...`);
    const entries = await loadCorpus(actorsPath);
    const summary = await ingestCorpus(entries, { embedder, store }, { reset: flags.bool("reset") });
    profiles = summary.profiles;
    console.log(`Ingested ${summary.actors} actors, ${summary.stats.totalVectorCount} vectors.`);
  } else {
    console.log("\nSkipping ingestion (using existing index)");
  }

  const runtime = await createRuntime({ embedder, store, profiles });
  try {
    const query = flags.str("query");
    if (query) {
      await runSingleQuery(runtime.engine, query, opts);
    } else if (flags.bool("interactive")) {
      await interactiveMode(runtime.engine, opts);
    } else {
      console.log("\nTip: use --interactive or --query to search");
    }
  } finally {
    await runtime.close();
  }
}

main().catch((err) => {
  if (err instanceof UsageError) {
    console.error(err.message);
    console.log(HELP);
  } else {
    console.error(`Search failed: ${errorMessage(err)}`);
  }
  process.exit(1);
});
