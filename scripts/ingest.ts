#!/usr/bin/env tsx
// scripts/ingest.ts
// Load the actor corpus, embed its category chunks into the vector store and
// write the profile cache.
//
// Usage:
//   npm run ingest                        # ingest data/actors.json
//   npm run ingest -- --reset             # clear all namespaces first
//   npm run ingest -- --actors path.json

import { config, assertProviderCredentials } from "../src/config";
import { createEmbedder } from "../src/ai/embeddings";
import { loadCorpus } from "../src/actors/loader";
import { ingestCorpus } from "../src/ingestion/ingest";
import { SqliteVectorStore } from "../src/store/sqliteVectorStore";
import { parseFlags, UsageError } from "../src/cli/args";
import { errorMessage } from "../src/errors";

const HELP = `
People search ingestion

Usage:
  npm run ingest -- [--actors <path>] [--reset]

Options:
  --actors <path>   Actor corpus JSON (default: ${config.storage.actors})
  --reset           Delete all namespaces before ingesting
  --help, -h        Show this help
`;

async function main(): Promise<void> {
  const flags = parseFlags(process.argv.slice(2), {
    actors: { type: "string" },
    reset: { type: "boolean" },
    help: { type: "boolean", alias: "h" },
  });
  if (flags.bool("help")) {
    console.log(HELP);
    return;
  }

  assertProviderCredentials();
  const actorsPath = flags.str("actors") ?? config.storage.actors;
  const store = SqliteVectorStore.open(config.storage.vectorDb);

  try {
    console.log(`\nLoading data from ${actorsPath}...`);
    const entries = await loadCorpus(actorsPath);

    const summary = await ingestCorpus(entries, { embedder: createEmbedder(), store }, { reset: flags.bool("reset") });

    console.log(`\nActors: ${summary.actors}`);
    console.log("Chunks embedded:");
    for (const [ns, count] of Object.entries(summary.chunks)) {
      console.log(`  ${ns.padEnd(10)} ${count}`);
    }
    console.log(`\nVectors in store: ${summary.stats.totalVectorCount}`);
    console.log(`Profile cache: ${config.storage.profileCache}`);
    console.log(`\nIngestion complete in ${summary.durationMs}ms.`);
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  if (err instanceof UsageError) {
    console.error(err.message);
    console.log(HELP);
  } else {
    console.error(`Ingestion failed: ${errorMessage(err)}`);
  }
  process.exit(1);
});
