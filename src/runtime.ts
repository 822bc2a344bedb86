// src/runtime.ts
// Wires config into the engine: embedder, SQLite vector store, profile cache,
// parser with its intent cache, reranker and evaluator.

import { config, assertProviderCredentials } from "./config";
import { createEmbedder, type Embedder } from "./ai/embeddings";
import { SqliteVectorStore } from "./store/sqliteVectorStore";
import { loadProfiles, type ProfileMap } from "./store/profileCache";
import { IntentCache } from "./search/intentCache";
import { IntentParser } from "./search/intentParser";
import { Reranker } from "./search/reranker";
import { Evaluator } from "./search/evaluator";
import { SearchEngine } from "./search/engine";

export interface Runtime {
  embedder: Embedder;
  store: SqliteVectorStore;
  engine: SearchEngine;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  /** Profiles already in memory (e.g. fresh from ingestion); read from the cache otherwise */
  profiles?: ProfileMap;
  embedder?: Embedder;
  store?: SqliteVectorStore;
}

/** Throws ConfigError when a remote provider lacks credentials. */
export async function createRuntime(opts: RuntimeOptions = {}): Promise<Runtime> {
  assertProviderCredentials();

  const embedder = opts.embedder ?? createEmbedder();
  const store = opts.store ?? SqliteVectorStore.open(config.storage.vectorDb);
  const profiles = opts.profiles ?? (await loadProfiles(config.storage.profileCache, config.storage.actors));

  const engine = new SearchEngine({
    embedder,
    store,
    profiles,
    parser: new IntentParser({ cache: new IntentCache(config.search.intentCacheSize) }),
    reranker: new Reranker(),
    evaluator: new Evaluator(),
    defaults: { topK: config.search.topK, timeoutMs: config.search.timeoutMs },
  });

  return { embedder, store, engine, close: () => store.close() };
}
