// src/ingestion/ingest.ts
// Corpus -> chunks -> embeddings -> namespaced vector records, then the profile cache.

import type { Embedder } from "../ai/embeddings";
import { chunkArray } from "../ai/embeddings";
import type { CorpusEntry } from "../actors/loader";
import { normalizeActor } from "../actors/normalizer";
import type { CategoryChunk, NormalizedProfile } from "../actors/types";
import { config } from "../config";
import { OracleError, errorMessage } from "../errors";
import { createLogger } from "../observability";
import { saveProfileCache } from "../store/profileCache";
import {
  NAMESPACES,
  chunkToMetadata,
  type Namespace,
  type StoreStats,
  type VectorRecord,
  type VectorStore,
} from "../store/vectorStore";
import { withRetry, type RetryOptions } from "../utils/async";

const log = createLogger("ingestion/ingest");

/* ---------- Constants ---------- */

const UPSERT_BATCH_SIZE = 100;
const RETRY_ATTEMPTS = 3;
const RETRY_DELAY_MS = 2000;

/* ---------- Types ---------- */

export interface IngestDeps {
  embedder: Embedder;
  store: VectorStore;
}

export interface IngestOptions {
  /** Delete all four namespaces first */
  reset?: boolean;
  embedBatchSize?: number;
  upsertBatchSize?: number;
  retry?: Pick<RetryOptions, "attempts" | "delayMs">;
  /** Where to write the profile cache; null skips writing */
  profileCachePath?: string | null;
}

export interface IngestSummary {
  actors: number;
  chunks: Record<Namespace, number>;
  stats: StoreStats;
  profiles: Map<string, NormalizedProfile>;
  durationMs: number;
}

/* ---------- Helpers ---------- */

export function groupChunksByNamespace(chunks: readonly CategoryChunk[]): Record<Namespace, CategoryChunk[]> {
  const grouped: Record<Namespace, CategoryChunk[]> = { education: [], skills: [], companies: [], location: [] };
  for (const c of chunks) grouped[c.chunkType].push(c);
  return grouped;
}

/** Retry transport failures; a non-retryable OracleError fails at once. */
function isRetryable(err: unknown): boolean {
  return !(err instanceof OracleError) || err.retryable;
}

/* ---------- Ingestion ---------- */

export async function ingestCorpus(
  entries: readonly CorpusEntry[],
  deps: IngestDeps,
  opts: IngestOptions = {}
): Promise<IngestSummary> {
  const started = Date.now();
  const embedBatchSize = opts.embedBatchSize ?? config.embedding.batchSize;
  const upsertBatchSize = opts.upsertBatchSize ?? UPSERT_BATCH_SIZE;
  const retry: RetryOptions = {
    attempts: opts.retry?.attempts ?? RETRY_ATTEMPTS,
    delayMs: opts.retry?.delayMs ?? RETRY_DELAY_MS,
    shouldRetry: isRetryable,
  };

  const profiles = new Map<string, NormalizedProfile>();
  const allChunks: CategoryChunk[] = [];
  for (const { actorId, actor } of entries) {
    const normalized = normalizeActor(actor, actorId);
    profiles.set(actorId, normalized.profile);
    allChunks.push(...normalized.chunks);
  }
  const grouped = groupChunksByNamespace(allChunks);
  const counts: Record<Namespace, number> = {
    education: grouped.education.length,
    skills: grouped.skills.length,
    companies: grouped.companies.length,
    location: grouped.location.length,
  };
  log.info({ actors: entries.length, chunks: counts }, "Corpus normalized");

  if (opts.reset) {
    for (const ns of NAMESPACES) await deps.store.deleteNamespace(ns);
    log.info("Namespaces reset");
  }

  for (const ns of NAMESPACES) {
    const chunks = grouped[ns];
    if (chunks.length === 0) continue;

    const vectors: number[][] = [];
    const batches = chunkArray(chunks, embedBatchSize);
    for (const [b, batch] of batches.entries()) {
      const embedded = await withRetry(() => deps.embedder.embed(batch.map((c) => c.text)), {
        ...retry,
        onRetry: (err, attempt) =>
          log.warn({ namespace: ns, batch: b + 1, attempt, err: errorMessage(err) }, "Embedding batch failed, retrying"),
      });
      if (embedded.length !== batch.length) {
        throw new OracleError("embedding", `expected ${batch.length} vectors, got ${embedded.length}`, {
          retryable: false,
        });
      }
      vectors.push(...embedded);
    }

    // Ids count per actor so re-ingesting a changed corpus overwrites in place.
    const perActor = new Map<string, number>();
    const records: VectorRecord[] = chunks.map((chunk, i) => {
      const k = perActor.get(chunk.actorId) ?? 0;
      perActor.set(chunk.actorId, k + 1);
      return {
        id: `${ns}_${chunk.actorId}_${k}`,
        values: vectors[i],
        metadata: chunkToMetadata(chunk),
      };
    });
    for (const [b, batch] of chunkArray(records, upsertBatchSize).entries()) {
      await withRetry(() => deps.store.upsert(ns, batch), {
        ...retry,
        onRetry: (err, attempt) =>
          log.warn({ namespace: ns, batch: b + 1, attempt, err: errorMessage(err) }, "Upsert batch failed, retrying"),
      });
    }
    log.info({ namespace: ns, vectors: records.length }, "Namespace ingested");
  }

  if (opts.profileCachePath !== null) {
    await saveProfileCache(opts.profileCachePath ?? config.storage.profileCache, profiles.values());
  }

  const stats = await deps.store.stats();
  const durationMs = Date.now() - started;
  log.info({ durationMs, totalVectors: stats.totalVectorCount }, "Ingestion complete");
  return { actors: entries.length, chunks: counts, stats, profiles, durationMs };
}
