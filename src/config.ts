/* src/config.ts
   Centralized config: AI providers, embeddings, storage paths, search defaults */
import path from 'node:path';
import 'dotenv/config';
import { ConfigError } from './errors';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number): number => {
  const n = Number.parseInt(env(name), 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
};

export type AIProvider = 'dev' | 'openai' | 'anthropic';
export type EmbeddingProvider = 'dev' | 'openai';

function parseAIProvider(raw: string): AIProvider {
  return raw === 'openai' || raw === 'anthropic' ? raw : 'dev';
}

function parseEmbeddingProvider(raw: string): EmbeddingProvider {
  return raw === 'openai' ? 'openai' : 'dev';
}

const dataRoot = path.resolve(process.cwd(), env('DATA_ROOT', 'data'));

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),

  // ── AI oracles (intent parsing, reranking, evaluation) ───────────
  ai: {
    provider: parseAIProvider(env('AI_PROVIDER', 'dev')),
    openaiKey: env('OPENAI_API_KEY'),
    openaiBaseUrl: env('OPENAI_BASE_URL') || undefined,
    anthropicKey: env('ANTHROPIC_API_KEY'),
    model: {
      openai: env('AI_MODEL_OPENAI', 'gpt-4o-mini'),
      anthropic: env('AI_MODEL_ANTHROPIC', 'claude-sonnet-4-5-20250929'),
    },
  },

  // ── Embeddings ───────────────────────────────────────────────────
  embedding: {
    provider: parseEmbeddingProvider(env('EMBEDDING_PROVIDER', 'dev')),
    model: env('EMBEDDING_MODEL', 'text-embedding-3-small'),
    dimension: envInt('EMBEDDING_DIMENSION', 256),
    batchSize: envInt('EMBEDDING_BATCH_SIZE', 20),
  },

  // ── Storage ──────────────────────────────────────────────────────
  storage: {
    root: dataRoot,
    vectorDb: path.resolve(process.cwd(), env('VECTOR_DB_PATH', path.join(dataRoot, 'db', 'vectors.db'))),
    actors: path.resolve(process.cwd(), env('ACTORS_PATH', path.join(dataRoot, 'actors.json'))),
    profileCache: path.resolve(
      process.cwd(),
      env('PROFILE_CACHE_PATH', path.join(dataRoot, 'profiles_cache.json'))
    ),
  },

  // ── Search ───────────────────────────────────────────────────────
  search: {
    topK: envInt('SEARCH_TOP_K', 10),
    timeoutMs: envInt('SEARCH_TIMEOUT_MS', 30_000),
    intentCacheSize: envInt('INTENT_CACHE_SIZE', 1000),
  },

  server: {
    port: envInt('PORT', 4000),
  },
} as const;

/**
 * Fail fast when a remote provider is selected without credentials.
 * The dev providers need nothing.
 */
export function assertProviderCredentials(c: typeof config = config): void {
  const openaiNeeded = c.ai.provider === 'openai' || c.embedding.provider === 'openai';
  if (openaiNeeded && !c.ai.openaiKey) {
    throw new ConfigError('OPENAI_API_KEY is not set. Set it in your environment to use the OpenAI provider.');
  }
  if (c.ai.provider === 'anthropic' && !c.ai.anthropicKey) {
    throw new ConfigError('ANTHROPIC_API_KEY is not set. Set it in your environment to use the Anthropic provider.');
  }
}
