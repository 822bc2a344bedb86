/* src/ai/embeddings.ts
   Embedding oracle: text -> dense vector, batched, order preserving.
   - OpenAIEmbedder: openai SDK embeddings endpoint (any OpenAI-compatible base URL)
   - HashingEmbedder: offline and deterministic; token + bigram feature hashing
*/
import OpenAI from 'openai';
import { config } from '../config';
import { OracleError, errorMessage } from '../errors';
import { l2Normalize } from '../utils/vectors';
import { seedToUint32 } from './deterministic';

export interface Embedder {
  readonly name: string;
  /** One vector per input text, same order. `[]` for `[]`. */
  embed(texts: string[]): Promise<number[][]>;
}

/** Split `items` into consecutive slices of at most `size`. */
export function chunkArray<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += step) out.push(items.slice(i, i + step));
  return out;
}

/* ---------- Hashing (dev) ---------- */

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9+#]+/).filter(Boolean);
}

export class HashingEmbedder implements Embedder {
  readonly name = 'hashing';

  constructor(
    readonly dimension: number = config.embedding.dimension,
    private readonly batchSize: number = config.embedding.batchSize
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (const batch of chunkArray(texts, this.batchSize)) {
      for (const text of batch) out.push(this.embedOne(text));
    }
    return out;
  }

  embedOne(text: string): number[] {
    const vec = new Array<number>(this.dimension).fill(0);
    const tokens = tokenize(text);
    const features = [...tokens];
    for (let i = 0; i + 1 < tokens.length; i++) features.push(`${tokens[i]} ${tokens[i + 1]}`);
    for (const feature of features) {
      const h = seedToUint32(feature);
      vec[h % this.dimension] += 1;
    }
    return l2Normalize(vec);
  }
}

/* ---------- OpenAI ---------- */

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(
    private readonly model: string = config.embedding.model,
    private readonly batchSize: number = config.embedding.batchSize,
    private readonly dimension: number = config.embedding.dimension,
    client?: OpenAI
  ) {
    this.client = client ?? new OpenAI({ apiKey: config.ai.openaiKey, baseURL: config.ai.openaiBaseUrl });
  }

  /** Only the text-embedding-3 family takes a requested dimension. */
  private request(input: string[]): OpenAI.Embeddings.EmbeddingCreateParams {
    return this.model.startsWith('text-embedding-3')
      ? { model: this.model, input, dimensions: this.dimension }
      : { model: this.model, input };
  }

  async embed(texts: string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (const batch of chunkArray(texts, this.batchSize)) {
      let resp: OpenAI.Embeddings.CreateEmbeddingResponse;
      try {
        resp = await this.client.embeddings.create(this.request(batch));
      } catch (err) {
        throw new OracleError('embedding', `embedding request failed: ${errorMessage(err)}`, { cause: err });
      }
      const ordered = [...resp.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new OracleError('embedding', `expected ${batch.length} embeddings, got ${ordered.length}`);
      }
      for (const item of ordered) out.push(item.embedding);
    }
    return out;
  }
}

export function createEmbedder(provider = config.embedding.provider): Embedder {
  return provider === 'openai' ? new OpenAIEmbedder() : new HashingEmbedder();
}
