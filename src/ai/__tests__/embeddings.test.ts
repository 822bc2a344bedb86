import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { HashingEmbedder, OpenAIEmbedder, chunkArray, tokenize } from '../embeddings';
import { cosineSimilarity, norm } from '../../utils/vectors';
import { OracleError } from '../../errors';

/* ============= helpers ============= */

describe('chunkArray', () => {
  it('splits into slices of at most size', () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunkArray([], 3)).toEqual([]);
  });
});

describe('tokenize', () => {
  it('lowercases and keeps + and #', () => {
    expect(tokenize('C++ and C#, Node.js')).toEqual(['c++', 'and', 'c#', 'node', 'js']);
  });
});

/* ============= HashingEmbedder ============= */

describe('HashingEmbedder', () => {
  const embedder = new HashingEmbedder(64, 2);

  it('returns one unit vector per text, in order', async () => {
    const texts = ['Studied at Stanford', 'Located in Bangalore', 'Skills: react'];
    const vectors = await embedder.embed(texts);
    expect(vectors).toHaveLength(3);
    for (const v of vectors) {
      expect(v).toHaveLength(64);
      expect(norm(v)).toBeCloseTo(1, 10);
    }
    expect(vectors[1]).toEqual(embedder.embedOne('Located in Bangalore'));
  });

  it('returns [] for []', async () => {
    await expect(embedder.embed([])).resolves.toEqual([]);
  });

  it('is deterministic and case-insensitive', () => {
    expect(embedder.embedOne('Frontend React')).toEqual(embedder.embedOne('frontend react'));
  });

  it('scores shared vocabulary above disjoint text', () => {
    const q = embedder.embedOne('Studied at Stanford University');
    const near = embedder.embedOne('Stanford University, B.S. in Computer Science');
    const far = embedder.embedOne('Located in Dubai');
    expect(cosineSimilarity(q, near)).toBeGreaterThan(cosineSimilarity(q, far));
  });
});

/* ============= OpenAIEmbedder ============= */

describe('OpenAIEmbedder', () => {
  it('orders results by index within a batch', async () => {
    const client = new OpenAI({ apiKey: 'test-secret' });
    const create = vi.spyOn(client.embeddings, 'create').mockResolvedValue({
      object: 'list',
      model: 'test-model',
      data: [
        { object: 'embedding', index: 1, embedding: [0, 1] },
        { object: 'embedding', index: 0, embedding: [1, 0] },
      ],
      usage: { prompt_tokens: 2, total_tokens: 2 },
    });

    const embedder = new OpenAIEmbedder('test-model', 10, 256, client);
    await expect(embedder.embed(['a', 'b'])).resolves.toEqual([[1, 0], [0, 1]]);
    expect(create).toHaveBeenCalledWith({ model: 'test-model', input: ['a', 'b'] });
  });

  it('requests the configured dimension from text-embedding-3 models', async () => {
    const client = new OpenAI({ apiKey: 'test-secret' });
    const create = vi.spyOn(client.embeddings, 'create').mockResolvedValue({
      object: 'list',
      model: 'text-embedding-3-small',
      data: [{ object: 'embedding', index: 0, embedding: [0.6, 0.8] }],
      usage: { prompt_tokens: 1, total_tokens: 1 },
    });

    await new OpenAIEmbedder('text-embedding-3-small', 10, 2, client).embed(['a']);
    expect(create).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['a'], dimensions: 2 });
  });

  it('wraps transport failures as retryable OracleError', async () => {
    const client = new OpenAI({ apiKey: 'test-secret' });
    vi.spyOn(client.embeddings, 'create').mockRejectedValue(new Error('socket hang up'));

    const err = await new OpenAIEmbedder('test-model', 10, 256, client).embed(['a']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OracleError);
    expect(err instanceof OracleError && err.oracle).toBe('embedding');
    expect(err instanceof OracleError && err.retryable).toBe(true);
  });
});
