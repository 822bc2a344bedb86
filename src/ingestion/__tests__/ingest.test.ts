import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { groupChunksByNamespace, ingestCorpus } from '../ingest';
import { parseCorpus } from '../../actors/loader';
import { normalizeActor } from '../../actors/normalizer';
import { HashingEmbedder, type Embedder } from '../../ai/embeddings';
import { SqliteVectorStore } from '../../store/sqliteVectorStore';
import { readProfileCache } from '../../store/profileCache';
import { OracleError } from '../../errors';

const corpus = parseCorpus([
  {
    profile: { name: 'Ada', headline: 'Engineer', location: 'London' },
    professional: {
      education: [{ school: 'Oxford' }],
      work_experience: [{ title: 'Engineer', company_name: 'Acme' }],
    },
    platform_identities: [{ platform_id: 'ada' }],
  },
  {
    profile: { name: 'Bob' },
    professional: { education: [{ school: 'MIT' }, { school: 'Stanford' }] },
    platform_identities: [{ platform_id: 'bob' }],
  },
]);

let store: SqliteVectorStore;

beforeEach(() => {
  store = SqliteVectorStore.open(':memory:');
});

afterEach(async () => {
  await store.close();
});

describe('groupChunksByNamespace', () => {
  it('buckets chunks by type', () => {
    const grouped = groupChunksByNamespace(normalizeActor(corpus[1].actor, 'bob').chunks);
    expect(grouped.education).toHaveLength(2);
    expect(grouped.skills).toEqual([]);
  });
});

describe('ingestCorpus', () => {
  it('embeds every chunk into its namespace', async () => {
    const embedder = new HashingEmbedder(16, 2);

    const summary = await ingestCorpus(corpus, { embedder, store }, { profileCachePath: null });

    expect(summary.actors).toBe(2);
    expect(summary.chunks).toEqual({ education: 3, skills: 1, companies: 1, location: 1 });
    expect(summary.stats.totalVectorCount).toBe(6);
    expect(summary.profiles.get('bob')?.education).toEqual(['MIT', 'Stanford']);

    const matches = await store.query('education', embedder.embedOne('Stanford'), 10);
    expect(matches.map((m) => m.id).sort()).toEqual(['education_ada_0', 'education_bob_0', 'education_bob_1']);
    expect(matches.find((m) => m.id === 'education_bob_1')?.metadata).toEqual({
      actorId: 'bob',
      name: 'Bob',
      chunkType: 'education',
      school: 'Stanford',
      degree: '',
      fieldOfStudy: '',
    });
  });

  it('is idempotent for the same corpus', async () => {
    const deps = { embedder: new HashingEmbedder(16, 20), store };
    await ingestCorpus(corpus, deps, { profileCachePath: null });
    const again = await ingestCorpus(corpus, deps, { profileCachePath: null });
    expect(again.stats.totalVectorCount).toBe(6);
  });

  it('keeps vector ids stable when other actors leave the corpus', async () => {
    const embedder = new HashingEmbedder(16, 20);
    await ingestCorpus(corpus, { embedder, store }, { profileCachePath: null });

    const summary = await ingestCorpus([corpus[1]], { embedder, store }, { profileCachePath: null });

    expect(summary.stats.totalVectorCount).toBe(6);
    const matches = await store.query('education', embedder.embedOne('MIT'), 10);
    expect(matches.find((m) => m.id === 'education_bob_0')?.metadata.school).toBe('MIT');
    expect(matches.find((m) => m.id === 'education_bob_1')?.metadata.school).toBe('Stanford');
  });

  it('clears old namespaces on reset', async () => {
    const deps = { embedder: new HashingEmbedder(16, 20), store };
    await ingestCorpus(corpus, deps, { profileCachePath: null });

    const summary = await ingestCorpus([corpus[1]], deps, { reset: true, profileCachePath: null });

    expect(summary.stats).toEqual({
      totalVectorCount: 2,
      namespaces: { education: { vectorCount: 2, dimension: 16 } },
    });
  });

  it('retries a failed embedding batch', async () => {
    const inner = new HashingEmbedder(16, 20);
    let calls = 0;
    const flaky: Embedder = {
      name: 'flaky',
      embed: async (texts) => {
        calls++;
        if (calls === 1) throw new OracleError('embedding', 'connection reset');
        return inner.embed(texts);
      },
    };

    const summary = await ingestCorpus(corpus, { embedder: flaky, store }, {
      embedBatchSize: 20,
      retry: { attempts: 3, delayMs: 0 },
      profileCachePath: null,
    });

    expect(summary.stats.totalVectorCount).toBe(6);
    expect(calls).toBe(5);
  });

  it('does not retry a non-retryable failure', async () => {
    let calls = 0;
    const broken: Embedder = {
      name: 'broken',
      embed: async () => {
        calls++;
        throw new OracleError('embedding', 'bad request', { retryable: false });
      },
    };

    await expect(
      ingestCorpus(corpus, { embedder: broken, store }, { retry: { attempts: 3, delayMs: 0 }, profileCachePath: null })
    ).rejects.toThrow('bad request');
    expect(calls).toBe(1);
  });

  it('writes the profile cache', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ingest-'));
    const cachePath = path.join(dir, 'profiles.json');
    try {
      await ingestCorpus(corpus, { embedder: new HashingEmbedder(16, 20), store }, { profileCachePath: cachePath });
      const cached = await readProfileCache(cachePath);
      expect([...(cached?.keys() ?? [])]).toEqual(['ada', 'bob']);
      expect(cached?.get('ada')?.currentRole).toBe('Engineer at Acme');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
