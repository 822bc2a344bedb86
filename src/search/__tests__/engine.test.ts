import { describe, it, expect } from 'vitest';
import { SearchEngine } from '../engine';
import { IntentParser } from '../intentParser';
import { Reranker } from '../reranker';
import { Evaluator } from '../evaluator';
import type { ProfileMap } from '../../store/profileCache';
import type { ComposeFn } from '../../ai/modelRouter';
import { RecordingEmbedder, StubVectorStore, intentJson, makeProfile, match, scriptedCompose, type StubNamespace } from './testUtils';

/* ============= Fixtures ============= */

const profiles: ProfileMap = new Map(
  ['s1', 's2', 's3', 'h', 'a', 'b', 'c', 'd'].map((id) => [id, makeProfile(id, { headline: `${id} headline` })])
);

const educationNs: StubNamespace = {
  matches: [
    match('education_s1_0', 0.9, { actorId: 's1', school: 'Stanford University' }),
    match('education_s1_1', 0.85, { actorId: 's1', school: 'MIT' }),
    match('education_s2_0', 0.8, { actorId: 's2', school: 'Stanford' }),
    match('education_s3_0', 0.7, { actorId: 's3', school: 'Massachusetts Institute of Technology' }),
    match('education_h_0', 0.6, { actorId: 'h', school: 'Harvard University' }),
  ],
};

const skillsNs: StubNamespace = {
  matches: [
    match('skills_a_0', 0.8, { actorId: 'a' }),
    match('skills_b_0', 0.6, { actorId: 'b' }),
    match('skills_c_0', 0.5, { actorId: 'c' }),
  ],
};

const locationNs: StubNamespace = {
  matches: [
    match('location_d_0', 0.95, { actorId: 'd', location: 'Mumbai' }),
    match('location_a_0', 0.9, { actorId: 'a', location: 'Bangalore' }),
    match('location_c_0', 0.7, { actorId: 'c', location: 'Bengaluru, Karnataka' }),
  ],
};

const stanfordMitIntent = intentJson({
  education: ['Stanford', 'Stanford University', 'MIT', 'Massachusetts Institute of Technology'],
  education_logic: 'AND',
  normalized_query: 'Stanford and MIT alumni',
});

const frontendBangaloreIntent = intentJson({
  skills: ['frontend', 'react'],
  locations: ['Bangalore', 'Bengaluru'],
  normalized_query: 'frontend developers in Bangalore',
});

interface Setup {
  intentReply: string | Error;
  namespaces?: Record<string, StubNamespace>;
  rerank?: ComposeFn;
  evaluate?: ComposeFn;
}

function setup({ intentReply, namespaces = {}, rerank, evaluate }: Setup) {
  const parserCompose = scriptedCompose(intentReply);
  const embedder = new RecordingEmbedder();
  const store = new StubVectorStore(namespaces);
  const engine = new SearchEngine({
    embedder,
    store,
    profiles,
    parser: new IntentParser({ compose: parserCompose }),
    reranker: new Reranker({ compose: rerank ?? scriptedCompose('[]') }),
    evaluator: new Evaluator({ compose: evaluate ?? scriptedCompose('{}') }),
  });
  return { engine, store, embedder, parserCompose };
}

/* ============= Combination ============= */

describe('SearchEngine.search', () => {
  it('returns only graduates of both schools for an AND query', async () => {
    const { engine } = setup({ intentReply: stanfordMitIntent, namespaces: { education: educationNs } });

    const response = await engine.search('Stanford and MIT grads', { rerank: false });

    expect(response.status).toBe('ok');
    expect(response.intentSource).toBe('oracle');
    expect(response.parsedIntent?.educationGroups.map((g) => g.canonical)).toEqual(['stanford', 'mit']);
    expect(response.results).toEqual([{ actor_id: 's1', score: 0.9 }]);
    expect(response.reranked).toBe(false);
  });

  it('intersects categories and averages their scores', async () => {
    const { engine, embedder } = setup({
      intentReply: frontendBangaloreIntent,
      namespaces: { skills: skillsNs, location: locationNs },
    });

    const response = await engine.search('frontend devs in Bangalore', { rerank: false, debug: true });

    expect(response.results).toEqual([
      { actor_id: 'a', score: 0.85 },
      { actor_id: 'c', score: 0.6 },
    ]);
    expect(response.resultsWithDetails[0]).toMatchObject({ actor_id: 'a', name: 'A', headline: 'a headline' });
    expect(response.debug).toEqual([
      { category: 'skills', outcome: 'ok', rawCount: 3, keptCount: 3 },
      { category: 'location', outcome: 'ok', rawCount: 3, keptCount: 2 },
    ]);
    expect(embedder.texts).toEqual(['Skills: frontend developers in Bangalore', 'Located in Bangalore Bengaluru']);
  });

  it('truncates to topK', async () => {
    const { engine } = setup({ intentReply: frontendBangaloreIntent, namespaces: { skills: skillsNs, location: locationNs } });
    const response = await engine.search('frontend devs in Bangalore', { rerank: false, topK: 1 });
    expect(response.results).toEqual([{ actor_id: 'a', score: 0.85 }]);
  });

  it('drops hits without a cached profile', async () => {
    const { engine } = setup({
      intentReply: intentJson({ skills: ['go'] }),
      namespaces: { skills: { matches: [match('skills_ghost_0', 0.99, { actorId: 'ghost' }), ...(skillsNs.matches ?? [])] } },
    });
    const response = await engine.search('go developers', { rerank: false });
    expect(response.results.map((r) => r.actor_id)).toEqual(['a', 'b', 'c']);
  });

  /* ============= Generic & fallback ============= */

  it('runs a generic skills search when the intent names no category', async () => {
    const { engine, store, embedder } = setup({
      intentReply: intentJson({ normalized_query: '' }),
      namespaces: { skills: skillsNs },
    });

    const response = await engine.search('interesting people', { rerank: false });

    expect(store.queries).toEqual([{ namespace: 'skills', topK: 50 }]);
    expect(embedder.texts).toEqual(['interesting people']);
    expect(response.results.map((r) => r.actor_id)).toEqual(['a', 'b', 'c']);
  });

  it('searches skills with the raw query when intent parsing fails', async () => {
    const { engine, embedder } = setup({ intentReply: new Error('oracle down'), namespaces: { skills: skillsNs } });

    const response = await engine.search('rust folks', { rerank: false });

    expect(response.intentSource).toBe('fallback');
    expect(response.status).toBe('ok');
    expect(embedder.texts).toEqual(['Skills: rust folks']);
  });

  it('returns no results for an empty query without calling any oracle', async () => {
    const { engine, parserCompose, store } = setup({ intentReply: stanfordMitIntent });
    const response = await engine.search('   ');
    expect(response.status).toBe('no_results');
    expect(response.results).toEqual([]);
    expect(parserCompose.calls).toHaveLength(0);
    expect(store.queries).toEqual([]);
  });

  /* ============= Failures ============= */

  it('leaves a timed-out category out of the intersection', async () => {
    const { engine } = setup({
      intentReply: frontendBangaloreIntent,
      namespaces: { skills: skillsNs, location: { ...locationNs, delayMs: 300 } },
    });

    const response = await engine.search('frontend devs in Bangalore', { rerank: false, timeoutMs: 60 });

    expect(response.timedOutCategories).toEqual(['location']);
    expect(response.status).toBe('ok');
    expect(response.results.map((r) => r.actor_id)).toEqual(['a', 'b', 'c']);
  });

  it('returns no results when every category timed out', async () => {
    const { engine } = setup({
      intentReply: intentJson({ locations: ['Bangalore'] }),
      namespaces: { location: { ...locationNs, delayMs: 300 } },
    });
    const response = await engine.search('people in Bangalore', { rerank: false, timeoutMs: 60 });
    expect(response.status).toBe('no_results');
    expect(response.timedOutCategories).toEqual(['location']);
  });

  it('returns no results when one category is empty', async () => {
    const { engine } = setup({
      intentReply: frontendBangaloreIntent,
      namespaces: { skills: skillsNs, location: { matches: [] } },
    });
    const response = await engine.search('frontend devs in Bangalore', { rerank: false });
    expect(response.status).toBe('no_results');
    expect(response.results).toEqual([]);
  });

  it('reports a failing category as an error', async () => {
    const { engine } = setup({
      intentReply: intentJson({ companies: ['Google'], skills: ['ml'] }),
      namespaces: { skills: skillsNs, companies: { error: new Error('index offline') } },
    });

    const response = await engine.search('ml at google', { rerank: false });

    expect(response.status).toBe('error');
    expect(response.error).toBe('companies search failed: index offline');
    expect(response.results).toEqual([]);
  });

  /* ============= Reranking ============= */

  it('applies reranker scores and reasons', async () => {
    const rerank = scriptedCompose(
      '[{"index": 1, "score": 0.95, "reason": "React dev in Bengaluru"}, {"index": 0, "score": 0.3, "reason": "weak"}]'
    );
    const { engine } = setup({
      intentReply: frontendBangaloreIntent,
      namespaces: { skills: skillsNs, location: locationNs },
      rerank,
    });

    const response = await engine.search('frontend devs in Bangalore');

    expect(response.reranked).toBe(true);
    expect(response.results).toEqual([
      { actor_id: 'c', score: 0.95 },
      { actor_id: 'a', score: 0.3 },
    ]);
    expect(response.resultsWithDetails[0].reason).toBe('React dev in Bengaluru');
  });

  it('keeps the heuristic order when the rerank reply is malformed', async () => {
    const { engine } = setup({
      intentReply: frontendBangaloreIntent,
      namespaces: { skills: skillsNs, location: locationNs },
      rerank: scriptedCompose('Draft:\nnot json'),
    });

    const response = await engine.search('frontend devs in Bangalore');

    expect(response.reranked).toBe(false);
    expect(response.results).toEqual([
      { actor_id: 'a', score: 0.85 },
      { actor_id: 'c', score: 0.6 },
    ]);
  });

  it('returns nothing when the reranker judges no candidate relevant', async () => {
    const { engine } = setup({
      intentReply: frontendBangaloreIntent,
      namespaces: { skills: skillsNs, location: locationNs },
      rerank: scriptedCompose('[]'),
    });

    const response = await engine.search('frontend devs in Bangalore');

    expect(response.reranked).toBe(true);
    expect(response.status).toBe('no_results');
    expect(response.results).toEqual([]);
  });
});

/* ============= Evaluation ============= */

describe('SearchEngine.evaluate', () => {
  it('passes the detailed results to the evaluator', async () => {
    const evaluate = scriptedCompose('{"overall_score": 8, "precision": 1}');
    const { engine } = setup({ intentReply: stanfordMitIntent, namespaces: { education: educationNs }, evaluate });

    const response = await engine.search('Stanford and MIT grads', { rerank: false });
    const outcome = await engine.evaluate(response);

    expect(outcome).toEqual({
      status: 'ok',
      report: { overallScore: 8, precision: 1, issues: [], feedback: '', suggestions: [] },
    });
    expect(evaluate.calls[0].prompt).toContain('#1: S1 - s1 headline (score: 0.90)');
  });
});
