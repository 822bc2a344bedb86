import { describe, it, expect } from 'vitest';
import { IntentParser, fallbackIntent, normalizeIntent } from '../intentParser';
import { IntentCache } from '../intentCache';
import { hangingCompose, intentJson, scriptedCompose } from './testUtils';

/* ============= normalizeIntent ============= */

describe('normalizeIntent', () => {
  it('drops non-string entries and defaults unknown logic to OR', () => {
    const intent = normalizeIntent(
      { skills: ['react', 5, ' vue ', ''], skills_logic: 'both', locations_logic: 'and' },
      'q'
    );
    expect(intent.skills).toEqual(['react', 'vue']);
    expect(intent.skillsLogic).toBe('OR');
    expect(intent.locationsLogic).toBe('AND');
    expect(intent.normalizedQuery).toBe('q');
    expect(intent.rawIntent).toBe('q');
  });

  it('drops groups without variations and fills a missing canonical id', () => {
    const intent = normalizeIntent(
      {
        education: ['MIT'],
        education_groups: [
          { canonical: 'empty', variations: [] },
          { variations: ['Massachusetts Institute of Technology'] },
          'junk',
        ],
      },
      'q'
    );
    expect(intent.educationGroups).toEqual([
      { canonical: 'mit', variations: ['Massachusetts Institute of Technology'] },
    ]);
  });

  it('derives school groups for AND when the reply has none', () => {
    const intent = normalizeIntent({ education: ['Stanford', 'MIT'], education_logic: 'AND' }, 'q');
    expect(intent.educationGroups.map((g) => g.canonical)).toEqual(['stanford', 'mit']);
  });

  it('does not derive groups when the terms name a single school', () => {
    const intent = normalizeIntent(
      { education: ['Stanford', 'Stanford University'], education_logic: 'AND' },
      'q'
    );
    expect(intent.educationGroups).toEqual([]);
  });

  it('keeps company groups from the reply', () => {
    const intent = normalizeIntent(
      {
        companies: ['Google', 'MSFT'],
        companies_logic: 'AND',
        companies_groups: [{ canonical: 'google', variations: ['Google'] }, { variations: ['MSFT'] }],
      },
      'q'
    );
    expect(intent.companiesGroups).toEqual([
      { canonical: 'google', variations: ['Google'] },
      { canonical: 'msft', variations: ['MSFT'] },
    ]);
  });

  it('derives company groups for AND, folding unknown tickers into a known company', () => {
    const intent = normalizeIntent(
      { companies: ['Google', 'Alphabet', 'Microsoft', 'MSFT'], companies_logic: 'AND' },
      'q'
    );
    expect(intent.companiesGroups.map((g) => g.canonical)).toEqual(['google', 'microsoft']);
    expect(intent.companiesGroups[1].variations).toContain('MSFT');
  });
});

describe('fallbackIntent', () => {
  it('treats the whole query as a skill', () => {
    const intent = fallbackIntent('rust people');
    expect(intent.skills).toEqual(['rust people']);
    expect(intent.education).toEqual([]);
    expect(intent.normalizedQuery).toBe('rust people');
  });
});

/* ============= IntentParser ============= */

describe('IntentParser', () => {
  const reply = intentJson({
    education: [],
    skills: ['frontend', 'react'],
    locations: ['Bangalore', 'Bengaluru'],
    normalized_query: 'frontend developers in Bangalore',
  });

  it('parses a fenced JSON reply', async () => {
    const compose = scriptedCompose('```json\n' + reply + '\n```');
    const parser = new IntentParser({ compose });

    const { intent, source } = await parser.parse('frontend devs in blr');

    expect(source).toBe('oracle');
    expect(intent.skills).toEqual(['frontend', 'react']);
    expect(intent.locations).toEqual(['Bangalore', 'Bengaluru']);
    expect(intent.normalizedQuery).toBe('frontend developers in Bangalore');
    expect(compose.calls[0].prompt).toContain('Parse and normalize this query: "frontend devs in blr"');
    expect(compose.calls[0].opts?.systemPrompt).toContain('## Quick Reference');
  });

  it('serves repeated queries from the cache', async () => {
    const compose = scriptedCompose(reply);
    const parser = new IntentParser({ compose, cache: new IntentCache() });

    await parser.parse('frontend devs in blr');
    const second = await parser.parse('Frontend devs in BLR');

    expect(second.source).toBe('cache');
    expect(compose.calls).toHaveLength(1);
  });

  it('falls back when the reply is not JSON and does not cache it', async () => {
    const compose = scriptedCompose('Draft:\nsomething', reply);
    const cache = new IntentCache();
    const parser = new IntentParser({ compose, cache });

    const first = await parser.parse('go engineers');
    expect(first.source).toBe('fallback');
    expect(first.intent).toEqual(fallbackIntent('go engineers'));
    expect(cache.size).toBe(0);

    const second = await parser.parse('go engineers');
    expect(second.source).toBe('oracle');
  });

  it('falls back when the oracle throws', async () => {
    const parser = new IntentParser({ compose: scriptedCompose(new Error('rate limited')) });
    const { intent, source } = await parser.parse('data scientists');
    expect(source).toBe('fallback');
    expect(intent.skills).toEqual(['data scientists']);
  });

  it('falls back when the oracle does not answer in time', async () => {
    const parser = new IntentParser({ compose: hangingCompose, timeoutMs: 20 });
    const { source } = await parser.parse('anyone');
    expect(source).toBe('fallback');
  });
});
