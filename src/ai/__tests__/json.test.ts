import { describe, it, expect } from 'vitest';
import { extractJsonFromResponse, normalizeStringArray } from '../json';

/* ============= extractJsonFromResponse ============= */

describe('extractJsonFromResponse', () => {
  it('parses plain JSON', () => {
    expect(extractJsonFromResponse('{"a": 1}')).toEqual({ json: { a: 1 } });
  });

  it('unwraps a fenced block', () => {
    const raw = 'Here you go:\n```json\n{"skills": ["react"]}\n```\nThanks';
    expect(extractJsonFromResponse(raw).json).toEqual({ skills: ['react'] });
  });

  it('finds an object inside surrounding prose', () => {
    expect(extractJsonFromResponse('The intent is {"x": true} as requested.').json).toEqual({ x: true });
  });

  it('extracts arrays when asked for one', () => {
    const raw = 'Ranking: [{"index": 0, "score": 0.9}]';
    expect(extractJsonFromResponse(raw, 'array').json).toEqual([{ index: 0, score: 0.9 }]);
  });

  it('does not accept an array where an object is expected', () => {
    const out = extractJsonFromResponse('[1, 2]', 'object');
    expect(out.json).toBeNull();
    expect(out.parseError).toBe('No JSON object found in response');
  });

  it('reports a parse error for a broken span', () => {
    const out = extractJsonFromResponse('result: {"a": }');
    expect(out.json).toBeNull();
    expect(out.parseError).toMatch(/^Failed to parse JSON/);
  });

  it('returns null for text without JSON', () => {
    expect(extractJsonFromResponse('Draft:\nhello').json).toBeNull();
  });
});

/* ============= normalizeStringArray ============= */

describe('normalizeStringArray', () => {
  it('keeps trimmed non-empty strings only', () => {
    expect(normalizeStringArray([' React ', '', 3, null, 'Vue'])).toEqual(['React', 'Vue']);
  });

  it('returns [] for non-arrays', () => {
    expect(normalizeStringArray('react')).toEqual([]);
    expect(normalizeStringArray(undefined)).toEqual([]);
  });
});
