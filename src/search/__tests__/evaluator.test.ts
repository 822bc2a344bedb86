import { describe, it, expect } from 'vitest';
import { Evaluator, parseEvaluationResponse, summarizeResults } from '../evaluator';
import type { ResultDetail } from '../types';
import { makeIntent, scriptedCompose } from './testUtils';

const results: ResultDetail[] = [
  {
    actor_id: 'a',
    score: 0.876,
    name: 'Ada',
    headline: 'ML engineer',
    location: 'London',
    education: ['Oxford'],
    companies: [],
    current_role: '',
  },
];

describe('summarizeResults', () => {
  it('lists rank, name, headline and score', () => {
    expect(summarizeResults(results)).toBe('#1: Ada - ML engineer (score: 0.88)');
  });
});

describe('parseEvaluationResponse', () => {
  it('clamps scores into range', () => {
    expect(
      parseEvaluationResponse('{"overall_score": 12, "precision": 1.5, "issues": ["x"], "feedback": "fine"}')
    ).toEqual({
      status: 'ok',
      report: { overallScore: 10, precision: 1, issues: ['x'], feedback: 'fine', suggestions: [] },
    });
  });

  it('is unavailable without a numeric overall_score', () => {
    expect(parseEvaluationResponse('{"precision": 0.5}')).toEqual({
      status: 'unavailable',
      reason: 'overall_score missing or not a number',
    });
  });
});

describe('Evaluator', () => {
  it('reports empty results without calling the oracle', async () => {
    const compose = scriptedCompose('{}');
    const outcome = await new Evaluator({ compose }).evaluate('q', [], makeIntent());
    expect(outcome).toEqual({
      status: 'ok',
      report: { overallScore: 0, precision: 0, issues: ['empty_results'], feedback: 'No results returned', suggestions: [] },
    });
    expect(compose.calls).toHaveLength(0);
  });

  it('returns the parsed report', async () => {
    const compose = scriptedCompose('```json\n{"overall_score": 7.5, "precision": 0.8, "suggestions": ["expand aliases"]}\n```');
    const outcome = await new Evaluator({ compose }).evaluate('ml in london', results, makeIntent());
    expect(outcome).toEqual({
      status: 'ok',
      report: { overallScore: 7.5, precision: 0.8, issues: [], feedback: '', suggestions: ['expand aliases'] },
    });
    expect(compose.calls[0].prompt).toContain('#1: Ada - ML engineer (score: 0.88)');
  });

  it('is unavailable when the oracle fails', async () => {
    const outcome = await new Evaluator({ compose: scriptedCompose(new Error('down')) }).evaluate('q', results, makeIntent());
    expect(outcome).toEqual({ status: 'unavailable', reason: 'down' });
  });
});
