import { describe, it, expect } from 'vitest';
import { composeText } from '../modelRouter';
import { extractJsonFromResponse } from '../json';

describe('composeText (dev provider)', () => {
  it('answers deterministically without a network call', async () => {
    const a = await composeText('Parse this', { provider: 'dev', systemPrompt: 'Return JSON {"a": 1}' });
    const b = await composeText('Parse this', { provider: 'dev' });

    expect(a).toEqual({
      text: 'Draft:\nParse this\n\n[dev stub; deterministic]',
      provider: 'dev',
      model: 'dev-stub-1',
    });
    expect(b.text).toBe(a.text);
  });

  it('never echoes the system prompt, so JSON extraction finds nothing', async () => {
    const { text } = await composeText('Parse and normalize this query: "ml people"', {
      provider: 'dev',
      systemPrompt: '{"education": []}',
    });
    expect(extractJsonFromResponse(text, 'object').json).toBeNull();
  });
});
