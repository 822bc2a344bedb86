// src/ai/types.ts
export type ProviderId = 'dev' | 'openai' | 'anthropic';

export interface ModelInvocationOptions {
  /** Which provider to route to; defaults to AI_PROVIDER. */
  provider?: ProviderId;
  /** Concrete model id (e.g., 'gpt-4o-mini'). */
  model?: string;
  /** Determinism hint; OpenAI honours it best-effort, Anthropic ignores it. */
  seed?: string | number;
}
