/* src/ai/modelRouter.ts
   Provider-agnostic "compose text" used by the intent parser, reranker and evaluator.
   The dev provider answers deterministically without a network call.
*/
import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { config } from '../config';
import { OracleError, errorMessage } from '../errors';
import type { ProviderId, ModelInvocationOptions } from './types';

export interface ComposeOptions extends ModelInvocationOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ComposeResult {
  text: string;
  provider: ProviderId;
  model: string;
}

/** Signature the LLM-backed oracles are written against; tests pass scripted fakes. */
export type ComposeFn = (prompt: string, opts?: ComposeOptions) => Promise<ComposeResult>;

/* ------------------------------ helpers ------------------------------ */

function normalizeSeedNumber(seed?: string | number): number | undefined {
  if (seed == null || seed === '') return undefined;
  const n = typeof seed === 'number' ? seed : Number(String(seed).trim());
  return Number.isFinite(n) ? Math.floor(n) : undefined;
}

let _openai: OpenAI | null = null;
function getOpenAIClient(): OpenAI {
  if (_openai) return _openai;
  _openai = new OpenAI({
    apiKey: config.ai.openaiKey,
    baseURL: config.ai.openaiBaseUrl,
  });
  return _openai;
}

let _anthropic: Anthropic | null = null;
function getAnthropicClient(): Anthropic {
  if (_anthropic) return _anthropic;
  _anthropic = new Anthropic({ apiKey: config.ai.anthropicKey });
  return _anthropic;
}

/** Visible text blocks only, joined by blank lines. */
function anthropicBlocksToText(content: Anthropic.Messages.ContentBlock[]): string {
  const out: string[] = [];
  for (const part of content) {
    if (part.type === 'text') {
      const t = part.text.trim();
      if (t) out.push(t);
    }
  }
  return out.join('\n\n').trim();
}

/* ------------------------------ main entry ------------------------------ */

/**
 * Canonical text generation entry. Transport and API failures surface as
 * OracleError('llm'); callers decide whether to fall back.
 */
export async function composeText(
  prompt: string,
  opts: ComposeOptions = {}
): Promise<ComposeResult> {
  const provider: ProviderId = opts.provider ?? config.ai.provider;

  if (provider === 'dev') {
    const model = opts.model || 'dev-stub-1';
    const text = `Draft:\n${prompt}\n\n[dev stub; deterministic]`;
    return { text, provider, model };
  }

  if (provider === 'openai') {
    const model = opts.model || config.ai.model.openai;
    try {
      const resp = await getOpenAIClient().chat.completions.create({
        model,
        messages: [
          ...(opts.systemPrompt ? [{ role: 'system' as const, content: opts.systemPrompt }] : []),
          { role: 'user' as const, content: prompt },
        ],
        max_tokens: opts.maxTokens ?? 1000,
        temperature: opts.temperature ?? 0,
        seed: normalizeSeedNumber(opts.seed),
      });
      const text = (resp.choices[0]?.message?.content ?? '').trim();
      return { text, provider, model };
    } catch (err) {
      throw new OracleError('llm', `openai completion failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  const model = opts.model || config.ai.model.anthropic;
  try {
    const resp = await getAnthropicClient().messages.create({
      model,
      max_tokens: opts.maxTokens ?? 1000,
      temperature: opts.temperature ?? 0,
      system: opts.systemPrompt || undefined,
      messages: [{ role: 'user', content: prompt }],
    });
    return { text: anthropicBlocksToText(resp.content), provider, model };
  } catch (err) {
    throw new OracleError('llm', `anthropic completion failed: ${errorMessage(err)}`, { cause: err });
  }
}
