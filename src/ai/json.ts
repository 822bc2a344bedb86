// src/ai/json.ts
// Pull a JSON payload out of an LLM reply. Models wrap JSON in code fences or
// prose often enough that a bare JSON.parse is not sufficient.

export type JsonShape = 'object' | 'array';

export interface JsonExtraction {
  json: unknown;
  parseError?: string;
}

const FENCE_RE = /```(?:json)?\s*\n?([\s\S]*?)```/i;

function stripCodeFences(s: string): string {
  const m = s.match(FENCE_RE);
  return m ? m[1].trim() : s.trim();
}

/**
 * Extract JSON of the expected shape from an AI response.
 * Order: fenced block, whole text, first-open to last-close bracket span.
 * `json` is null when nothing of that shape parses.
 */
export function extractJsonFromResponse(raw: string, shape: JsonShape = 'object'): JsonExtraction {
  const text = stripCodeFences(raw);

  try {
    const json: unknown = JSON.parse(text);
    if (matchesShape(json, shape)) return { json };
  } catch {
    // not plain JSON; try the bracket span below
  }

  const open = shape === 'object' ? '{' : '[';
  const close = shape === 'object' ? '}' : ']';
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start !== -1 && end > start) {
    try {
      const json: unknown = JSON.parse(text.slice(start, end + 1));
      if (matchesShape(json, shape)) return { json };
    } catch (err) {
      return { json: null, parseError: `Failed to parse JSON: ${String(err)}` };
    }
  }
  return { json: null, parseError: `No JSON ${shape} found in response` };
}

function matchesShape(value: unknown, shape: JsonShape): boolean {
  if (shape === 'array') return Array.isArray(value);
  return isRecord(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Non-empty trimmed strings only; anything else in the list is dropped. */
export function normalizeStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((v): v is string => typeof v === 'string' && v.trim() !== '')
    .map((v) => v.trim());
}
