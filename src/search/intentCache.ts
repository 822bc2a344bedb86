// src/search/intentCache.ts
// Bounded query-intent cache. Keys are MD5 of the trimmed lowercase query.
// At the high-water mark the oldest half is evicted (insertion order, not LRU).
// Concurrent lookups for the same key share one in-flight computation.

import { md5Hex } from "../ai/deterministic";
import type { ParsedIntent } from "./types";

export interface CacheCompute {
  intent: ParsedIntent;
  /** False for fallback intents, which must not be remembered */
  cacheable: boolean;
}

export class IntentCache {
  private readonly entries = new Map<string, ParsedIntent>();
  private readonly inFlight = new Map<string, Promise<CacheCompute>>();

  constructor(readonly capacity: number = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`intent cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  static keyFor(query: string): string {
    return md5Hex(query.trim().toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }

  get(query: string): ParsedIntent | undefined {
    return this.entries.get(IntentCache.keyFor(query));
  }

  set(query: string, intent: ParsedIntent): void {
    const key = IntentCache.keyFor(query);
    if (!this.entries.has(key) && this.entries.size >= this.capacity) this.evictOldestHalf();
    this.entries.set(key, intent);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Cached intent, or the result of `compute`. Callers arriving while a
   * computation for the same key is pending await that one.
   */
  async getOrCompute(
    query: string,
    compute: () => Promise<CacheCompute>
  ): Promise<CacheCompute & { hit: boolean }> {
    const key = IntentCache.keyFor(query);
    const cached = this.entries.get(key);
    if (cached) return { intent: cached, cacheable: true, hit: true };

    let pending = this.inFlight.get(key);
    if (!pending) {
      pending = compute()
        .then((result) => {
          if (result.cacheable) this.set(query, result.intent);
          return result;
        })
        .finally(() => this.inFlight.delete(key));
      this.inFlight.set(key, pending);
    }
    const result = await pending;
    return { ...result, hit: false };
  }

  private evictOldestHalf(): void {
    const drop = Math.max(1, Math.floor(this.capacity / 2));
    let removed = 0;
    for (const key of this.entries.keys()) {
      if (removed >= drop) break;
      this.entries.delete(key);
      removed++;
    }
  }
}
