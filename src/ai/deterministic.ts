// src/ai/deterministic.ts
import crypto from "node:crypto";

/** Hex MD5 of a UTF-8 string. Used as a cache key, not for security. */
export function md5Hex(s: string): string {
  return crypto.createHash("md5").update(s, "utf8").digest("hex");
}

/** Convert a seed string to a 32-bit unsigned int. */
export function seedToUint32(seed: string): number {
  const h = crypto.createHash("sha256").update(seed, "utf8").digest();
  return (((h[0] << 24) >>> 0) ^ (h[1] << 16) ^ (h[2] << 8) ^ h[3]) >>> 0;
}
