// src/errors.ts
// Failure taxonomy shared by the oracles, the engine and the entry points.

export type OracleKind = "embedding" | "vector_store" | "llm";

/** Missing credentials or unusable configuration. The only fatal class. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A network or API failure from an external collaborator. */
export class OracleError extends Error {
  readonly oracle: OracleKind;
  readonly retryable: boolean;

  constructor(oracle: OracleKind, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "OracleError";
    this.oracle = oracle;
    this.retryable = options.retryable ?? true;
  }
}

export class TimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
