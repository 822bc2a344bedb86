// src/db/types.ts
// Async database interface the vector store is written against.

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/**
 * Unified async database interface.
 * Statements use SQLite '?' placeholders.
 */
export interface DbAdapter {
  readonly dbType: "sqlite";

  /** First matching row, or undefined. */
  queryOne<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T | undefined>;

  queryAll<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]>;

  /** INSERT / UPDATE / DELETE */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /** Raw DDL, semicolon separated, no parameters. */
  exec(sql: string): Promise<void>;

  /** BEGIN/COMMIT around `fn`; ROLLBACK when it throws. */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
