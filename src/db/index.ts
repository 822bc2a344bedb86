// src/db/index.ts
// Opens the SQLite database behind the vector store.

import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";
import { SqliteAdapter } from "./sqlite";

export type { DbAdapter, RunResult } from "./types";
export { SqliteAdapter } from "./sqlite";

/**
 * Open a SQLite database file (creating parent directories) or an
 * in-memory database when `dbPath` is ':memory:'.
 */
export function openDatabase(dbPath: string): SqliteAdapter {
  if (dbPath === ":memory:") {
    return new SqliteAdapter(new Database(":memory:"));
  }
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const rawDb = new Database(dbPath);
  rawDb.pragma("journal_mode = WAL");
  return new SqliteAdapter(rawDb);
}
