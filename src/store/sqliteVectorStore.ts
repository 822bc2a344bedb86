// src/store/sqliteVectorStore.ts
// VectorStore on SQLite: one row per (namespace, id), Float32 BLOB embeddings,
// brute-force cosine scoring in process.
//
// Tables: vector_records

import { openDatabase, type DbAdapter } from "../db";
import { OracleError, errorMessage } from "../errors";
import { createLogger } from "../observability";
import { bufferToVector, cosineSimilarity, vectorToBuffer } from "../utils/vectors";
import {
  toMetadata,
  type Metadata,
  type MetadataFilter,
  type QueryMatch,
  type StoreStats,
  type VectorRecord,
  type VectorStore,
} from "./vectorStore";

const log = createLogger("store/sqliteVectorStore");

/* ---------- Schema ---------- */

const SCHEMA = `
CREATE TABLE IF NOT EXISTS vector_records (
  namespace     TEXT    NOT NULL,
  id            TEXT    NOT NULL,
  dimension     INTEGER NOT NULL,
  embedding     BLOB    NOT NULL,
  metadata_json TEXT    NOT NULL,
  created_at    INTEGER NOT NULL,
  PRIMARY KEY (namespace, id)
);
CREATE INDEX IF NOT EXISTS idx_vector_records_namespace ON vector_records(namespace);
`;

// Row type (snake_case, matches DB)
interface VectorRow {
  id: string;
  embedding: Buffer;
  metadata_json: string;
}

interface StatsRow {
  namespace: string;
  count: number;
  dimension: number | null;
}

/* ---------- Row to Domain Converters ---------- */

/** Unreadable metadata becomes `{}`; such a row fails every containment filter. */
function parseMetadata(json: string, namespace: string, id: string): Metadata {
  try {
    return toMetadata(JSON.parse(json));
  } catch (err) {
    log.warn({ namespace, id, err: errorMessage(err) }, "Corrupt vector metadata, treating as empty");
    return {};
  }
}

function matchesFilter(metadata: Metadata, filter?: MetadataFilter): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, expected]) => metadata[key] === expected);
}

/* ---------- Store ---------- */

export class SqliteVectorStore implements VectorStore {
  private ready: Promise<void> | null = null;

  constructor(private readonly db: DbAdapter) {}

  /** Open (or create) the store at `dbPath`; ':memory:' for tests. */
  static open(dbPath: string): SqliteVectorStore {
    return new SqliteVectorStore(openDatabase(dbPath));
  }

  private init(): Promise<void> {
    if (!this.ready) this.ready = this.db.exec(SCHEMA);
    return this.ready;
  }

  async upsert(namespace: string, records: VectorRecord[]): Promise<number> {
    await this.init();
    if (records.length === 0) return 0;

    const existing = await this.db.queryOne<{ dimension: number }>(
      "SELECT dimension FROM vector_records WHERE namespace = ? LIMIT 1",
      [namespace]
    );
    const dimension = existing?.dimension ?? records[0].values.length;
    const bad = records.find((r) => r.values.length !== dimension);
    if (bad) {
      throw new OracleError(
        "vector_store",
        `dimension mismatch in namespace "${namespace}": expected ${dimension}, got ${bad.values.length} for ${bad.id}`,
        { retryable: false }
      );
    }

    const now = Date.now();
    await this.db.transaction(async (tx) => {
      for (const r of records) {
        await tx.run(
          `INSERT INTO vector_records (namespace, id, dimension, embedding, metadata_json, created_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(namespace, id) DO UPDATE SET
             dimension = excluded.dimension,
             embedding = excluded.embedding,
             metadata_json = excluded.metadata_json`,
          [namespace, r.id, dimension, vectorToBuffer(r.values), JSON.stringify(r.metadata), now]
        );
      }
    });
    log.debug({ namespace, count: records.length }, "Upserted vectors");
    return records.length;
  }

  async query(namespace: string, vector: number[], topK: number, filter?: MetadataFilter): Promise<QueryMatch[]> {
    await this.init();
    if (topK <= 0) return [];

    const rows = await this.db.queryAll<VectorRow>(
      "SELECT id, embedding, metadata_json FROM vector_records WHERE namespace = ?",
      [namespace]
    );

    const matches: QueryMatch[] = [];
    for (const row of rows) {
      const metadata = parseMetadata(row.metadata_json, namespace, row.id);
      if (!matchesFilter(metadata, filter)) continue;
      const values = bufferToVector(row.embedding);
      if (values.length !== vector.length) {
        throw new OracleError(
          "vector_store",
          `query dimension ${vector.length} does not match namespace "${namespace}" dimension ${values.length}`,
          { retryable: false }
        );
      }
      matches.push({ id: row.id, score: cosineSimilarity(vector, values), metadata });
    }

    matches.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return matches.slice(0, topK);
  }

  async deleteNamespace(namespace: string): Promise<void> {
    await this.init();
    const result = await this.db.run("DELETE FROM vector_records WHERE namespace = ?", [namespace]);
    log.info({ namespace, deleted: result.changes }, "Deleted namespace");
  }

  async stats(): Promise<StoreStats> {
    await this.init();
    const rows = await this.db.queryAll<StatsRow>(
      `SELECT namespace, COUNT(*) AS count, MAX(dimension) AS dimension
       FROM vector_records GROUP BY namespace ORDER BY namespace`
    );
    const namespaces: StoreStats["namespaces"] = {};
    let total = 0;
    for (const row of rows) {
      namespaces[row.namespace] = { vectorCount: row.count, dimension: row.dimension };
      total += row.count;
    }
    return { totalVectorCount: total, namespaces };
  }

  close(): Promise<void> {
    return this.db.close();
  }
}
