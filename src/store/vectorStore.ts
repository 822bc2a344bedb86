// src/store/vectorStore.ts
// Namespaced nearest-neighbour store contract. One namespace per category;
// the search engine fans out across namespaces itself.

import { CHUNK_TYPES, type CategoryChunk, type ChunkType } from "../actors/types";

/* ---------- Types ---------- */

export type MetadataValue = string | number | boolean | string[];
export type Metadata = Record<string, MetadataValue>;
/** Equality filter on scalar metadata fields */
export type MetadataFilter = Record<string, string | number | boolean>;

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: Metadata;
}

export interface QueryMatch {
  id: string;
  score: number;
  metadata: Metadata;
}

export interface NamespaceStats {
  vectorCount: number;
  dimension: number | null;
}

export interface StoreStats {
  totalVectorCount: number;
  namespaces: Record<string, NamespaceStats>;
}

export interface VectorStore {
  /** Insert or replace records; resolves to the number written. */
  upsert(namespace: string, records: VectorRecord[]): Promise<number>;
  /** Top-K by descending similarity. */
  query(namespace: string, vector: number[], topK: number, filter?: MetadataFilter): Promise<QueryMatch[]>;
  deleteNamespace(namespace: string): Promise<void>;
  stats(): Promise<StoreStats>;
}

/* ---------- Namespaces ---------- */

export type Namespace = ChunkType;
export const NAMESPACES: readonly Namespace[] = CHUNK_TYPES;

/* ---------- Chunk <-> Metadata ---------- */

/** Chunk fields minus the embedded text. */
export function chunkToMetadata(chunk: CategoryChunk): Metadata {
  const base = { actorId: chunk.actorId, name: chunk.name, chunkType: chunk.chunkType };
  switch (chunk.chunkType) {
    case "education":
      return { ...base, school: chunk.school, degree: chunk.degree, fieldOfStudy: chunk.fieldOfStudy };
    case "skills":
      return { ...base, jobTitles: chunk.jobTitles };
    case "companies":
      return { ...base, companies: chunk.companies, roles: chunk.roles };
    case "location":
      return { ...base, location: chunk.location };
  }
}

export function metaString(metadata: Metadata, key: string): string {
  const v = metadata[key];
  return typeof v === "string" ? v : "";
}

export function metaStringList(metadata: Metadata, key: string): string[] {
  const v = metadata[key];
  if (Array.isArray(v)) return v;
  return typeof v === "string" && v ? [v] : [];
}

/** Narrow parsed JSON into Metadata, dropping values of unsupported types. */
export function toMetadata(value: unknown): Metadata {
  const out: Metadata = {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) return out;
  for (const [key, v] of Object.entries(value)) {
    if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") {
      out[key] = v;
    } else if (Array.isArray(v)) {
      out[key] = v.filter((x): x is string => typeof x === "string");
    }
  }
  return out;
}
