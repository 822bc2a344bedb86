// src/store/profileCache.ts
// actor_id -> normalized profile, persisted as one JSON file after ingestion.

import fs from "node:fs/promises";
import path from "node:path";
import { isRecord, normalizeStringArray } from "../ai/json";
import { createLogger } from "../observability";
import { errorMessage } from "../errors";
import { loadCorpus } from "../actors/loader";
import { normalizeActor } from "../actors/normalizer";
import type { NormalizedProfile } from "../actors/types";

const log = createLogger("store/profileCache");

export type ProfileMap = Map<string, NormalizedProfile>;

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toProfile(actorId: string, value: unknown): NormalizedProfile | null {
  if (!isRecord(value)) return null;
  return {
    actorId,
    name: str(value.name) || "Unknown",
    headline: str(value.headline),
    location: str(value.location),
    bio: str(value.bio),
    education: normalizeStringArray(value.education),
    companies: normalizeStringArray(value.companies),
    currentRole: str(value.currentRole),
  };
}

export async function saveProfileCache(filePath: string, profiles: Iterable<NormalizedProfile>): Promise<void> {
  const out: Record<string, NormalizedProfile> = {};
  for (const p of profiles) out[p.actorId] = p;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(out, null, 2), "utf8");
  log.info({ filePath, profiles: Object.keys(out).length }, "Profile cache written");
}

/** Null when the file is missing or not a JSON object of profiles. */
export async function readProfileCache(filePath: string): Promise<ProfileMap | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    log.warn({ filePath, err: errorMessage(err) }, "Profile cache unreadable");
    return null;
  }
  try {
    const data: unknown = JSON.parse(raw);
    if (!isRecord(data)) throw new Error("expected an object keyed by actor id");
    const map: ProfileMap = new Map();
    for (const [actorId, value] of Object.entries(data)) {
      const profile = toProfile(actorId, value);
      if (profile) map.set(actorId, profile);
    }
    return map;
  } catch (err) {
    log.warn({ filePath, err: errorMessage(err) }, "Profile cache corrupt");
    return null;
  }
}

/**
 * Read the cache; when absent or corrupt, rebuild it from the raw corpus and
 * write it back.
 */
export async function loadProfiles(cachePath: string, actorsPath: string): Promise<ProfileMap> {
  const cached = await readProfileCache(cachePath);
  if (cached) return cached;

  log.warn({ cachePath, actorsPath }, "Regenerating profile cache from corpus");
  const corpus = await loadCorpus(actorsPath);
  const map: ProfileMap = new Map();
  for (const { actorId, actor } of corpus) {
    map.set(actorId, normalizeActor(actor, actorId).profile);
  }
  await saveProfileCache(cachePath, map.values());
  return map;
}
