// src/actors/loader.ts
// Read and validate the raw actor corpus (a JSON array).

import fs from "node:fs/promises";
import { createLogger } from "../observability";
import { isRecord } from "../ai/json";
import { deriveActorId } from "./normalizer";
import type { RawActor, RawEducation, RawWorkExperience } from "./types";

const log = createLogger("actors/loader");

export interface CorpusEntry {
  actorId: string;
  actor: RawActor;
}

/* ============= Validation ============= */

function optString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/** Narrow one JSON record to a RawActor; null when it has no profile name. */
export function parseRawActor(value: unknown): RawActor | null {
  if (!isRecord(value) || !isRecord(value.profile)) return null;
  const name = optString(value.profile.name);
  if (!name || !name.trim()) return null;

  const professional = isRecord(value.professional) ? value.professional : {};
  const education: RawEducation[] = records(professional.education).map((e) => ({
    school: optString(e.school) ?? "",
    degree: optString(e.degree),
    field_of_study: optString(e.field_of_study),
  }));
  const workExperience: RawWorkExperience[] = records(professional.work_experience).map((w) => ({
    title: optString(w.title),
    company_name: optString(w.company_name),
    description: optString(w.description),
  }));
  const current = isRecord(professional.current_position) ? professional.current_position : null;

  return {
    profile: {
      name,
      headline: optString(value.profile.headline),
      bio: optString(value.profile.bio),
      location: optString(value.profile.location),
    },
    professional: {
      education,
      work_experience: workExperience,
      current_position: current
        ? { title: optString(current.title), company: optString(current.company) }
        : undefined,
    },
    platform_identities: records(value.platform_identities).map((p) => ({
      platform_id: optString(p.platform_id),
    })),
  };
}

/* ============= Identity ============= */

/**
 * Assign unique ids in corpus order. A repeated id gets `_2`, `_3`, ... appended,
 * skipping suffixes already taken.
 */
export function assignActorIds(actors: RawActor[]): CorpusEntry[] {
  const taken = new Set<string>();
  const out: CorpusEntry[] = [];
  for (const actor of actors) {
    const base = deriveActorId(actor);
    let actorId = base;
    for (let n = 2; taken.has(actorId); n++) actorId = `${base}_${n}`;
    if (actorId !== base) log.warn({ base, actorId }, "Duplicate actor id renamed");
    taken.add(actorId);
    out.push({ actorId, actor });
  }
  return out;
}

/* ============= Loading ============= */

export function parseCorpus(data: unknown): CorpusEntry[] {
  if (!Array.isArray(data)) {
    throw new Error("actor corpus must be a JSON array");
  }
  const actors: RawActor[] = [];
  data.forEach((item, index) => {
    const actor = parseRawActor(item);
    if (actor) actors.push(actor);
    else log.warn({ index }, "Skipping actor record without a profile name");
  });
  return assignActorIds(actors);
}

export async function loadCorpus(filePath: string): Promise<CorpusEntry[]> {
  const raw = await fs.readFile(filePath, "utf8");
  const entries = parseCorpus(JSON.parse(raw));
  log.info({ filePath, actors: entries.length }, "Corpus loaded");
  return entries;
}
