// src/actors/normalizer.ts
// Raw actor -> compact profile + category chunks (education / skills / companies / location).
//
// Pure and deterministic: the same record always yields the same actor id and the
// same chunks in the same order.

import type {
  RawActor,
  CategoryChunk,
  EducationChunk,
  SkillsChunk,
  CompaniesChunk,
  LocationChunk,
  NormalizedProfile,
  NormalizedActor,
} from "./types";

/* ============= Constants ============= */

const MAX_ROLES = 5;
const MAX_BIO_CHARS = 300;
const PLACEHOLDER_SCHOOLS = new Set(["", "*"]);

/* ============= Helpers ============= */

function clean(value: string | undefined): string {
  return (value ?? "").trim();
}

function dedupe(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    if (!seen.has(v)) {
      seen.add(v);
      out.push(v);
    }
  }
  return out;
}

export function slugifyName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_]/g, "");
}

/**
 * First platform identity's id; else a slug of the name; else "unknown".
 */
export function deriveActorId(actor: RawActor): string {
  const platformId = clean(actor.platform_identities?.[0]?.platform_id);
  if (platformId) return platformId;
  const slug = slugifyName(actor.profile.name);
  return slug || "unknown";
}

function validSchools(actor: RawActor) {
  return (actor.professional?.education ?? []).filter(
    (e) => !PLACEHOLDER_SCHOOLS.has(clean(e.school))
  );
}

function currentRole(actor: RawActor): string {
  const fmt = (title: string, company: string) =>
    title && company ? `${title} at ${company}` : title || company;

  const current = actor.professional?.current_position;
  if (current) {
    const role = fmt(clean(current.title), clean(current.company));
    if (role) return role;
  }
  const first = actor.professional?.work_experience?.[0];
  return first ? fmt(clean(first.title), clean(first.company_name)) : "";
}

/* ============= Chunk Extraction ============= */

export function extractEducationChunks(actor: RawActor, actorId: string): EducationChunk[] {
  const name = clean(actor.profile.name);
  return validSchools(actor).map((edu) => {
    const school = clean(edu.school);
    const degree = clean(edu.degree);
    const fieldOfStudy = clean(edu.field_of_study);
    let text = school;
    if (degree) text += `, ${degree}`;
    if (fieldOfStudy) text += ` in ${fieldOfStudy}`;
    return { actorId, name, chunkType: "education", text, school, degree, fieldOfStudy };
  });
}

export function extractSkillsChunk(actor: RawActor, actorId: string): SkillsChunk | null {
  const headline = clean(actor.profile.headline);
  const bio = clean(actor.profile.bio);
  const jobTitles = (actor.professional?.work_experience ?? [])
    .map((w) => clean(w.title))
    .filter(Boolean)
    .slice(0, MAX_ROLES);

  if (!headline && !bio && jobTitles.length === 0) return null;

  let text = `Skills and expertise: ${headline}. Roles: ${jobTitles.join(", ")}.`;
  if (bio) text += ` Background: ${bio.slice(0, MAX_BIO_CHARS)}`;

  return { actorId, name: clean(actor.profile.name), chunkType: "skills", text, jobTitles };
}

export function extractCompaniesChunk(actor: RawActor, actorId: string): CompaniesChunk | null {
  const experience = actor.professional?.work_experience ?? [];
  const companies = dedupe(experience.map((w) => clean(w.company_name)).filter(Boolean));
  if (companies.length === 0) return null;

  const roles = experience
    .filter((w) => clean(w.title))
    .map((w) => {
      const company = clean(w.company_name);
      return company ? `${clean(w.title)} at ${company}` : clean(w.title);
    })
    .slice(0, MAX_ROLES);

  let text = `Work experience at: ${companies.join(", ")}.`;
  if (roles.length > 0) text += ` Roles: ${roles.join(", ")}`;

  return { actorId, name: clean(actor.profile.name), chunkType: "companies", text, companies, roles };
}

export function extractLocationChunk(actor: RawActor, actorId: string): LocationChunk | null {
  const location = clean(actor.profile.location);
  if (!location) return null;
  return {
    actorId,
    name: clean(actor.profile.name),
    chunkType: "location",
    text: `Located in: ${location}`,
    location,
  };
}

/* ============= Profile ============= */

export function buildProfile(actor: RawActor, actorId: string): NormalizedProfile {
  return {
    actorId,
    name: clean(actor.profile.name) || "Unknown",
    headline: clean(actor.profile.headline),
    location: clean(actor.profile.location),
    bio: clean(actor.profile.bio),
    education: dedupe(validSchools(actor).map((e) => clean(e.school))),
    companies: dedupe(
      (actor.professional?.work_experience ?? []).map((w) => clean(w.company_name)).filter(Boolean)
    ),
    currentRole: currentRole(actor),
  };
}

/**
 * Normalize one actor. `actorId` defaults to the derived id; the corpus loader
 * passes a suffixed id when two records collide.
 */
export function normalizeActor(actor: RawActor, actorId: string = deriveActorId(actor)): NormalizedActor {
  const chunks: CategoryChunk[] = [...extractEducationChunks(actor, actorId)];
  const skills = extractSkillsChunk(actor, actorId);
  if (skills) chunks.push(skills);
  const companies = extractCompaniesChunk(actor, actorId);
  if (companies) chunks.push(companies);
  const location = extractLocationChunk(actor, actorId);
  if (location) chunks.push(location);

  return { profile: buildProfile(actor, actorId), chunks };
}
