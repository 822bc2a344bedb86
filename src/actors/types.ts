// src/actors/types.ts
// Raw corpus records, normalized profiles and category chunks.

/* ============= Raw Corpus ============= */

export interface RawEducation {
  school: string;
  degree?: string;
  field_of_study?: string;
}

export interface RawWorkExperience {
  title?: string;
  company_name?: string;
  description?: string;
}

export interface RawActor {
  profile: {
    name: string;
    headline?: string;
    bio?: string;
    location?: string;
  };
  professional?: {
    education?: RawEducation[];
    work_experience?: RawWorkExperience[];
    current_position?: { title?: string; company?: string };
  };
  platform_identities?: Array<{ platform_id?: string }>;
}

/* ============= Categories ============= */

export const CHUNK_TYPES = ["education", "skills", "companies", "location"] as const;
export type ChunkType = (typeof CHUNK_TYPES)[number];

/* ============= Chunks ============= */

interface ChunkBase {
  actorId: string;
  name: string;
  /** The string that gets embedded */
  text: string;
}

export interface EducationChunk extends ChunkBase {
  chunkType: "education";
  school: string;
  degree: string;
  fieldOfStudy: string;
}

export interface SkillsChunk extends ChunkBase {
  chunkType: "skills";
  jobTitles: string[];
}

export interface CompaniesChunk extends ChunkBase {
  chunkType: "companies";
  companies: string[];
  roles: string[];
}

export interface LocationChunk extends ChunkBase {
  chunkType: "location";
  location: string;
}

export type CategoryChunk = EducationChunk | SkillsChunk | CompaniesChunk | LocationChunk;

/* ============= Profiles ============= */

export interface NormalizedProfile {
  actorId: string;
  name: string;
  headline: string;
  location: string;
  bio: string;
  /** Deduplicated school names, corpus order */
  education: string[];
  /** Deduplicated company names, corpus order */
  companies: string[];
  currentRole: string;
}

export interface NormalizedActor {
  profile: NormalizedProfile;
  chunks: CategoryChunk[];
}
