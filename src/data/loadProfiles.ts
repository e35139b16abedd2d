import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { basename, join } from "node:path";
import type { Profile } from "../api/types";
import { isJsonObject } from "../api/types";

export const OH_PROFILE_SUFFIX = "_OH_profile.json";

const MAX_REPORTED_ERRORS = 5;

export interface LoadResult {
  profiles: Map<string, Profile>;
  /** One message per file that could not be read or parsed. */
  errors: string[];
}

export interface LoadOptions {
  /** Only load these subjects (all when omitted). */
  subjectIds?: readonly string[] | null;
  /** Log a summary and the first few errors. */
  verbose?: boolean;
}

/** Profile files in `directory`, sorted by name. Throws if the directory is missing. */
export function discoverProfiles(directory: string): string[] {
  if (!existsSync(directory)) {
    throw new Error(`OH profiles directory not found: ${directory}`);
  }
  if (!statSync(directory).isDirectory()) {
    throw new Error(`Path is not a directory: ${directory}`);
  }
  return readdirSync(directory)
    .filter((name) => name.endsWith(OH_PROFILE_SUFFIX))
    .sort()
    .map((name) => join(directory, name));
}

/** "S01_OH_profile.json" → "S01"; other names lose only their extension. */
export function extractSubjectId(filePath: string): string {
  const name = basename(filePath);
  if (name.endsWith(OH_PROFILE_SUFFIX)) return name.slice(0, -OH_PROFILE_SUFFIX.length);
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

/** Parse profile text; the top level must be a JSON object. */
export function parseProfile(text: string): Profile {
  const data: unknown = JSON.parse(text);
  if (!isJsonObject(data)) {
    throw new Error("Unrecognized OH profile format: expected a JSON object");
  }
  return data;
}

export function loadProfile(filePath: string): Profile {
  if (!existsSync(filePath)) {
    throw new Error(`OH profile not found: ${filePath}`);
  }
  return parseProfile(readFileSync(filePath, "utf-8"));
}

/**
 * Load every `<subject_id>_OH_profile.json` in `directory`. Files that fail to
 * load are reported in `errors` and skipped; they never abort the load.
 */
export function loadProfiles(directory: string, { subjectIds = null, verbose = true }: LoadOptions = {}): LoadResult {
  const profiles = new Map<string, Profile>();
  const errors: string[] = [];
  const paths = discoverProfiles(directory);

  if (paths.length === 0) {
    if (verbose) console.log(`[oh-tidy] No OH profiles found in ${directory}`);
    return { profiles, errors };
  }

  for (const path of paths) {
    const subjectId = extractSubjectId(path);
    if (subjectIds && !subjectIds.includes(subjectId)) continue;
    try {
      profiles.set(subjectId, loadProfile(path));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const reason = err instanceof SyntaxError ? `JSON decode error - ${message}` : message;
      errors.push(`${subjectId}: ${reason}`);
    }
  }

  if (verbose) {
    console.log(`[oh-tidy] Loaded ${profiles.size} OH profiles from ${directory}`);
    if (errors.length > 0) {
      console.warn(`[oh-tidy] ${errors.length} profiles failed to load:`);
      for (const error of errors.slice(0, MAX_REPORTED_ERRORS)) console.warn(`  - ${error}`);
      if (errors.length > MAX_REPORTED_ERRORS) {
        console.warn(`  ... and ${errors.length - MAX_REPORTED_ERRORS} more`);
      }
    }
  }

  return { profiles, errors };
}

/** Subject ids in sorted order. */
export function listSubjects(profiles: ReadonlyMap<string, Profile>): string[] {
  return [...profiles.keys()].sort();
}

export function getProfile(profiles: ReadonlyMap<string, Profile>, subjectId: string): Profile | undefined {
  return profiles.get(subjectId);
}
