// ─── Parsed JSON ────────────────────────────────────────────────────

export type JsonScalar = string | number | boolean | null;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonValue = JsonScalar | JsonArray | JsonObject;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Assign as an own data property, so a "__proto__" key stays an ordinary key. */
export function setOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

// ─── OH profiles ────────────────────────────────────────────────────

/**
 * One subject's occupational-health profile as written by the profile
 * generator. Only `meta_data` has a fixed shape; everything under
 * `sensor_metrics` and `daily_questionnaires` is keyed by sensor, then by
 * date ("DD-MM-YYYY") and session ("HH-MM-SS"), at varying depths.
 */
export type Profile = JsonObject;

/** Profiles keyed by subject id, in the order the caller supplied them. */
export type ProfileSet = ReadonlyMap<string, Profile> | Readonly<Record<string, Profile>>;

export const GROUP_PATH = "meta_data.group";
export const WORK_TYPE_PATH = "meta_data.work_type";

function isProfileMap(profiles: ProfileSet): profiles is ReadonlyMap<string, Profile> {
  return profiles instanceof Map;
}

export function profileEntries(profiles: ProfileSet): [string, Profile][] {
  if (isProfileMap(profiles)) return [...profiles.entries()];
  return Object.entries(profiles);
}
