// Subject-level filtering applied before extraction
import type { Profile, ProfileSet } from "../../api/types";
import { GROUP_PATH, profileEntries } from "../../api/types";
import type { FilterSpec } from "../config";
import { filterSpecSchema, parseOptions } from "../config";
import { pathExists, resolvePath } from "../path/navigator";

export { filterDateKeys } from "./dateKeys";

/** Validate a filter record once so later calls can trust it. */
export function createFilters(spec: FilterSpec = {}): Readonly<FilterSpec> {
    return Object.freeze(parseOptions(filterSpecSchema, spec, "filters"));
}

function passes(subjectId: string, profile: Profile, filters: FilterSpec): boolean {
    if (filters.subjectIds != null && !filters.subjectIds.includes(subjectId)) return false;
    if (filters.excludeSubjects != null && filters.excludeSubjects.includes(subjectId)) return false;
    if (filters.groups != null) {
        const group = resolvePath(profile, GROUP_PATH);
        if (typeof group !== "string" || !filters.groups.includes(group)) return false;
    }
    if (filters.requireKeys != null && !filters.requireKeys.every((key) => pathExists(profile, key))) {
        return false;
    }
    if (filters.customFilter != null && !filters.customFilter(subjectId, profile)) return false;
    return true;
}

/**
 * Profiles passing every configured criterion, in the order they were given.
 * Checks run allow-list, deny-list, group, required paths, custom predicate,
 * and stop at the first failure. No filters keeps everything.
 */
export function applySubjectFilters(profiles: ProfileSet, filters?: FilterSpec | null): Map<string, Profile> {
    const entries = profileEntries(profiles);
    if (filters == null) return new Map(entries);

    const checked = parseOptions(filterSpecSchema, filters, "filters");
    return new Map(entries.filter(([subjectId, profile]) => passes(subjectId, profile, checked)));
}
