// Wide-format extraction and profile inspection (one row per subject)
import type { JsonValue, Profile, ProfileSet } from "../../api/types";
import { GROUP_PATH, WORK_TYPE_PATH, isJsonObject } from "../../api/types";
import type { ExtractOptions, FilterSpec } from "../config";
import { extractOptionsSchema, parseOptions } from "../config";
import { applySubjectFilters } from "../filter/filters";
import { listKeysAtPath, resolvePath } from "../path/navigator";
import { flattenObject, getLeafPaths, printTree } from "../path/structure";
import type { Cell, Row, TidyTable } from "../table/table";
import { createTable } from "../table/table";
import { SUBJECT_COLUMN } from "./extractNested";

function toCell(value: JsonValue | null): Cell {
    return isJsonObject(value) ? null : value;
}

/**
 * One row per subject, one column per named path:
 *
 *   extract(profiles, { paths: { age: "meta_data.age", emg_p50: "sensor_metrics.emg.…p50" } })
 *
 * Paths that are missing or land on a mapping give a missing cell.
 */
export function extract(profiles: ProfileSet, options: ExtractOptions): TidyTable {
    const { paths, filters } = parseOptions(extractOptionsSchema, options, "extract options");
    const rows: Row[] = [];
    for (const [subjectId, profile] of applySubjectFilters(profiles, filters)) {
        const row: Row = { [SUBJECT_COLUMN]: subjectId };
        for (const [column, path] of Object.entries(paths)) {
            row[column] = toCell(resolvePath(profile, path, null));
        }
        rows.push(row);
    }
    return createTable(rows, [SUBJECT_COLUMN, ...Object.keys(paths)]);
}

/**
 * One row per subject with the whole subtree at `basePath` flattened into
 * dotted columns ("left.EMG_apdf.active.p50"). Subjects without the subtree
 * are left out.
 */
export function extractFlat(
    profiles: ProfileSet,
    basePath: string,
    { filters, excludePatterns = [] }: { filters?: FilterSpec | null; excludePatterns?: readonly string[] } = {},
): TidyTable {
    const rows: Row[] = [];
    for (const [subjectId, profile] of applySubjectFilters(profiles, filters)) {
        const subtree = resolvePath(profile, basePath);
        if (!isJsonObject(subtree)) continue;
        rows.push({ [SUBJECT_COLUMN]: subjectId, ...flattenObject(subtree, "", excludePatterns) });
    }
    return createTable(rows, [SUBJECT_COLUMN]);
}

/** Every leaf path of a profile, optionally below `path`, up to `maxDepth` levels. */
export function getAvailablePaths(profile: Profile, path = "", maxDepth = 10): string[] {
    const target = resolvePath(profile, path, null);
    const prefix = path === "" ? "" : `${path}.`;
    return getLeafPaths(target, maxDepth).map((p) => prefix + p);
}

/** Indented outline of a profile (or of the subtree at `path`). */
export function inspectProfile(profile: Profile, path = "", maxDepth = 3): string {
    const target = resolvePath(profile, path, null);
    return printTree(target, { maxDepth });
}

/** One row per subject: group, work type, sensors present and number of leaf values. */
export function summarizeProfiles(profiles: ProfileSet): TidyTable {
    const rows: Row[] = [];
    for (const [subjectId, profile] of applySubjectFilters(profiles)) {
        rows.push({
            [SUBJECT_COLUMN]: subjectId,
            group: toCell(resolvePath(profile, GROUP_PATH, null)),
            work_type: toCell(resolvePath(profile, WORK_TYPE_PATH, null)),
            sensors: listKeysAtPath(profile, "sensor_metrics").join(","),
            n_values: getLeafPaths(profile, Number.POSITIVE_INFINITY).length,
        });
    }
    return createTable(rows, [SUBJECT_COLUMN, "group", "work_type", "sensors", "n_values"]);
}
