// Long-format extraction: one row per subject × wildcard branch
import type { JsonValue, Profile, ProfileSet } from "../../api/types";
import { isJsonObject, setOwn } from "../../api/types";
import type { ExtractNestedOptions, ResolvedExtractNestedOptions } from "../config";
import { extractNestedOptionsSchema, parseOptions } from "../config";
import { applySubjectFilters } from "../filter/filters";
import type { MatchContext } from "../path/expand";
import { expandWildcards, WILDCARD } from "../path/expand";
import { joinPath, resolvePath } from "../path/navigator";
import { keyPredicate } from "../path/pattern";
import { flattenObject } from "../path/structure";
import type { Cell, Row, TidyTable } from "../table/table";
import { createTable } from "../table/table";

export const SUBJECT_COLUMN = "subject_id";

/**
 * Columns produced by one value path at one branch node.
 *
 * The value path is expanded relative to the node; its own wildcards become
 * parts of column names, not levels. Mapping values are flattened into
 * dotted names under the concrete path that reached them. A match whose
 * concrete path has an excluded segment, literal or not, gives no column.
 */
export function collectValueColumns(
    node: JsonValue,
    valuePath: string,
    opts: Pick<ResolvedExtractNestedOptions, "excludePatterns" | "includePatterns">,
): Record<string, Cell> {
    const out: Record<string, Cell> = {};
    const matches = expandWildcards(node, valuePath, [], {
        exclude: opts.excludePatterns,
        include: opts.includePatterns,
    });

    const admit = keyPredicate({ exclude: opts.excludePatterns });

    for (const { value, keys } of matches) {
        if (!keys.every(admit)) continue;
        const prefix = keys.join(".");
        if (isJsonObject(value)) {
            for (const [column, cell] of Object.entries(flattenObject(value, prefix, opts.excludePatterns))) {
                setOwn(out, column, cell);
            }
        } else if (prefix !== "") {
            setOwn(out, prefix, value);
        }
    }
    return out;
}

function branchRow(
    subjectId: string,
    metadata: Record<string, Cell>,
    context: MatchContext,
    node: JsonValue,
    opts: ResolvedExtractNestedOptions,
): Row | null {
    // identifier columns keep their cells; a value with the same name is dropped
    const reserved = new Set([SUBJECT_COLUMN, ...Object.keys(metadata), ...Object.keys(context)]);
    const values: Record<string, Cell> = {};
    for (const valuePath of opts.valuePaths) {
        for (const [column, cell] of Object.entries(collectValueColumns(node, valuePath, opts))) {
            if (!reserved.has(column)) setOwn(values, column, cell);
        }
    }
    if (Object.keys(values).length === 0) return null;
    return { ...values, [SUBJECT_COLUMN]: subjectId, ...metadata, ...context };
}

function metadataCells(profile: Profile, metadata: Record<string, string>): Record<string, Cell> {
    const out: Record<string, Cell> = {};
    for (const [column, path] of Object.entries(metadata)) {
        const value = resolvePath(profile, path, null);
        out[column] = isJsonObject(value) ? null : value;
    }
    return out;
}

/** Rows for one subject, in depth-first branch order. */
export function extractSubjectRows(subjectId: string, profile: Profile, opts: ResolvedExtractNestedOptions): Row[] {
    const branchPath = joinPath(opts.basePath, ...opts.levelNames.map(() => WILDCARD));
    const metadata = metadataCells(profile, opts.metadata);
    const rows: Row[] = [];

    const branches = expandWildcards(profile, branchPath, opts.levelNames, {
        exclude: opts.excludePatterns,
        dateRange: opts.filters?.dateRange,
    });
    for (const { context, value } of branches) {
        const row = branchRow(subjectId, metadata, context, value, opts);
        if (row) rows.push(row);
    }
    return rows;
}

/**
 * Extract nested sensor data into a long table.
 *
 * The branch path is `basePath` followed by one `*` per level name, so
 * `{ basePath: "sensor_metrics.heart_rate", levelNames: ["date", "session"] }`
 * walks every date and session under heart_rate. At each branch, every value
 * path is resolved and its leaves become columns:
 *
 *   valuePaths: ["HR_BPM_stats.*"]  →  HR_BPM_stats.mean, HR_BPM_stats.max, …
 *
 * Exclude patterns prune keys both at level wildcards and inside values.
 * Branches that yield no value columns produce no row. The result always
 * starts with subject_id, the metadata columns and the level columns, even
 * when it has no rows.
 */
export function extractNested(profiles: ProfileSet, options: ExtractNestedOptions): TidyTable {
    const opts = parseOptions(extractNestedOptionsSchema, options, "extractNested options");
    const selected = applySubjectFilters(profiles, opts.filters);

    const rows: Row[] = [];
    for (const [subjectId, profile] of selected) {
        rows.push(...extractSubjectRows(subjectId, profile, opts));
    }

    const leading = [SUBJECT_COLUMN, ...Object.keys(opts.metadata), ...opts.levelNames];
    return createTable(rows, leading);
}
