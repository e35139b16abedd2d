// Structure discovery helpers: flattening, path listing, shape summaries
import type { JsonArray, JsonObject, JsonScalar, JsonValue } from "../../api/types";
import { isJsonObject, setOwn } from "../../api/types";
import { isDateKey, isTimeKey } from "../dates";
import { resolvePath } from "./navigator";
import { keyPredicate, matchesPattern } from "./pattern";

export type FlatValue = JsonScalar | JsonArray;

export type LeafType = "string" | "number" | "boolean" | "null" | "list";

export type StructureNode =
    | { kind: "mapping"; children: Record<string, StructureNode> }
    | { kind: "truncated"; keys: string[]; keyCount: number }
    | { kind: "leaf"; type: LeafType; preview?: string };

export type LevelType = "date" | "time" | "side" | "generic" | "empty";

const SIDE_LABELS = new Set(["left", "right", "Left", "Right", "LEFT", "RIGHT", "L", "R"]);

export function leafType(value: JsonScalar | JsonArray): LeafType {
    if (value === null) return "null";
    if (Array.isArray(value)) return "list";
    switch (typeof value) {
        case "string":
            return "string";
        case "number":
            return "number";
        default:
            return "boolean";
    }
}

// ─── Flattening ────────────────────────────────────────────────────

/**
 * Flatten nested mappings into dotted keys: { a: { b: 1 } } → { "a.b": 1 }.
 * Keys matching `exclude` are dropped together with everything beneath them.
 * Empty mappings contribute nothing.
 */
export function flattenObject(
    data: JsonObject,
    prefix = "",
    exclude: readonly string[] = [],
): Record<string, FlatValue> {
    const admit = keyPredicate({ exclude });
    const out: Record<string, FlatValue> = {};

    const visit = (node: JsonObject, path: string) => {
        for (const [key, value] of Object.entries(node)) {
            if (!admit(key)) continue;
            const name = path === "" ? key : `${path}.${key}`;
            if (isJsonObject(value)) {
                visit(value, name);
            } else {
                setOwn(out, name, value);
            }
        }
    };

    visit(data, prefix);
    return out;
}

/** Inverse of flattenObject. A scalar in the way of a deeper key is replaced by a mapping. */
export function unflattenObject(flat: Readonly<Record<string, JsonValue>>): JsonObject {
    const root: JsonObject = {};
    for (const [dotted, value] of Object.entries(flat)) {
        const parts = dotted.split(".");
        const last = parts.pop();
        if (last === undefined) continue;
        let node = root;
        for (const part of parts) {
            const existing = node[part];
            if (isJsonObject(existing)) {
                node = existing;
            } else {
                const created: JsonObject = {};
                node[part] = created;
                node = created;
            }
        }
        node[last] = value;
    }
    return root;
}

// ─── Path listing ──────────────────────────────────────────────────

/** Every path (intermediate and leaf) down to `maxDepth` levels, depth-first. */
export function getNestedKeys(data: JsonValue, maxDepth = 10, prefix = ""): string[] {
    const out: string[] = [];
    const visit = (node: JsonValue, path: string, depth: number) => {
        if (!isJsonObject(node) || depth >= maxDepth) return;
        for (const [key, value] of Object.entries(node)) {
            const name = path === "" ? key : `${path}.${key}`;
            out.push(name);
            visit(value, name, depth + 1);
        }
    };
    visit(data, prefix, 0);
    return out;
}

/** Leaf paths only: the paths whose value is not a mapping. */
export function getLeafPaths(data: JsonValue, maxDepth = 10): string[] {
    return getNestedKeys(data, maxDepth).filter((path) => !isJsonObject(resolvePath(data, path)));
}

/** Whole-path glob match, e.g. "sensor_metrics.*.EMG_*". `*` may span dots. */
export function findPathsMatching(data: JsonValue, pattern: string, maxDepth = 10): string[] {
    return getNestedKeys(data, maxDepth).filter((path) => matchesPattern(path, [pattern]));
}

// ─── Shape summaries ───────────────────────────────────────────────

export function getStructureSummary(data: JsonValue, path = "", maxDepth = 4): StructureNode {
    const target = path === "" ? data : resolvePath(data, path, null);
    return summarize(target, 0, maxDepth);
}

function summarize(node: JsonValue, depth: number, maxDepth: number): StructureNode {
    if (!isJsonObject(node)) {
        return { kind: "leaf", type: leafType(node), preview: JSON.stringify(node).slice(0, 50) };
    }
    const keys = Object.keys(node);
    if (depth >= maxDepth) {
        return { kind: "truncated", keys: keys.slice(0, 5), keyCount: keys.length };
    }
    const children: Record<string, StructureNode> = {};
    for (const [key, value] of Object.entries(node)) {
        children[key] = isJsonObject(value) ? summarize(value, depth + 1, maxDepth) : { kind: "leaf", type: leafType(value) };
    }
    return { kind: "mapping", children };
}

/** Guess what a level's keys denote, for naming wildcard levels. */
export function inferLevelType(keys: readonly string[]): LevelType {
    if (keys.length === 0) return "empty";
    if (keys.every(isDateKey)) return "date";
    if (keys.every(isTimeKey)) return "time";
    if (keys.every((k) => SIDE_LABELS.has(k))) return "side";
    return "generic";
}

export interface TreeOptions {
    maxDepth?: number;
    maxKeys?: number;
}

/** Indented text outline of a profile, for terminals. */
export function printTree(data: JsonValue, { maxDepth = 3, maxKeys = 10 }: TreeOptions = {}): string {
    const lines: string[] = [];
    const visit = (node: JsonObject, indent: string, depth: number) => {
        const entries = Object.entries(node);
        for (const [key, value] of entries.slice(0, maxKeys)) {
            if (isJsonObject(value)) {
                const count = Object.keys(value).length;
                if (depth + 1 >= maxDepth) {
                    lines.push(`${indent}${key}/ (${count} keys)`);
                } else {
                    lines.push(`${indent}${key}/`);
                    visit(value, indent + "  ", depth + 1);
                }
            } else {
                lines.push(`${indent}${key}: ${leafType(value)}`);
            }
        }
        if (entries.length > maxKeys) {
            lines.push(`${indent}… (+${entries.length - maxKeys} more)`);
        }
    };

    if (isJsonObject(data)) {
        visit(data, "", 0);
    } else {
        lines.push(leafType(data));
    }
    return lines.join("\n");
}
