// Dot-path navigation over parsed profiles
import type { JsonValue } from "../../api/types";
import { isJsonObject } from "../../api/types";

const MISSING: unique symbol = Symbol("missing");

export function splitPath(path: string): string[] {
    return path === "" ? [] : path.split(".");
}

export function joinPath(...parts: string[]): string {
    return parts.filter((p) => p !== "").join(".");
}

/**
 * Value at `path` ("sensor_metrics.emg.EMG_weekly_metrics"), or `fallback` as
 * soon as a segment is missing or a non-mapping is reached with segments left.
 * The empty path resolves to `data` itself.
 */
export function resolvePath(data: JsonValue, path: string): JsonValue | undefined;
export function resolvePath<T>(data: JsonValue, path: string, fallback: T): JsonValue | T;
export function resolvePath<T>(data: JsonValue, path: string, fallback?: T): JsonValue | T | undefined {
    let current: JsonValue = data;
    for (const key of splitPath(path)) {
        if (!isJsonObject(current) || !Object.hasOwn(current, key)) return fallback;
        const next: JsonValue | undefined = current[key];
        if (next === undefined) return fallback;
        current = next;
    }
    return current;
}

/** True when `path` exists, even if the stored value is null. */
export function pathExists(data: JsonValue, path: string): boolean {
    return resolvePath(data, path, MISSING) !== MISSING;
}

/** Keys of the mapping at `path`, in stored order; [] when it is not a mapping. */
export function listKeysAtPath(data: JsonValue, path: string): string[] {
    const target = resolvePath(data, path);
    return isJsonObject(target) ? Object.keys(target) : [];
}
