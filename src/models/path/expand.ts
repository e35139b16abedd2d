// Wildcard expansion: walk every branch a "*"-bearing path can take
import type { JsonValue } from "../../api/types";
import { isJsonObject } from "../../api/types";
import { ConfigurationError } from "../errors";
import { filterDateKeys } from "../filter/dateKeys";
import { splitPath } from "./navigator";
import { keyPredicate } from "./pattern";

export const WILDCARD = "*";

/** Level name → concrete key chosen at that wildcard. */
export type MatchContext = Readonly<Record<string, string>>;

export interface WildcardMatch {
    context: MatchContext;
    value: JsonValue;
    /** Concrete keys walked from the starting node, wildcards substituted. */
    keys: readonly string[];
}

export interface ExpandOptions {
    /** Keys at wildcard levels matching any of these are not descended into. */
    exclude?: readonly string[] | null;
    /** When set, keys at wildcard levels must match one of these (exclude still wins). */
    include?: readonly string[] | null;
    /** Date-like keys at wildcard levels outside this inclusive range are skipped. */
    dateRange?: readonly [string, string] | null;
}

export function levelNameFor(levelNames: readonly string[], wildcardIndex: number): string {
    return levelNames[wildcardIndex] ?? `level_${wildcardIndex}`;
}

export function countWildcards(path: string): number {
    return splitPath(path).filter((segment) => segment === WILDCARD).length;
}

export function hasRecursiveWildcard(path: string): boolean {
    return splitPath(path).some((segment) => segment.includes("**"));
}

export function assertSupportedPath(path: string): void {
    if (hasRecursiveWildcard(path)) {
        throw new ConfigurationError(`Recursive wildcard "**" is not supported (path "${path}")`);
    }
}

/**
 * Lazily yield one match per branch of `path` that exists in `data`.
 *
 * Children are visited in the order the mapping stores them, depth-first,
 * so a fixed profile always produces the same sequence. Each branch gets its
 * own context object. A literal segment that is absent, or a non-mapping met
 * before the last segment, ends that branch without output.
 */
export function* expandWildcards(
    data: JsonValue,
    path: string,
    levelNames: readonly string[] = [],
    options: ExpandOptions = {},
): Generator<WildcardMatch, void, undefined> {
    const segments = splitPath(path);
    assertSupportedPath(path);
    const admit = keyPredicate({ include: options.include, exclude: options.exclude });
    const dateRange = options.dateRange ?? null;

    function* walk(
        current: JsonValue,
        depth: number,
        context: MatchContext,
        keys: readonly string[],
        wildcardIndex: number,
    ): Generator<WildcardMatch, void, undefined> {
        if (depth === segments.length) {
            yield { context, value: current, keys };
            return;
        }
        if (!isJsonObject(current)) return;

        const segment = segments[depth]!;
        if (segment !== WILDCARD) {
            const child = current[segment];
            if (child === undefined || !Object.hasOwn(current, segment)) return;
            yield* walk(child, depth + 1, context, [...keys, segment], wildcardIndex);
            return;
        }

        const levelName = levelNameFor(levelNames, wildcardIndex);
        let candidates = Object.keys(current).filter(admit);
        if (dateRange) candidates = filterDateKeys(candidates, dateRange);
        for (const key of candidates) {
            const child = current[key];
            if (child === undefined) continue;
            yield* walk(child, depth + 1, { ...context, [levelName]: key }, [...keys, key], wildcardIndex + 1);
        }
    }

    yield* walk(data, 0, {}, [], 0);
}
