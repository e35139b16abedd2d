// Glob-style key matching for include/exclude lists.
//
// Only `*` is special: it matches any run of characters, including none.
// Every other character is literal (so `?` and `[abc]` match themselves) and
// matching is case-sensitive over the whole key:
//   "EMG_weekly_metrics"  exact
//   "EMG_*"               prefix
//   "*_metrics"           suffix
//   "*daily*"             contains
import { ConfigurationError } from "../errors";

export interface KeySelection {
    include?: readonly string[] | null;
    exclude?: readonly string[] | null;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
}

export function globToRegExp(pattern: string): RegExp {
    if (typeof pattern !== "string") {
        throw new ConfigurationError(`Pattern must be a string, got ${typeof pattern}`);
    }
    const body = pattern.split("*").map(escapeRegExp).join(".*");
    return new RegExp(`^${body}$`, "s");
}

function compile(patterns: readonly string[]): RegExp[] {
    return patterns.map(globToRegExp);
}

/** True iff `key` matches at least one of `patterns`. */
export function matchesPattern(key: string, patterns: readonly string[]): boolean {
    return compile(patterns).some((re) => re.test(key));
}

/** Keys matching none of the patterns, in their original order. */
export function excludeKeys(keys: readonly string[], excludePatterns: readonly string[]): string[] {
    const compiled = compile(excludePatterns);
    return keys.filter((k) => !compiled.some((re) => re.test(k)));
}

/** Keys matching at least one pattern, in their original order. */
export function includeKeys(keys: readonly string[], includePatterns: readonly string[]): string[] {
    const compiled = compile(includePatterns);
    return keys.filter((k) => compiled.some((re) => re.test(k)));
}

/**
 * Build a reusable predicate for a selection. An absent include list admits
 * every key; an exclude match always rejects, whatever the include list says.
 */
export function keyPredicate(selection: KeySelection): (key: string) => boolean {
    const include = selection.include ? compile(selection.include) : null;
    const exclude = compile(selection.exclude ?? []);
    return (key) => {
        if (exclude.some((re) => re.test(key))) return false;
        return include === null || include.some((re) => re.test(key));
    };
}

export function selectKeys(keys: readonly string[], selection: KeySelection): string[] {
    return keys.filter(keyPredicate(selection));
}
