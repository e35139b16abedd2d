import { parseDate } from "../dates";
import { ConfigurationError } from "../errors";

/**
 * Keep keys that are not dates, plus date keys inside the inclusive range.
 * Non-date siblings such as "EMG_weekly_metrics" always survive.
 */
export function filterDateKeys(keys: readonly string[], dateRange?: readonly [string, string] | null): string[] {
    if (!dateRange) return [...keys];

    const [startText, endText] = dateRange;
    const start = parseDate(startText);
    const end = parseDate(endText);
    if (!start || !end) {
        throw new ConfigurationError(`Invalid date range [${startText}, ${endText}]`);
    }

    return keys.filter((key) => {
        const date = parseDate(key);
        return date === null || (date >= start && date <= end);
    });
}
