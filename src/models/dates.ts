// Calendar date and time-of-day parsing for profile keys.
// Profiles use "DD-MM-YYYY" for sensor dates and "HH-MM-SS" for sessions;
// questionnaires use ISO dates.

const DATE_FORMATS: { pattern: RegExp; order: "dmy" | "ymd" }[] = [
    { pattern: /^(\d{2})-(\d{2})-(\d{4})$/, order: "dmy" },
    { pattern: /^(\d{4})-(\d{2})-(\d{2})$/, order: "ymd" },
    { pattern: /^(\d{2})\/(\d{2})\/(\d{4})$/, order: "dmy" },
    { pattern: /^(\d{4})\/(\d{2})\/(\d{2})$/, order: "ymd" },
];

const TIME_PATTERN = /^(\d{1,2})[-:](\d{2})[-:](\d{2})$/;

/**
 * Parse a date key into a UTC-midnight Date. Returns null for anything that is
 * not one of the supported layouts or is not a real calendar day ("31-02-2025").
 */
export function parseDate(text: unknown): Date | null {
    if (typeof text !== "string") return null;
    const trimmed = text.trim();

    for (const { pattern, order } of DATE_FORMATS) {
        const m = pattern.exec(trimmed);
        if (!m) continue;
        const [a, b, c] = [Number(m[1]), Number(m[2]), Number(m[3])];
        const [year, month, day] = order === "dmy" ? [c, b, a] : [a, b, c];
        return calendarDate(year, month, day);
    }
    return null;
}

function calendarDate(year: number, month: number, day: number): Date | null {
    if (month < 1 || month > 12 || day < 1) return null;
    const date = new Date(Date.UTC(year, month - 1, day));
    // Date.UTC rolls overflow into the next month; reject instead
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/** Seconds since midnight for "HH-MM-SS" / "HH:MM:SS", or null. */
export function parseTimeOfDay(text: unknown): number | null {
    if (typeof text !== "string") return null;
    const m = TIME_PATTERN.exec(text.trim());
    if (!m) return null;
    const hours = Number(m[1]);
    const minutes = Number(m[2]);
    const seconds = Number(m[3]);
    if (hours > 23 || minutes > 59 || seconds > 59) return null;
    return hours * 3600 + minutes * 60 + seconds;
}

/** Monday = 0 … Sunday = 6. */
export function weekdayIndex(date: Date): number {
    return (date.getUTCDay() + 6) % 7;
}

export function toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export function isDateKey(key: string): boolean {
    return parseDate(key) !== null;
}

export function isTimeKey(key: string): boolean {
    return parseTimeOfDay(key) !== null;
}

export const WEEKDAY_NAMES = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"] as const;

export function weekdayName(date: Date): string {
    return WEEKDAY_NAMES[weekdayIndex(date)] ?? "";
}
