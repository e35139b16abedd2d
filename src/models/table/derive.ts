// Derived columns: weekday, within-day session ordinal, within-subject day index
import { parseDate, parseTimeOfDay, toIsoDate, weekdayIndex, weekdayName } from "../dates";
import { DatasetError } from "../errors";
import type { Cell, Row, TidyTable } from "./table";
import { withColumn } from "./table";

export interface WeekdayOptions {
    dateColumn?: string;
    outputColumn?: string;
}

export interface SessionNumberOptions {
    subjectColumn?: string;
    dateColumn?: string;
    sessionColumn?: string;
    outputColumn?: string;
}

export interface DayIndexOptions {
    subjectColumn?: string;
    dateColumn?: string;
    outputColumn?: string;
}

function requireColumns(table: TidyTable, columns: readonly string[]): void {
    for (const column of columns) {
        if (!table.columns.includes(column)) {
            throw new DatasetError(`Column "${column}" not found in table`, column);
        }
    }
}

/** Weekday index of the date column, Monday = 0 … Sunday = 6; unparseable → missing. */
export function addWeekday(
    table: TidyTable,
    { dateColumn = "date", outputColumn = "weekday_num" }: WeekdayOptions = {},
): TidyTable {
    requireColumns(table, [dateColumn]);
    return withColumn(table, outputColumn, (row) => {
        const date = parseDate(row[dateColumn]);
        return date ? weekdayIndex(date) : null;
    });
}

/**
 * 1-based order of each session within its (subject, date), by time of day.
 * Rows whose date or session time cannot be parsed keep a missing ordinal.
 * Equal times keep their table order.
 */
export function addSessionNumber(
    table: TidyTable,
    {
        subjectColumn = "subject_id",
        dateColumn = "date",
        sessionColumn = "session",
        outputColumn = "n_session",
    }: SessionNumberOptions = {},
): TidyTable {
    requireColumns(table, [subjectColumn, dateColumn, sessionColumn]);

    const groups = new Map<string, { index: number; seconds: number }[]>();
    table.rows.forEach((row, index) => {
        const date = parseDate(row[dateColumn]);
        const seconds = parseTimeOfDay(row[sessionColumn]);
        if (!date || seconds === null) return;
        const key = JSON.stringify([row[subjectColumn] ?? null, toIsoDate(date)]);
        const members = groups.get(key);
        if (members) members.push({ index, seconds });
        else groups.set(key, [{ index, seconds }]);
    });

    const ordinals = new Map<number, number>();
    for (const members of groups.values()) {
        members.sort((a, b) => a.seconds - b.seconds);
        members.forEach(({ index }, position) => ordinals.set(index, position + 1));
    }

    return withColumn(table, outputColumn, (_row, index) => ordinals.get(index) ?? null);
}

/** 1-based index of each distinct date within its subject, in calendar order. */
export function addDayIndex(
    table: TidyTable,
    { subjectColumn = "subject_id", dateColumn = "date", outputColumn = "day_index" }: DayIndexOptions = {},
): TidyTable {
    requireColumns(table, [subjectColumn, dateColumn]);

    const datesBySubject = new Map<string, Set<string>>();
    const parsed: (string | null)[] = table.rows.map((row) => {
        const date = parseDate(row[dateColumn]);
        if (!date) return null;
        const iso = toIsoDate(date);
        const subject = JSON.stringify(row[subjectColumn] ?? null);
        const dates = datesBySubject.get(subject) ?? new Set<string>();
        dates.add(iso);
        datesBySubject.set(subject, dates);
        return iso;
    });

    const indexBySubject = new Map<string, Map<string, number>>();
    for (const [subject, dates] of datesBySubject) {
        const ordered = [...dates].sort();
        indexBySubject.set(subject, new Map(ordered.map((d, i) => [d, i + 1])));
    }

    return withColumn(table, outputColumn, (row, index): Cell => {
        const iso = parsed[index];
        if (!iso) return null;
        return indexBySubject.get(JSON.stringify(row[subjectColumn] ?? null))?.get(iso) ?? null;
    });
}

/**
 * Rewrite a date column as ISO "YYYY-MM-DD" and drop the rows whose date
 * cannot be parsed. Returns how many rows were dropped.
 */
export function normalizeDateColumn(table: TidyTable, dateColumn = "date"): { table: TidyTable; dropped: number } {
    requireColumns(table, [dateColumn]);
    const rows: Row[] = [];
    for (const row of table.rows) {
        const date = parseDate(row[dateColumn]);
        if (date) rows.push({ ...row, [dateColumn]: toIsoDate(date) });
    }
    return { table: { columns: [...table.columns], rows }, dropped: table.rows.length - rows.length };
}

/** English weekday name of the date column ("Monday"); unparseable → missing. */
export function addWeekdayName(
    table: TidyTable,
    { dateColumn = "date", outputColumn = "weekday" }: WeekdayOptions = {},
): TidyTable {
    requireColumns(table, [dateColumn]);
    return withColumn(table, outputColumn, (row) => {
        const date = parseDate(row[dateColumn]);
        return date ? weekdayName(date) : null;
    });
}
