// Analysis-ready dataset container and side handling
import type { SideOption } from "../config";
import { parseOptions, sideOptionSchema } from "../config";
import { parseDate, toIsoDate } from "../dates";
import { DatasetError } from "../errors";
import type { Cell, Row, TidyTable } from "../table/table";
import { compareCells, createTable, dropColumns, filterRows, isMissing, uniqueValues } from "../table/table";

// ─── Dataset container ─────────────────────────────────────────────

export interface AnalysisDataset {
    data: TidyTable;
    outcomeVars: string[];
    idVar: string;
    timeVar: string;
    groupingVars: string[];
    sensor: string;
    level: string;
}

export interface AnalysisDatasetInit {
    data: TidyTable;
    outcomeVars: string[];
    idVar?: string;
    timeVar?: string;
    groupingVars?: string[];
    sensor?: string;
    level?: string;
}

export function createAnalysisDataset({
    data,
    outcomeVars,
    idVar = "subject_id",
    timeVar = "date",
    groupingVars = [],
    sensor = "emg",
    level = "daily",
}: AnalysisDatasetInit): AnalysisDataset {
    return validateDataset({ data, outcomeVars, idVar, timeVar, groupingVars, sensor, level });
}

/**
 * Throws DatasetError when the id or time column is absent. Outcomes that
 * are not columns are dropped with a warning.
 */
export function validateDataset(ds: AnalysisDataset): AnalysisDataset {
    const { data, idVar, timeVar } = ds;
    if (!data.columns.includes(idVar)) {
        throw new DatasetError(`ID variable "${idVar}" not found in data`, idVar);
    }
    if (!data.columns.includes(timeVar)) {
        throw new DatasetError(`Time variable "${timeVar}" not found in data`, timeVar);
    }

    const missing = ds.outcomeVars.filter((v) => !data.columns.includes(v));
    if (missing.length === 0) return ds;
    console.warn(`[prepare] Outcome variables not found in data: ${missing.join(", ")}`);
    return { ...ds, outcomeVars: ds.outcomeVars.filter((v) => data.columns.includes(v)) };
}

export function getNSubjects(ds: AnalysisDataset): number {
    return uniqueValues(ds.data, ds.idVar).length;
}

export function getNObservations(ds: AnalysisDataset): number {
    return ds.data.rows.length;
}

/** Earliest and latest time value; dates compare as calendar days. */
export function getDateRange(ds: AnalysisDataset): [Cell, Cell] {
    const values = uniqueValues(ds.data, ds.timeVar);
    const sortKey = (cell: Cell): Cell => {
        const date = parseDate(cell);
        return date ? toIsoDate(date) : cell;
    };
    const sorted = [...values].sort((a, b) => compareCells(sortKey(a), sortKey(b)));
    return [sorted[0] ?? null, sorted[sorted.length - 1] ?? null];
}

export function getObsPerSubject(ds: AnalysisDataset): Map<string, number> {
    const counts = new Map<string, number>();
    for (const row of ds.data.rows) {
        const id = String(row[ds.idVar]);
        counts.set(id, (counts.get(id) ?? 0) + 1);
    }
    return counts;
}

export interface SubsetOptions {
    outcomes?: string[];
    subjects?: string[];
    sides?: string[];
}

export function subsetDataset(ds: AnalysisDataset, { outcomes, subjects, sides }: SubsetOptions = {}): AnalysisDataset {
    let data = ds.data;
    if (subjects) {
        data = filterRows(data, (row) => {
            const id = row[ds.idVar];
            return typeof id === "string" && subjects.includes(id);
        });
    }
    if (sides && ds.groupingVars.includes("side")) {
        data = filterRows(data, (row) => typeof row.side === "string" && sides.includes(row.side));
    }
    return createAnalysisDataset({ ...ds, data, outcomeVars: outcomes ?? ds.outcomeVars });
}

export function describeDataset(ds: AnalysisDataset): string {
    const [first, last] = getDateRange(ds);
    return [
        `AnalysisDataset: ${ds.sensor} (${ds.level} level)`,
        `  Subjects: ${getNSubjects(ds)}`,
        `  Observations: ${getNObservations(ds)}`,
        `  Date range: ${String(first)} to ${String(last)}`,
        `  Outcomes: ${ds.outcomeVars.length} variables`,
        `  Grouping: [${ds.groupingVars.join(", ")}]`,
    ].join("\n");
}

// ─── Side handling ─────────────────────────────────────────────────

export interface SideResult {
    table: TidyTable;
    groupingVars: string[];
}

function isNumericColumn(table: TidyTable, column: string): boolean {
    let seen = false;
    for (const row of table.rows) {
        const cell = row[column];
        if (isMissing(cell)) continue;
        if (typeof cell !== "number") return false;
        seen = true;
    }
    return seen;
}

function mean(cells: Cell[]): Cell {
    const values = cells.filter((c): c is number => typeof c === "number" && !Number.isNaN(c));
    if (values.length === 0) return null;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Apply a side option to a table with a "side" column.
 *
 * - left / right: keep that side and drop the column
 * - both: keep rows per side, "side" becomes a grouping variable
 * - average: mean of numeric columns over sides, only for `by` groups
 *   that have both sides; other rows are dropped
 */
export function handleSides(
    table: TidyTable,
    side: SideOption,
    by: readonly string[] = ["subject_id", "date"],
): SideResult {
    const option = parseOptions(sideOptionSchema, side, "side option");
    if (!table.columns.includes("side")) return { table, groupingVars: [] };

    switch (option) {
        case "left":
        case "right":
            return {
                table: dropColumns(filterRows(table, (row) => row.side === option), ["side"]),
                groupingVars: [],
            };
        case "both":
            return { table, groupingVars: ["side"] };
        case "average":
            return averageSides(table, by);
    }
}

function averageSides(table: TidyTable, by: readonly string[]): SideResult {
    const groups = new Map<string, Row[]>();
    for (const row of table.rows) {
        const key = JSON.stringify(by.map((c) => row[c] ?? null));
        const members = groups.get(key);
        if (members) members.push(row);
        else groups.set(key, [row]);
    }

    const paired = [...groups.values()].filter((rows) => new Set(rows.map((r) => r.side)).size === 2);
    if (paired.length === 0) {
        console.warn("[prepare] No groups have both sides. Returning all data.");
        return { table, groupingVars: ["side"] };
    }

    const pairedRows = paired.flat();
    const pairedTable: TidyTable = { columns: table.columns, rows: pairedRows };
    const numeric = table.columns.filter((c) => !by.includes(c) && c !== "side" && isNumericColumn(pairedTable, c));

    const averaged = paired.map((rows) => {
        const out: Row = {};
        for (const c of by) out[c] = rows[0]?.[c] ?? null;
        for (const c of numeric) out[c] = mean(rows.map((r) => r[c] ?? null));
        return out;
    });

    const dropped = table.rows.length - pairedRows.length;
    if (dropped > 0) {
        console.warn(
            `[prepare] Dropped ${dropped} rows where only one side existed. Kept ${averaged.length} averaged observations.`,
        );
    }
    return { table: createTable(averaged, [...by, ...numeric]), groupingVars: [] };
}
