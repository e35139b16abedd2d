// Tidy table: an ordered column list plus rows that all carry every column
import type { JsonArray, JsonScalar } from "../../api/types";
import { setOwn } from "../../api/types";

/** A single cell. `null` is the only missing marker. */
export type Cell = JsonScalar | JsonArray;

export type Row = Record<string, Cell>;

export interface TidyTable {
    columns: string[];
    rows: Row[];
}

/** Missing means null, absent, or a NaN produced by arithmetic. */
export function isMissing(cell: Cell | undefined): boolean {
    return cell === null || cell === undefined || (typeof cell === "number" && Number.isNaN(cell));
}

export function emptyTable(columns: readonly string[] = []): TidyTable {
    return { columns: [...columns], rows: [] };
}

/**
 * Normalize loose rows into a table. Columns are `leading` first, then every
 * other key in the order it is first seen; cells a row lacks become null.
 */
export function createTable(rows: readonly Readonly<Partial<Row>>[], leading: readonly string[] = []): TidyTable {
    const columns = [...leading];
    const known = new Set(columns);
    for (const row of rows) {
        for (const key of Object.keys(row)) {
            if (!known.has(key)) {
                known.add(key);
                columns.push(key);
            }
        }
    }
    return { columns, rows: rows.map((row) => conform(row, columns)) };
}

function conform(row: Readonly<Partial<Row>>, columns: readonly string[]): Row {
    const out: Row = {};
    for (const column of columns) {
        setOwn(out, column, row[column] ?? null);
    }
    return out;
}

export function hasColumn(table: TidyTable, column: string): boolean {
    return table.columns.includes(column);
}

export function getColumn(table: TidyTable, column: string): Cell[] {
    return table.rows.map((row) => row[column] ?? null);
}

/** Distinct non-missing values in first-seen order. */
export function uniqueValues(table: TidyTable, column: string): Cell[] {
    const seen = new Set<string>();
    const out: Cell[] = [];
    for (const cell of getColumn(table, column)) {
        if (isMissing(cell)) continue;
        const key = JSON.stringify(cell);
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(cell);
    }
    return out;
}

export function filterRows(table: TidyTable, predicate: (row: Row, index: number) => boolean): TidyTable {
    return { columns: [...table.columns], rows: table.rows.filter(predicate) };
}

export function dropColumns(table: TidyTable, drop: readonly string[]): TidyTable {
    const dropped = new Set(drop);
    const columns = table.columns.filter((c) => !dropped.has(c));
    return { columns, rows: table.rows.map((row) => conform(row, columns)) };
}

export function selectColumns(table: TidyTable, keep: readonly string[]): TidyTable {
    const columns = keep.filter((c) => table.columns.includes(c));
    return { columns, rows: table.rows.map((row) => conform(row, columns)) };
}

/** Add or replace a column computed per row. New columns go last. */
export function withColumn(table: TidyTable, column: string, compute: (row: Row, index: number) => Cell): TidyTable {
    const columns = table.columns.includes(column) ? [...table.columns] : [...table.columns, column];
    return { columns, rows: table.rows.map((row, i) => ({ ...row, [column]: compute(row, i) })) };
}

/** Ascending, missing last; strings compare by code unit, numbers numerically. */
export function compareCells(a: Cell, b: Cell): number {
    const aMissing = isMissing(a);
    const bMissing = isMissing(b);
    if (aMissing || bMissing) return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
    if (typeof a === "number" && typeof b === "number") return a - b;
    const sa = typeof a === "string" ? a : JSON.stringify(a);
    const sb = typeof b === "string" ? b : JSON.stringify(b);
    return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** Stable sort by the given columns in order. */
export function sortRows(table: TidyTable, by: readonly string[]): TidyTable {
    const rows = [...table.rows].sort((ra, rb) => {
        for (const column of by) {
            const order = compareCells(ra[column] ?? null, rb[column] ?? null);
            if (order !== 0) return order;
        }
        return 0;
    });
    return { columns: [...table.columns], rows };
}

// ─── CSV ───────────────────────────────────────────────────────────

function csvField(cell: Cell | undefined): string {
    if (cell === undefined || cell === null || isMissing(cell)) return "";
    const text = typeof cell === "string" ? cell : Array.isArray(cell) ? JSON.stringify(cell) : String(cell);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** RFC 4180 text with a header line; missing cells are empty fields. */
export function toCsv(table: TidyTable): string {
    const lines = [table.columns.map(csvField).join(",")];
    for (const row of table.rows) {
        lines.push(table.columns.map((c) => csvField(row[c])).join(","));
    }
    return lines.join("\n") + "\n";
}
