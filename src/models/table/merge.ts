// Full outer join of two tidy tables on shared key columns
import { setOwn } from "../../api/types";
import type { MergeOptions } from "../config";
import { mergeOptionsSchema, parseOptions } from "../config";
import { ConfigurationError } from "../errors";
import type { Cell, Row, TidyTable } from "./table";
import { emptyTable } from "./table";

function keyOf(row: Row, on: readonly string[]): string {
    return JSON.stringify(on.map((column) => row[column] ?? null));
}

function requireKeys(table: TidyTable, on: readonly string[], side: string): void {
    const missing = on.filter((column) => !table.columns.includes(column));
    if (missing.length > 0) {
        throw new ConfigurationError(`Merge key column(s) missing from ${side} table: ${missing.join(", ")}`);
    }
}

function copyTable(table: TidyTable): TidyTable {
    return { columns: [...table.columns], rows: table.rows.map((row) => ({ ...row })) };
}

/**
 * Outer merge: every key combination present in either table yields rows.
 *
 * Rows are matched on equal key cells (two missing cells are equal); several
 * matches on both sides give their cross product. Columns present on both
 * sides that are not keys get the suffixes. When one side has no rows the
 * other comes back unchanged.
 */
export function outerMerge(left: TidyTable, right: TidyTable, options: MergeOptions = {}): TidyTable {
    const { on, suffixes } = parseOptions(mergeOptionsSchema, options, "merge options");

    if (left.rows.length === 0 && right.rows.length === 0) {
        return emptyTable([...new Set([...left.columns, ...right.columns])]);
    }
    if (left.rows.length === 0) return copyTable(right);
    if (right.rows.length === 0) return copyTable(left);

    requireKeys(left, on, "left");
    requireKeys(right, on, "right");

    const keys = new Set(on);
    const shared = new Set(left.columns.filter((c) => !keys.has(c) && right.columns.includes(c)));
    const leftName = (c: string) => (shared.has(c) ? c + suffixes[0] : c);
    const rightName = (c: string) => (shared.has(c) ? c + suffixes[1] : c);
    const leftValues = left.columns.filter((c) => !keys.has(c));
    const rightValues = right.columns.filter((c) => !keys.has(c));
    const columns = [...left.columns.map(leftName), ...rightValues.map(rightName)];

    const rightIndex = new Map<string, number[]>();
    right.rows.forEach((row, i) => {
        const key = keyOf(row, on);
        const bucket = rightIndex.get(key);
        if (bucket) bucket.push(i);
        else rightIndex.set(key, [i]);
    });

    const build = (leftRow: Row | null, rightRow: Row | null): Row => {
        const keySource = leftRow ?? rightRow;
        const out: Row = {};
        for (const column of columns) setOwn<Cell>(out, column, null);
        for (const column of on) setOwn(out, column, keySource?.[column] ?? null);
        if (leftRow) for (const c of leftValues) setOwn(out, leftName(c), leftRow[c] ?? null);
        if (rightRow) for (const c of rightValues) setOwn(out, rightName(c), rightRow[c] ?? null);
        return out;
    };

    const matchedRight = new Set<number>();
    const rows: Row[] = [];
    for (const leftRow of left.rows) {
        const matches = rightIndex.get(keyOf(leftRow, on));
        if (!matches) {
            rows.push(build(leftRow, null));
            continue;
        }
        for (const i of matches) {
            matchedRight.add(i);
            rows.push(build(leftRow, right.rows[i] ?? null));
        }
    }
    right.rows.forEach((rightRow, i) => {
        if (!matchedRight.has(i)) rows.push(build(null, rightRow));
    });

    return { columns, rows };
}

/** Fold outerMerge over the tables that have rows; none → an empty table. */
export function mergeAll(tables: readonly TidyTable[], options: MergeOptions = {}): TidyTable {
    const nonEmpty = tables.filter((t) => t.rows.length > 0);
    const [first, ...rest] = nonEmpty;
    if (!first) return emptyTable();
    return rest.reduce((acc, table) => outerMerge(acc, table, options), copyTable(first));
}
