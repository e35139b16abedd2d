// Group-aware missing-value fill for distribution columns
import type { FillOptions } from "../config";
import { fillOptionsSchema, parseOptions } from "../config";
import type { TidyTable } from "./table";
import { isMissing } from "./table";

/**
 * Columns grouped by the prefix before their last "." — keeping only
 * prefixes that contain `marker` and have at least `minGroupSize` members.
 */
export function distributionGroups(columns: readonly string[], marker: string, minGroupSize: number): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    for (const column of columns) {
        const cut = column.lastIndexOf(".");
        if (cut < 0) continue;
        const prefix = column.slice(0, cut);
        if (!prefix.includes(marker)) continue;
        const members = groups.get(prefix);
        if (members) members.push(column);
        else groups.set(prefix, [column]);
    }
    for (const [prefix, members] of groups) {
        if (members.length < minGroupSize) groups.delete(prefix);
    }
    return groups;
}

/**
 * Within each distribution group, a row with at least one observed member
 * gets 0 in its other missing members. A row with every member missing stays
 * missing. Applying it twice changes nothing.
 */
export function autofillNanGroups(table: TidyTable, options: FillOptions = {}): TidyTable {
    const { minGroupSize, marker } = parseOptions(fillOptionsSchema, options, "fill options");
    const groups = [...distributionGroups(table.columns, marker, minGroupSize).values()];

    const rows = table.rows.map((row) => {
        const out = { ...row };
        for (const members of groups) {
            if (members.every((c) => isMissing(row[c]))) continue;
            for (const c of members) {
                if (isMissing(row[c])) out[c] = 0;
            }
        }
        return out;
    });
    return { columns: [...table.columns], rows };
}
