// EMG datasets: daily metrics per side, weekly aggregates per subject
import type { ProfileSet } from "../../api/types";
import type { SideOption } from "../config";
import { extractFlat } from "../extract/extract";
import { extractNested, SUBJECT_COLUMN } from "../extract/extractNested";
import { addDayIndex, addWeekdayName, normalizeDateColumn } from "../table/derive";
import type { Row, TidyTable } from "../table/table";
import { createTable, dropColumns, emptyTable, filterRows, sortRows } from "../table/table";
import type { AnalysisDataset } from "./dataset";
import { createAnalysisDataset, handleSides } from "./dataset";

export const EMG_BASE_PATH = "sensor_metrics.emg";
export const EMG_DAILY_LEVEL = "EMG_daily_metrics";
export const EMG_WEEKLY_PATH = `${EMG_BASE_PATH}.EMG_weekly_metrics`;

export const EMG_VALUE_PATHS = [
    "EMG_session.*",
    "EMG_intensity.*",
    "EMG_apdf.full.*",
    "EMG_apdf.active.*",
    "EMG_rest_recovery.*",
    "EMG_relative_bins.*",
];

const DAILY_META = new Set([SUBJECT_COLUMN, "work_type", "date", "side", "day_index", "weekday"]);
const SIDES = ["left", "right"];

export interface DailyEmgOptions {
    side?: SideOption;
    addDayIndex?: boolean;
    addWeekday?: boolean;
}

/**
 * Daily EMG metrics (`<date>.EMG_daily_metrics.<side>.…`) as one row per
 * subject × date (× side). Dates become ISO strings; rows whose date key
 * cannot be parsed are dropped with a warning.
 */
export function prepareDailyEmg(
    profiles: ProfileSet,
    { side = "both", addDayIndex: withDayIndex = true, addWeekday: withWeekday = true }: DailyEmgOptions = {},
): AnalysisDataset {
    const extracted = extractNested(profiles, {
        basePath: EMG_BASE_PATH,
        levelNames: ["date", "level", "side"],
        valuePaths: EMG_VALUE_PATHS,
    });

    const daily = dropColumns(
        filterRows(extracted, (row) => row.level === EMG_DAILY_LEVEL),
        ["level"],
    );
    if (daily.rows.length === 0) {
        console.warn("[prepare] No EMG data found in profiles");
        return createAnalysisDataset({ data: emptyTable([SUBJECT_COLUMN, "date"]), outcomeVars: [], sensor: "emg", level: "daily" });
    }

    const { table: dated, dropped } = normalizeDateColumn(daily);
    if (dropped > 0) {
        console.warn(`[prepare] Dropped ${dropped} rows with unparseable dates`);
    }

    const sided = handleSides(dated, side);
    let data = sided.table;
    if (withDayIndex) data = addDayIndex(data);
    if (withWeekday) data = addWeekdayName(data);
    data = sortRows(data, data.columns.includes("side") ? [SUBJECT_COLUMN, "date", "side"] : [SUBJECT_COLUMN, "date"]);

    return createAnalysisDataset({
        data,
        outcomeVars: data.columns.filter((c) => !DAILY_META.has(c)),
        groupingVars: sided.groupingVars,
        sensor: "emg",
        level: "daily",
    });
}

/** Turn "left.X" / "right.X" columns of a flattened weekly table into one row per side. */
function weeklyToLong(wide: TidyTable): TidyTable {
    const rows: Row[] = [];
    for (const row of wide.rows) {
        for (const side of SIDES) {
            const prefix = `${side}.`;
            const columns = wide.columns.filter((c) => c.startsWith(prefix));
            if (columns.length === 0) continue;
            const long: Row = { [SUBJECT_COLUMN]: row[SUBJECT_COLUMN] ?? null, side };
            for (const c of columns) long[c.slice(prefix.length)] = row[c] ?? null;
            rows.push(long);
        }
    }
    return createTable(rows, [SUBJECT_COLUMN, "side"]);
}

/**
 * Weekly EMG aggregates, one row per subject (× side). There is a single
 * observation per subject and side, so the subject id doubles as time var.
 */
export function prepareWeeklyEmg(profiles: ProfileSet, side: SideOption = "both"): AnalysisDataset {
    const wide = extractFlat(profiles, EMG_WEEKLY_PATH);
    if (wide.rows.length === 0) {
        console.warn("[prepare] No weekly EMG data found in profiles");
        return createAnalysisDataset({
            data: emptyTable([SUBJECT_COLUMN]),
            outcomeVars: [],
            timeVar: SUBJECT_COLUMN,
            sensor: "emg",
            level: "weekly",
        });
    }

    const { table, groupingVars } = handleSides(weeklyToLong(wide), side, [SUBJECT_COLUMN]);
    return createAnalysisDataset({
        data: table,
        outcomeVars: table.columns.filter((c) => c !== SUBJECT_COLUMN && c !== "side"),
        timeVar: SUBJECT_COLUMN,
        groupingVars,
        sensor: "emg",
        level: "weekly",
    });
}
