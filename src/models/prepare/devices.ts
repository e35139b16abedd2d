// Smartwatch / smartphone tables composed from per-sensor extractions
import { z } from "zod";
import type { ProfileSet } from "../../api/types";
import type { DeviceComponent, FilterSpec } from "../config";
import { deviceComponentSchema, parseOptions } from "../config";
import { extractSensor } from "../sensors";
import { addSessionNumber, addWeekday } from "../table/derive";
import { autofillNanGroups } from "../table/fill";
import { mergeAll } from "../table/merge";
import type { TidyTable } from "../table/table";
import { emptyTable } from "../table/table";

export interface DeviceTables {
    smartwatch: TidyTable;
    smartphone: TidyTable;
}

export const ALL_COMPONENTS: readonly DeviceComponent[] = ["HR", "wrist", "noise", "activity"];

const COMPONENT_SENSOR: Record<DeviceComponent, string> = {
    HR: "heart_rate",
    wrist: "wrist_activities",
    noise: "noise",
    activity: "human_activities",
};

function extractComponent(
    component: DeviceComponent,
    wanted: ReadonlySet<DeviceComponent>,
    profiles: ProfileSet,
    filters: FilterSpec | null | undefined,
): TidyTable {
    return wanted.has(component) ? extractSensor(COMPONENT_SENSOR[component], profiles, filters) : emptyTable();
}

/**
 * Build the two per-device tables.
 *
 * Smartwatch: heart rate (distribution groups zero-filled) outer-merged with
 * wrist activities, then weekday_num and n_session. Smartphone: human
 * activities outer-merged with noise, zero-filled, then weekday_num.
 * A device with no requested or present components gives an empty table.
 */
export function extractSmartwatchAndSmartphone(
    profiles: ProfileSet,
    components: readonly DeviceComponent[] = ALL_COMPONENTS,
    filters?: FilterSpec | null,
): DeviceTables {
    const wanted = new Set(parseOptions(z.array(deviceComponentSchema), components, "device components"));

    const hr = extractComponent("HR", wanted, profiles, filters);
    const wrist = extractComponent("wrist", wanted, profiles, filters);
    let smartwatch = mergeAll([hr, wrist]);
    if (smartwatch.rows.length > 0) {
        smartwatch = addSessionNumber(addWeekday(smartwatch));
    }

    const activity = extractComponent("activity", wanted, profiles, filters);
    const noise = extractComponent("noise", wanted, profiles, filters);
    let smartphone = mergeAll([activity, noise]);
    if (smartphone.rows.length > 0) {
        smartphone = addWeekday(autofillNanGroups(smartphone));
    }

    return { smartwatch, smartphone };
}
