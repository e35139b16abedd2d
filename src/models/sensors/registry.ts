import type { ProfileSet } from "../../api/types";
import type { ExtractNestedOptions, FilterSpec } from "../config";
import { ConfigurationError } from "../errors";
import { extractNested } from "../extract/extractNested";
import { autofillNanGroups } from "../table/fill";
import type { TidyTable } from "../table/table";

export type Device = "smartwatch" | "smartphone" | "emg" | "questionnaire";

export interface SensorPreset {
    id: string;
    name: string;
    device: Device;
    options: ExtractNestedOptions;
    /** Zero-fill distribution groups after extraction. */
    fillDistributions?: boolean;
}

export const SENSORS: Record<string, SensorPreset> = {};

export function registerSensor(preset: SensorPreset): void {
    if (SENSORS[preset.id]) {
        console.warn(`[sensors] Overwriting existing sensor preset: ${preset.id}`);
    }
    SENSORS[preset.id] = preset;
}

export function getSensor(id: string): SensorPreset | undefined {
    return SENSORS[id];
}

export function listSensors(): SensorPreset[] {
    return Object.values(SENSORS);
}

export function requireSensor(id: string): SensorPreset {
    const preset = SENSORS[id];
    if (!preset) {
        const known = Object.keys(SENSORS).join(", ");
        throw new ConfigurationError(`Unknown sensor preset "${id}" (known: ${known})`);
    }
    return preset;
}

/** Run a registered preset, with optional subject filters layered on top. */
export function extractSensor(id: string, profiles: ProfileSet, filters?: FilterSpec | null): TidyTable {
    const preset = requireSensor(id);
    const table = extractNested(profiles, { ...preset.options, filters: filters ?? preset.options.filters });
    return preset.fillDistributions ? autofillNanGroups(table) : table;
}
