import { loadProfiles } from "../src/data/loadProfiles.js";
import { extractSmartwatchAndSmartphone } from "../src/models/prepare/devices.js";
import { extractSensor, listSensors } from "../src/models/sensors/index.js";
import { toCsv } from "../src/models/table/table.js";
import type { TidyTable } from "../src/models/table/table.js";

const dir = process.argv[2];
const requested = process.argv.slice(3);

if (!dir) {
    const sensors = listSensors()
        .map((s) => `  ${s.id}: ${s.name} (${s.device})`)
        .join("\n");
    console.error(`Usage: npx tsx cli/extract.ts <profiles-dir> [sensor...]\n\nSensors:\n${sensors}`);
    process.exit(1);
}

const { profiles, errors } = loadProfiles(dir);
if (profiles.size === 0) {
    console.error(`[oh-tidy] Nothing to extract (${errors.length} files failed to load)`);
    process.exit(1);
}

function printTable(title: string, table: TidyTable): void {
    console.log(`# ${title}: ${table.rows.length} rows × ${table.columns.length} columns`);
    process.stdout.write(toCsv(table));
    console.log();
}

const ids = requested.length > 0 ? requested : listSensors().map((s) => s.id);
for (const id of ids) {
    printTable(id, extractSensor(id, profiles));
}

if (requested.length === 0) {
    const { smartwatch, smartphone } = extractSmartwatchAndSmartphone(profiles);
    printTable("smartwatch", smartwatch);
    printTable("smartphone", smartphone);
}
