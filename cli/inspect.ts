import { loadProfile } from "../src/data/loadProfiles.js";
import { getAvailablePaths, inspectProfile } from "../src/models/extract/extract.js";

const file = process.argv[2];
const path = process.argv[3] ?? "";
const depth = process.argv[4] ? Number(process.argv[4]) : 3;

if (!file || !Number.isInteger(depth) || depth < 0) {
    console.error("Usage: npx tsx cli/inspect.ts <profile.json> [path] [depth]");
    process.exit(1);
}

const profile = loadProfile(file);

console.log(`Structure at "${path || "<root>"}" (depth ${depth}):`);
console.log(inspectProfile(profile, path, depth));

const paths = getAvailablePaths(profile, path);
console.log(`\nLeaf paths: ${paths.length}`);
for (const p of paths) console.log(`  ${p}`);
