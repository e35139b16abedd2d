import { describe, it, expect } from "vitest";
import type { JsonObject, Profile } from "../../api/types";
import { isJsonObject } from "../../api/types";
import { ConfigurationError } from "../errors";
import { collectValueColumns, extractNested } from "../extract/extractNested";

function makeNoiseProfile(workType: string, noise: JsonObject): Profile {
  return { meta_data: { group: "office", work_type: workType }, sensor_metrics: { noise } };
}

function gridProfile(): Profile {
  return makeNoiseProfile("desk", {
    "06-01-2025": { "09-00-00": { X: { a: 1, b: 2 } }, "14-00-00": { X: { a: 3, b: 4 } } },
    "07-01-2025": { "09-00-00": { X: { a: 5, b: 6 } }, "14-00-00": { X: { a: 7, b: 8 } } },
  });
}

const GRID_OPTIONS = {
  basePath: "sensor_metrics.noise",
  levelNames: ["date", "session"],
  valuePaths: ["X.*"],
};

describe("extractNested", () => {
  it("produces one row per existing date × session", () => {
    const table = extractNested({ P1: gridProfile() }, GRID_OPTIONS);
    expect(table.columns).toEqual(["subject_id", "work_type", "date", "session", "X.a", "X.b"]);
    expect(table.rows).toEqual([
      { subject_id: "P1", work_type: "desk", date: "06-01-2025", session: "09-00-00", "X.a": 1, "X.b": 2 },
      { subject_id: "P1", work_type: "desk", date: "06-01-2025", session: "14-00-00", "X.a": 3, "X.b": 4 },
      { subject_id: "P1", work_type: "desk", date: "07-01-2025", session: "09-00-00", "X.a": 5, "X.b": 6 },
      { subject_id: "P1", work_type: "desk", date: "07-01-2025", session: "14-00-00", "X.a": 7, "X.b": 8 },
    ]);
  });

  it("never invents branches that do not exist", () => {
    const uneven = makeNoiseProfile("assembly", {
      "06-01-2025": {},
      "07-01-2025": { "09-00-00": { X: { a: 1 } } },
      "08-01-2025": "sensor offline",
    });
    const table = extractNested({ P1: gridProfile(), P2: uneven }, GRID_OPTIONS);
    expect(table.rows.length).toBe(5);
    expect(table.rows[4]).toEqual({
      subject_id: "P2",
      work_type: "assembly",
      date: "07-01-2025",
      session: "09-00-00",
      "X.a": 1,
      "X.b": null,
    });
  });

  it("prunes excluded keys and skips branches left without values", () => {
    const profile = makeNoiseProfile("desk", {
      "06-01-2025": {
        "09-00-00": { Noise_statistics: { mean: 55.5 }, Noise_timeline: [50, 61] },
        "14-00-00": { Noise_timeline: [48] },
      },
    });
    const table = extractNested(
      { P1: profile },
      { basePath: "sensor_metrics.noise", levelNames: ["date", "session"], excludePatterns: ["Noise_timeline"] },
    );
    expect(table.columns).toEqual(["subject_id", "work_type", "date", "session", "Noise_statistics.mean"]);
    expect(table.rows.map((r) => r.session)).toEqual(["09-00-00"]);
  });

  it("keeps an empty table's identifier columns", () => {
    const table = extractNested({}, { basePath: "sensor_metrics.noise", levelNames: ["date"] });
    expect(table).toEqual({ columns: ["subject_id", "work_type", "date"], rows: [] });
  });

  it("reads custom metadata columns", () => {
    const table = extractNested(
      { P1: gridProfile() },
      { ...GRID_OPTIONS, metadata: { group: "meta_data.group", site: "meta_data.site" } },
    );
    expect(table.columns.slice(0, 5)).toEqual(["subject_id", "group", "site", "date", "session"]);
    expect(table.rows[0]!.group).toBe("office");
    expect(table.rows[0]!.site).toBeNull();
  });

  it("applies subject filters and the date range", () => {
    const profiles = { P1: gridProfile(), P2: gridProfile() };
    const table = extractNested(profiles, {
      ...GRID_OPTIONS,
      filters: { subjectIds: ["P2"], dateRange: ["07-01-2025", "07-01-2025"] },
    });
    expect(table.rows.map((r) => [r.subject_id, r.date, r.session])).toEqual([
      ["P2", "07-01-2025", "09-00-00"],
      ["P2", "07-01-2025", "14-00-00"],
    ]);
  });

  it("skips subjects whose base path is missing", () => {
    const table = extractNested({ P1: { meta_data: { work_type: "desk" } } }, GRID_OPTIONS);
    expect(table.rows).toEqual([]);
  });

  it("rejects recursive wildcards in value paths", () => {
    expect(() => extractNested({ P1: gridProfile() }, { ...GRID_OPTIONS, valuePaths: ["**"] })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects recursive wildcards before reading any profile", () => {
    expect(() => extractNested({}, { basePath: "sensor_metrics.**", levelNames: ["date"] })).toThrow(
      ConfigurationError,
    );
    expect(() =>
      extractNested({ P1: { meta_data: { work_type: "desk" } } }, { ...GRID_OPTIONS, valuePaths: ["**"] }),
    ).toThrow(ConfigurationError);
  });

  it("keeps level and metadata cells when a value has the same name", () => {
    const profile: Profile = {
      meta_data: { work_type: "desk" },
      q: { "06-01-2025": { date: "yesterday", work_type: "other", pain: 3 } },
    };
    const table = extractNested({ P1: profile }, { basePath: "q", levelNames: ["date"] });
    expect(table.rows).toEqual([{ subject_id: "P1", work_type: "desk", date: "06-01-2025", pain: 3 }]);
  });

  it("skips a branch whose only values collide with identifier columns", () => {
    const profile: Profile = { q: { "06-01-2025": { date: "yesterday" } } };
    expect(extractNested({ P1: profile }, { basePath: "q", levelNames: ["date"] }).rows).toEqual([]);
  });
});

describe("collectValueColumns", () => {
  const node = { HR_BPM_stats: { mean: 72, max: 110 }, HR_timeline: [70], count: 3, nested: { deep: { x: 1 } } };

  it("names columns after the concrete path", () => {
    expect(collectValueColumns(node, "HR_BPM_stats.*", { excludePatterns: [], includePatterns: null })).toEqual({
      "HR_BPM_stats.mean": 72,
      "HR_BPM_stats.max": 110,
    });
  });

  it("flattens mappings recursively and keeps scalars", () => {
    expect(collectValueColumns(node, "*", { excludePatterns: ["HR_*"], includePatterns: null })).toEqual({
      count: 3,
      "nested.deep.x": 1,
    });
  });

  it("restricts wildcard keys to the include list", () => {
    expect(collectValueColumns(node, "*", { excludePatterns: [], includePatterns: ["count"] })).toEqual({ count: 3 });
  });

  it("drops literal value paths that are excluded", () => {
    const opts = { excludePatterns: ["HR_timeline"], includePatterns: null };
    expect(collectValueColumns(node, "HR_timeline", opts)).toEqual({});
    expect(collectValueColumns(node, "HR_BPM_stats.*", opts)).toEqual({ "HR_BPM_stats.mean": 72, "HR_BPM_stats.max": 110 });
  });

  it("excludes by any literal segment of the value path", () => {
    expect(collectValueColumns(node, "nested.deep", { excludePatterns: ["nest*"], includePatterns: null })).toEqual({});
  });

  it("keeps a __proto__ key as an ordinary column", () => {
    const parsed: unknown = JSON.parse('{"__proto__": 1, "mean": 2}');
    if (!isJsonObject(parsed)) throw new Error("expected an object");
    const columns = collectValueColumns(parsed, "*", { excludePatterns: [], includePatterns: null });
    expect(Object.keys(columns)).toEqual(["__proto__", "mean"]);
    expect(Object.getPrototypeOf(columns)).toBe(Object.prototype);
  });

  it("returns nothing for a missing value path", () => {
    expect(collectValueColumns(node, "HR_ratio_stats.*", { excludePatterns: [], includePatterns: null })).toEqual({});
  });
});
