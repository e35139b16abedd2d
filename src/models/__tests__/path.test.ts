import { describe, it, expect } from "vitest";
import type { Profile } from "../../api/types";
import { isJsonObject } from "../../api/types";
import { ConfigurationError } from "../errors";
import { countWildcards, expandWildcards, levelNameFor } from "../path/expand";
import { joinPath, listKeysAtPath, pathExists, resolvePath, splitPath } from "../path/navigator";
import { excludeKeys, includeKeys, keyPredicate, matchesPattern, selectKeys } from "../path/pattern";
import {
  findPathsMatching,
  flattenObject,
  getLeafPaths,
  getNestedKeys,
  getStructureSummary,
  inferLevelType,
  printTree,
  unflattenObject,
} from "../path/structure";

function makeProfile(): Profile {
  return {
    meta_data: { group: "office", work_type: "desk", notes: null },
    sensor_metrics: {
      heart_rate: {
        "06-01-2025": {
          "09-00-00": { HR_BPM_stats: { mean: 72, max: 110 }, HR_timeline: [70, 71] },
          "14-00-00": { HR_BPM_stats: { mean: 80, max: 120 } },
        },
        "07-01-2025": {
          "10-30-00": { HR_BPM_stats: { mean: 75, max: 101 } },
        },
      },
    },
  };
}

// ─── Navigation ────────────────────────────────────────────────────

describe("resolvePath", () => {
  it("resolves the empty path to the profile itself", () => {
    const profile = makeProfile();
    expect(resolvePath(profile, "")).toBe(profile);
  });

  it("walks dotted keys", () => {
    expect(resolvePath(makeProfile(), "meta_data.group")).toBe("office");
  });

  it("returns the fallback for a missing key", () => {
    expect(resolvePath(makeProfile(), "meta_data.age")).toBeUndefined();
    expect(resolvePath(makeProfile(), "meta_data.age", "n/a")).toBe("n/a");
  });

  it("stops at a non-mapping with segments left", () => {
    expect(resolvePath(makeProfile(), "meta_data.group.name", null)).toBeNull();
  });

  it("returns a stored null as null, not as the fallback", () => {
    expect(resolvePath(makeProfile(), "meta_data.notes", "fallback")).toBeNull();
  });
});

describe("pathExists", () => {
  it("is true for a path whose value is null", () => {
    expect(pathExists(makeProfile(), "meta_data.notes")).toBe(true);
  });

  it("agrees with resolvePath for missing paths", () => {
    const profile = makeProfile();
    for (const path of ["meta_data.age", "sensor_metrics.emg", "meta_data.group.x"]) {
      expect(pathExists(profile, path)).toBe(false);
    }
    expect(pathExists(profile, "")).toBe(true);
  });

  it("does not see inherited properties", () => {
    expect(pathExists(makeProfile(), "meta_data.toString")).toBe(false);
  });
});

describe("listKeysAtPath", () => {
  it("lists keys in stored order", () => {
    expect(listKeysAtPath(makeProfile(), "sensor_metrics.heart_rate")).toEqual(["06-01-2025", "07-01-2025"]);
  });

  it("returns [] for leaves and missing paths", () => {
    expect(listKeysAtPath(makeProfile(), "meta_data.group")).toEqual([]);
    expect(listKeysAtPath(makeProfile(), "nope")).toEqual([]);
  });
});

describe("splitPath / joinPath", () => {
  it("treats the empty path as no segments", () => {
    expect(splitPath("")).toEqual([]);
    expect(splitPath("a.b")).toEqual(["a", "b"]);
  });

  it("skips empty parts when joining", () => {
    expect(joinPath("", "a", "", "b")).toBe("a.b");
    expect(joinPath("")).toBe("");
  });
});

// ─── Patterns ──────────────────────────────────────────────────────

describe("matchesPattern", () => {
  it("supports exact, prefix, suffix and contains forms", () => {
    expect(matchesPattern("EMG_weekly_metrics", ["EMG_weekly_metrics"])).toBe(true);
    expect(matchesPattern("EMG_weekly_metrics", ["EMG_*"])).toBe(true);
    expect(matchesPattern("EMG_weekly_metrics", ["*_metrics"])).toBe(true);
    expect(matchesPattern("EMG_daily_metrics", ["*daily*"])).toBe(true);
  });

  it("matches the whole key, case-sensitively", () => {
    expect(matchesPattern("xEMG_session", ["EMG_*"])).toBe(false);
    expect(matchesPattern("emg_session", ["EMG_*"])).toBe(false);
  });

  it("treats characters other than * literally", () => {
    expect(matchesPattern("a?c", ["a?c"])).toBe(true);
    expect(matchesPattern("abc", ["a?c"])).toBe(false);
    expect(matchesPattern("a.c", ["a.c"])).toBe(true);
    expect(matchesPattern("abc", ["a.c"])).toBe(false);
  });

  it("is false for an empty pattern list", () => {
    expect(matchesPattern("anything", [])).toBe(false);
  });
});

describe("key selection", () => {
  const keys = ["EMG_session", "EMG_timeline", "HR_stats"];

  it("excludes and includes in original order", () => {
    expect(excludeKeys(keys, ["*timeline"])).toEqual(["EMG_session", "HR_stats"]);
    expect(includeKeys(keys, ["HR_*", "EMG_s*"])).toEqual(["EMG_session", "HR_stats"]);
  });

  it("lets exclude win over include", () => {
    const admit = keyPredicate({ include: ["EMG_*"], exclude: ["EMG_timeline"] });
    expect(admit("EMG_session")).toBe(true);
    expect(admit("EMG_timeline")).toBe(false);
    expect(admit("HR_stats")).toBe(false);
  });

  it("admits everything not excluded when include is absent", () => {
    expect(selectKeys(keys, { include: null, exclude: ["EMG_*"] })).toEqual(["HR_stats"]);
  });
});

// ─── Wildcard expansion ────────────────────────────────────────────

describe("expandWildcards", () => {
  it("yields one match per existing branch, depth-first", () => {
    const matches = [...expandWildcards(makeProfile(), "sensor_metrics.heart_rate.*.*", ["date", "session"])];
    expect(matches.map((m) => m.context)).toEqual([
      { date: "06-01-2025", session: "09-00-00" },
      { date: "06-01-2025", session: "14-00-00" },
      { date: "07-01-2025", session: "10-30-00" },
    ]);
    expect(matches[0]!.keys).toEqual(["sensor_metrics", "heart_rate", "06-01-2025", "09-00-00"]);
  });

  it("gives every branch its own context object", () => {
    const matches = [...expandWildcards(makeProfile(), "sensor_metrics.heart_rate.*.*", ["date", "session"])];
    expect(matches[0]!.context).not.toBe(matches[1]!.context);
    expect(matches[0]!.context.session).toBe("09-00-00");
  });

  it("names unnamed levels level_<i>", () => {
    const [first] = [...expandWildcards(makeProfile(), "sensor_metrics.*")];
    expect(first!.context).toEqual({ level_0: "heart_rate" });
    expect(levelNameFor(["date"], 1)).toBe("level_1");
  });

  it("yields nothing for a missing literal segment or a leaf in the way", () => {
    expect([...expandWildcards(makeProfile(), "sensor_metrics.emg.*")]).toEqual([]);
    expect([...expandWildcards(makeProfile(), "meta_data.group.*")]).toEqual([]);
  });

  it("skips excluded keys at wildcard levels", () => {
    const matches = [
      ...expandWildcards(makeProfile(), "sensor_metrics.heart_rate.*.*", ["date", "session"], { exclude: ["14-*"] }),
    ];
    expect(matches.map((m) => m.context.session)).toEqual(["09-00-00", "10-30-00"]);
  });

  it("restricts date keys to the range", () => {
    const matches = [
      ...expandWildcards(makeProfile(), "sensor_metrics.heart_rate.*", ["date"], {
        dateRange: ["07-01-2025", "31-01-2025"],
      }),
    ];
    expect(matches.map((m) => m.context.date)).toEqual(["07-01-2025"]);
  });

  it("rejects recursive wildcards", () => {
    expect(() => [...expandWildcards(makeProfile(), "sensor_metrics.**")]).toThrow(ConfigurationError);
  });

  it("counts wildcard segments", () => {
    expect(countWildcards("a.*.b.*")).toBe(2);
    expect(countWildcards("")).toBe(0);
  });
});

// ─── Structure helpers ─────────────────────────────────────────────

describe("flattenObject", () => {
  it("joins nested keys and skips empty mappings", () => {
    expect(flattenObject({ a: { b: 1, c: { d: 2 } }, e: [1], f: {} })).toEqual({ "a.b": 1, "a.c.d": 2, e: [1] });
  });

  it("applies a prefix and prunes excluded subtrees", () => {
    expect(flattenObject({ a: { b: 1, c: { d: 2 } }, e: [1] }, "X", ["c"])).toEqual({ "X.a.b": 1, "X.e": [1] });
  });

  it("keeps a __proto__ key as an own column", () => {
    const parsed: unknown = JSON.parse('{"__proto__": 1, "b": {"c": 2}}');
    if (!isJsonObject(parsed)) throw new Error("expected an object");
    const out = flattenObject(parsed);
    expect(Object.keys(out)).toEqual(["__proto__", "b.c"]);
    expect(Object.hasOwn(out, "__proto__")).toBe(true);
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
  });

  it("is undone by unflattenObject", () => {
    expect(unflattenObject({ "a.b": 1, "a.c": 2, d: 3 })).toEqual({ a: { b: 1, c: 2 }, d: 3 });
  });
});

describe("path listing", () => {
  it("lists intermediate and leaf paths up to the depth", () => {
    expect(getNestedKeys({ a: { b: 1 }, c: 2 })).toEqual(["a", "a.b", "c"]);
    expect(getNestedKeys({ a: { b: 1 }, c: 2 }, 1)).toEqual(["a", "c"]);
    expect(getLeafPaths({ a: { b: 1 }, c: 2 })).toEqual(["a.b", "c"]);
  });

  it("finds paths by whole-path glob", () => {
    expect(findPathsMatching(makeProfile(), "sensor_metrics.*.HR_BPM_stats")).toEqual([
      "sensor_metrics.heart_rate.06-01-2025.09-00-00.HR_BPM_stats",
      "sensor_metrics.heart_rate.06-01-2025.14-00-00.HR_BPM_stats",
      "sensor_metrics.heart_rate.07-01-2025.10-30-00.HR_BPM_stats",
    ]);
  });
});

describe("getStructureSummary", () => {
  it("truncates mappings at the depth limit", () => {
    expect(getStructureSummary({ a: { b: { c: 1 } }, d: "x" }, "", 1)).toEqual({
      kind: "mapping",
      children: {
        a: { kind: "truncated", keys: ["b"], keyCount: 1 },
        d: { kind: "leaf", type: "string" },
      },
    });
  });

  it("previews a leaf target", () => {
    expect(getStructureSummary({ a: 5 }, "a")).toEqual({ kind: "leaf", type: "number", preview: "5" });
  });
});

describe("inferLevelType", () => {
  it("recognizes dates, times and sides", () => {
    expect(inferLevelType(["06-01-2025", "2025-01-07"])).toBe("date");
    expect(inferLevelType(["09-00-00", "14:30:00"])).toBe("time");
    expect(inferLevelType(["left", "right"])).toBe("side");
  });

  it("falls back to generic or empty", () => {
    expect(inferLevelType(["06-01-2025", "EMG_weekly_metrics"])).toBe("generic");
    expect(inferLevelType([])).toBe("empty");
  });
});

describe("printTree", () => {
  const data = { meta: { group: "g", age: 30 }, list: [1], n: null };

  it("indents nested mappings", () => {
    expect(printTree(data)).toBe("meta/\n  group: string\n  age: number\nlist: list\nn: null");
  });

  it("collapses mappings at the depth limit", () => {
    expect(printTree(data, { maxDepth: 1 })).toBe("meta/ (2 keys)\nlist: list\nn: null");
  });

  it("reports keys beyond maxKeys", () => {
    expect(printTree({ a: 1, b: 2, c: 3 }, { maxKeys: 1 })).toBe("a: number\n… (+2 more)");
  });
});
