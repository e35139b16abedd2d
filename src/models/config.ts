// Option records accepted by the public API, validated with zod.
// Each schema's input type is what callers write; its output type (defaults
// applied) is what the implementation reads.
import { z } from "zod";
import type { Profile } from "../api/types";
import { WORK_TYPE_PATH } from "../api/types";
import { parseDate } from "./dates";
import { ConfigurationError } from "./errors";
import { hasRecursiveWildcard } from "./path/expand";

export type CustomFilter = (subjectId: string, profile: Profile) => boolean;

// ─── Building blocks ───────────────────────────────────────────────

export const patternListSchema = z.array(z.string({ invalid_type_error: "patterns must be strings" }));

export const dateRangeSchema = z
    .tuple([z.string(), z.string()])
    .superRefine(([start, end], ctx) => {
        const startDate = parseDate(start);
        const endDate = parseDate(end);
        if (!startDate) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable start date "${start}"` });
        if (!endDate) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable end date "${end}"` });
        if (startDate && endDate && startDate > endDate) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `start "${start}" is after end "${end}"` });
        }
    });

export const sideOptionSchema = z.enum(["left", "right", "both", "average"]);

export type SideOption = z.infer<typeof sideOptionSchema>;

export const deviceComponentSchema = z.enum(["HR", "wrist", "noise", "activity"]);

export type DeviceComponent = z.infer<typeof deviceComponentSchema>;

// ─── Subject filters ───────────────────────────────────────────────

export const filterSpecSchema = z
    .object({
        subjectIds: z.array(z.string()).nullish(),
        excludeSubjects: z.array(z.string()).nullish(),
        groups: z.array(z.string()).nullish(),
        dateRange: dateRangeSchema.nullish(),
        requireKeys: z.array(z.string()).nullish(),
        customFilter: z
            .custom<CustomFilter>((v) => typeof v === "function", { message: "customFilter must be a function" })
            .nullish(),
    })
    .strict();

export type FilterSpec = z.infer<typeof filterSpecSchema>;

// ─── Extraction ────────────────────────────────────────────────────

export const extractNestedOptionsSchema = z
    .object({
        basePath: z.string(),
        levelNames: z.array(z.string().min(1)).default([]),
        valuePaths: z.array(z.string()).default(["*"]),
        excludePatterns: patternListSchema.default([]),
        includePatterns: patternListSchema.nullish(),
        filters: filterSpecSchema.nullish(),
        metadata: z.record(z.string()).default({ work_type: WORK_TYPE_PATH }),
    })
    .strict()
    .superRefine((opts, ctx) => {
        const reserved = new Set(["subject_id", ...Object.keys(opts.metadata)]);
        const seen = new Set<string>();
        for (const name of opts.levelNames) {
            if (reserved.has(name) || seen.has(name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["levelNames"],
                    message: `level name "${name}" is used twice or collides with an identifier column`,
                });
            }
            seen.add(name);
        }
        const recursive = (path: (string | number)[]) =>
            ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: 'recursive wildcard "**" is not supported' });
        if (hasRecursiveWildcard(opts.basePath)) recursive(["basePath"]);
        opts.valuePaths.forEach((valuePath, i) => {
            if (hasRecursiveWildcard(valuePath)) recursive(["valuePaths", i]);
        });
    });

export type ExtractNestedOptions = z.input<typeof extractNestedOptionsSchema>;
export type ResolvedExtractNestedOptions = z.output<typeof extractNestedOptionsSchema>;

export const extractOptionsSchema = z
    .object({
        paths: z.record(z.string()),
        filters: filterSpecSchema.nullish(),
    })
    .strict();

export type ExtractOptions = z.input<typeof extractOptionsSchema>;

// ─── Table composition ─────────────────────────────────────────────

export const DEFAULT_MERGE_KEYS = ["subject_id", "work_type", "date", "session"];

export const mergeOptionsSchema = z
    .object({
        on: z.array(z.string()).min(1).default(DEFAULT_MERGE_KEYS),
        suffixes: z.tuple([z.string(), z.string()]).default(["_x", "_y"]),
    })
    .strict()
    .refine((opts) => opts.suffixes[0] !== opts.suffixes[1], { message: "suffixes must differ" });

export type MergeOptions = z.input<typeof mergeOptionsSchema>;

export const fillOptionsSchema = z
    .object({
        minGroupSize: z.number().int().min(1).default(2),
        marker: z.string().default("distributions"),
    })
    .strict();

export type FillOptions = z.input<typeof fillOptionsSchema>;

// ─── Validation entry point ────────────────────────────────────────

/** Validate `value` against `schema`, turning zod's failure into a ConfigurationError. */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
    const result = schema.safeParse(value);
    if (result.success) return result.data;
    const details = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
    throw new ConfigurationError(`Invalid ${what}: ${details}`);
}
