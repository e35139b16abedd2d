// oh-tidy — nested OH profile extraction into tidy tables

export type { JsonScalar, JsonArray, JsonObject, JsonValue, Profile, ProfileSet } from "./api/types";
export { isJsonObject, profileEntries, GROUP_PATH, WORK_TYPE_PATH } from "./api/types";

// ─── Loading ───────────────────────────────────────────────────────

export type { LoadOptions, LoadResult } from "./data/loadProfiles";
export {
    OH_PROFILE_SUFFIX,
    discoverProfiles,
    extractSubjectId,
    parseProfile,
    loadProfile,
    loadProfiles,
    listSubjects,
    getProfile,
} from "./data/loadProfiles";

// ─── Options and errors ────────────────────────────────────────────

export type {
    CustomFilter,
    DeviceComponent,
    ExtractNestedOptions,
    ExtractOptions,
    FillOptions,
    FilterSpec,
    MergeOptions,
    SideOption,
} from "./models/config";
export { DEFAULT_MERGE_KEYS } from "./models/config";
export { ConfigurationError, DatasetError } from "./models/errors";
export { parseDate, parseTimeOfDay, weekdayIndex, weekdayName, isDateKey, isTimeKey } from "./models/dates";

// ─── Paths and filters ─────────────────────────────────────────────

export * from "./models/path";
export { createFilters, applySubjectFilters, filterDateKeys } from "./models/filter/filters";

// ─── Extraction ────────────────────────────────────────────────────

export { extractNested, collectValueColumns, SUBJECT_COLUMN } from "./models/extract/extractNested";
export { extract, extractFlat, getAvailablePaths, inspectProfile, summarizeProfiles } from "./models/extract/extract";

// ─── Tables ────────────────────────────────────────────────────────

export type { Cell, Row, TidyTable } from "./models/table/table";
export {
    createTable,
    emptyTable,
    isMissing,
    hasColumn,
    getColumn,
    uniqueValues,
    filterRows,
    dropColumns,
    selectColumns,
    withColumn,
    sortRows,
    toCsv,
} from "./models/table/table";
export { outerMerge, mergeAll } from "./models/table/merge";
export type { WeekdayOptions, SessionNumberOptions, DayIndexOptions } from "./models/table/derive";
export {
    addWeekday,
    addWeekdayName,
    addSessionNumber,
    addDayIndex,
    normalizeDateColumn,
} from "./models/table/derive";
export { autofillNanGroups, distributionGroups } from "./models/table/fill";

// ─── Sensors and datasets ──────────────────────────────────────────

export type { Device, SensorPreset } from "./models/sensors";
export { registerSensor, getSensor, listSensors, extractSensor } from "./models/sensors";
export type { DeviceTables } from "./models/prepare/devices";
export { ALL_COMPONENTS, extractSmartwatchAndSmartphone } from "./models/prepare/devices";
export type { AnalysisDataset, AnalysisDatasetInit, SideResult, SubsetOptions } from "./models/prepare/dataset";
export {
    createAnalysisDataset,
    validateDataset,
    getNSubjects,
    getNObservations,
    getDateRange,
    getObsPerSubject,
    subsetDataset,
    describeDataset,
    handleSides,
} from "./models/prepare/dataset";
export type { DailyEmgOptions } from "./models/prepare/emg";
export { prepareDailyEmg, prepareWeeklyEmg } from "./models/prepare/emg";
export type { QuestionnaireOptions } from "./models/prepare/questionnaires";
export { prepareDailyQuestionnaires } from "./models/prepare/questionnaires";
