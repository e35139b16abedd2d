// Daily questionnaire dataset, produced only when some profile has answers
import type { ProfileSet } from "../../api/types";
import { isJsonObject, profileEntries } from "../../api/types";
import { extractNested, SUBJECT_COLUMN } from "../extract/extractNested";
import { resolvePath } from "../path/navigator";
import { addDayIndex, addWeekdayName, normalizeDateColumn } from "../table/derive";
import type { AnalysisDataset } from "./dataset";
import { createAnalysisDataset } from "./dataset";

export const QUESTIONNAIRE_PATH = "daily_questionnaires";

const META = new Set([SUBJECT_COLUMN, "work_type", "date", "domain", "day_index", "weekday"]);

export interface QuestionnaireOptions {
    /** "workload", "pain", … ; every domain when omitted. */
    domain?: string | null;
    addDayIndex?: boolean;
    addWeekday?: boolean;
}

function hasAnswers(profiles: ProfileSet, domain: string | null): boolean {
    return profileEntries(profiles).some(([, profile]) => {
        const questionnaires = resolvePath(profile, QUESTIONNAIRE_PATH);
        if (!isJsonObject(questionnaires)) return false;
        const candidates = domain ? [questionnaires[domain]] : Object.values(questionnaires);
        return candidates.some((v) => isJsonObject(v) && Object.keys(v).length > 0);
    });
}

/**
 * One row per subject × (domain ×) date with every answer as a column.
 * Returns null when no profile carries questionnaire data for the domain.
 */
export function prepareDailyQuestionnaires(
    profiles: ProfileSet,
    { domain = null, addDayIndex: withDayIndex = true, addWeekday: withWeekday = true }: QuestionnaireOptions = {},
): AnalysisDataset | null {
    if (!hasAnswers(profiles, domain)) return null;

    const extracted = extractNested(profiles, {
        basePath: domain ? `${QUESTIONNAIRE_PATH}.${domain}` : QUESTIONNAIRE_PATH,
        levelNames: domain ? ["date"] : ["domain", "date"],
        valuePaths: ["*"],
    });
    if (extracted.rows.length === 0) return null;

    let { table: data } = normalizeDateColumn(extracted);
    if (data.rows.length === 0) return null;
    if (withDayIndex) data = addDayIndex(data);
    if (withWeekday) data = addWeekdayName(data);

    return createAnalysisDataset({
        data,
        outcomeVars: data.columns.filter((c) => !META.has(c)),
        groupingVars: data.columns.includes("domain") ? ["domain"] : [],
        sensor: "questionnaire",
        level: "daily",
    });
}
