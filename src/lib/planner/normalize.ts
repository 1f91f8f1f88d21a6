import { parseCalendarDate } from "./dates";
import type { PlannerConfig, RawRow } from "./schema";
import type { NormalizationIssue, NormalizedRecord } from "./types";

type CanonicalField =
  | "id"
  | "name"
  | "cohort"
  | "owner"
  | "channel_preference"
  | "last_touch"
  | "risk_score"
  | "flags";

export const FIELD_ALIASES: Record<CanonicalField, readonly string[]> = {
  id: ["id", "scholar_id", "person_id"],
  name: ["name", "full_name"],
  cohort: ["cohort"],
  owner: ["owner", "advisor", "case_manager", "coach"],
  channel_preference: ["channel_preference", "preferred_channel", "channel"],
  last_touch: ["last_touch", "last_contact", "last_touch_date"],
  risk_score: ["risk_score", "risk"],
  flags: ["flags"],
};

export type NormalizedRows = {
  records: NormalizedRecord[];
  issues: NormalizationIssue[];
};

function normalizeKey(key: string) {
  return key.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function buildNormalizedRow(row: RawRow) {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    const normalizedKey = normalizeKey(key);
    // first header wins when two collapse to the same key
    if (normalized[normalizedKey] === undefined) {
      normalized[normalizedKey] = value;
    }
  }
  return normalized;
}

function pickValue(normalizedRow: Record<string, string>, field: CanonicalField) {
  for (const alias of FIELD_ALIASES[field]) {
    const value = normalizedRow[normalizeKey(alias)];
    if (value !== undefined && value.trim() !== "") return value.trim();
  }
  return undefined;
}

export function parseFlags(value: string | undefined): string[] {
  if (!value) return [];
  const flags = new Set<string>();
  for (const part of value.split(";")) {
    const flag = part.trim().toLowerCase();
    if (flag) flags.add(flag);
  }
  return [...flags];
}

export function parseRiskScore(value: string): number | null {
  const parsed = Number(value.replace(/%$/, "").trim());
  if (!Number.isFinite(parsed)) return null;
  return Math.min(100, Math.max(0, Math.round(parsed)));
}

// only a row that is kept can have its date coerced
function invalidDateIssue(
  rowNumber: number,
  id: string | null,
  raw: string,
  rejected: boolean
): NormalizationIssue {
  return {
    row_number: rowNumber,
    record_id: id,
    code: "InvalidDate",
    field: "last_touch",
    value: raw,
    message: rejected ? `Last touch "${raw}" is not a date.` : `Last touch "${raw}" is not a date; treated as never touched.`,
    disposition: rejected ? "rejected" : "coerced",
  };
}

/**
 * Maps one raw row onto the canonical record. A row can produce a record and
 * a coerced issue at the same time (an unreadable last-touch date under the
 * "no_touch" policy).
 */
export function normalizeRow(
  row: RawRow,
  rowNumber: number,
  config: PlannerConfig
): { record: NormalizedRecord | null; issues: NormalizationIssue[] } {
  const normalizedRow = buildNormalizedRow(row);
  const issues: NormalizationIssue[] = [];
  const id = pickValue(normalizedRow, "id") ?? null;

  const reject = (code: NormalizationIssue["code"], field: string, value: string | null, message: string) => {
    issues.push({ row_number: rowNumber, record_id: id, code, field, value, message, disposition: "rejected" });
  };

  if (!id) reject("MissingField", "id", null, "Row has no id.");

  const name = pickValue(normalizedRow, "name");
  if (!name) reject("MissingField", "name", null, "Row has no name.");

  const rawRisk = pickValue(normalizedRow, "risk_score");
  let riskScore: number | null = null;
  if (rawRisk === undefined) {
    reject("MissingField", "risk_score", null, "Row has no risk score.");
  } else {
    riskScore = parseRiskScore(rawRisk);
    if (riskScore === null) {
      reject("InvalidScore", "risk_score", rawRisk, `Risk score "${rawRisk}" is not a number.`);
    }
  }

  const rowRejected = !id || !name || riskScore === null;
  const rawLastTouch = pickValue(normalizedRow, "last_touch");
  let lastTouch: string | null = null;
  if (rawLastTouch !== undefined) {
    lastTouch = parseCalendarDate(rawLastTouch);
    if (lastTouch === null) {
      issues.push(
        invalidDateIssue(rowNumber, id, rawLastTouch, rowRejected || config.invalid_date_policy === "reject")
      );
    }
  }

  if (!id || !name || riskScore === null || issues.some((issue) => issue.disposition === "rejected")) {
    return { record: null, issues };
  }

  return {
    record: {
      id,
      name,
      cohort: pickValue(normalizedRow, "cohort") ?? "",
      owner: pickValue(normalizedRow, "owner") ?? null,
      channel_preference: pickValue(normalizedRow, "channel_preference") ?? "",
      last_touch: lastTouch,
      risk_score: riskScore,
      flags: parseFlags(pickValue(normalizedRow, "flags")),
      row_number: rowNumber,
    },
    issues,
  };
}

export function normalizeRows(rows: readonly RawRow[], config: PlannerConfig): NormalizedRows {
  const records: NormalizedRecord[] = [];
  const issues: NormalizationIssue[] = [];
  const seenIds = new Set<string>();

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const { record, issues: rowIssues } = normalizeRow(row, rowNumber, config);

    if (record && seenIds.has(record.id)) {
      // a dropped duplicate has nothing left to coerce
      for (const issue of rowIssues) {
        issues.push(
          issue.code === "InvalidDate" ? invalidDateIssue(rowNumber, record.id, issue.value ?? "", true) : issue
        );
      }
      issues.push({
        row_number: rowNumber,
        record_id: record.id,
        code: "DuplicateId",
        field: "id",
        value: record.id,
        message: `Id "${record.id}" already appeared earlier in the input.`,
        disposition: "rejected",
      });
      return;
    }

    issues.push(...rowIssues);
    if (!record) return;
    seenIds.add(record.id);
    records.push(record);
  });

  return { records, issues };
}
