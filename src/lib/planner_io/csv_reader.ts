import fs from "node:fs";

import { parse as parseCsv } from "csv-parse/sync";

import { InputError, RawRowsSchema, type RawRow } from "../planner";

export function parseOutreachCsv(text: string, source = "input"): RawRow[] {
  let records: unknown;
  try {
    records = parseCsv(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new InputError(source, error instanceof Error ? error.message : String(error));
  }

  const parsed = RawRowsSchema.safeParse(records);
  if (!parsed.success) {
    throw new InputError(source, "CSV rows did not parse into text columns.");
  }
  return parsed.data;
}

export function readOutreachCsv(filePath: string): RawRow[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new InputError(filePath, error instanceof Error ? error.message : String(error));
  }
  return parseOutreachCsv(text, filePath);
}
