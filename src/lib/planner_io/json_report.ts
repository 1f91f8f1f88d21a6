import fs from "node:fs";
import path from "node:path";

import type { PlannerReport } from "../planner";

export function serializeReport(report: PlannerReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export function writeJsonReport(filePath: string, report: PlannerReport): string {
  const outPath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, serializeReport(report), "utf8");
  return outPath;
}
