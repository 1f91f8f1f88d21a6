import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import { PlannerConfigSchema, type PlannerConfig, type PlannerReport, type PlannerSummary } from "../planner";

export type RunRecord = {
  run_id: string;
  run_label: string;
  generated_at: string;
  today: string;
  scored: number;
  rejected: number;
  escalations: number;
  created_at: string;
};

export type StoredAction = {
  rank: number;
  record_id: string;
  name: string;
  cohort: string;
  owner: string | null;
  channel: string;
  tier: string;
  status: string;
  priority_score: number;
  reasons: string[];
  escalated: boolean;
};

export type StoredRunSummary = {
  run_id: string;
  config: PlannerConfig;
  summary: PlannerSummary;
};

export type PlannerStore = {
  saveRun: (runLabel: string, report: PlannerReport) => RunRecord;
  listRuns: () => RunRecord[];
  getRunActions: (runId: string) => StoredAction[];
  getRunSummary: (runId: string) => StoredRunSummary | null;
  close: () => void;
};

const RunRowSchema = z.object({
  run_id: z.string(),
  run_label: z.string(),
  generated_at: z.string(),
  today: z.string(),
  scored: z.number(),
  rejected: z.number(),
  escalations: z.number(),
  created_at: z.string(),
});

const ActionRowSchema = z.object({
  rank: z.number(),
  record_id: z.string(),
  name: z.string(),
  cohort: z.string(),
  owner: z.string().nullable(),
  channel: z.string(),
  tier: z.string(),
  status: z.string(),
  priority_score: z.number(),
  reasons_json: z.string(),
  escalated: z.number(),
});

const ReasonsSchema = z.array(z.string());
const RunSummaryRowSchema = z.object({ config_json: z.string(), summary_json: z.string() });

const count = z.number().int().nonnegative();
const PlannerSummarySchema: z.ZodType<PlannerSummary> = z.object({
  total_rows: count,
  scored: count,
  rejected: count,
  coerced: count,
  overdue: count,
  due_soon: count,
  on_track: count,
  no_touch: count,
  high_risk: count,
  medium_risk: count,
  low_risk: count,
  stale: count,
  escalations: count,
  owner_alerts: count,
});

export function resolveStorePath() {
  return process.env.OUTREACH_DB_PATH ?? path.join(process.cwd(), "tmp", "outreach_planner.db");
}

function initDb(dbPath: string) {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  db.exec(`
    CREATE TABLE IF NOT EXISTS planner_runs (
      run_id TEXT PRIMARY KEY,
      run_label TEXT NOT NULL,
      generated_at TEXT NOT NULL,
      today TEXT NOT NULL,
      scored INTEGER NOT NULL,
      rejected INTEGER NOT NULL,
      escalations INTEGER NOT NULL,
      config_json TEXT NOT NULL,
      summary_json TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS planner_actions (
      run_id TEXT NOT NULL REFERENCES planner_runs(run_id) ON DELETE CASCADE,
      rank INTEGER NOT NULL,
      record_id TEXT NOT NULL,
      name TEXT NOT NULL,
      cohort TEXT NOT NULL,
      owner TEXT,
      channel TEXT NOT NULL,
      tier TEXT NOT NULL,
      status TEXT NOT NULL,
      priority_score REAL NOT NULL,
      reasons_json TEXT NOT NULL,
      escalated INTEGER NOT NULL,
      PRIMARY KEY (run_id, rank)
    );
    CREATE TABLE IF NOT EXISTS planner_owner_alerts (
      run_id TEXT NOT NULL REFERENCES planner_runs(run_id) ON DELETE CASCADE,
      owner TEXT NOT NULL,
      reasons_json TEXT NOT NULL,
      overdue INTEGER NOT NULL,
      no_touch INTEGER NOT NULL,
      total INTEGER NOT NULL,
      PRIMARY KEY (run_id, owner)
    );
    CREATE INDEX IF NOT EXISTS idx_planner_actions_record ON planner_actions(record_id);
  `);
  return db;
}

export function openPlannerStore(dbPath: string = resolveStorePath()): PlannerStore {
  const db = initDb(dbPath);

  const insertRun = db.prepare(
    `INSERT INTO planner_runs (run_id, run_label, generated_at, today, scored, rejected, escalations, config_json, summary_json, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertAction = db.prepare(
    `INSERT INTO planner_actions (run_id, rank, record_id, name, cohort, owner, channel, tier, status, priority_score, reasons_json, escalated)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertAlert = db.prepare(
    `INSERT INTO planner_owner_alerts (run_id, owner, reasons_json, overdue, no_touch, total)
     VALUES (?, ?, ?, ?, ?, ?)`
  );

  const saveRunTx = db.transaction((run: RunRecord, report: PlannerReport) => {
    insertRun.run(
      run.run_id,
      run.run_label,
      run.generated_at,
      run.today,
      run.scored,
      run.rejected,
      run.escalations,
      JSON.stringify(report.config),
      JSON.stringify(report.summary),
      run.created_at
    );
    const escalated = new Set(report.escalations.map((action) => action.id));
    report.records.forEach((action, index) => {
      insertAction.run(
        run.run_id,
        index + 1,
        action.id,
        action.name,
        action.cohort,
        action.owner,
        action.channel,
        action.tier,
        action.status,
        action.priority_score,
        JSON.stringify(action.priority_reasons),
        escalated.has(action.id) ? 1 : 0
      );
    });
    for (const alert of report.owners.alerts) {
      insertAlert.run(run.run_id, alert.owner, JSON.stringify(alert.reasons), alert.overdue, alert.no_touch, alert.total);
    }
  });

  return {
    saveRun(runLabel, report) {
      const run: RunRecord = {
        run_id: crypto.randomUUID(),
        run_label: runLabel,
        generated_at: report.generated_at,
        today: report.today,
        scored: report.summary.scored,
        rejected: report.summary.rejected,
        escalations: report.summary.escalations,
        created_at: new Date().toISOString(),
      };
      saveRunTx(run, report);
      return run;
    },
    listRuns() {
      const rows = db
        .prepare(
          "SELECT run_id, run_label, generated_at, today, scored, rejected, escalations, created_at FROM planner_runs ORDER BY created_at DESC, run_id ASC"
        )
        .all();
      return z.array(RunRowSchema).parse(rows);
    },
    getRunActions(runId) {
      const rows = db
        .prepare(
          "SELECT rank, record_id, name, cohort, owner, channel, tier, status, priority_score, reasons_json, escalated FROM planner_actions WHERE run_id = ? ORDER BY rank ASC"
        )
        .all(runId);
      return z
        .array(ActionRowSchema)
        .parse(rows)
        .map(({ reasons_json, escalated, ...row }) => ({
          ...row,
          reasons: ReasonsSchema.parse(JSON.parse(reasons_json)),
          escalated: escalated === 1,
        }));
    },
    getRunSummary(runId) {
      const row = db.prepare("SELECT config_json, summary_json FROM planner_runs WHERE run_id = ?").get(runId);
      if (row === undefined) return null;
      const { config_json, summary_json } = RunSummaryRowSchema.parse(row);
      return {
        run_id: runId,
        config: PlannerConfigSchema.parse(JSON.parse(config_json)),
        summary: PlannerSummarySchema.parse(JSON.parse(summary_json)),
      };
    },
    close() {
      db.close();
    },
  };
}
