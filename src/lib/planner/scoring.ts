import { buildRecommendation, normalizeChannel, tierLabel } from "./recommend";
import type { PlannerConfig } from "./schema";
import type { Action, ClassifiedRecord } from "./types";

type ScoreComponent = {
  key: "risk" | "status" | "stale" | "flags";
  points: (record: ClassifiedRecord, config: PlannerConfig) => number;
  reason: (record: ClassifiedRecord, config: PlannerConfig) => string;
};

function days(count: number) {
  return `${count} day${count === 1 ? "" : "s"}`;
}

export function highImpactFlags(record: ClassifiedRecord, config: PlannerConfig): string[] {
  return record.flags.filter((flag) => config.high_impact_flags.includes(flag));
}

function describeStatus(record: ClassifiedRecord): string {
  switch (record.status) {
    case "no-touch":
      return "No recorded touchpoint";
    case "overdue":
      return `Overdue by ${days(record.overdue_days ?? 0)} (cadence ${record.cadence_days} days)`;
    case "due-soon":
      return record.due_in_days === 0 ? "Due today" : `Due in ${days(record.due_in_days ?? 0)}`;
    case "on-track":
      return "On track";
  }
}

/**
 * The single source for both the score and its explanation. Order here is the
 * order reasons appear in: risk tier, due status, staleness, flags.
 */
export const SCORE_COMPONENTS: readonly ScoreComponent[] = [
  {
    key: "risk",
    points: (record, config) => record.risk_score * config.risk_weight,
    reason: (record) => `${tierLabel(record.tier)} tier (risk score ${record.risk_score})`,
  },
  {
    key: "status",
    points: (record, config) => config.status_weights[record.status],
    reason: (record) => describeStatus(record),
  },
  {
    key: "stale",
    points: (record, config) => (record.is_stale ? config.stale_boost : 0),
    reason: (record, config) =>
      `Stale: ${days(record.days_since_touch ?? 0)} since last touch (threshold ${config.stale_days})`,
  },
  {
    key: "flags",
    points: (record, config) => highImpactFlags(record, config).length * config.flag_weight,
    reason: (record, config) => `High-impact flags: ${highImpactFlags(record, config).join(", ")}`,
  },
];

function roundScore(value: number) {
  return Math.round(value * 100) / 100;
}

export function computePriorityScore(record: ClassifiedRecord, config: PlannerConfig): number {
  const total = SCORE_COMPONENTS.reduce((sum, component) => sum + component.points(record, config), 0);
  return roundScore(total);
}

export function explainPriority(record: ClassifiedRecord, config: PlannerConfig): string[] {
  return SCORE_COMPONENTS.filter((component) => component.points(record, config) > 0).map((component) =>
    component.reason(record, config)
  );
}

export function scoreRecord(record: ClassifiedRecord, config: PlannerConfig): Action {
  return {
    ...record,
    channel: normalizeChannel(record.channel_preference),
    priority_score: computePriorityScore(record, config),
    priority_reasons: config.explain ? explainPriority(record, config) : [],
    recommended_action: buildRecommendation(record.tier, record.channel_preference, record.status),
  };
}

function stalenessRank(action: Action) {
  return action.days_since_touch === null ? Number.POSITIVE_INFINITY : action.days_since_touch;
}

/**
 * Total order for every queue: score desc, risk score desc, days since touch
 * desc (never touched first), then id ascending by code unit.
 */
export function compareActions(a: Action, b: Action): number {
  if (a.priority_score !== b.priority_score) return b.priority_score - a.priority_score;
  if (a.risk_score !== b.risk_score) return b.risk_score - a.risk_score;
  const staleA = stalenessRank(a);
  const staleB = stalenessRank(b);
  if (staleA !== staleB) return staleA > staleB ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function rankActions(actions: readonly Action[]): Action[] {
  return [...actions].sort(compareActions);
}
