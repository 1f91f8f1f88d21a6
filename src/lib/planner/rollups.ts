import { assertInvariant } from "./errors";
import { RISK_TIERS, type PlannerConfig, type RiskTier, type TouchStatus } from "./schema";
import { average, byName, groupBy, ratio } from "./stats";
import type {
  Action,
  CadenceAdherence,
  CadenceAdherenceRow,
  ChannelCount,
  CohortHotspot,
  FlagCount,
  StaleByTier,
  StatusCounts,
  TierStatusTable,
} from "./types";

export const UNASSIGNED_COHORT = "Unassigned";

const STATUS_KEYS: Record<TouchStatus, Exclude<keyof StatusCounts, "total">> = {
  overdue: "overdue",
  "due-soon": "due_soon",
  "on-track": "on_track",
  "no-touch": "no_touch",
};

function emptyStatusCounts(): StatusCounts {
  return { overdue: 0, due_soon: 0, on_track: 0, no_touch: 0, total: 0 };
}

export function countStatuses(actions: readonly Action[]): StatusCounts {
  const counts = emptyStatusCounts();
  for (const action of actions) {
    counts[STATUS_KEYS[action.status]] += 1;
    counts.total += 1;
  }
  return counts;
}

export function buildTierStatusTable(actions: readonly Action[]): TierStatusTable {
  const rows: Record<RiskTier, StatusCounts> = {
    high: countStatuses(actions.filter((action) => action.tier === "high")),
    medium: countStatuses(actions.filter((action) => action.tier === "medium")),
    low: countStatuses(actions.filter((action) => action.tier === "low")),
  };

  const totals = emptyStatusCounts();
  let cellSum = 0;
  for (const tier of RISK_TIERS) {
    const row = rows[tier];
    totals.overdue += row.overdue;
    totals.due_soon += row.due_soon;
    totals.on_track += row.on_track;
    totals.no_touch += row.no_touch;
    totals.total += row.total;
    cellSum += row.overdue + row.due_soon + row.on_track + row.no_touch;
  }

  assertInvariant(
    cellSum === actions.length && totals.total === actions.length,
    "tier_status",
    `table holds ${cellSum} cells for ${actions.length} scored records`
  );
  return { rows, totals };
}

function adherenceRow(actions: readonly Action[], cadenceDays: number | null): CadenceAdherenceRow {
  const counts = countStatuses(actions);
  const compliant = counts.on_track + counts.due_soon;
  return {
    cadence_days: cadenceDays,
    total: counts.total,
    compliant,
    overdue: counts.overdue,
    no_touch: counts.no_touch,
    compliance_rate: ratio(compliant, counts.total),
  };
}

/** A record is compliant when it is on-track or due-soon. */
export function summarizeCadenceAdherence(actions: readonly Action[], config: PlannerConfig): CadenceAdherence {
  const summary: CadenceAdherence = {
    overall: adherenceRow(actions, null),
    high: adherenceRow(
      actions.filter((action) => action.tier === "high"),
      config.cadence_days.high
    ),
    medium: adherenceRow(
      actions.filter((action) => action.tier === "medium"),
      config.cadence_days.medium
    ),
    low: adherenceRow(
      actions.filter((action) => action.tier === "low"),
      config.cadence_days.low
    ),
  };

  const tierTotal = RISK_TIERS.reduce((sum, tier) => sum + summary[tier].total, 0);
  assertInvariant(
    tierTotal === summary.overall.total,
    "cadence_adherence",
    `tier totals ${tierTotal} differ from overall ${summary.overall.total}`
  );
  return summary;
}

export function summarizeStaleByTier(actions: readonly Action[]): StaleByTier {
  const summary: StaleByTier = { high: 0, medium: 0, low: 0, total: 0 };
  for (const action of actions) {
    if (!action.is_stale) continue;
    summary[action.tier] += 1;
    summary.total += 1;
  }
  return summary;
}

export function summarizeChannelMix(actions: readonly Action[]): ChannelCount[] {
  const groups = groupBy(actions, (action) => action.channel);
  return [...groups.entries()]
    .map(([channel, members]) => ({ channel, count: members.length }))
    .sort((a, b) => b.count - a.count || byName(a.channel, b.channel));
}

export function summarizeFlags(actions: readonly Action[], config: PlannerConfig): FlagCount[] {
  const counts = new Map<string, number>();
  for (const action of actions) {
    for (const flag of action.flags) {
      counts.set(flag, (counts.get(flag) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([flag, count]) => ({ flag, count, high_impact: config.high_impact_flags.includes(flag) }))
    .sort((a, b) => b.count - a.count || byName(a.flag, b.flag));
}

export function summarizeCohorts(actions: readonly Action[], limit: number): CohortHotspot[] {
  // blank and literal "Unassigned" cohorts land in the same hotspot
  const groups = groupBy(actions, (action) => action.cohort.trim() || UNASSIGNED_COHORT);
  const hotspots: CohortHotspot[] = [];

  for (const [cohort, members] of groups) {
    const counts = countStatuses(members);
    hotspots.push({
      cohort,
      total: counts.total,
      overdue: counts.overdue,
      due_soon: counts.due_soon,
      no_touch: counts.no_touch,
      high_risk: members.filter((action) => action.tier === "high").length,
      medium_risk: members.filter((action) => action.tier === "medium").length,
      low_risk: members.filter((action) => action.tier === "low").length,
      avg_priority: average(members.map((action) => action.priority_score)),
    });
  }

  return hotspots
    .sort(
      (a, b) =>
        b.overdue - a.overdue ||
        b.due_soon - a.due_soon ||
        b.avg_priority - a.avg_priority ||
        byName(a.cohort, b.cohort)
    )
    .slice(0, limit);
}
