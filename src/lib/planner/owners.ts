import { summarizeHorizon } from "./buckets";
import { countStatuses } from "./rollups";
import type { PlannerConfig } from "./schema";
import { rankActions } from "./scoring";
import { average, byName, groupBy, ratio } from "./stats";
import type {
  Action,
  OwnerAlert,
  OwnerAlertReason,
  OwnerCapacity,
  OwnerCapacityRow,
  OwnerHorizon,
  OwnerLoadSummary,
  OwnerQueue,
} from "./types";

export const UNASSIGNED_OWNER = "Unassigned";

/**
 * Grouping and display key for an owner. Rosters write "Unassigned" for an
 * empty advisor column, so a literal "Unassigned" owner shares the bucket of
 * records with no owner at all.
 */
export function ownerKey(owner: string | null): string {
  const trimmed = owner?.trim() ?? "";
  return trimmed || UNASSIGNED_OWNER;
}

export function groupByOwner(actions: readonly Action[]): Map<string, Action[]> {
  return groupBy(actions, (action) => ownerKey(action.owner));
}

/** Near-term due volume against what the owner can cover in the capacity window. */
export function computeOwnerCapacity(actions: readonly Action[], config: PlannerConfig): OwnerCapacity {
  const windowDays = config.capacity_window_days;
  const capacity = config.daily_capacity * windowDays;
  let overdue = 0;
  let upcoming = 0;

  for (const action of actions) {
    if (action.status === "overdue") {
      overdue += 1;
      continue;
    }
    if (action.due_in_days !== null && action.due_in_days >= 0 && action.due_in_days < windowDays) {
      upcoming += 1;
    }
  }

  const dueWithinWindow = upcoming + (config.capacity_include_overdue ? overdue : 0);
  return {
    window_days: windowDays,
    daily_capacity: config.daily_capacity,
    capacity,
    due_within_window: dueWithinWindow,
    overdue,
    gap: Math.max(0, dueWithinWindow - capacity),
    utilization: ratio(dueWithinWindow, capacity),
  };
}

export function summarizeOwners(actions: readonly Action[], config: PlannerConfig): OwnerLoadSummary[] {
  const summaries: OwnerLoadSummary[] = [];
  for (const [owner, members] of groupByOwner(actions)) {
    const counts = countStatuses(members);
    summaries.push({
      owner,
      total: counts.total,
      overdue: counts.overdue,
      due_soon: counts.due_soon,
      on_track: counts.on_track,
      no_touch: counts.no_touch,
      stale: members.filter((action) => action.is_stale).length,
      high_risk: members.filter((action) => action.tier === "high").length,
      avg_priority: average(members.map((action) => action.priority_score)),
      capacity: computeOwnerCapacity(members, config),
    });
  }

  return summaries.sort(
    (a, b) =>
      b.overdue - a.overdue || b.no_touch - a.no_touch || b.total - a.total || byName(a.owner, b.owner)
  );
}

type AlertRule = {
  reason: OwnerAlertReason;
  metric: (owner: OwnerLoadSummary) => number;
  threshold: (config: PlannerConfig) => number;
  describe: (value: number, threshold: number) => string;
};

const ALERT_RULES: readonly AlertRule[] = [
  {
    reason: "overdue_backlog",
    metric: (owner) => owner.overdue,
    threshold: (config) => config.owner_alert_overdue,
    describe: (value, threshold) => `${value} overdue (threshold ${threshold})`,
  },
  {
    reason: "no_touch_backlog",
    metric: (owner) => owner.no_touch,
    threshold: (config) => config.owner_alert_no_touch,
    describe: (value, threshold) => `${value} never touched (threshold ${threshold})`,
  },
  {
    reason: "caseload",
    metric: (owner) => owner.total,
    threshold: (config) => config.owner_alert_total,
    describe: (value, threshold) => `${value} assigned (threshold ${threshold})`,
  },
];

/** Every rule is checked independently; one owner can trip several. */
export function buildOwnerAlerts(owners: readonly OwnerLoadSummary[], config: PlannerConfig): OwnerAlert[] {
  const alerts: OwnerAlert[] = [];
  for (const owner of owners) {
    const triggered = ALERT_RULES.filter((rule) => rule.metric(owner) >= rule.threshold(config));
    if (triggered.length === 0) continue;
    alerts.push({
      owner: owner.owner,
      reasons: triggered.map((rule) => rule.reason),
      details: triggered.map((rule) => rule.describe(rule.metric(owner), rule.threshold(config))),
      overdue: owner.overdue,
      no_touch: owner.no_touch,
      total: owner.total,
    });
  }
  return alerts;
}

export function summarizeOwnerCapacity(owners: readonly OwnerLoadSummary[]): OwnerCapacityRow[] {
  return owners
    .map((owner) => ({ owner: owner.owner, ...owner.capacity }))
    .sort(
      (a, b) =>
        b.utilization - a.utilization ||
        b.due_within_window - a.due_within_window ||
        byName(a.owner, b.owner)
    );
}

export function summarizeOwnerHorizon(actions: readonly Action[], config: PlannerConfig): OwnerHorizon[] {
  const rows: OwnerHorizon[] = [];
  for (const [owner, members] of groupByOwner(actions)) {
    rows.push({
      owner,
      ...summarizeHorizon(members, config.horizon_buckets),
      avg_priority: average(members.map((action) => action.priority_score)),
    });
  }
  return rows.sort((a, b) => b.overdue - a.overdue || byName(a.owner, b.owner));
}

/** `owners` must already be in workload order (see summarizeOwners). */
export function buildOwnerQueues(
  actions: readonly Action[],
  owners: readonly OwnerLoadSummary[],
  config: PlannerConfig
): OwnerQueue[] {
  const grouped = groupByOwner(actions);
  return owners.slice(0, config.owner_queue_limit).map((owner) => {
    const members = grouped.get(owner.owner) ?? [];
    return {
      owner: owner.owner,
      total: members.length,
      actions: rankActions(members).slice(0, config.owner_queue_size),
    };
  });
}
