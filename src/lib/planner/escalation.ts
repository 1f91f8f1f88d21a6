import type { PlannerConfig } from "./schema";
import { rankActions } from "./scoring";
import type { Action } from "./types";

export function isEscalationCandidate(action: Action, config: PlannerConfig): boolean {
  return (
    action.tier === "high" &&
    (action.status === "overdue" || action.status === "no-touch") &&
    action.priority_score >= config.escalation_min_score
  );
}

// Scans the whole scored set; display limits elsewhere never hide a candidate.
export function buildEscalationList(actions: readonly Action[], config: PlannerConfig): Action[] {
  return rankActions(actions.filter((action) => isEscalationCandidate(action, config))).slice(
    0,
    config.escalation_limit
  );
}
