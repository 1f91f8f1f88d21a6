import type { RawRow } from "../schema";
import type { Action } from "../types";

export function makeAction(overrides: Partial<Action> = {}): Action {
  return {
    id: "s-1",
    name: "Test Person",
    cohort: "Test",
    owner: "Owner",
    channel_preference: "email",
    last_touch: null,
    risk_score: 50,
    flags: [],
    row_number: 1,
    tier: "medium",
    cadence_days: 21,
    days_since_touch: 0,
    due_date: null,
    due_in_days: 21,
    overdue_days: null,
    status: "on-track",
    is_stale: false,
    channel: "email",
    priority_score: 50,
    priority_reasons: [],
    recommended_action: "Check in",
    ...overrides,
  };
}

/**
 * Builds an action whose status agrees with its due offset: null is never
 * touched, negative is overdue, anything else is upcoming.
 */
export function actionDueIn(dueInDays: number | null, overrides: Partial<Action> = {}): Action {
  const cadence = overrides.cadence_days ?? 21;
  if (dueInDays === null) {
    return makeAction({
      status: "no-touch",
      days_since_touch: null,
      due_in_days: null,
      ...overrides,
    });
  }
  if (dueInDays < 0) {
    return makeAction({
      status: "overdue",
      days_since_touch: cadence - dueInDays,
      due_in_days: dueInDays,
      overdue_days: -dueInDays,
      ...overrides,
    });
  }
  return makeAction({
    status: "on-track",
    days_since_touch: Math.max(0, cadence - dueInDays),
    due_in_days: dueInDays,
    ...overrides,
  });
}

export const TODAY = "2024-04-01";

// Six scorable rows plus two that normalization rejects.
export const SAMPLE_ROWS: RawRow[] = [
  {
    scholar_id: "s-001",
    name: "Avery Stone",
    cohort: "2024 Fall",
    advisor: "Casey Lin",
    preferred_channel: "email",
    last_contact: "2024-03-01",
    risk_score: "92",
    flags: "housing;crisis",
  },
  {
    scholar_id: "s-002",
    name: "Blake Moreno",
    cohort: "2024 Fall",
    advisor: "Casey Lin",
    preferred_channel: "sms",
    last_contact: "2024-03-29",
    risk_score: "95",
    flags: "",
  },
  {
    scholar_id: "s-003",
    name: "Carmen Ortiz",
    cohort: "2023 Spring",
    advisor: "Dee Patel",
    preferred_channel: "call",
    last_contact: "2024-02-10",
    risk_score: "55",
    flags: "food",
  },
  {
    scholar_id: "s-004",
    name: "Dana Whit",
    cohort: "2023 Spring",
    advisor: "Dee Patel",
    preferred_channel: "text",
    last_contact: "",
    risk_score: "81",
    flags: "safety",
  },
  {
    scholar_id: "s-005",
    name: "Eli Park",
    cohort: "2024 Fall",
    advisor: "",
    preferred_channel: "email",
    last_contact: "2024-01-05",
    risk_score: "35",
    flags: "",
  },
  {
    scholar_id: "s-006",
    name: "Hana Ito",
    cohort: "2023 Spring",
    advisor: "Rae Okafor",
    preferred_channel: "sms",
    last_contact: "not recorded",
    risk_score: "73",
    flags: "",
  },
  {
    scholar_id: "s-007",
    name: "",
    cohort: "2024 Fall",
    advisor: "Rae Okafor",
    preferred_channel: "email",
    last_contact: "2024-03-10",
    risk_score: "50",
    flags: "",
  },
  {
    scholar_id: "s-008",
    name: "Omar Said",
    cohort: "2024 Spring",
    advisor: "Dee Patel",
    preferred_channel: "text",
    last_contact: "2024-03-05",
    risk_score: "abc",
    flags: "",
  },
];
