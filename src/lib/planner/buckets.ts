import { addDays } from "./dates";
import { assertInvariant } from "./errors";
import { bucketForDueIn } from "./rules";
import type { HorizonBucket, PlannerConfig } from "./schema";
import type { Action, ForecastDay, ForecastSeries, HorizonSummary } from "./types";

// Overdue and never-touched records belong to "now", not to an upcoming bucket.
function isUpcoming(action: Action): action is Action & { due_in_days: number } {
  return action.status !== "overdue" && action.status !== "no-touch" && action.due_in_days !== null;
}

export function summarizeHorizon(actions: readonly Action[], buckets: readonly HorizonBucket[]): HorizonSummary {
  const counts = buckets.map((bucket) => ({ ...bucket, count: 0 }));
  let overdue = 0;
  let noDueDate = 0;

  for (const action of actions) {
    if (action.status === "overdue") {
      overdue += 1;
      continue;
    }
    if (!isUpcoming(action)) {
      noDueDate += 1;
      continue;
    }
    const bucket = bucketForDueIn(action.due_in_days, buckets);
    assertInvariant(bucket !== null, "horizon", `no bucket covers ${action.due_in_days} days (record ${action.id})`);
    const target = counts.find((entry) => entry.key === bucket.key);
    assertInvariant(target !== undefined, "horizon", `bucket ${bucket.key} missing from counts`);
    target.count += 1;
  }

  const bucketed = counts.reduce((sum, entry) => sum + entry.count, 0);
  assertInvariant(
    overdue + noDueDate + bucketed === actions.length,
    "horizon",
    `${overdue} overdue + ${noDueDate} undated + ${bucketed} bucketed != ${actions.length}`
  );

  return { total: actions.length, overdue, no_due_date: noDueDate, buckets: counts };
}

/**
 * One entry per day for `forecast_days` days starting today. Each record lands
 * on at most one day; overdue records land on day 0 only when the config asks.
 */
export function buildForecast(actions: readonly Action[], today: string, config: PlannerConfig): ForecastSeries {
  const windowDays = config.forecast_days;
  const includeOverdue = config.forecast_include_overdue;
  const daily: ForecastDay[] = Array.from({ length: windowDays }, (_, day_index) => ({
    day_index,
    date: addDays(today, day_index),
    count: 0,
  }));

  let overdue = 0;
  let noDueDate = 0;
  let beyondWindow = 0;
  let inWindow = 0;

  for (const action of actions) {
    if (action.status === "overdue") {
      overdue += 1;
      if (includeOverdue) daily[0].count += 1;
      continue;
    }
    if (!isUpcoming(action)) {
      noDueDate += 1;
      continue;
    }
    if (action.due_in_days >= windowDays) {
      beyondWindow += 1;
      continue;
    }
    daily[action.due_in_days].count += 1;
    inWindow += 1;
  }

  const total = daily.reduce((sum, day) => sum + day.count, 0);
  assertInvariant(
    total === inWindow + (includeOverdue ? overdue : 0),
    "forecast",
    `daily counts sum to ${total}, expected ${inWindow} in window${includeOverdue ? ` + ${overdue} overdue` : ""}`
  );

  return {
    window_days: windowDays,
    include_overdue: includeOverdue,
    start_date: today,
    daily,
    overdue,
    no_due_date: noDueDate,
    beyond_window: beyondWindow,
    in_window: inWindow,
    total,
  };
}
