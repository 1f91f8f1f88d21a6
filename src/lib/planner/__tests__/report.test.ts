import { describe, expect, it } from "vitest";

import { ConfigError } from "../errors";
import { createPlannerLogger } from "../logger";
import { runPlanner } from "../report";
import { SAMPLE_ROWS, TODAY } from "./fixtures";

const NOW = new Date("2024-04-01T15:00:00.000Z");

function run(config: Parameters<typeof runPlanner>[1] = {}) {
  return runPlanner(SAMPLE_ROWS, { today: TODAY, explain: true, ...config }, { now: NOW });
}

describe("runPlanner", () => {
  it("ranks scored records into the queue", () => {
    const report = run();

    expect(report.report_version).toBe("outreach_plan_v1");
    expect(report.generated_at).toBe("2024-04-01T15:00:00.000Z");
    expect(report.today).toBe(TODAY);
    expect(report.queue.map((action) => [action.id, action.priority_score])).toEqual([
      ["s-001", 138],
      ["s-004", 129],
      ["s-006", 113],
      ["s-002", 107],
      ["s-003", 93],
      ["s-005", 80],
    ]);
    expect(report.queue[0].recommended_action).toBe(
      "Send a focused email check-in within 48 hours. Confirm support needs and capture blockers."
    );
    expect(report.queue[0].due_date).toBe("2024-03-08");
  });

  it("derives summary figures from the stage outputs", () => {
    expect(run().summary).toEqual({
      total_rows: 8,
      scored: 6,
      rejected: 2,
      coerced: 1,
      overdue: 3,
      due_soon: 1,
      on_track: 0,
      no_touch: 2,
      high_risk: 4,
      medium_risk: 1,
      low_risk: 1,
      stale: 1,
      escalations: 3,
      owner_alerts: 2,
    });
  });

  it("keeps issues in row order with their dispositions", () => {
    expect(run().issues.map((issue) => [issue.row_number, issue.code, issue.disposition])).toEqual([
      [6, "InvalidDate", "coerced"],
      [7, "MissingField", "rejected"],
      [8, "InvalidScore", "rejected"],
    ]);
  });

  it("builds the operational rollups", () => {
    const report = run();

    expect(report.tier_status.rows.high).toEqual({ overdue: 1, due_soon: 1, on_track: 0, no_touch: 2, total: 4 });
    expect(report.channel_mix).toEqual([
      { channel: "sms", count: 3 },
      { channel: "email", count: 2 },
      { channel: "call", count: 1 },
    ]);
    expect(report.flag_frequency.map((entry) => entry.flag)).toEqual(["crisis", "food", "housing", "safety"]);
    expect(report.cohort_hotspots.map((entry) => [entry.cohort, entry.overdue, entry.avg_priority])).toEqual([
      ["2024 Fall", 2, 108.33],
      ["2023 Spring", 1, 111.67],
    ]);
    expect(report.cadence_adherence.overall.compliance_rate).toBe(0.17);
    expect(report.horizon.overdue).toBe(3);
    expect(report.horizon.no_due_date).toBe(2);
    expect(report.forecast.daily[0].count).toBe(3);
    expect(report.forecast.daily[4]).toEqual({ day_index: 4, date: "2024-04-05", count: 1 });
    expect(report.channel_batches.map((batch) => [batch.channel, batch.actions.map((action) => action.id)])).toEqual([
      ["sms", ["s-004", "s-006", "s-002"]],
      ["email", ["s-001", "s-005"]],
      ["call", ["s-003"]],
    ]);
  });

  it("summarizes owners and raises alerts", () => {
    const report = run();

    expect(report.owners.summary.map((owner) => owner.owner)).toEqual([
      "Dee Patel",
      "Casey Lin",
      "Unassigned",
      "Rae Okafor",
    ]);
    expect(report.owners.alerts.map((alert) => [alert.owner, alert.details])).toEqual([
      ["Dee Patel", ["1 never touched (threshold 1)"]],
      ["Rae Okafor", ["1 never touched (threshold 1)"]],
    ]);
    expect(report.owners.capacity.map((row) => [row.owner, row.utilization])).toEqual([
      ["Casey Lin", 0.14],
      ["Dee Patel", 0.07],
      ["Unassigned", 0.07],
      ["Rae Okafor", 0],
    ]);
    expect(report.escalations.map((action) => action.id)).toEqual(["s-001", "s-004", "s-006"]);
  });

  it("applies display limits without hiding escalations", () => {
    const report = run({ limit: 1, owner_limit: 2 });

    expect(report.queue.map((action) => action.id)).toEqual(["s-001"]);
    expect(report.records).toHaveLength(6);
    expect(report.owners.summary).toHaveLength(2);
    expect(report.escalations).toHaveLength(3);
  });

  it("is deterministic for the same input and clock", () => {
    expect(run()).toEqual(run());
  });

  it("uses the injected clock when no date is configured", () => {
    const report = runPlanner(SAMPLE_ROWS, {}, { now: new Date("2024-04-10T08:00:00.000Z") });
    expect(report.today).toBe("2024-04-10");
  });

  it("returns a frozen report that survives a JSON round trip", () => {
    const report = run();

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.queue[0].flags)).toBe(true);
    expect(JSON.parse(JSON.stringify(report))).toEqual(report);
  });

  it("rejects bad configuration before touching any row", () => {
    const logger = createPlannerLogger({ silent: true });

    expect(() => runPlanner(SAMPLE_ROWS, { medium_risk: 90 }, { now: NOW, logger })).toThrow(ConfigError);
    expect(logger.entries).toEqual([]);
  });

  it("logs rejected rows", () => {
    const logger = createPlannerLogger({ silent: true });
    runPlanner(SAMPLE_ROWS, { today: TODAY }, { now: NOW, logger });

    expect(logger.entries.map((entry) => [entry.level, entry.message])).toEqual([
      ["info", "normalized 6/8 rows (2 rejected)"],
      ["warn", "row 7: MissingField Row has no name."],
      ["warn", 'row 8: InvalidScore Risk score "abc" is not a number.'],
      ["info", "scored 6 records as of 2024-04-01; 3 escalations, 2 owner alerts"],
    ]);
  });

  it("counts a rejected row once and never as coerced", () => {
    const report = runPlanner(
      [{ id: "x", name: "", risk_score: "80", last_touch: "garbage" }],
      { today: TODAY },
      { now: NOW }
    );

    expect([report.summary.scored, report.summary.rejected, report.summary.coerced]).toEqual([0, 1, 0]);
  });

  it("stamps log entries with the injected clock", () => {
    const logger = createPlannerLogger({ silent: true, clock: () => NOW });
    runPlanner(SAMPLE_ROWS, { today: TODAY }, { now: NOW, logger });

    expect(new Set(logger.entries.map((entry) => entry.at))).toEqual(new Set(["2024-04-01T15:00:00.000Z"]));
  });

  it("handles an empty input", () => {
    const report = runPlanner([], { today: TODAY }, { now: NOW });
    expect(report.summary.scored).toBe(0);
    expect(report.queue).toEqual([]);
    expect(report.forecast.total).toBe(0);
  });
});
