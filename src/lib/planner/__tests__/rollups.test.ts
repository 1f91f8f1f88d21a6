import { describe, expect, it } from "vitest";

import { buildChannelBatches } from "../channels";
import { resolvePlannerConfig } from "../config";
import { InvariantViolation } from "../errors";
import {
  buildTierStatusTable,
  summarizeCadenceAdherence,
  summarizeChannelMix,
  summarizeCohorts,
  summarizeFlags,
  summarizeStaleByTier,
} from "../rollups";
import { rankActions } from "../scoring";
import { makeAction } from "./fixtures";

const config = resolvePlannerConfig();

describe("buildTierStatusTable", () => {
  it("counts each record once in its tier row", () => {
    const table = buildTierStatusTable([
      makeAction({ id: "1", tier: "high", status: "overdue" }),
      makeAction({ id: "2", tier: "high", status: "due-soon" }),
      makeAction({ id: "3", tier: "medium", status: "on-track" }),
      makeAction({ id: "4", tier: "medium", status: "no-touch" }),
      makeAction({ id: "5", tier: "low", status: "overdue" }),
    ]);

    expect(table.rows.high).toEqual({ overdue: 1, due_soon: 1, on_track: 0, no_touch: 0, total: 2 });
    expect(table.rows.medium).toEqual({ overdue: 0, due_soon: 0, on_track: 1, no_touch: 1, total: 2 });
    expect(table.rows.low).toEqual({ overdue: 1, due_soon: 0, on_track: 0, no_touch: 0, total: 1 });
    expect(table.totals).toEqual({ overdue: 2, due_soon: 1, on_track: 1, no_touch: 1, total: 5 });
  });

  it("returns an all-zero table for an empty run", () => {
    expect(buildTierStatusTable([]).totals.total).toBe(0);
  });
});

describe("summarizeCadenceAdherence", () => {
  it("treats on-track and due-soon as compliant", () => {
    const summary = summarizeCadenceAdherence(
      [
        makeAction({ id: "1", tier: "high", status: "on-track" }),
        makeAction({ id: "2", tier: "high", status: "overdue" }),
        makeAction({ id: "3", tier: "medium", status: "due-soon" }),
        makeAction({ id: "4", tier: "low", status: "no-touch" }),
      ],
      config
    );

    expect(summary.overall).toEqual({
      cadence_days: null,
      total: 4,
      compliant: 2,
      overdue: 1,
      no_touch: 1,
      compliance_rate: 0.5,
    });
    expect(summary.high).toEqual({
      cadence_days: 7,
      total: 2,
      compliant: 1,
      overdue: 1,
      no_touch: 0,
      compliance_rate: 0.5,
    });
    expect(summary.medium.compliance_rate).toBe(1);
    expect(summary.low).toEqual({
      cadence_days: 45,
      total: 1,
      compliant: 0,
      overdue: 0,
      no_touch: 1,
      compliance_rate: 0,
    });
  });
});

describe("record mix summaries", () => {
  const actions = [
    makeAction({ id: "1", channel: "sms", flags: ["housing", "transport"], is_stale: true, tier: "low" }),
    makeAction({ id: "2", channel: "email", flags: ["transport"] }),
    makeAction({ id: "3", channel: "sms", flags: [] }),
    makeAction({ id: "4", channel: "call", flags: ["housing"], is_stale: true, tier: "high" }),
  ];

  it("orders channels by count, then name", () => {
    expect(summarizeChannelMix(actions)).toEqual([
      { channel: "sms", count: 2 },
      { channel: "call", count: 1 },
      { channel: "email", count: 1 },
    ]);
  });

  it("counts every flag and marks the high-impact ones", () => {
    expect(summarizeFlags(actions, config)).toEqual([
      { flag: "housing", count: 2, high_impact: true },
      { flag: "transport", count: 2, high_impact: false },
    ]);
  });

  it("counts stale records per tier", () => {
    expect(summarizeStaleByTier(actions)).toEqual({ high: 1, medium: 0, low: 1, total: 2 });
  });
});

describe("summarizeCohorts", () => {
  it("ranks cohorts by overdue, then due-soon, then average score, then name", () => {
    const hotspots = summarizeCohorts(
      [
        makeAction({ id: "1", cohort: "Fall", status: "overdue", priority_score: 100, tier: "high" }),
        makeAction({ id: "2", cohort: "Fall", status: "on-track", priority_score: 40 }),
        makeAction({ id: "3", cohort: "Spring", status: "overdue", priority_score: 90 }),
        makeAction({ id: "4", cohort: "Spring", status: "due-soon", priority_score: 60 }),
        makeAction({ id: "5", cohort: " ", status: "no-touch", priority_score: 80 }),
        makeAction({ id: "6", cohort: "Summer", status: "overdue", priority_score: 70 }),
      ],
      3
    );

    expect(hotspots.map((entry) => [entry.cohort, entry.overdue, entry.due_soon, entry.avg_priority])).toEqual([
      ["Spring", 1, 1, 75],
      ["Fall", 1, 0, 70],
      ["Summer", 1, 0, 70],
    ]);
    expect(hotspots[1].high_risk).toBe(1);
  });

  it("groups blank cohorts as Unassigned", () => {
    const [only] = summarizeCohorts([makeAction({ cohort: "" })], 5);
    expect(only.cohort).toBe("Unassigned");
  });

  it("merges a cohort named Unassigned with blank cohorts", () => {
    const hotspots = summarizeCohorts(
      [makeAction({ id: "1", cohort: "Unassigned" }), makeAction({ id: "2", cohort: "  " })],
      5
    );
    expect(hotspots.map((entry) => [entry.cohort, entry.total])).toEqual([["Unassigned", 2]]);
  });
});

describe("buildChannelBatches", () => {
  it("groups the head of the queue by channel and keeps queue order inside a batch", () => {
    const ranked = rankActions([
      makeAction({ id: "a", channel: "email", priority_score: 90 }),
      makeAction({ id: "b", channel: "sms", priority_score: 85 }),
      makeAction({ id: "c", channel: "sms", priority_score: 80 }),
      makeAction({ id: "d", channel: "call", priority_score: 75 }),
      makeAction({ id: "e", channel: "sms", priority_score: 70 }),
      makeAction({ id: "f", channel: "email", priority_score: 65 }),
    ]);
    const batches = buildChannelBatches(
      ranked,
      resolvePlannerConfig({ channel_batch_pool: 5, channel_batch_size: 2, channel_batch_limit: 2 })
    );

    expect(batches.map((batch) => [batch.channel, batch.count, batch.actions.map((action) => action.id)])).toEqual([
      ["sms", 3, ["b", "c"]],
      ["call", 1, ["d"]],
    ]);
  });
});

describe("invariants", () => {
  it("raises InvariantViolation with its stage", () => {
    const error = new InvariantViolation("horizon", "counts disagree");
    expect(error.message).toBe("[horizon] counts disagree");
    expect(error.code).toBe("INVARIANT_VIOLATION");
  });
});
