import { describe, expect, it } from "vitest";

import { resolvePlannerConfig } from "../config";
import { addDays, daysBetween, isoDateFromInstant, parseCalendarDate } from "../dates";
import { ConfigError, toFailureSummary } from "../errors";
import { DEFAULT_HORIZON_BUCKETS } from "../schema";

describe("calendar dates", () => {
  it("accepts ISO, slashed ISO and US formats", () => {
    expect(parseCalendarDate("2024-03-05")).toBe("2024-03-05");
    expect(parseCalendarDate("2024/3/5")).toBe("2024-03-05");
    expect(parseCalendarDate("03/15/2024")).toBe("2024-03-15");
    expect(parseCalendarDate(" 2024-02-29 ")).toBe("2024-02-29");
  });

  it("rejects impossible and free-text dates", () => {
    expect(parseCalendarDate("2024-02-30")).toBeNull();
    expect(parseCalendarDate("2023-02-29")).toBeNull();
    expect(parseCalendarDate("not recorded")).toBeNull();
    expect(parseCalendarDate("")).toBeNull();
    expect(parseCalendarDate(null)).toBeNull();
  });

  it("counts signed days across month and leap boundaries", () => {
    expect(daysBetween("2024-02-28", "2024-03-01")).toBe(2);
    expect(daysBetween("2024-04-01", "2024-03-01")).toBe(-31);
    expect(addDays("2024-04-01", -40)).toBe("2024-02-21");
    expect(addDays("2023-12-31", 1)).toBe("2024-01-01");
  });

  it("reads the UTC calendar date of an instant", () => {
    expect(isoDateFromInstant(new Date("2024-04-01T23:30:00.000Z"))).toBe("2024-04-01");
  });
});

describe("resolvePlannerConfig", () => {
  it("fills every default", () => {
    const config = resolvePlannerConfig();

    expect(config.high_risk).toBe(70);
    expect(config.medium_risk).toBe(40);
    expect(config.cadence_days).toEqual({ high: 7, medium: 21, low: 45 });
    expect(config.status_weights).toEqual({ "no-touch": 40, overdue: 30, "due-soon": 12, "on-track": 0 });
    expect(config.horizon_buckets).toEqual(DEFAULT_HORIZON_BUCKETS);
    expect(config.invalid_date_policy).toBe("no_touch");
    expect(config.explain).toBe(false);
    expect(config.today).toBeUndefined();
  });

  it("lowercases high-impact flags", () => {
    expect(resolvePlannerConfig({ high_impact_flags: [" Housing ", "CRISIS"] }).high_impact_flags).toEqual([
      "housing",
      "crisis",
    ]);
  });

  it("rejects inverted risk thresholds instead of clamping", () => {
    expect(() => resolvePlannerConfig({ medium_risk: 80 })).toThrow(ConfigError);
    try {
      resolvePlannerConfig({ medium_risk: 80 });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toEqual(["medium_risk (80) must be below high_risk (70)"]);
      }
    }
  });

  it("reports schema problems with their path", () => {
    try {
      resolvePlannerConfig({ limit: -1 });
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      expect(error.problems).toHaveLength(1);
      expect(error.problems[0].startsWith("limit: ")).toBe(true);
    }
  });

  it("rejects unknown keys and non-numeric values", () => {
    expect(() => resolvePlannerConfig({ limit: Number.NaN })).toThrow(ConfigError);
    const withExtraKey = { limit: 3, verbose: true };
    expect(() => resolvePlannerConfig(withExtraKey)).toThrow(ConfigError);
  });

  it("collects several cross-field problems at once", () => {
    try {
      resolvePlannerConfig({
        cadence_days: { high: 30, medium: 21, low: 45 },
        status_weights: { "on-track": 50 },
        today: "2024-02-30",
      });
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      expect(error.problems).toEqual([
        "cadence_days must not shorten as risk drops (high 30, medium 21, low 45)",
        "status_weights must be ordered no-touch >= overdue >= due-soon >= on-track",
        'today "2024-02-30" is not a calendar date',
      ]);
    }
  });

  it("requires horizon buckets to be contiguous and end open", () => {
    try {
      resolvePlannerConfig({
        horizon_buckets: [
          { key: "near", label: "near", min_days: 0, max_days: 5 },
          { key: "far", label: "far", min_days: 7, max_days: 20 },
        ],
      });
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      expect(error.problems).toEqual([
        "horizon_buckets[1] must start at day 6 (got 7)",
        "the last horizon bucket must be open-ended (max_days null)",
      ]);
    }
  });

  it("summarizes a config failure for operators", () => {
    const summary = toFailureSummary(new ConfigError(["limit: too small"]));
    expect(summary).toEqual({
      code: "CONFIG_INVALID",
      reason: "Planner configuration rejected.",
      details: ["limit: too small"],
      next_action: "Fix the listed options and rerun.",
    });
    expect(toFailureSummary(new Error("boom")).code).toBe("UNEXPECTED");
  });
});
