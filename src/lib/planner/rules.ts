import type { HorizonBucket, PlannerConfig, RiskTier } from "./schema";

export type ThresholdRule<T> = { min: number; outcome: T };

// Rules are ordered; the first one whose threshold is met wins.
export function firstMatch<T>(rules: readonly ThresholdRule<T>[], value: number, fallback: T): T {
  for (const rule of rules) {
    if (value >= rule.min) return rule.outcome;
  }
  return fallback;
}

export function tierRules(config: PlannerConfig): ThresholdRule<RiskTier>[] {
  return [
    { min: config.high_risk, outcome: "high" },
    { min: config.medium_risk, outcome: "medium" },
  ];
}

export function resolveTier(riskScore: number, config: PlannerConfig): RiskTier {
  return firstMatch(tierRules(config), riskScore, "low");
}

export function bucketForDueIn(dueInDays: number, buckets: readonly HorizonBucket[]): HorizonBucket | null {
  for (const bucket of buckets) {
    if (dueInDays < bucket.min_days) continue;
    if (bucket.max_days === null || dueInDays <= bucket.max_days) return bucket;
  }
  return null;
}
