import { parseCalendarDate } from "./dates";
import { ConfigError } from "./errors";
import { PlannerConfigSchema, type PlannerConfig, type PlannerConfigInput } from "./schema";

function checkRiskThresholds(config: PlannerConfig, problems: string[]) {
  if (config.medium_risk >= config.high_risk) {
    problems.push(
      `medium_risk (${config.medium_risk}) must be below high_risk (${config.high_risk})`
    );
  }
}

function checkCadence(config: PlannerConfig, problems: string[]) {
  const { high, medium, low } = config.cadence_days;
  if (high > medium || medium > low) {
    problems.push(
      `cadence_days must not shorten as risk drops (high ${high}, medium ${medium}, low ${low})`
    );
  }
}

function checkStatusWeights(config: PlannerConfig, problems: string[]) {
  const weights = config.status_weights;
  const ordered = [weights["no-touch"], weights.overdue, weights["due-soon"], weights["on-track"]];
  for (let i = 1; i < ordered.length; i += 1) {
    if (ordered[i] > ordered[i - 1]) {
      problems.push(
        "status_weights must be ordered no-touch >= overdue >= due-soon >= on-track"
      );
      return;
    }
  }
}

function checkHorizonBuckets(config: PlannerConfig, problems: string[]) {
  const buckets = config.horizon_buckets;
  const keys = new Set<string>();
  let expectedMin = 0;

  buckets.forEach((bucket, index) => {
    const isLast = index === buckets.length - 1;
    if (keys.has(bucket.key)) {
      problems.push(`horizon_buckets key "${bucket.key}" is duplicated`);
    }
    keys.add(bucket.key);

    if (bucket.min_days !== expectedMin) {
      problems.push(
        `horizon_buckets[${index}] must start at day ${expectedMin} (got ${bucket.min_days})`
      );
    }
    if (isLast) {
      if (bucket.max_days !== null) {
        problems.push("the last horizon bucket must be open-ended (max_days null)");
      }
      return;
    }
    if (bucket.max_days === null) {
      problems.push(`horizon_buckets[${index}] is open-ended but is not the last bucket`);
      return;
    }
    if (bucket.max_days < bucket.min_days) {
      problems.push(`horizon_buckets[${index}] ends before it starts`);
    }
    expectedMin = bucket.max_days + 1;
  });
}

function checkToday(config: PlannerConfig, problems: string[]) {
  if (config.today !== undefined && parseCalendarDate(config.today) !== config.today) {
    problems.push(`today "${config.today}" is not a calendar date`);
  }
}

/**
 * Parses raw options into a complete configuration. Invalid values are never
 * clamped; every problem found is reported in one ConfigError.
 */
export function resolvePlannerConfig(input: PlannerConfigInput = {}): PlannerConfig {
  const parsed = PlannerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "config";
        return `${where}: ${issue.message}`;
      })
    );
  }

  const config = parsed.data;
  const problems: string[] = [];
  checkRiskThresholds(config, problems);
  checkCadence(config, problems);
  checkStatusWeights(config, problems);
  checkHorizonBuckets(config, problems);
  checkToday(config, problems);

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}
