import path from "node:path";

import minimist from "minimist";

import { ConfigError, InvalidDatePolicySchema, type PlannerConfigInput } from "../planner";

export type PlannerCliArgs = {
  input: string | null;
  json_path: string | null;
  db_path: string | null;
  run_label: string | null;
  help: boolean;
  config: PlannerConfigInput;
};

const NUMERIC_OPTIONS = [
  "limit",
  "high_risk",
  "medium_risk",
  "soon_days",
  "stale_days",
  "stale_boost",
  "risk_weight",
  "flag_weight",
  "cohort_limit",
  "owner_limit",
  "owner_queue_limit",
  "owner_queue_size",
  "channel_batch_pool",
  "channel_batch_limit",
  "channel_batch_size",
  "escalation_min_score",
  "escalation_limit",
  "owner_alert_overdue",
  "owner_alert_no_touch",
  "owner_alert_total",
  "daily_capacity",
  "capacity_window_days",
  "forecast_days",
] as const satisfies readonly (keyof PlannerConfigInput)[];

const BOOLEAN_OPTIONS = [
  "explain",
  "forecast_include_overdue",
  "capacity_include_overdue",
] as const satisfies readonly (keyof PlannerConfigInput)[];

const PATH_OPTIONS = ["input", "json", "db", "run_label", "today", "invalid_date_policy", "high_impact_flags"];

function kebab(key: string) {
  return key.replace(/_/g, "-");
}

function readOption(argv: minimist.ParsedArgs, key: string): string | undefined {
  for (const alias of [key, kebab(key)]) {
    const value: unknown = argv[alias];
    if (value === undefined) continue;
    // repeated flags: last one wins
    const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
    if (typeof last === "string") return last;
    if (typeof last === "number" || typeof last === "boolean") return String(last);
  }
  return undefined;
}

/**
 * True when argv names the switch in any spelling minimist accepts:
 * `--explain`, `--explain=false` or `--no-explain`. minimist reports an
 * absent boolean as false, which would override a default of true.
 */
function mentionsSwitch(args: readonly string[], name: string) {
  return args.some(
    (arg) => arg === `--${name}` || arg === `--no-${name}` || arg.startsWith(`--${name}=`)
  );
}

function readSwitch(argv: minimist.ParsedArgs, args: readonly string[], key: string): boolean | undefined {
  let value: boolean | undefined;
  for (const name of new Set([key, kebab(key)])) {
    const parsed: unknown = argv[name];
    if (mentionsSwitch(args, name) && typeof parsed === "boolean") value = parsed;
  }
  return value;
}

/**
 * Reads planner options from argv. Numbers are passed through unchecked so
 * that config validation reports bad values instead of silently defaulting.
 * Switches never take the next word as their value, so `--explain data.csv`
 * leaves `data.csv` as the input.
 */
export function parsePlannerArgs(args: string[]): PlannerCliArgs {
  const stringKeys = [...NUMERIC_OPTIONS, ...PATH_OPTIONS];
  const argv = minimist(args, {
    string: [...stringKeys, ...stringKeys.map(kebab)],
    boolean: ["help", ...BOOLEAN_OPTIONS, ...BOOLEAN_OPTIONS.map(kebab)],
    alias: { h: "help" },
  });

  const config: PlannerConfigInput = {};
  for (const key of NUMERIC_OPTIONS) {
    const value = readOption(argv, key);
    if (value !== undefined) config[key] = Number(value);
  }
  for (const key of BOOLEAN_OPTIONS) {
    const value = readSwitch(argv, args, key);
    if (value !== undefined) config[key] = value;
  }

  const today = readOption(argv, "today");
  if (today !== undefined) config.today = today;

  const policy = readOption(argv, "invalid_date_policy");
  if (policy !== undefined) {
    const parsedPolicy = InvalidDatePolicySchema.safeParse(policy);
    if (!parsedPolicy.success) {
      throw new ConfigError([`invalid_date_policy: expected no_touch or reject (got "${policy}")`]);
    }
    config.invalid_date_policy = parsedPolicy.data;
  }

  const flags = readOption(argv, "high_impact_flags");
  if (flags !== undefined) {
    config.high_impact_flags = flags
      .split(/[;,]/)
      .map((flag) => flag.trim())
      .filter(Boolean);
  }

  const input = readOption(argv, "input") ?? (typeof argv._[0] === "string" ? argv._[0] : undefined);
  const jsonPath = readOption(argv, "json");
  const dbPath = readOption(argv, "db");

  return {
    input: input ? path.resolve(input) : null,
    json_path: jsonPath ? path.resolve(jsonPath) : null,
    db_path: dbPath ? path.resolve(dbPath) : null,
    run_label: readOption(argv, "run_label")?.trim() || null,
    help: argv.help === true,
    config,
  };
}

export const PLANNER_USAGE = [
  "Usage: tsx scripts/planner/plan.ts --input <file.csv> [options]",
  "",
  "  --limit <n>                  actions shown in the queue (default 10)",
  "  --high-risk <n>              high tier threshold (default 70)",
  "  --medium-risk <n>            medium tier threshold (default 40)",
  "  --soon-days <n>              due-soon window (default 14)",
  "  --stale-days <n>             staleness threshold (default 60)",
  "  --stale-boost <n>            score boost for stale records (default 15)",
  "  --escalation-min-score <n>   escalation score floor (default 90)",
  "  --forecast-days <n>          forecast window (default 21)",
  "  --invalid-date-policy <p>    no_touch | reject (default no_touch)",
  "  --explain                    include priority reasons",
  "  --no-forecast-include-overdue leave overdue records off the forecast",
  "  --today <YYYY-MM-DD>         override today's date",
  "  --json <path>                write the JSON report",
  "  --db <path>                  persist the run to SQLite",
  "  --run-label <label>          label stored with the run",
].join("\n");

export type SeedCliArgs = {
  input: string;
  db_path: string | null;
  run_label: string | null;
  today: string | undefined;
};

export function parseSeedArgs(args: string[]): SeedCliArgs {
  const argv = minimist(args, {
    string: ["input", "db", "run_label", "today"],
    alias: { "run-label": "run_label" },
  });
  const input = readOption(argv, "input");
  const dbPath = readOption(argv, "db");
  return {
    input: path.resolve(input || path.join("data", "sample.csv")),
    db_path: dbPath ? path.resolve(dbPath) : null,
    run_label: readOption(argv, "run_label")?.trim() || null,
    today: readOption(argv, "today"),
  };
}
