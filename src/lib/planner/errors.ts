export type PlannerErrorCode = "CONFIG_INVALID" | "INVARIANT_VIOLATION" | "INPUT_UNREADABLE";

export type FailureSummary = {
  code: PlannerErrorCode | "UNEXPECTED";
  reason: string;
  details: string[];
  next_action: string;
};

export class PlannerError extends Error {
  readonly code: PlannerErrorCode;

  constructor(code: PlannerErrorCode, message: string) {
    super(message);
    this.name = "PlannerError";
    this.code = code;
  }
}

/** Raised before any scoring when the run configuration is unusable. */
export class ConfigError extends PlannerError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super("CONFIG_INVALID", `Invalid planner configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

/** An aggregate disagreed with its own inputs. Always a logic defect, never bad data. */
export class InvariantViolation extends PlannerError {
  readonly stage: string;

  constructor(stage: string, message: string) {
    super("INVARIANT_VIOLATION", `[${stage}] ${message}`);
    this.name = "InvariantViolation";
    this.stage = stage;
  }
}

export class InputError extends PlannerError {
  readonly source: string;

  constructor(source: string, message: string) {
    super("INPUT_UNREADABLE", `${source}: ${message}`);
    this.name = "InputError";
    this.source = source;
  }
}

export function assertInvariant(condition: boolean, stage: string, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(stage, message);
  }
}

export function toFailureSummary(error: unknown): FailureSummary {
  if (error instanceof ConfigError) {
    return {
      code: error.code,
      reason: "Planner configuration rejected.",
      details: error.problems,
      next_action: "Fix the listed options and rerun.",
    };
  }
  if (error instanceof InvariantViolation) {
    return {
      code: error.code,
      reason: error.message,
      details: [`stage: ${error.stage}`],
      next_action: "Report the failing stage with the input file; the run output is not trustworthy.",
    };
  }
  if (error instanceof PlannerError) {
    return {
      code: error.code,
      reason: error.message,
      details: [],
      next_action: "Check the input path and file format, then rerun.",
    };
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    code: "UNEXPECTED",
    reason,
    details: [],
    next_action: "Review logs for the failing step and rerun the planner.",
  };
}
