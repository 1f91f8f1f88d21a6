export { resolvePlannerConfig } from "./config";
export { ConfigError, InputError, InvariantViolation, PlannerError, toFailureSummary } from "./errors";
export type { FailureSummary } from "./errors";
export { createPlannerLogger, createSilentLogger } from "./logger";
export type { PlannerLogEntry, PlannerLogger, PlannerLoggerOptions } from "./logger";
export { runPlanner, assembleReport } from "./report";
export type { PlannerReport, PlannerSummary, PlannerRunOptions } from "./report";
export { InvalidDatePolicySchema, PlannerConfigSchema, RawRowsSchema, RISK_TIERS, TOUCH_STATUSES } from "./schema";
export type { PlannerConfig, PlannerConfigInput, RawRow, RiskTier, TouchStatus } from "./schema";
export type * from "./types";
