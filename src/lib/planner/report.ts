import { buildForecast, summarizeHorizon } from "./buckets";
import { buildChannelBatches } from "./channels";
import { classifyRecords } from "./classify";
import { resolvePlannerConfig } from "./config";
import { isoDateFromInstant } from "./dates";
import { buildEscalationList } from "./escalation";
import { createSilentLogger, type PlannerLogger } from "./logger";
import { normalizeRows } from "./normalize";
import {
  buildOwnerAlerts,
  buildOwnerQueues,
  summarizeOwnerCapacity,
  summarizeOwnerHorizon,
  summarizeOwners,
} from "./owners";
import { buildCadenceGuidance } from "./recommend";
import {
  buildTierStatusTable,
  summarizeCadenceAdherence,
  summarizeChannelMix,
  summarizeCohorts,
  summarizeFlags,
  summarizeStaleByTier,
} from "./rollups";
import type { PlannerConfig, PlannerConfigInput, RawRow } from "./schema";
import { rankActions, scoreRecord } from "./scoring";
import type {
  Action,
  CadenceAdherence,
  CadenceGuidance,
  ChannelBatch,
  ChannelCount,
  CohortHotspot,
  FlagCount,
  ForecastSeries,
  HorizonSummary,
  NormalizationIssue,
  OwnerAlert,
  OwnerCapacityRow,
  OwnerHorizon,
  OwnerLoadSummary,
  OwnerQueue,
  RunWarning,
  StaleByTier,
  TierStatusTable,
} from "./types";

export type PlannerSummary = {
  total_rows: number;
  scored: number;
  rejected: number;
  coerced: number;
  overdue: number;
  due_soon: number;
  on_track: number;
  no_touch: number;
  high_risk: number;
  medium_risk: number;
  low_risk: number;
  stale: number;
  escalations: number;
  owner_alerts: number;
};

export type PlannerReport = {
  report_version: "outreach_plan_v1";
  generated_at: string;
  today: string;
  config: PlannerConfig;
  summary: PlannerSummary;
  queue: Action[];
  records: Action[];
  tier_status: TierStatusTable;
  cadence_adherence: CadenceAdherence;
  stale_by_tier: StaleByTier;
  channel_mix: ChannelCount[];
  flag_frequency: FlagCount[];
  cohort_hotspots: CohortHotspot[];
  horizon: HorizonSummary;
  forecast: ForecastSeries;
  owners: {
    summary: OwnerLoadSummary[];
    alerts: OwnerAlert[];
    capacity: OwnerCapacityRow[];
    horizon: OwnerHorizon[];
    queues: OwnerQueue[];
  };
  channel_batches: ChannelBatch[];
  escalations: Action[];
  cadence_guidance: CadenceGuidance[];
  issues: NormalizationIssue[];
  warnings: RunWarning[];
};

export type PlannerStageOutputs = {
  generated_at: string;
  today: string;
  config: PlannerConfig;
  total_rows: number;
  ranked: Action[];
  tier_status: TierStatusTable;
  cadence_adherence: CadenceAdherence;
  stale_by_tier: StaleByTier;
  channel_mix: ChannelCount[];
  flag_frequency: FlagCount[];
  cohort_hotspots: CohortHotspot[];
  horizon: HorizonSummary;
  forecast: ForecastSeries;
  owner_summary: OwnerLoadSummary[];
  owner_alerts: OwnerAlert[];
  owner_capacity: OwnerCapacityRow[];
  owner_horizon: OwnerHorizon[];
  owner_queues: OwnerQueue[];
  channel_batches: ChannelBatch[];
  escalations: Action[];
  cadence_guidance: CadenceGuidance[];
  issues: NormalizationIssue[];
  warnings: RunWarning[];
};

export type PlannerRunOptions = {
  now: Date;
  logger?: PlannerLogger;
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// a row can carry several rejected issues
function countRejectedRows(issues: readonly NormalizationIssue[]) {
  return new Set(issues.filter((issue) => issue.disposition === "rejected").map((issue) => issue.row_number)).size;
}

/**
 * Bundles stage outputs without recomputing anything: each summary figure is
 * read off exactly one upstream result.
 */
export function assembleReport(stages: PlannerStageOutputs): PlannerReport {
  const { totals, rows } = stages.tier_status;
  const report: PlannerReport = {
    report_version: "outreach_plan_v1",
    generated_at: stages.generated_at,
    today: stages.today,
    config: stages.config,
    summary: {
      total_rows: stages.total_rows,
      scored: totals.total,
      rejected: countRejectedRows(stages.issues),
      coerced: stages.issues.filter((issue) => issue.disposition === "coerced").length,
      overdue: totals.overdue,
      due_soon: totals.due_soon,
      on_track: totals.on_track,
      no_touch: totals.no_touch,
      high_risk: rows.high.total,
      medium_risk: rows.medium.total,
      low_risk: rows.low.total,
      stale: stages.stale_by_tier.total,
      escalations: stages.escalations.length,
      owner_alerts: stages.owner_alerts.length,
    },
    queue: stages.ranked.slice(0, stages.config.limit),
    records: stages.ranked,
    tier_status: stages.tier_status,
    cadence_adherence: stages.cadence_adherence,
    stale_by_tier: stages.stale_by_tier,
    channel_mix: stages.channel_mix,
    flag_frequency: stages.flag_frequency,
    cohort_hotspots: stages.cohort_hotspots,
    horizon: stages.horizon,
    forecast: stages.forecast,
    owners: {
      summary: stages.owner_summary.slice(0, stages.config.owner_limit),
      alerts: stages.owner_alerts,
      capacity: stages.owner_capacity,
      horizon: stages.owner_horizon,
      queues: stages.owner_queues,
    },
    channel_batches: stages.channel_batches,
    escalations: stages.escalations,
    cadence_guidance: stages.cadence_guidance,
    issues: stages.issues,
    warnings: stages.warnings,
  };
  return deepFreeze(report);
}

/**
 * Runs one planning pass. Configuration is validated before any row is
 * touched; the clock is only read through `options.now`.
 */
export function runPlanner(
  rows: readonly RawRow[],
  configInput: PlannerConfigInput,
  options: PlannerRunOptions
): PlannerReport {
  const logger = options.logger ?? createSilentLogger(() => options.now);
  const config = resolvePlannerConfig(configInput);
  const today = config.today ?? isoDateFromInstant(options.now);

  const normalized = normalizeRows(rows, config);
  const rejected = normalized.issues.filter((issue) => issue.disposition === "rejected");
  logger.info(`normalized ${normalized.records.length}/${rows.length} rows (${countRejectedRows(rejected)} rejected)`);
  for (const issue of rejected) {
    logger.warn(`row ${issue.row_number}: ${issue.code} ${issue.message}`);
  }

  const classified = classifyRecords(normalized.records, today, config);
  for (const warning of classified.warnings) {
    logger.warn(`${warning.record_id}: ${warning.message}`);
  }

  const ranked = rankActions(classified.records.map((record) => scoreRecord(record, config)));
  const ownerSummary = summarizeOwners(ranked, config);
  const ownerAlerts = buildOwnerAlerts(ownerSummary, config);
  const escalations = buildEscalationList(ranked, config);
  logger.info(
    `scored ${ranked.length} records as of ${today}; ${escalations.length} escalations, ${ownerAlerts.length} owner alerts`
  );

  return assembleReport({
    generated_at: options.now.toISOString(),
    today,
    config,
    total_rows: rows.length,
    ranked,
    tier_status: buildTierStatusTable(ranked),
    cadence_adherence: summarizeCadenceAdherence(ranked, config),
    stale_by_tier: summarizeStaleByTier(ranked),
    channel_mix: summarizeChannelMix(ranked),
    flag_frequency: summarizeFlags(ranked, config),
    cohort_hotspots: summarizeCohorts(ranked, config.cohort_limit),
    horizon: summarizeHorizon(ranked, config.horizon_buckets),
    forecast: buildForecast(ranked, today, config),
    owner_summary: ownerSummary,
    owner_alerts: ownerAlerts,
    owner_capacity: summarizeOwnerCapacity(ownerSummary),
    owner_horizon: summarizeOwnerHorizon(ranked, config),
    owner_queues: buildOwnerQueues(ranked, ownerSummary, config),
    channel_batches: buildChannelBatches(ranked, config),
    escalations,
    cadence_guidance: buildCadenceGuidance(config),
    issues: normalized.issues,
    warnings: classified.warnings,
  });
}
