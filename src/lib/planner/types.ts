import type { HorizonBucket, RiskTier, TouchStatus } from "./schema";

export type NormalizedRecord = {
  id: string;
  name: string;
  cohort: string;
  owner: string | null;
  channel_preference: string;
  last_touch: string | null;
  risk_score: number;
  flags: string[];
  row_number: number;
};

export type ClassifiedRecord = NormalizedRecord & {
  tier: RiskTier;
  cadence_days: number;
  // null means never touched
  days_since_touch: number | null;
  due_date: string | null;
  due_in_days: number | null;
  overdue_days: number | null;
  status: TouchStatus;
  is_stale: boolean;
};

export type Action = ClassifiedRecord & {
  channel: string;
  priority_score: number;
  priority_reasons: string[];
  recommended_action: string;
};

export type NormalizationIssueCode = "MissingField" | "InvalidScore" | "InvalidDate" | "DuplicateId";

export type NormalizationIssue = {
  row_number: number;
  record_id: string | null;
  code: NormalizationIssueCode;
  field: string;
  value: string | null;
  message: string;
  disposition: "rejected" | "coerced";
};

export type RunWarning = {
  record_id: string;
  code: "FutureTouchDate";
  message: string;
};

export type StatusCounts = {
  overdue: number;
  due_soon: number;
  on_track: number;
  no_touch: number;
  total: number;
};

export type TierStatusTable = {
  rows: Record<RiskTier, StatusCounts>;
  totals: StatusCounts;
};

export type CadenceAdherenceRow = {
  cadence_days: number | null;
  total: number;
  compliant: number;
  overdue: number;
  no_touch: number;
  compliance_rate: number;
};

export type CadenceAdherence = Record<RiskTier | "overall", CadenceAdherenceRow>;

export type StaleByTier = Record<RiskTier | "total", number>;

export type ChannelCount = { channel: string; count: number };

export type FlagCount = { flag: string; count: number; high_impact: boolean };

export type CohortHotspot = {
  cohort: string;
  total: number;
  overdue: number;
  due_soon: number;
  no_touch: number;
  high_risk: number;
  medium_risk: number;
  low_risk: number;
  avg_priority: number;
};

export type HorizonBucketCount = HorizonBucket & { count: number };

export type HorizonSummary = {
  total: number;
  overdue: number;
  no_due_date: number;
  buckets: HorizonBucketCount[];
};

export type ForecastDay = { day_index: number; date: string; count: number };

export type ForecastSeries = {
  window_days: number;
  include_overdue: boolean;
  start_date: string;
  daily: ForecastDay[];
  overdue: number;
  no_due_date: number;
  beyond_window: number;
  in_window: number;
  total: number;
};

export type OwnerCapacity = {
  window_days: number;
  daily_capacity: number;
  capacity: number;
  due_within_window: number;
  overdue: number;
  gap: number;
  utilization: number;
};

export type OwnerLoadSummary = {
  owner: string;
  total: number;
  overdue: number;
  due_soon: number;
  on_track: number;
  no_touch: number;
  stale: number;
  high_risk: number;
  avg_priority: number;
  capacity: OwnerCapacity;
};

export type OwnerAlertReason = "overdue_backlog" | "no_touch_backlog" | "caseload";

export type OwnerAlert = {
  owner: string;
  reasons: OwnerAlertReason[];
  details: string[];
  overdue: number;
  no_touch: number;
  total: number;
};

export type OwnerCapacityRow = OwnerCapacity & { owner: string };

export type OwnerHorizon = HorizonSummary & { owner: string; avg_priority: number };

export type OwnerQueue = { owner: string; total: number; actions: Action[] };

export type ChannelBatch = { channel: string; count: number; actions: Action[] };

export type CadenceGuidance = { tier: RiskTier; cadence_days: number; text: string };
