import { z } from "zod";

export const RiskTierSchema = z.enum(["high", "medium", "low"]);
export type RiskTier = z.infer<typeof RiskTierSchema>;
export const RISK_TIERS = RiskTierSchema.options;

export const TouchStatusSchema = z.enum(["overdue", "due-soon", "on-track", "no-touch"]);
export type TouchStatus = z.infer<typeof TouchStatusSchema>;
export const TOUCH_STATUSES = TouchStatusSchema.options;

export const InvalidDatePolicySchema = z.enum(["no_touch", "reject"]);
export type InvalidDatePolicy = z.infer<typeof InvalidDatePolicySchema>;

const CountSchema = z.number().int().min(0);
const PositiveCountSchema = z.number().int().min(1);
const WeightSchema = z.number().finite().min(0);
const RiskThresholdSchema = z.number().finite().min(0).max(100);
const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export const HorizonBucketSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  min_days: CountSchema,
  max_days: CountSchema.nullable(),
});
export type HorizonBucket = z.infer<typeof HorizonBucketSchema>;

export const DEFAULT_HORIZON_BUCKETS: HorizonBucket[] = [
  { key: "days_0_3", label: "0-3 days", min_days: 0, max_days: 3 },
  { key: "days_4_7", label: "4-7 days", min_days: 4, max_days: 7 },
  { key: "days_8_14", label: "8-14 days", min_days: 8, max_days: 14 },
  { key: "days_15_30", label: "15-30 days", min_days: 15, max_days: 30 },
  { key: "days_31_plus", label: "31+ days", min_days: 31, max_days: null },
];

export const DEFAULT_HIGH_IMPACT_FLAGS = ["crisis", "housing", "food", "health", "safety", "financial"];

export const PlannerConfigSchema = z
  .object({
    high_risk: RiskThresholdSchema.default(70),
    medium_risk: RiskThresholdSchema.default(40),
    cadence_days: z
      .object({
        high: PositiveCountSchema.default(7),
        medium: PositiveCountSchema.default(21),
        low: PositiveCountSchema.default(45),
      })
      .strict()
      .default({}),
    soon_days: CountSchema.default(14),
    stale_days: PositiveCountSchema.default(60),
    stale_boost: WeightSchema.default(15),
    risk_weight: WeightSchema.default(1),
    status_weights: z
      .object({
        "no-touch": WeightSchema.default(40),
        overdue: WeightSchema.default(30),
        "due-soon": WeightSchema.default(12),
        "on-track": WeightSchema.default(0),
      })
      .strict()
      .default({}),
    high_impact_flags: z
      .array(z.string().trim().toLowerCase().min(1))
      .default(() => [...DEFAULT_HIGH_IMPACT_FLAGS]),
    flag_weight: WeightSchema.default(8),
    limit: CountSchema.default(10),
    cohort_limit: CountSchema.default(5),
    owner_limit: CountSchema.default(5),
    owner_queue_limit: CountSchema.default(5),
    owner_queue_size: CountSchema.default(3),
    channel_batch_pool: CountSchema.default(20),
    channel_batch_limit: CountSchema.default(4),
    channel_batch_size: CountSchema.default(3),
    escalation_min_score: WeightSchema.default(90),
    escalation_limit: CountSchema.default(5),
    owner_alert_overdue: PositiveCountSchema.default(2),
    owner_alert_no_touch: PositiveCountSchema.default(1),
    owner_alert_total: PositiveCountSchema.default(8),
    daily_capacity: z.number().finite().positive().default(2),
    capacity_window_days: PositiveCountSchema.default(7),
    capacity_include_overdue: z.boolean().default(true),
    forecast_days: PositiveCountSchema.default(21),
    forecast_include_overdue: z.boolean().default(true),
    horizon_buckets: z
      .array(HorizonBucketSchema)
      .min(1)
      .default(() => DEFAULT_HORIZON_BUCKETS.map((bucket) => ({ ...bucket }))),
    explain: z.boolean().default(false),
    invalid_date_policy: InvalidDatePolicySchema.default("no_touch"),
    today: IsoDateSchema.optional(),
  })
  .strict();

export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;
export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;

export const RawRowSchema = z.record(z.string());
export type RawRow = z.infer<typeof RawRowSchema>;
export const RawRowsSchema = z.array(RawRowSchema);
