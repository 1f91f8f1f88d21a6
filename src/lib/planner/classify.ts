import { addDays, daysBetween } from "./dates";
import { resolveTier } from "./rules";
import type { PlannerConfig, TouchStatus } from "./schema";
import type { ClassifiedRecord, NormalizedRecord, RunWarning } from "./types";

type StatusContext = {
  days_since_touch: number | null;
  due_in_days: number | null;
  cadence_days: number;
  soon_days: number;
};

type StatusRule = { status: TouchStatus; applies: (ctx: StatusContext) => boolean };

// Evaluated top to bottom; anything unmatched is on-track.
const STATUS_RULES: readonly StatusRule[] = [
  { status: "no-touch", applies: (ctx) => ctx.days_since_touch === null },
  {
    status: "overdue",
    applies: (ctx) => ctx.days_since_touch !== null && ctx.days_since_touch > ctx.cadence_days,
  },
  {
    status: "due-soon",
    applies: (ctx) => ctx.due_in_days !== null && ctx.due_in_days >= 0 && ctx.due_in_days <= ctx.soon_days,
  },
];

export function resolveStatus(ctx: StatusContext): TouchStatus {
  return STATUS_RULES.find((rule) => rule.applies(ctx))?.status ?? "on-track";
}

export type ClassifiedResult = {
  record: ClassifiedRecord;
  warning: RunWarning | null;
};

export function classifyRecord(record: NormalizedRecord, today: string, config: PlannerConfig): ClassifiedResult {
  const tier = resolveTier(record.risk_score, config);
  const cadence_days = config.cadence_days[tier];

  if (record.last_touch === null) {
    return {
      record: {
        ...record,
        flags: [...record.flags],
        tier,
        cadence_days,
        days_since_touch: null,
        due_date: null,
        due_in_days: null,
        overdue_days: null,
        status: resolveStatus({ days_since_touch: null, due_in_days: null, cadence_days, soon_days: config.soon_days }),
        is_stale: false,
      },
      warning: null,
    };
  }

  const elapsed = daysBetween(record.last_touch, today);
  // A touch dated after today counts as a touch today.
  const days_since_touch = Math.max(0, elapsed);
  const due_in_days = cadence_days - days_since_touch;
  const status = resolveStatus({ days_since_touch, due_in_days, cadence_days, soon_days: config.soon_days });

  return {
    record: {
      ...record,
      flags: [...record.flags],
      tier,
      cadence_days,
      days_since_touch,
      due_date: addDays(today, due_in_days),
      due_in_days,
      overdue_days: status === "overdue" ? days_since_touch - cadence_days : null,
      status,
      is_stale: days_since_touch >= config.stale_days,
    },
    warning:
      elapsed < 0
        ? {
            record_id: record.id,
            code: "FutureTouchDate",
            message: `Last touch ${record.last_touch} is after ${today}; counted as touched today.`,
          }
        : null,
  };
}

export function classifyRecords(
  records: readonly NormalizedRecord[],
  today: string,
  config: PlannerConfig
): { records: ClassifiedRecord[]; warnings: RunWarning[] } {
  const classified: ClassifiedRecord[] = [];
  const warnings: RunWarning[] = [];
  for (const record of records) {
    const result = classifyRecord(record, today, config);
    classified.push(result.record);
    if (result.warning) warnings.push(result.warning);
  }
  return { records: classified, warnings };
}
