export type PlannerLogLevel = "info" | "warn" | "error";

export type PlannerLogEntry = {
  at: string;
  level: PlannerLogLevel;
  message: string;
};

export type PlannerLogger = {
  entries: PlannerLogEntry[];
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type PlannerLoggerOptions = {
  silent?: boolean;
  /** Stamps each entry. Defaults to the system clock. */
  clock?: () => Date;
};

const CONSOLE_WRITERS: Record<PlannerLogLevel, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Keeps every entry in memory so a run can be inspected afterwards, and echoes
 * it to the console as `[planner:<level>] <message>` unless silent.
 */
export function createPlannerLogger(options: PlannerLoggerOptions = {}): PlannerLogger {
  const entries: PlannerLogEntry[] = [];
  const clock = options.clock ?? (() => new Date());

  const log = (level: PlannerLogLevel) => (message: string) => {
    entries.push({ at: clock().toISOString(), level, message });
    if (!options.silent) CONSOLE_WRITERS[level](`[planner:${level}] ${message}`);
  };

  return { entries, info: log("info"), warn: log("warn"), error: log("error") };
}

export function createSilentLogger(clock?: () => Date): PlannerLogger {
  return createPlannerLogger({ silent: true, clock });
}
