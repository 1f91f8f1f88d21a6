import { createPlannerLogger, runPlanner, toFailureSummary } from "../../src/lib/planner";
import { parseSeedArgs } from "../../src/lib/planner_io/cli_args";
import { readOutreachCsv } from "../../src/lib/planner_io/csv_reader";
import { openPlannerStore, resolveStorePath } from "../../src/lib/planner_io/store";

function main() {
  const args = parseSeedArgs(process.argv.slice(2));
  const dbPath = args.db_path ?? resolveStorePath();

  const logger = createPlannerLogger();
  const report = runPlanner(
    readOutreachCsv(args.input),
    { today: args.today, explain: true },
    { now: new Date(), logger }
  );

  const store = openPlannerStore(dbPath);
  try {
    const runLabel = args.run_label ?? `seed-${report.today}`;
    const run = store.saveRun(runLabel, report);
    logger.info(`seeded ${run.scored} records as run ${run.run_id} (${runLabel}) into ${dbPath}`);
  } finally {
    store.close();
  }
}

try {
  main();
} catch (error) {
  const failure = toFailureSummary(error);
  process.stderr.write(`${failure.reason}\n${failure.details.map((detail) => `  - ${detail}\n`).join("")}`);
  process.exit(1);
}
