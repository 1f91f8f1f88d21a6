import path from "node:path";

import { createPlannerLogger, runPlanner, toFailureSummary } from "../../src/lib/planner";
import { PLANNER_USAGE, parsePlannerArgs } from "../../src/lib/planner_io/cli_args";
import { renderConsoleReport } from "../../src/lib/planner_io/console_report";
import { readOutreachCsv } from "../../src/lib/planner_io/csv_reader";
import { writeJsonReport } from "../../src/lib/planner_io/json_report";
import { openPlannerStore } from "../../src/lib/planner_io/store";

function defaultRunLabel(inputPath: string, today: string) {
  return `${path.basename(inputPath, path.extname(inputPath))}-${today}`;
}

function main() {
  const args = parsePlannerArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${PLANNER_USAGE}\n`);
    return;
  }
  if (!args.input) {
    throw new Error(PLANNER_USAGE);
  }

  const logger = createPlannerLogger();
  const rows = readOutreachCsv(args.input);
  const report = runPlanner(rows, args.config, { now: new Date(), logger });

  process.stdout.write(`${renderConsoleReport(report)}\n`);

  if (args.json_path) {
    const outPath = writeJsonReport(args.json_path, report);
    logger.info(`JSON report written to ${outPath}`);
  }

  if (args.db_path) {
    const store = openPlannerStore(args.db_path);
    try {
      const run = store.saveRun(args.run_label ?? defaultRunLabel(args.input, report.today), report);
      logger.info(`run ${run.run_id} (${run.run_label}) saved to ${args.db_path}`);
    } finally {
      store.close();
    }
  }
}

try {
  main();
} catch (error) {
  const failure = toFailureSummary(error);
  process.stderr.write(`${failure.reason}\n`);
  for (const detail of failure.details) {
    process.stderr.write(`  - ${detail}\n`);
  }
  process.stderr.write(`${failure.next_action}\n`);
  process.exit(1);
}
