import type { PlannerReport } from "../planner";

function heading(title: string) {
  return ["", title, "-".repeat(title.length)];
}

function cut(value: string, width: number) {
  return value.length > width ? value.slice(0, width) : value;
}

function summaryLines(report: PlannerReport) {
  const { summary } = report;
  return [
    ...heading("Intervention Summary"),
    `As of: ${report.today}`,
    `Total records: ${summary.scored} (${summary.rejected} rejected, ${summary.coerced} dates coerced)`,
    `High risk: ${summary.high_risk}`,
    `Medium risk: ${summary.medium_risk}`,
    `Low risk: ${summary.low_risk}`,
    `Overdue touches: ${summary.overdue}`,
    `Due soon: ${summary.due_soon}`,
    `On track: ${summary.on_track}`,
    `No prior touch: ${summary.no_touch}`,
    `Stale: ${summary.stale}`,
  ];
}

function tierStatusLines(report: PlannerReport) {
  const header = `${"Tier".padEnd(8)} ${"Overdue".padStart(7)} ${"DueSoon".padStart(7)} ${"OnTrack".padStart(7)} ${"NoTouch".padStart(7)} ${"Total".padStart(5)}`;
  const lines = [...heading("Status by Risk Tier"), header, "-".repeat(header.length)];
  for (const [tier, row] of Object.entries(report.tier_status.rows)) {
    lines.push(
      `${tier.padEnd(8)} ${String(row.overdue).padStart(7)} ${String(row.due_soon).padStart(7)} ${String(row.on_track).padStart(7)} ${String(row.no_touch).padStart(7)} ${String(row.total).padStart(5)}`
    );
  }
  return lines;
}

function channelLines(report: PlannerReport) {
  const lines = heading("Channel Mix");
  if (report.channel_mix.length === 0) return [...lines, "No channel data available."];
  return [...lines, ...report.channel_mix.map((entry) => `${entry.channel.padEnd(10)} ${entry.count}`)];
}

function flagLines(report: PlannerReport) {
  const lines = heading("High-Impact Flags");
  const flags = report.flag_frequency.filter((entry) => entry.high_impact);
  if (flags.length === 0) return [...lines, "No high-impact flags captured."];
  return [...lines, ...flags.map((entry) => `${entry.flag.padEnd(12)} ${entry.count}`)];
}

function cohortLines(report: PlannerReport) {
  const lines = heading("Cohort Hotspots");
  if (report.cohort_hotspots.length === 0) return [...lines, "No cohort data available."];
  const header = `${"Cohort".padEnd(16)} ${"Total".padStart(5)} ${"Overdue".padStart(7)} ${"DueSoon".padStart(7)} ${"NoTouch".padStart(7)} ${"AvgScore".padStart(9)}`;
  lines.push(header, "-".repeat(header.length));
  for (const bucket of report.cohort_hotspots) {
    lines.push(
      `${cut(bucket.cohort, 16).padEnd(16)} ${String(bucket.total).padStart(5)} ${String(bucket.overdue).padStart(7)} ${String(bucket.due_soon).padStart(7)} ${String(bucket.no_touch).padStart(7)} ${bucket.avg_priority.toFixed(1).padStart(9)}`
    );
  }
  return lines;
}

function ownerAlertLines(report: PlannerReport) {
  const lines = heading("Owner Alerts");
  if (report.owners.alerts.length === 0) return [...lines, "No owner alerts."];
  return [...lines, ...report.owners.alerts.map((alert) => `${alert.owner}: ${alert.details.join("; ")}`)];
}

function queueLines(report: PlannerReport) {
  const header = `${"Score".padStart(6)}  ${"Name".padEnd(20)} ${"Cohort".padEnd(10)} ${"Risk".padStart(5)}  ${"Status".padEnd(9)} ${"Due".padEnd(10)}`;
  const lines = [...heading("Priority Action Queue"), header, "-".repeat(header.length)];
  for (const action of report.queue) {
    lines.push(
      `${action.priority_score.toFixed(1).padStart(6)}  ${cut(action.name, 20).padEnd(20)} ${cut(action.cohort, 10).padEnd(10)} ${String(action.risk_score).padStart(5)}  ${action.status.padEnd(9)} ${(action.due_date ?? "-").padEnd(10)}`
    );
    lines.push(`      -> ${action.recommended_action}`);
    for (const reason of action.priority_reasons) {
      lines.push(`         * ${reason}`);
    }
  }
  return lines;
}

function escalationLines(report: PlannerReport) {
  const lines = heading("Escalation Candidates");
  if (report.escalations.length === 0) return [...lines, "No escalation candidates."];
  return [
    ...lines,
    ...report.escalations.map(
      (action) => `${action.priority_score.toFixed(1).padStart(6)}  ${action.name} (${action.id}) ${action.status}`
    ),
  ];
}

export function renderConsoleReport(report: PlannerReport): string {
  return [
    ...summaryLines(report),
    ...tierStatusLines(report),
    ...channelLines(report),
    ...flagLines(report),
    ...cohortLines(report),
    ...ownerAlertLines(report),
    ...queueLines(report),
    ...escalationLines(report),
    ...heading("Cadence Guidance"),
    ...report.cadence_guidance.map((entry) => entry.text),
  ].join("\n");
}
