/**
 * Plain-text rendering of engine and execution reports for review.
 */

import type { EngineReport } from "../engine/engine.js";
import type { Finding, PlanItem } from "../engine/types.js";
import type { ExecutionReport } from "../engine/update-executor.js";

function findingScope(f: Finding): string {
  return f.kind === "ValidLabelFailure" ? "subject" : `scan ${f.scanId}`;
}

function planItemLine(item: PlanItem): string {
  return (
    `  ${item.bucket.padEnd(9)} scan ${item.scanId.padEnd(4)} ` +
    `${item.field}: "${item.currentValue}" -> "${item.newValue}"  (${item.reason})`
  );
}

export function renderReport(report: EngineReport): string[] {
  const lines: string[] = [];
  const { subject, session, plan } = report;

  lines.push(
    `Subject ${subject.label}` +
      (subject.labelValid ? ` (study ${subject.studyCode})` : " (INVALID LABEL)"),
  );
  lines.push(
    `  Session ${session.sessionId} "${session.sessionLabel}" in ${session.projectId}, ${session.scanCount} scan(s)`,
  );

  if (report.findings.length === 0) {
    lines.push("Findings: none");
  } else {
    lines.push(`Findings: ${report.findings.length}`);
    for (const f of report.findings) {
      lines.push(`  [${findingScope(f)}] ${f.kind}: ${f.reason}`);
    }
  }

  lines.push(`Plan ${plan.planHash.slice(0, 12)}`);
  for (const item of [...plan.unusable, ...plan.rename]) {
    lines.push(planItemLine(item));
  }
  for (const entry of plan.noAction) {
    const why = entry.findings.length > 0 ? `[${entry.findings.join(", ")}]` : "ok";
    lines.push(`  ${"no action".padEnd(9)} scan ${entry.scanId.padEnd(4)} ${why}`);
  }
  return lines;
}

export function renderExecution(report: ExecutionReport): string[] {
  const lines = [`Applied plan ${report.planHash.slice(0, 12)} to ${report.subjectLabel}`];
  for (const o of report.outcomes) {
    lines.push(
      `  ${o.status.padEnd(7)} scan ${o.scanId.padEnd(4)} ${o.field} -> "${o.newValue}": ${o.reason}`,
    );
  }
  const { succeeded, skipped, failed } = report.summary;
  lines.push(`${succeeded} succeeded, ${skipped} skipped, ${failed} failed`);
  return lines;
}
