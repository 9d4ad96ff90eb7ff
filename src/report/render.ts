import { toPct } from "../coverage/aggregator.js";
import { renderGateLine } from "../coverage/writer.js";
import type { OutcomeStatus } from "../types/run.js";
import type { FailureMessage, ReportedOutcome, RunReport } from "./builder.js";

export const STATUS_LABEL: Record<OutcomeStatus, string> = {
  passed: "PASS",
  failed: "FAIL",
  skipped: "SKIP",
  errored: "ERROR",
  timed_out: "TIMEOUT"
};

function indentBlock(text: string, first: string, rest: string): string[] {
  return text.split("\n").map((line, i) => (i === 0 ? first : rest) + line);
}

/**
 * ```
 * FAIL test_peak (outbreak): peak infected count
 *   expected: 120
 *   actual:   118
 *   context:
 *     seed: 7
 * ```
 */
export function renderFailureMessage(f: FailureMessage): string {
  const lines = [
    `${STATUS_LABEL[f.status]} ${f.unit} (${f.topic}): ${f.summary}`,
    ...indentBlock(f.expected, "  expected: ", "            "),
    ...indentBlock(f.actual, "  actual:   ", "            ")
  ];
  const keys = Object.keys(f.context).sort();
  if (keys.length > 0) {
    lines.push("  context:");
    for (const key of keys) {
      lines.push(...indentBlock(f.context[key], `    ${key}: `, "      "));
    }
  }
  return lines.join("\n");
}

export function renderOutcomeLine(o: ReportedOutcome): string {
  const line = `${STATUS_LABEL[o.status].padEnd(7)} ${o.unit}  ${o.duration_ms} ms`;
  return o.skip_reason !== undefined ? `${line} (${o.skip_reason})` : line;
}

export function renderSummaryLine(report: RunReport): string {
  const c = report.counts;
  return (
    `${report.total} units: ${c.passed} passed, ${c.failed} failed, ${c.errored} errored, ` +
    `${c.timed_out} timed out, ${c.skipped} skipped in ${report.duration_ms} ms`
  );
}

/** Human-readable report. Return previews are shown only in standalone mode. */
export function renderHuman(report: RunReport): string {
  const lines: string[] = [
    `run ${report.run_id} mode=${report.mode} workers=${report.workers} isolation=${report.isolation}`
  ];

  for (const o of report.outcomes) {
    lines.push(renderOutcomeLine(o));
    if (report.mode === "standalone" && o.preview !== undefined) {
      lines.push(...indentBlock(o.preview, "        = ", "          "));
    }
  }

  if (report.failures.length > 0) {
    lines.push("", "failures:");
    for (const f of report.failures) lines.push("", renderFailureMessage(f));
  }

  if (report.violations.length > 0) {
    lines.push("");
    for (const v of report.violations) lines.push(`violation ${v.code}: ${v.message}`);
  }

  lines.push(
    "",
    `coverage: lines ${toPct(report.coverage.line_ratio)}% branches ${toPct(report.coverage.branch_ratio)}%`,
    renderGateLine(report.coverage_gate)
  );
  if (report.budget.budget_ms !== null) {
    lines.push(
      `budget: ${report.budget.elapsed_ms} ms of ${report.budget.budget_ms} ms${report.budget.exceeded ? " (exceeded)" : ""}`
    );
  }
  lines.push(
    report.artifacts.pinned
      ? `artifacts: ${report.artifacts.count} kept (verbose run)`
      : `artifacts: ${report.artifacts.count} written, swept at end of run`,
    renderSummaryLine(report),
    `verdict: ${report.verdict} (exit ${report.exit_code})`
  );
  return lines.join("\n");
}
