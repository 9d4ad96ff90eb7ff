import fs from "node:fs";
import path from "node:path";
import type { CoverageGateResult, CoverageReport } from "../types/coverage.js";
import { toPct } from "./aggregator.js";

export function renderGateLine(gate: CoverageGateResult): string {
  return gate.pass
    ? `gate: branches ${gate.branch_pct}% >= ${gate.minimum_pct}% minimum${gate.below_target ? ` (below ${gate.target_pct}% target)` : ""}`
    : `gate: branches ${gate.branch_pct}% < ${gate.minimum_pct}% minimum${gate.strict ? " (strict)" : ""}`;
}

export function renderCoverageSummary(report: CoverageReport, gate: CoverageGateResult): string {
  const rows = Object.entries(report.modules).map(
    ([name, m]) =>
      `${name.padEnd(32)} lines ${String(toPct(m.line_ratio)).padStart(6)}%  branches ${String(toPct(m.branch_ratio)).padStart(6)}%`
  );
  return [
    ...rows,
    `${"total".padEnd(32)} lines ${String(toPct(report.line_ratio)).padStart(6)}%  branches ${String(toPct(report.branch_ratio)).padStart(6)}%`,
    renderGateLine(gate)
  ].join("\n");
}

/** Write coverage.json and coverage-summary.txt. Returns the JSON path. */
export function writeCoverageReport(
  reportDir: string,
  report: CoverageReport,
  gate: CoverageGateResult
): string {
  fs.mkdirSync(reportDir, { recursive: true });
  const jsonPath = path.join(reportDir, "coverage.json");
  fs.writeFileSync(
    jsonPath,
    JSON.stringify({ generated_at: new Date().toISOString(), gate, report }, null, 2) + "\n",
    "utf8"
  );
  fs.writeFileSync(path.join(reportDir, "coverage-summary.txt"), renderCoverageSummary(report, gate) + "\n", "utf8");
  return jsonPath;
}
