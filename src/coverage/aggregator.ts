import type {
  CoverageData,
  CoverageGateResult,
  CoverageReport,
  CoverageSample,
  ModuleCoverage,
  ModuleHits
} from "../types/coverage.js";
import type { CoverageGate } from "../types/run.js";

function mergeModule(a: ModuleHits | undefined, b: ModuleHits | undefined): ModuleHits {
  const lines: Record<string, number> = { ...(a?.lines ?? {}) };
  for (const [line, hits] of Object.entries(b?.lines ?? {})) {
    lines[line] = Math.max(lines[line] ?? 0, hits);
  }

  const branches: Record<string, boolean[]> = {};
  const ids = new Set([...Object.keys(a?.branches ?? {}), ...Object.keys(b?.branches ?? {})]);
  for (const id of ids) {
    const left = a?.branches[id] ?? [];
    const right = b?.branches[id] ?? [];
    const width = Math.max(left.length, right.length);
    const arms: boolean[] = [];
    for (let i = 0; i < width; i++) arms.push(Boolean(left[i]) || Boolean(right[i]));
    branches[id] = arms;
  }

  return { lines, branches };
}

/**
 * Union of two hit maps: per-line max, per-branch-arm OR.
 * Commutative and associative, so worker completion order never matters.
 */
export function mergeData(a: CoverageData, b: CoverageData): CoverageData {
  const result: CoverageData = {};
  const names = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const name of names) {
    result[name] = mergeModule(a[name], b[name]);
  }
  return result;
}

export function mergeSamples(samples: readonly CoverageSample[]): CoverageData {
  return samples.reduce<CoverageData>((acc, s) => mergeData(acc, s.modules), {});
}

function ratio(covered: number, total: number): number {
  return total > 0 ? covered / total : 1;
}

export function summarizeModule(hits: ModuleHits): ModuleCoverage {
  const lineCounts = Object.values(hits.lines);
  const arms = Object.values(hits.branches).flat();
  const lines_covered = lineCounts.filter((n) => n > 0).length;
  const branches_covered = arms.filter(Boolean).length;
  return {
    lines_total: lineCounts.length,
    lines_covered,
    line_ratio: ratio(lines_covered, lineCounts.length),
    branches_total: arms.length,
    branches_covered,
    branch_ratio: ratio(branches_covered, arms.length)
  };
}

export function summarize(data: CoverageData): CoverageReport {
  const modules: Record<string, ModuleCoverage> = {};
  let linesTotal = 0;
  let linesCovered = 0;
  let branchesTotal = 0;
  let branchesCovered = 0;

  for (const name of Object.keys(data).sort()) {
    const m = summarizeModule(data[name]);
    modules[name] = m;
    linesTotal += m.lines_total;
    linesCovered += m.lines_covered;
    branchesTotal += m.branches_total;
    branchesCovered += m.branches_covered;
  }

  return {
    lines_total: linesTotal,
    lines_covered: linesCovered,
    line_ratio: ratio(linesCovered, linesTotal),
    branches_total: branchesTotal,
    branches_covered: branchesCovered,
    branch_ratio: ratio(branchesCovered, branchesTotal),
    modules
  };
}

/** Merge every worker's samples into the Run-level report. */
export function merge(samples: readonly CoverageSample[]): CoverageReport {
  return summarize(mergeSamples(samples));
}

export function toPct(r: number): number {
  return Math.round(r * 10000) / 100;
}

/**
 * Compare the merged branch ratio against the gate.
 * Falling below `minimumPct` fails the gate; falling below `targetPct` only flags it.
 */
export function checkCoverageGate(report: CoverageReport, gate: CoverageGate): CoverageGateResult {
  // Thresholds apply to the exact counts; branch_pct is rounded for display.
  const reaches = (pct: number): boolean =>
    report.branches_total === 0 || report.branches_covered * 100 >= pct * report.branches_total;
  return {
    pass: reaches(gate.minimumPct),
    strict: gate.strict,
    minimum_pct: gate.minimumPct,
    target_pct: gate.targetPct,
    branch_pct: toPct(report.branch_ratio),
    below_target: !reaches(gate.targetPct)
  };
}
