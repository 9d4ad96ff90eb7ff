import type { ArtifactRecord } from "../artifacts/store.js";
import { EXIT, type ExitCode } from "../commands/exit-codes.js";
import type { WorkerFault } from "../pool/worker-pool.js";
import type { StructuralViolation } from "../registry/registry.js";
import type { CoverageGateResult, CoverageReport } from "../types/coverage.js";
import type { Isolation } from "../types/config.js";
import type { Mode, Outcome, OutcomeStatus, RunPlan } from "../types/run.js";

export const REPORT_SCHEMA_VERSION = "1.0.0";

const FAILING: readonly OutcomeStatus[] = ["failed", "errored", "timed_out"];

/** Everything a maintainer needs to file a bug from one failing unit. */
export type FailureMessage = {
  unit: string;
  topic: string;
  status: OutcomeStatus;
  summary: string;
  expected: string;
  actual: string;
  context: Record<string, string>;
};

export type StatusCounts = Record<OutcomeStatus, number>;

export type Verdict = "success" | "unit_failures" | "infrastructure" | "budget_exceeded";

export type BudgetState = {
  budget_ms: number | null;
  elapsed_ms: number;
  exceeded: boolean;
};

export type ReportedOutcome = Omit<Outcome, "coverage">;

export type RunReport = {
  schema_version: string;
  run_id: string;
  mode: Mode;
  isolation: Isolation;
  workers: number;
  verbose: boolean;
  plot: boolean;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  total: number;
  counts: StatusCounts;
  outcomes: ReportedOutcome[];
  failures: FailureMessage[];
  coverage: CoverageReport;
  coverage_gate: CoverageGateResult;
  violations: StructuralViolation[];
  worker_faults: WorkerFault[];
  budget: BudgetState;
  artifacts: { pinned: boolean; count: number };
  verdict: Verdict;
  exit_code: ExitCode;
};

export type ReportInput = {
  plan: RunPlan;
  outcomes: readonly Outcome[];
  coverage: CoverageReport;
  gate: CoverageGateResult;
  startedAt: Date;
  finishedAt: Date;
  budgetExceeded: boolean;
  artifacts: readonly ArtifactRecord[];
  faults?: readonly WorkerFault[];
};

export function countStatuses(outcomes: readonly Outcome[]): StatusCounts {
  const counts: StatusCounts = { passed: 0, failed: 0, skipped: 0, errored: 0, timed_out: 0 };
  for (const o of outcomes) counts[o.status] += 1;
  return counts;
}

export function decideVerdict(input: {
  counts: StatusCounts;
  gate: CoverageGateResult;
  budgetExceeded: boolean;
}): { verdict: Verdict; exit_code: ExitCode } {
  if (input.budgetExceeded) return { verdict: "budget_exceeded", exit_code: EXIT.BUDGET_EXCEEDED };
  if (FAILING.some((s) => input.counts[s] > 0)) return { verdict: "unit_failures", exit_code: EXIT.UNIT_FAILURES };
  if (input.gate.strict && !input.gate.pass) return { verdict: "infrastructure", exit_code: EXIT.INFRASTRUCTURE };
  return { verdict: "success", exit_code: EXIT.SUCCESS };
}

const NOT_RECORDED = "(not recorded)";

function toFailureMessage(outcome: Outcome): FailureMessage {
  const f = outcome.failure;
  return {
    unit: outcome.unit,
    topic: outcome.topic,
    status: outcome.status,
    summary: f?.summary || `${outcome.unit} ${outcome.status.replace("_", " ")}`,
    expected: f?.expected || NOT_RECORDED,
    actual: f?.actual || NOT_RECORDED,
    context: f?.context ?? {}
  };
}

function withoutCoverage(outcome: Outcome): ReportedOutcome {
  const reported: ReportedOutcome = {
    unit: outcome.unit,
    topic: outcome.topic,
    status: outcome.status,
    duration_ms: outcome.duration_ms,
    worker: outcome.worker
  };
  if (outcome.failure) reported.failure = outcome.failure;
  if (outcome.skip_reason !== undefined) reported.skip_reason = outcome.skip_reason;
  if (outcome.preview !== undefined) reported.preview = outcome.preview;
  return reported;
}

export function buildReport(input: ReportInput): RunReport {
  const { plan, outcomes, gate } = input;
  const counts = countStatuses(outcomes);
  const durationMs = input.finishedAt.getTime() - input.startedAt.getTime();

  const report: RunReport = {
    schema_version: REPORT_SCHEMA_VERSION,
    run_id: plan.runId,
    mode: plan.mode,
    isolation: plan.isolation,
    workers: plan.workers,
    verbose: plan.verbose,
    plot: plan.plot,
    started_at: input.startedAt.toISOString(),
    finished_at: input.finishedAt.toISOString(),
    duration_ms: durationMs,
    total: outcomes.length,
    counts,
    outcomes: outcomes.map(withoutCoverage),
    failures: outcomes.filter((o) => FAILING.includes(o.status)).map(toFailureMessage),
    coverage: input.coverage,
    coverage_gate: gate,
    violations: [...plan.violations],
    worker_faults: [...(input.faults ?? [])],
    budget: { budget_ms: plan.budgetMs, elapsed_ms: durationMs, exceeded: input.budgetExceeded },
    artifacts: { pinned: plan.verbose, count: input.artifacts.length },
    ...decideVerdict({ counts, gate, budgetExceeded: input.budgetExceeded })
  };
  assertReportable(report);
  return report;
}

/** Names of failures that lack a summary, expected or actual value. */
export function unreportableFailures(report: Pick<RunReport, "failures">): string[] {
  return report.failures
    .filter((f) => f.unit === "" || f.summary === "" || f.expected === "" || f.actual === "")
    .map((f) => f.unit || "(unnamed)");
}

export class UnreportableFailureError extends Error {
  constructor(readonly units: string[]) {
    super(`Failure messages incomplete for: ${units.join(", ")}`);
    this.name = "UnreportableFailureError";
  }
}

/** Every failing unit must carry enough detail to file a bug from. */
export function assertReportable(report: Pick<RunReport, "failures">): void {
  const missing = unreportableFailures(report);
  if (missing.length > 0) throw new UnreportableFailureError(missing);
}
