import fs from "node:fs";
import path from "node:path";
import { ArtifactStore, type SweepResult } from "../artifacts/store.js";
import { checkCoverageGate, merge } from "../coverage/aggregator.js";
import { writeCoverageReport } from "../coverage/writer.js";
import { unitConfigFor } from "../dispatch/mode.js";
import { diag, type DiagnosticSink } from "../output/diagnostics.js";
import { ProcessWorkerContext } from "../pool/process-context.js";
import { InlineWorkerContext, type WorkerContextFactory } from "../pool/worker-context.js";
import { WorkerPool, type PoolResult } from "../pool/worker-pool.js";
import type { TestRegistry } from "../registry/registry.js";
import { buildReport, type RunReport } from "../report/builder.js";
import { writeJunit } from "../report/junit.js";
import type { SuiteConfig } from "../types/config.js";
import type { RunPlan } from "../types/run.js";
import { RunEvents } from "./events.js";

export type OrchestratorOptions = {
  config: SuiteConfig;
  /** Base for the relative directories in the config. Defaults to the process cwd. */
  cwd?: string;
  sink?: DiagnosticSink;
  events?: RunEvents;
  junitPath?: string;
  /** Replaces the isolation the plan asks for. */
  createContext?: WorkerContextFactory;
};

export type RunOutput = {
  report: RunReport;
  reportPath: string;
  coveragePath: string;
  junitPath?: string;
  sweeps: { start: SweepResult; end: SweepResult };
};

export function contextFactory(plan: RunPlan, store: ArtifactStore): WorkerContextFactory {
  return plan.isolation === "process"
    ? (id) => new ProcessWorkerContext(id, store.dir)
    : (id) => new InlineWorkerContext(id, store);
}

function reportSweep(sink: DiagnosticSink | undefined, barrier: "start" | "end", res: SweepResult): void {
  if (!sink) return;
  if (res.pinned) {
    sink.emit(diag("info", "ARTIFACTS_PINNED", `Artifacts kept at the ${barrier} of a verbose run`));
    return;
  }
  if (res.manifest_error !== undefined) {
    sink.emit(
      diag("warn", "ARTIFACTS_MANIFEST_RESET", `Artifact manifest was unreadable at run ${barrier} and was reset`, {
        details: { error: res.manifest_error }
      })
    );
  }
  if (res.removed.length > 0) {
    sink.emit(
      diag("info", "ARTIFACTS_SWEPT", `Swept ${res.removed.length} artifact file(s) at run ${barrier}`, {
        details: { removed: res.removed }
      })
    );
  }
  if (res.skipped.length > 0) {
    sink.emit(
      diag("warn", "ARTIFACTS_OPEN", `${res.skipped.length} artifact file(s) still open at run ${barrier}`, {
        details: { skipped: res.skipped }
      })
    );
  }
}

/**
 * Drives one Run from a resolved plan: start barrier, parallel execution,
 * coverage merge, report, end barrier.
 */
export class RunOrchestrator {
  private readonly events: RunEvents;

  constructor(
    private readonly registry: TestRegistry,
    private readonly options: OrchestratorOptions
  ) {
    this.events = options.events ?? new RunEvents();
  }

  async execute(plan: RunPlan): Promise<RunOutput> {
    const { config, sink } = this.options;
    const cwd = this.options.cwd ?? process.cwd();
    const reportDir = path.resolve(cwd, config.report_dir);

    this.registry.freeze();

    const store = new ArtifactStore(path.resolve(cwd, config.artifacts_dir));
    store.init();
    const startSweep = store.sweep(plan.verbose);
    reportSweep(sink, "start", startSweep);

    const startedAt = new Date();
    this.events.emit("run:start", {
      runId: plan.runId,
      mode: plan.mode,
      units: plan.units.length,
      workers: plan.workers
    });

    const cancel = new AbortController();
    let budgetExceeded = false;
    const budgetTimer =
      plan.budgetMs === null
        ? undefined
        : setTimeout(() => {
            budgetExceeded = true;
            const reason = `run budget of ${plan.budgetMs} ms exceeded`;
            sink?.emit(diag("error", "BUDGET_EXCEEDED", reason));
            this.events.emit("run:cancel", { runId: plan.runId, reason });
            cancel.abort(reason);
          }, plan.budgetMs);

    const pool = new WorkerPool({
      workers: plan.workers,
      unitTimeoutMs: plan.unitTimeoutMs,
      graceMs: plan.graceMs,
      signal: cancel.signal,
      configFor: (unit) => unitConfigFor(plan, unit),
      createContext: this.options.createContext ?? contextFactory(plan, store),
      events: this.events
    });

    let result: PoolResult;
    try {
      result = await pool.run(plan.units);
    } finally {
      if (budgetTimer) clearTimeout(budgetTimer);
    }
    const finishedAt = new Date();

    const coverage = merge(result.outcomes.flatMap((o) => (o.coverage ? [o.coverage] : [])));
    const gate = checkCoverageGate(coverage, plan.coverageGate);
    if (!gate.pass) {
      sink?.emit(
        diag(
          gate.strict ? "error" : "warn",
          "COVERAGE_BELOW_MINIMUM",
          `Branch coverage ${gate.branch_pct}% is below the ${gate.minimum_pct}% minimum`
        )
      );
    } else if (gate.below_target) {
      sink?.emit(
        diag("warn", "COVERAGE_BELOW_TARGET", `Branch coverage ${gate.branch_pct}% is below the ${gate.target_pct}% target`)
      );
    }

    const report = buildReport({
      plan,
      outcomes: result.outcomes,
      coverage,
      gate,
      startedAt,
      finishedAt,
      budgetExceeded,
      artifacts: result.artifacts,
      faults: result.faults
    });

    store.record(plan.runId, result.artifacts, plan.verbose);
    const endSweep = store.sweep(plan.verbose);
    reportSweep(sink, "end", endSweep);

    const coveragePath = writeCoverageReport(reportDir, coverage, gate);
    const reportPath = path.join(reportDir, "run-report.json");
    fs.writeFileSync(reportPath, JSON.stringify(report, null, 2) + "\n", "utf8");

    let junitPath: string | undefined;
    if (this.options.junitPath) {
      junitPath = path.resolve(cwd, this.options.junitPath);
      writeJunit(junitPath, report);
    }

    this.events.emit("run:end", { runId: plan.runId, duration_ms: report.duration_ms });
    return { report, reportPath, coveragePath, junitPath, sweeps: { start: startSweep, end: endSweep } };
  }
}
