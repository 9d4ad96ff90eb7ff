import { RunEvents } from "../core/events.js";
import { RunOrchestrator, type RunOutput } from "../core/orchestrator.js";
import { parseOverrides, resolveRunPlan, type DispatchErrorCode } from "../dispatch/mode.js";
import { diag, type DiagnosticSink, type OutputFormat } from "../output/diagnostics.js";
import type { WorkerContextFactory } from "../pool/worker-context.js";
import { renderFailureMessage, renderHuman } from "../report/render.js";
import type { Isolation } from "../types/config.js";
import { MODES, type Mode } from "../types/run.js";
import { baseDir, loadSuite, type CommandError, type ConfigOptions } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type RunCommandOptions = ConfigOptions & {
  selectors: string[];
  mode: string;
  tags?: string;
  workers?: number;
  verbose?: boolean;
  plot?: boolean;
  strictCoverage?: boolean;
  strictRegistry?: boolean;
  budgetMs?: number;
  timeoutMs?: number;
  isolation?: string;
  set?: string[];
  junit?: string;
  format: OutputFormat;
  sink: DiagnosticSink;
  events?: RunEvents;
  createContext?: WorkerContextFactory;
};

export type RunCommandResult =
  | { ok: true; exitCode: ExitCode; output: RunOutput }
  | { ok: false; exitCode: ExitCode; error: CommandError };

const DISPATCH_EXIT: Record<DispatchErrorCode, ExitCode> = {
  NO_SUCH_UNIT: EXIT.INVALID_ARGS,
  STANDALONE_REQUIRES_NAME: EXIT.INVALID_ARGS,
  INVALID_WORKERS: EXIT.INVALID_ARGS,
  INVALID_OVERRIDE: EXIT.INVALID_ARGS,
  INVALID_TAG_EXPRESSION: EXIT.INVALID_ARGS,
  STRUCTURAL_VIOLATION: EXIT.INFRASTRUCTURE
};

function isMode(value: string): value is Mode {
  return MODES.some((m) => m === value);
}

function isIsolation(value: string): value is Isolation {
  return value === "inline" || value === "process";
}

function invalid(code: string, message: string): RunCommandResult {
  return { ok: false, exitCode: EXIT.INVALID_ARGS, error: { code, message } };
}

/** Progress as JSON lines; human output waits for the final report. */
function attachProgress(events: RunEvents, sink: DiagnosticSink, format: OutputFormat): void {
  events.on("worker:fault", (f) => {
    sink.emit(
      diag("warn", "WORKER_FAULT", `Worker ${f.worker} exited; ${f.remaining} queued unit(s) will not run`, {
        details: { code: f.code, signal: f.signal }
      })
    );
  });
  if (format !== "jsonl") return;
  events.on("run:start", (p) => {
    sink.emit(diag("info", "RUN_START", `Run ${p.runId} started`, { details: { ...p } }));
  });
  events.on("unit:end", (o) => {
    sink.emit(
      diag(o.status === "passed" || o.status === "skipped" ? "info" : "error", "UNIT_END", `${o.unit} ${o.status}`, {
        details: { unit: o.unit, topic: o.topic, status: o.status, duration_ms: o.duration_ms, worker: o.worker }
      })
    );
  });
}

export async function runCommand(opts: RunCommandOptions): Promise<RunCommandResult> {
  const { sink } = opts;

  if (!isMode(opts.mode)) {
    return invalid("INVALID_MODE", `Unknown mode "${opts.mode}" (expected ${MODES.join("|")})`);
  }
  const mode = opts.mode;
  if (opts.isolation !== undefined && !isIsolation(opts.isolation)) {
    return invalid("INVALID_ISOLATION", `Unknown isolation "${opts.isolation}" (expected inline|process)`);
  }
  const isolation = opts.isolation;
  const overrides = parseOverrides(opts.set ?? []);
  if (!overrides.ok) return invalid(overrides.error.code, overrides.error.message);

  const suite = await loadSuite(opts);
  if (!suite.ok) return { ok: false, exitCode: EXIT.INVALID_ARGS, error: suite.error };

  const dispatch = resolveRunPlan(
    {
      mode,
      selectors: opts.selectors,
      tags: opts.tags,
      workers: opts.workers,
      verbose: opts.verbose,
      plot: opts.plot,
      strictCoverage: opts.strictCoverage,
      strictRegistry: opts.strictRegistry,
      budgetMs: opts.budgetMs,
      unitTimeoutMs: opts.timeoutMs,
      isolation,
      overrides: overrides.overrides
    },
    suite.registry,
    suite.config
  );
  for (const d of dispatch.diagnostics) sink.emit(d);
  if (!dispatch.ok) {
    return { ok: false, exitCode: DISPATCH_EXIT[dispatch.error.code], error: dispatch.error };
  }

  const events = opts.events ?? new RunEvents();
  attachProgress(events, sink, opts.format);

  const orchestrator = new RunOrchestrator(suite.registry, {
    config: suite.config,
    cwd: baseDir(opts),
    sink,
    events,
    junitPath: opts.junit,
    createContext: opts.createContext
  });
  const output = await orchestrator.execute(dispatch.plan);
  const { report } = output;

  if (opts.format === "jsonl") {
    for (const f of report.failures) {
      sink.emit(diag("error", "UNIT_FAILURE", renderFailureMessage(f), { details: { ...f } }));
    }
    sink.emit(
      diag(report.exit_code === EXIT.SUCCESS ? "info" : "error", "RUN_COMPLETE", `Run ${report.run_id}: ${report.verdict}`, {
        path: output.reportPath,
        details: { run_id: report.run_id, verdict: report.verdict, exit_code: report.exit_code, counts: report.counts }
      })
    );
  } else {
    sink.text(renderHuman(report));
  }

  return { ok: true, exitCode: report.exit_code, output };
}
