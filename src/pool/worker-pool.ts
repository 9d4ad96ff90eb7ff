import type { ArtifactRecord } from "../artifacts/store.js";
import type { RunEvents } from "../core/events.js";
import { toError } from "../types/errors.js";
import type { FailureDetail, Outcome } from "../types/run.js";
import type { RegisteredUnit, UnitConfig } from "../types/unit.js";
import type { UnitExecution } from "./execute-unit.js";
import type { ContextResult, WorkerContext, WorkerContextFactory } from "./worker-context.js";

export type PoolOptions = {
  workers: number;
  unitTimeoutMs: number;
  /** How long running units may continue after the Run is cancelled. */
  graceMs: number;
  signal?: AbortSignal;
  configFor: (unit: RegisteredUnit) => UnitConfig;
  createContext: WorkerContextFactory;
  events?: RunEvents;
};

export type WorkerFault = {
  worker: number;
  unit: string;
  code: number | null;
  signal: string | null;
  reason?: string;
};

export type PoolResult = {
  /** One per requested unit, in the order the units were given. */
  outcomes: Outcome[];
  artifacts: ArtifactRecord[];
  faults: WorkerFault[];
};

type Slot = { unit: RegisteredUnit; index: number };

type Stop = { kind: "timeout"; timeoutMs: number } | { kind: "cancelled" };

/**
 * Deal items round-robin into `n` buckets: item i goes to bucket i mod n.
 * Every bucket keeps the relative order of its items.
 */
export function partition<T>(items: readonly T[], n: number): T[][] {
  const count = Math.max(1, Math.floor(n));
  const buckets: T[][] = Array.from({ length: count }, () => []);
  items.forEach((item, i) => {
    buckets[i % count].push(item);
  });
  return buckets;
}

function toOutcome(unit: RegisteredUnit, worker: number, execution: UnitExecution): Outcome {
  return {
    unit: unit.name,
    topic: unit.topic,
    status: execution.status,
    duration_ms: execution.duration_ms,
    worker,
    failure: execution.failure,
    skip_reason: execution.skip_reason,
    preview: execution.preview,
    coverage: execution.coverage
  };
}

function failedOutcome(
  unit: RegisteredUnit,
  worker: number,
  status: "errored" | "timed_out",
  durationMs: number,
  failure: FailureDetail
): Outcome {
  return { unit: unit.name, topic: unit.topic, status, duration_ms: durationMs, worker, failure, coverage: null };
}

function describeExit(result: { code: number | null; signal: string | null; reason?: string }): string {
  const parts = [`exit code ${result.code ?? "none"}`, `signal ${result.signal ?? "none"}`];
  if (result.reason) parts.push(result.reason);
  return parts.join(", ");
}

/**
 * Fixed pool of workers. Units are dealt round-robin over the given order and
 * each worker runs its share strictly one at a time in its own context.
 */
export class WorkerPool {
  constructor(private readonly options: PoolOptions) {}

  async run(units: readonly RegisteredUnit[]): Promise<PoolResult> {
    const slots: Array<Outcome | undefined> = new Array<Outcome | undefined>(units.length).fill(undefined);
    const artifacts: ArtifactRecord[] = [];
    const faults: WorkerFault[] = [];

    const indexed = units.map((unit, index) => ({ unit, index }));
    const buckets = partition(indexed, Math.min(this.options.workers, Math.max(units.length, 1)));

    await Promise.all(
      buckets.map((bucket, worker) =>
        bucket.length === 0 ? Promise.resolve() : this.workerLoop(worker, bucket, slots, artifacts, faults)
      )
    );

    const outcomes = slots.map((outcome, i) =>
      outcome ??
      failedOutcome(units[i], -1, "errored", 0, {
        summary: `${units[i].name} produced no outcome`,
        expected: "one outcome per unit",
        actual: "none",
        context: {}
      })
    );
    artifacts.sort((a, b) => a.path.localeCompare(b.path));
    return { outcomes, artifacts, faults };
  }

  private async workerLoop(
    worker: number,
    bucket: readonly Slot[],
    slots: Array<Outcome | undefined>,
    artifacts: ArtifactRecord[],
    faults: WorkerFault[]
  ): Promise<void> {
    const { events, signal } = this.options;
    const ctx = this.options.createContext(worker);

    const settle = (index: number, outcome: Outcome): void => {
      slots[index] = outcome;
      events?.emit("unit:end", outcome);
    };

    try {
      for (let i = 0; i < bucket.length; i++) {
        const { unit, index } = bucket[i];

        if (signal?.aborted) {
          settle(
            index,
            failedOutcome(unit, worker, "timed_out", 0, {
              summary: `${unit.name} was not started before the run was cancelled`,
              expected: "the unit to be dispatched",
              actual: "not started",
              context: { reason: String(signal.reason ?? "cancelled") }
            })
          );
          continue;
        }

        events?.emit("unit:start", { unit: unit.name, worker });
        const result = await this.runOne(ctx, unit, worker);

        if (result.kind === "outcome") {
          artifacts.push(...result.artifacts);
          settle(index, result.outcome);
          continue;
        }

        const exit = result.exit;
        const remaining = bucket.slice(i + 1);
        faults.push({ worker, unit: unit.name, code: exit.code, signal: exit.signal, reason: exit.reason });
        events?.emit("worker:fault", { worker, code: exit.code, signal: exit.signal, remaining: remaining.length });

        settle(
          index,
          failedOutcome(unit, worker, "errored", result.durationMs, {
            summary: `worker ${worker} exited while running ${unit.name}`,
            expected: "the worker to stay alive until the unit finished",
            actual: describeExit(exit),
            context: { worker: String(worker) }
          })
        );
        for (const rest of remaining) {
          settle(
            rest.index,
            failedOutcome(rest.unit, worker, "errored", 0, {
              summary: `${rest.unit.name} was not run because worker ${worker} exited`,
              expected: "a live worker",
              actual: `worker ${worker} exited while running ${unit.name}`,
              context: { worker: String(worker) }
            })
          );
        }
        break;
      }
    } finally {
      await ctx.close();
    }
  }

  private async runOne(
    ctx: WorkerContext,
    unit: RegisteredUnit,
    worker: number
  ): Promise<
    | { kind: "outcome"; outcome: Outcome; artifacts: ArtifactRecord[] }
    | { kind: "fault"; exit: Extract<ContextResult, { kind: "exit" }>; durationMs: number }
  > {
    const { signal, graceMs } = this.options;
    const timeoutMs = unit.timeoutMs ?? this.options.unitTimeoutMs;
    const started = Date.now();

    const timers: NodeJS.Timeout[] = [];
    const listeners = new AbortController();
    const stop = new Promise<Stop>((resolve) => {
      timers.push(setTimeout(() => resolve({ kind: "timeout", timeoutMs }), timeoutMs));
      const onAbort = (): void => {
        timers.push(setTimeout(() => resolve({ kind: "cancelled" }), graceMs));
      };
      if (signal?.aborted) onAbort();
      else signal?.addEventListener("abort", onAbort, { once: true, signal: listeners.signal });
    });

    let result: ContextResult | Stop;
    try {
      result = await Promise.race([ctx.runUnit(unit, this.options.configFor(unit)), stop]);
    } finally {
      for (const t of timers) clearTimeout(t);
      listeners.abort();
    }

    if (result.kind === "done") {
      const { execution } = result;
      const elapsed = Date.now() - started;
      if (elapsed <= timeoutMs || execution.status === "skipped") {
        return { kind: "outcome", outcome: toOutcome(unit, worker, execution), artifacts: execution.artifacts };
      }
      // A unit that never yields finishes before the timer can fire.
      const context: Record<string, string> = { worker: String(worker), finished_as: execution.status };
      const discardError = await ctx.discard(execution.artifacts).then(
        () => null,
        (e: unknown) => toError(e)
      );
      if (discardError) context.discard_error = discardError.message;
      const failure: FailureDetail = {
        summary: `${unit.name} exceeded its ${timeoutMs} ms timeout`,
        expected: `completion within ${timeoutMs} ms`,
        actual: `finished after ${elapsed} ms`,
        context
      };
      return { kind: "outcome", outcome: failedOutcome(unit, worker, "timed_out", elapsed, failure), artifacts: [] };
    }
    if (result.kind === "exit") {
      return { kind: "fault", exit: result, durationMs: Date.now() - started };
    }

    const interruptError = await ctx.interrupt().then(
      () => null,
      (e: unknown) => toError(e)
    );
    const elapsed = Date.now() - started;
    const context: Record<string, string> = { worker: String(worker) };
    if (interruptError) context.interrupt_error = interruptError.message;

    const failure: FailureDetail =
      result.kind === "timeout"
        ? {
            summary: `${unit.name} exceeded its ${result.timeoutMs} ms timeout`,
            expected: `completion within ${result.timeoutMs} ms`,
            actual: `still running after ${elapsed} ms`,
            context
          }
        : {
            summary: `${unit.name} was interrupted when the run was cancelled`,
            expected: "completion before the run was cancelled",
            actual: `still running ${graceMs} ms after cancellation`,
            context
          };
    return { kind: "outcome", outcome: failedOutcome(unit, worker, "timed_out", elapsed, failure), artifacts: [] };
  }
}
