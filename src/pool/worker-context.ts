import type { ArtifactRecord, ArtifactScope, ArtifactStore } from "../artifacts/store.js";
import type { RegisteredUnit, UnitConfig } from "../types/unit.js";
import { executeUnit, type UnitExecution } from "./execute-unit.js";

/**
 * `done`: the unit finished (in any status).
 * `exit`: the execution context itself died while running it.
 */
export type ContextResult =
  | { kind: "done"; execution: UnitExecution }
  | { kind: "exit"; code: number | null; signal: string | null; reason?: string };

/**
 * One worker's execution context. A context runs one unit at a time; the pool
 * never calls runUnit again before the previous call settled or was interrupted.
 */
export interface WorkerContext {
  readonly id: number;
  /** Never rejects. */
  runUnit(unit: RegisteredUnit, config: UnitConfig): Promise<ContextResult>;
  /** Forcibly stop the unit currently running, if any. */
  interrupt(): Promise<void>;
  /** Remove artifacts a unit committed before its outcome was overruled. */
  discard(records: readonly ArtifactRecord[]): Promise<void>;
  close(): Promise<void>;
}

export type WorkerContextFactory = (id: number) => WorkerContext;

type RunningUnit = { controller: AbortController; scope: ArtifactScope | null };

/**
 * Runs units in this process. Interrupting aborts the unit's signal, discards
 * its open artifacts and abandons its promise.
 *
 * Synchronous code cannot be preempted here. A unit that blocks past its
 * timeout is reported as timed out only once it returns; use `process`
 * isolation for units that may never yield.
 */
export class InlineWorkerContext implements WorkerContext {
  private current: RunningUnit | null = null;

  constructor(
    readonly id: number,
    private readonly store: ArtifactStore
  ) {}

  async runUnit(unit: RegisteredUnit, config: UnitConfig): Promise<ContextResult> {
    const running: RunningUnit = { controller: new AbortController(), scope: null };
    this.current = running;
    const execution = await executeUnit(unit, config, {
      store: this.store,
      worker: this.id,
      signal: running.controller.signal,
      onScope: (scope) => {
        running.scope = scope;
      }
    });
    if (this.current === running) this.current = null;
    return { kind: "done", execution };
  }

  async interrupt(): Promise<void> {
    const running = this.current;
    this.current = null;
    if (!running) return;
    running.controller.abort(new Error("unit interrupted"));
    if (running.scope) await running.scope.closeAll(false);
  }

  async discard(records: readonly ArtifactRecord[]): Promise<void> {
    await this.store.remove(records);
  }

  async close(): Promise<void> {
    await this.interrupt();
  }
}
