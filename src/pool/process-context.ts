import { fork, type ChildProcess } from "node:child_process";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ArtifactStore, type ArtifactRecord } from "../artifacts/store.js";
import { tsxImportArgs } from "../registry/ts-loader.js";
import type { RegisteredUnit, UnitConfig } from "../types/unit.js";
import { erroredExecution } from "./execute-unit.js";
import { isReadyMessage, isResultMessage, type RunMessage } from "./protocol.js";
import type { ContextResult, WorkerContext } from "./worker-context.js";

const here = fileURLToPath(import.meta.url);
const ext = path.extname(here);

/** The child entry sits beside this file. Children always load tsx, since unit files may be TypeScript. */
const CHILD_ENTRY = path.join(path.dirname(here), `child${ext}`);

const SHUTDOWN_WAIT_MS = 2_000;

function waitForExit(child: ChildProcess, killAfterMs: number | null): Promise<void> {
  return new Promise((resolve) => {
    if (child.exitCode !== null || child.signalCode !== null) {
      resolve();
      return;
    }
    let timer: NodeJS.Timeout | undefined;
    child.once("exit", () => {
      if (timer) clearTimeout(timer);
      resolve();
    });
    if (killAfterMs === null) child.kill("SIGKILL");
    else timer = setTimeout(() => child.kill("SIGKILL"), killAfterMs);
  });
}

/**
 * Runs units in a forked Node.js process. Each unit is loaded in the child from
 * its source file. Interrupting kills the child; the next unit gets a fresh one.
 */
export class ProcessWorkerContext implements WorkerContext {
  private child: ChildProcess | null = null;
  private pending: ((result: ContextResult) => void) | null = null;
  private ready = false;
  /** A run message held until the child reports ready. */
  private queued: RunMessage | null = null;

  private readonly store: ArtifactStore;

  constructor(
    readonly id: number,
    private readonly artifactsDir: string,
    private readonly entry: string = CHILD_ENTRY
  ) {
    this.store = new ArtifactStore(artifactsDir);
  }

  runUnit(unit: RegisteredUnit, config: UnitConfig): Promise<ContextResult> {
    const file = unit.sourceFile;
    if (!file) {
      return Promise.resolve({
        kind: "done",
        execution: erroredExecution({
          summary: `${unit.name} cannot run in a separate process`,
          expected: "a unit registered from a source file",
          actual: "a unit registered in memory",
          context: { topic: unit.topic }
        })
      });
    }

    const child = this.child ?? this.spawn();
    const message: RunMessage = {
      type: "run",
      file,
      unit: unit.name,
      worker: this.id,
      artifactsDir: this.artifactsDir,
      config
    };

    return new Promise<ContextResult>((resolve) => {
      this.pending = resolve;
      if (this.ready) this.dispatch(child, message);
      else this.queued = message;
    });
  }

  private dispatch(child: ChildProcess, message: RunMessage): void {
    const resolve = this.pending;
    child.send(message, (err) => {
      if (err && resolve && this.pending === resolve) {
        this.pending = null;
        resolve({ kind: "exit", code: child.exitCode, signal: child.signalCode, reason: err.message });
      }
    });
  }

  async interrupt(): Promise<void> {
    const child = this.child;
    this.child = null;
    this.queued = null;
    if (child) await waitForExit(child, null);
  }

  async discard(records: readonly ArtifactRecord[]): Promise<void> {
    await this.store.remove(records);
  }

  async close(): Promise<void> {
    const child = this.child;
    this.child = null;
    if (!child) return;
    if (child.connected) child.send({ type: "shutdown" });
    await waitForExit(child, SHUTDOWN_WAIT_MS);
  }

  private spawn(): ChildProcess {
    const child = fork(this.entry, [], {
      execArgv: tsxImportArgs(),
      stdio: ["ignore", "inherit", "inherit", "ipc"]
    });
    child.on("message", (msg: unknown) => {
      if (this.child !== child) return;
      if (isReadyMessage(msg)) {
        this.ready = true;
        const queued = this.queued;
        this.queued = null;
        if (queued) this.dispatch(child, queued);
        return;
      }
      if (!isResultMessage(msg)) return;
      const resolve = this.pending;
      this.pending = null;
      resolve?.({ kind: "done", execution: msg.execution });
    });
    child.on("exit", (code, signal) => {
      if (this.child !== child) return;
      this.child = null;
      this.queued = null;
      const resolve = this.pending;
      this.pending = null;
      resolve?.({ kind: "exit", code, signal });
    });
    child.on("error", (err) => {
      const resolve = this.pending;
      this.pending = null;
      resolve?.({ kind: "exit", code: child.exitCode, signal: child.signalCode, reason: err.message });
    });
    this.child = child;
    this.ready = false;
    return child;
  }
}
