import { inspect } from "node:util";
import type { ArtifactRecord, ArtifactScope, ArtifactStore } from "../artifacts/store.js";
import { CoverageRecorder } from "../coverage/recorder.js";
import type { CoverageSample } from "../types/coverage.js";
import { isExpectationError, toError } from "../types/errors.js";
import type { FailureDetail, OutcomeStatus } from "../types/run.js";
import type { TestUnit, UnitConfig } from "../types/unit.js";

const PREVIEW_LIMIT = 2_000;
const STACK_LINES = 6;

/** What running one unit produced, before the pool turns it into an Outcome. */
export type UnitExecution = {
  status: Exclude<OutcomeStatus, "timed_out">;
  duration_ms: number;
  failure?: FailureDetail;
  skip_reason?: string;
  preview?: string;
  coverage: CoverageSample | null;
  artifacts: ArtifactRecord[];
};

export type ExecuteDeps = {
  store: ArtifactStore;
  worker: number;
  signal: AbortSignal;
  /** Called with the unit's artifact scope before the unit starts. */
  onScope?: (scope: ArtifactScope) => void;
};

export function previewValue(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  const text = inspect(value, { depth: 2, breakLength: 100 });
  return text.length > PREVIEW_LIMIT ? text.slice(0, PREVIEW_LIMIT) + "…" : text;
}

export function errorFailure(err: Error, summary: string): FailureDetail {
  const stack = (err.stack ?? "").split("\n").slice(1, STACK_LINES + 1).map((l) => l.trim());
  return {
    summary,
    expected: "no exception",
    actual: `${err.name}: ${err.message}`,
    context: stack.length > 0 ? { stack: stack.join("\n") } : {}
  };
}

export function erroredExecution(failure: FailureDetail): UnitExecution {
  return { status: "errored", duration_ms: 0, failure, coverage: null, artifacts: [] };
}

/**
 * Run one unit and classify what happened. Never rejects: an ExpectationError
 * becomes `failed`, anything else thrown becomes `errored`. The unit's artifact
 * scope is settled before this resolves.
 */
export async function executeUnit(unit: TestUnit, config: UnitConfig, deps: ExecuteDeps): Promise<UnitExecution> {
  if (unit.skip !== undefined) {
    return { status: "skipped", duration_ms: 0, skip_reason: unit.skip, coverage: null, artifacts: [] };
  }

  const scope = deps.store.scope(unit.name);
  const coverage = new CoverageRecorder();
  deps.onScope?.(scope);

  const started = Date.now();
  let status: UnitExecution["status"] = "passed";
  let failure: FailureDetail | undefined;
  let preview: string | undefined;

  try {
    const value = await unit.run(config, { artifacts: scope, coverage, signal: deps.signal });
    preview = previewValue(value);
  } catch (e) {
    if (isExpectationError(e)) {
      status = "failed";
      failure = { summary: e.summary, expected: e.expected, actual: e.actual, context: e.context };
    } else {
      const err = toError(e);
      status = "errored";
      failure = errorFailure(err, `${unit.name} raised an unexpected ${err.name}`);
    }
  }

  try {
    await scope.closeAll(status === "passed");
  } catch (e) {
    const err = toError(e);
    if (status === "passed" || !failure) {
      status = "errored";
      failure = errorFailure(err, `${unit.name} could not commit its artifacts`);
    } else {
      failure = { ...failure, context: { ...failure.context, artifact_error: err.message } };
    }
  }

  return {
    status,
    duration_ms: Date.now() - started,
    failure,
    preview,
    coverage: coverage.isEmpty() ? null : coverage.sample(unit.name, deps.worker),
    artifacts: scope.records()
  };
}
