import type { CoverageSample } from "./coverage.js";
import type { Isolation } from "./config.js";
import type { ParamValue, RegisteredUnit } from "./unit.js";
import type { StructuralViolation } from "../registry/registry.js";

export type Mode = "standalone" | "discovery" | "automated";

export const MODES: readonly Mode[] = ["standalone", "discovery", "automated"];

export type OutcomeStatus = "passed" | "failed" | "skipped" | "errored" | "timed_out";

export type FailureDetail = {
  /** One line describing what was checked. */
  summary: string;
  expected: string;
  actual: string;
  context: Record<string, string>;
};

export type Outcome = {
  unit: string;
  topic: string;
  status: OutcomeStatus;
  duration_ms: number;
  worker: number;
  failure?: FailureDetail;
  skip_reason?: string;
  /** Inspection preview of the value the unit returned. */
  preview?: string;
  coverage: CoverageSample | null;
};

export type CoverageGate = {
  minimumPct: number;
  targetPct: number;
  strict: boolean;
};

/** Fully resolved, immutable description of one Run. */
export type RunPlan = Readonly<{
  runId: string;
  mode: Mode;
  units: readonly RegisteredUnit[];
  workers: number;
  verbose: boolean;
  plot: boolean;
  plotBackend: string | null;
  unitTimeoutMs: number;
  graceMs: number;
  budgetMs: number | null;
  isolation: Isolation;
  overrides: Readonly<Record<string, ParamValue>>;
  coverageGate: CoverageGate;
  strictRegistry: boolean;
  violations: readonly StructuralViolation[];
}>;
