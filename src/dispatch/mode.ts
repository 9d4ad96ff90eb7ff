import os from "node:os";
import { makeRunId } from "../core/run-id.js";
import { diag, type Diagnostic } from "../output/diagnostics.js";
import { splitSelectors, tagExpressionError } from "../registry/filter.js";
import type { TestRegistry } from "../registry/registry.js";
import type { Isolation, SuiteConfig } from "../types/config.js";
import type { Mode, RunPlan } from "../types/run.js";
import type { ParamValue, RegisteredUnit, UnitConfig } from "../types/unit.js";

/** What a caller asked for, before defaults are applied. */
export type Invocation = {
  mode: Mode;
  /** Unit names and glob patterns over unit names. */
  selectors?: string[];
  tags?: string;
  workers?: number;
  verbose?: boolean;
  plot?: boolean;
  strictCoverage?: boolean;
  strictRegistry?: boolean;
  budgetMs?: number;
  unitTimeoutMs?: number;
  isolation?: Isolation;
  overrides?: Record<string, ParamValue>;
  runId?: string;
};

export type DispatchErrorCode =
  | "NO_SUCH_UNIT"
  | "STANDALONE_REQUIRES_NAME"
  | "STRUCTURAL_VIOLATION"
  | "INVALID_WORKERS"
  | "INVALID_OVERRIDE"
  | "INVALID_TAG_EXPRESSION";

export type DispatchError = { code: DispatchErrorCode; message: string };

export type DispatchResult =
  | { ok: true; plan: RunPlan; diagnostics: Diagnostic[] }
  | { ok: false; error: DispatchError; diagnostics: Diagnostic[] };

const MODE_DEFAULTS: Record<Mode, { verbose: boolean; plot: boolean }> = {
  standalone: { verbose: true, plot: true },
  discovery: { verbose: false, plot: false },
  automated: { verbose: false, plot: false }
};

function defaultWorkers(): number {
  return os.availableParallelism();
}

/** `"true"`, `"false"`, `"null"` and numbers are coerced; anything else stays a string. */
export function parseParamValue(raw: string): ParamValue {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (raw === "null") return null;
  if (raw.trim() !== "" && Number.isFinite(Number(raw))) return Number(raw);
  return raw;
}

/** Parse `key=value` pairs from `--set`. */
export function parseOverrides(
  pairs: readonly string[]
): { ok: true; overrides: Record<string, ParamValue> } | { ok: false; error: DispatchError } {
  const overrides: Record<string, ParamValue> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      return { ok: false, error: { code: "INVALID_OVERRIDE", message: `Expected key=value, got "${pair}"` } };
    }
    overrides[pair.slice(0, eq).trim()] = parseParamValue(pair.slice(eq + 1));
  }
  return { ok: true, overrides };
}

/**
 * Resolve an invocation into an immutable RunPlan. Every check that can reject
 * the Run happens here, before any unit executes.
 */
export function resolveRunPlan(invocation: Invocation, registry: TestRegistry, config: SuiteConfig): DispatchResult {
  const diagnostics: Diagnostic[] = [];
  const fail = (code: DispatchErrorCode, message: string): DispatchResult => ({
    ok: false,
    error: { code, message },
    diagnostics
  });

  const violations = registry.violations();
  for (const v of violations) {
    diagnostics.push(diag("warn", v.code, v.message, { path: v.file, details: { topic: v.topic, unit: v.unit } }));
  }
  const strictRegistry = invocation.strictRegistry ?? config.registry.strict;
  if (strictRegistry && violations.length > 0) {
    return fail("STRUCTURAL_VIOLATION", `${violations.length} structural violation(s) in the unit registry`);
  }

  const { names, patterns } = splitSelectors(invocation.selectors ?? []);
  if (invocation.mode === "standalone" && names.length === 0) {
    return fail("STANDALONE_REQUIRES_NAME", "Standalone mode needs at least one unit name");
  }

  const missing = names.filter((n) => !registry.has(n));
  if (missing.length > 0) {
    return fail("NO_SUCH_UNIT", `No such unit: ${missing.join(", ")}`);
  }

  if (invocation.workers !== undefined && (!Number.isInteger(invocation.workers) || invocation.workers < 1)) {
    return fail("INVALID_WORKERS", `Worker count must be a positive integer, got ${invocation.workers}`);
  }

  const tagError = tagExpressionError(invocation.tags);
  if (tagError !== null) return fail("INVALID_TAG_EXPRESSION", tagError);

  const units = registry.discover({ names, patterns, tags: invocation.tags });

  let workers = invocation.workers ?? defaultWorkers();
  if (invocation.mode === "standalone") {
    if (invocation.workers !== undefined && invocation.workers !== 1) {
      diagnostics.push(
        diag("warn", "WORKERS_FORCED", `Standalone mode runs on one worker; ignoring --workers ${invocation.workers}`)
      );
    }
    workers = 1;
  }
  workers = Math.max(1, Math.min(workers, units.length));

  const defaults = MODE_DEFAULTS[invocation.mode];
  const plot = invocation.plot ?? defaults.plot;

  const plan: RunPlan = Object.freeze({
    runId: invocation.runId ?? makeRunId(),
    mode: invocation.mode,
    units: Object.freeze([...units]),
    workers,
    verbose: invocation.verbose ?? defaults.verbose,
    plot,
    plotBackend: plot ? config.plot_backend : null,
    unitTimeoutMs: invocation.unitTimeoutMs ?? config.timeouts.unit_ms,
    graceMs: config.timeouts.grace_ms,
    budgetMs: invocation.mode === "automated" ? (invocation.budgetMs ?? config.timeouts.budget_ms) : null,
    isolation: invocation.isolation ?? config.isolation,
    overrides: Object.freeze({ ...(invocation.overrides ?? {}) }),
    coverageGate: Object.freeze({
      minimumPct: config.coverage.minimum_pct,
      targetPct: config.coverage.target_pct,
      strict: invocation.strictCoverage ?? config.coverage.strict
    }),
    strictRegistry,
    violations: Object.freeze(violations)
  });

  return { ok: true, plan, diagnostics };
}

/**
 * Configuration for one unit: declared defaults, then run overrides for the
 * names the unit declares. A declared `do_plot` always follows the plan.
 */
export function unitConfigFor(plan: RunPlan, unit: RegisteredUnit): UnitConfig {
  const params: Record<string, ParamValue> = {};
  for (const p of unit.parameters) {
    params[p.name] = Object.hasOwn(plan.overrides, p.name) ? plan.overrides[p.name] : p.default;
  }
  if (Object.hasOwn(params, "do_plot")) params.do_plot = plan.plot;
  return {
    doPlot: plan.plot,
    verbose: plan.verbose,
    plotBackend: plan.plot ? plan.plotBackend : null,
    params
  };
}
