import type { ParamValue, TestUnit, TopicModule, UnitConfig, UnitContext, UnitParameter } from "../types/unit.js";

export type UnitSpec = {
  name: string;
  tags?: string[];
  timeoutMs?: number;
  /** Reason for skipping; a unit with a reason is reported as skipped and never run. */
  skip?: string;
  /** Declared parameters and their defaults, in declaration order. */
  parameters?: Record<string, ParamValue> | UnitParameter[];
  run(config: UnitConfig, ctx: UnitContext): unknown;
};

function toParameters(parameters: UnitSpec["parameters"]): UnitParameter[] {
  if (!parameters) return [];
  if (Array.isArray(parameters)) return parameters.map((p) => ({ name: p.name, default: p.default }));
  return Object.entries(parameters).map(([name, value]) => ({ name, default: value }));
}

/**
 * Declare a unit.
 *
 * ```ts
 * export default defineTopic("outbreak", [
 *   defineUnit({
 *     name: "test_outbreak_peak",
 *     tags: ["unit"],
 *     parameters: { do_plot: false },
 *     run(config, ctx) {
 *       const peak = simulate(config.params);
 *       expectEqual(peak, 120, "peak infected count");
 *       return peak;
 *     },
 *   }),
 * ]);
 * ```
 */
export function defineUnit(spec: UnitSpec): TestUnit {
  const run = spec.run;
  return Object.freeze({
    name: spec.name,
    tags: Object.freeze([...(spec.tags ?? [])]),
    timeoutMs: spec.timeoutMs,
    skip: spec.skip,
    parameters: Object.freeze(toParameters(spec.parameters)),
    run: (config: UnitConfig, ctx: UnitContext) => run(config, ctx)
  });
}

export function defineTopic(topic: string, units: ReadonlyArray<TestUnit | UnitSpec>): TopicModule {
  return Object.freeze({
    kind: "topic" as const,
    topic,
    units: Object.freeze(units.map((u) => (isTestUnit(u) ? u : defineUnit(u))))
  });
}

function isTestUnit(value: TestUnit | UnitSpec): value is TestUnit {
  return Array.isArray(value.parameters) && Array.isArray(value.tags) && Object.isFrozen(value);
}

export function isTopicModule(value: unknown): value is TopicModule {
  if (typeof value !== "object" || value === null) return false;
  return (
    "kind" in value &&
    value.kind === "topic" &&
    "topic" in value &&
    typeof value.topic === "string" &&
    "units" in value &&
    Array.isArray(value.units)
  );
}
