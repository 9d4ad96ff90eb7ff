/** Configuration types — layered config system (base.yaml ← env.yaml ← SUITECTL_* vars). */
export type Isolation = "inline" | "process";

export type TimeoutsConfig = {
  /** Default per-unit timeout when a unit declares none. */
  unit_ms: number;
  /** Grace period for running units after a Run-level cancellation. */
  grace_ms: number;
  /** Wall-clock budget for an Automated-mode Run. */
  budget_ms: number;
};

export type CoverageGateConfig = {
  minimum_pct: number;
  target_pct: number;
  strict: boolean;
};

export type SuiteConfig = {
  schema_version: string;
  units_root: string;
  unit_match: string;
  artifacts_dir: string;
  report_dir: string;
  isolation: Isolation;
  plot_backend: string;
  timeouts: TimeoutsConfig;
  coverage: CoverageGateConfig;
  registry: { strict: boolean };
};
