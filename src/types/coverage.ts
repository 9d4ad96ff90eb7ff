/** Hit data for one instrumented module. Line ids and branch ids are opaque strings. */
export type ModuleHits = {
  lines: Record<string, number>;
  branches: Record<string, boolean[]>;
};

export type CoverageData = Record<string, ModuleHits>;

/** Coverage recorded while one unit ran on one worker. */
export type CoverageSample = {
  unit: string;
  worker: number;
  modules: CoverageData;
};

export type ModuleCoverage = {
  lines_total: number;
  lines_covered: number;
  line_ratio: number;
  branches_total: number;
  branches_covered: number;
  branch_ratio: number;
};

export type CoverageReport = ModuleCoverage & {
  modules: Record<string, ModuleCoverage>;
};

export type CoverageGateResult = {
  pass: boolean;
  strict: boolean;
  minimum_pct: number;
  target_pct: number;
  branch_pct: number;
  below_target: boolean;
};
