import type { CoverageRecorder } from "../coverage/recorder.js";
import type { ArtifactScope } from "../artifacts/store.js";

export const UNIT_PREFIX = "test_";

export type ParamValue = string | number | boolean | null;

export type UnitParameter = {
  name: string;
  default: ParamValue;
};

/** Configuration handed to every unit. There are no process-wide toggles. */
export type UnitConfig = {
  doPlot: boolean;
  verbose: boolean;
  /** Headless rendering backend; only set when plotting is enabled. */
  plotBackend: string | null;
  params: Record<string, ParamValue>;
};

export type UnitContext = {
  artifacts: ArtifactScope;
  coverage: CoverageRecorder;
  /** Aborted when the unit times out or the Run is cancelled. */
  signal: AbortSignal;
};

export interface TestUnit {
  readonly name: string;
  readonly tags: readonly string[];
  readonly timeoutMs?: number;
  readonly skip?: string;
  readonly parameters: readonly UnitParameter[];
  run(config: UnitConfig, ctx: UnitContext): unknown;
}

/** A grouping of units that share a topic, exported as the default of a `*.units.ts` file. */
export interface TopicModule {
  readonly kind: "topic";
  readonly topic: string;
  readonly units: readonly TestUnit[];
}

export interface RegisteredUnit extends TestUnit {
  readonly topic: string;
  readonly declarationIndex: number;
  readonly sourceFile?: string;
  readonly fileTopic?: string;
}
