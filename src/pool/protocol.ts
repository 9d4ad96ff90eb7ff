import type { UnitConfig } from "../types/unit.js";
import type { UnitExecution } from "./execute-unit.js";

/** Parent → child: run one unit from its source file. */
export type RunMessage = {
  type: "run";
  file: string;
  unit: string;
  worker: number;
  artifactsDir: string;
  config: UnitConfig;
};

export type ShutdownMessage = { type: "shutdown" };

/** Child → parent, once it listens for run messages. */
export type ReadyMessage = { type: "ready" };

/** Child → parent. */
export type ResultMessage = {
  type: "result";
  unit: string;
  execution: UnitExecution;
};

function hasType(value: unknown, type: string): value is { type: string } {
  return typeof value === "object" && value !== null && "type" in value && value.type === type;
}

export function isRunMessage(value: unknown): value is RunMessage {
  return hasType(value, "run");
}

export function isShutdownMessage(value: unknown): value is ShutdownMessage {
  return hasType(value, "shutdown");
}

export function isResultMessage(value: unknown): value is ResultMessage {
  return hasType(value, "result");
}

export function isReadyMessage(value: unknown): value is ReadyMessage {
  return hasType(value, "ready");
}
