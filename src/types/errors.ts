import { inspect, isDeepStrictEqual } from "node:util";

/** Render any value the way failure messages show it. */
export function formatValue(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: Infinity, sorted: true });
}

export type ExpectationInit = {
  summary: string;
  expected: unknown;
  actual: unknown;
  context?: Record<string, unknown>;
};

/**
 * Thrown by a unit when something it checked does not hold.
 * Recorded as a `failed` outcome; any other throw is `errored`.
 */
export class ExpectationError extends Error {
  readonly summary: string;
  readonly expected: string;
  readonly actual: string;
  readonly context: Record<string, string>;

  constructor(init: ExpectationInit) {
    super(`${init.summary}: expected ${formatValue(init.expected)}, got ${formatValue(init.actual)}`);
    this.name = "ExpectationError";
    this.summary = init.summary;
    this.expected = formatValue(init.expected);
    this.actual = formatValue(init.actual);
    this.context = {};
    for (const [key, value] of Object.entries(init.context ?? {})) {
      this.context[key] = typeof value === "string" ? value : formatValue(value);
    }
  }
}

/** Deep-equality check that throws an ExpectationError carrying both values. */
export function expectEqual<T>(
  actual: T,
  expected: T,
  summary: string,
  context?: Record<string, unknown>
): void {
  if (!isDeepStrictEqual(actual, expected)) {
    throw new ExpectationError({ summary, expected, actual, context });
  }
}

export function isExpectationError(err: unknown): err is ExpectationError {
  return err instanceof ExpectationError;
}

export class RegistryFrozenError extends Error {
  constructor(topic: string) {
    super(`Registry is frozen for the current run; cannot register topic "${topic}"`);
    this.name = "RegistryFrozenError";
  }
}

export class ArtifactPathError extends Error {
  constructor(unit: string, name: string) {
    super(`Artifact path escapes the unit directory: ${unit}/${name}`);
    this.name = "ArtifactPathError";
  }
}

export class TagExpressionError extends Error {
  constructor(
    readonly expression: string,
    reason: string
  ) {
    super(`Invalid tag expression "${expression}": ${reason}`);
    this.name = "TagExpressionError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
