import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { SuiteConfig } from "../types/config.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "SUITECTL_";

/** Built-in layer underneath base.yaml. */
export const DEFAULT_CONFIG: SuiteConfig = {
  schema_version: "1.0.0",
  units_root: "units",
  unit_match: "**/*.units.{ts,js,mjs}",
  artifacts_dir: ".suitectl/artifacts",
  report_dir: ".suitectl/reports",
  isolation: "process",
  plot_backend: "headless",
  timeouts: { unit_ms: 60_000, grace_ms: 5_000, budget_ms: 1_800_000 },
  coverage: { minimum_pct: 80, target_pct: 90, strict: false },
  registry: { strict: false }
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const current = result[key];
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

function coerceEnvValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  return value;
}

/**
 * Apply SUITECTL_ prefixed environment variable overrides.
 * SUITECTL_ARTIFACTS_DIR → artifacts_dir, SUITECTL_COVERAGE__MINIMUM_PCT → coverage.minimum_pct
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    let layer: Record<string, unknown> = { [segments[segments.length - 1]]: coerceEnvValue(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      layer = { [segments[i]]: layer };
    }
    result = deepMerge(result, layer);
  }
  return result;
}

/**
 * Load layered config: defaults ← base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; pass it through validateConfig().
 *
 * @param envName - Optional environment name (e.g., "ci"). Loads `{configDir}/{envName}.yaml`.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  let merged = deepMerge(DEFAULT_CONFIG, loadYaml(path.join(dir, "base.yaml")));

  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
