import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv } from "../schema/ajv.js";
import type { SuiteConfig } from "../types/config.js";
import { loadConfig } from "./loader.js";
import { toError } from "../types/errors.js";

const SCHEMA_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../schemas/config.schema.json"
);

export type ConfigValidationResult =
  | { valid: true; config: SuiteConfig }
  | { valid: false; errors: string };

/** Validate a loaded config against schemas/config.schema.json. */
export async function validateConfig(
  config: unknown,
  schemaPath: string = SCHEMA_PATH
): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, "utf8"));
  const validate = ajv.compile<SuiteConfig>(schema);
  if (!validate(config)) {
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }
  if (config.coverage.target_pct < config.coverage.minimum_pct) {
    return {
      valid: false,
      errors: `coverage.target_pct (${config.coverage.target_pct}) must not be below coverage.minimum_pct (${config.coverage.minimum_pct})`
    };
  }
  return { valid: true, config };
}

export type ResolveConfigResult =
  | { ok: true; config: SuiteConfig }
  | { ok: false; error: { code: string; message: string } };

/** Load and validate in one step. */
export async function resolveConfig(opts: {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ResolveConfigResult> {
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig(opts.envName, opts.configDir, opts.env);
  } catch (e) {
    return { ok: false, error: { code: "CONFIG_READ_FAILED", message: toError(e).message } };
  }
  const res = await validateConfig(raw);
  if (!res.valid) {
    return { ok: false, error: { code: "CONFIG_INVALID", message: `Config invalid: ${res.errors}` } };
  }
  return { ok: true, config: res.config };
}
