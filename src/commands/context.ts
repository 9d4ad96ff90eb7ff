import path from "node:path";
import { resolveConfig } from "../config/validator.js";
import { loadUnitDirectory } from "../registry/loader.js";
import { TestRegistry } from "../registry/registry.js";
import type { SuiteConfig } from "../types/config.js";

/** Options every command accepts for locating its configuration. */
export type ConfigOptions = {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export type CommandError = { code: string; message: string };

export function baseDir(opts: ConfigOptions): string {
  return opts.cwd ?? process.cwd();
}

export async function loadSuiteConfig(
  opts: ConfigOptions
): Promise<{ ok: true; config: SuiteConfig } | { ok: false; error: CommandError }> {
  return resolveConfig({
    configDir: opts.configDir ? path.resolve(baseDir(opts), opts.configDir) : undefined,
    envName: opts.envName,
    env: opts.env
  });
}

/** Config plus a registry loaded from the configured units directory. */
export async function loadSuite(
  opts: ConfigOptions
): Promise<
  | { ok: true; config: SuiteConfig; registry: TestRegistry; unitsRoot: string; files: string[] }
  | { ok: false; error: CommandError }
> {
  const cfg = await loadSuiteConfig(opts);
  if (!cfg.ok) return cfg;
  const unitsRoot = path.resolve(baseDir(opts), cfg.config.units_root);
  const registry = new TestRegistry();
  const files = await loadUnitDirectory(registry, unitsRoot, cfg.config.unit_match);
  return { ok: true, config: cfg.config, registry, unitsRoot, files };
}
