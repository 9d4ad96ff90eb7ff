import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { sha256File } from "../artifacts/checksum.js";
import { diag, type Diagnostic } from "../output/diagnostics.js";
import { loadUnitDirectory } from "../registry/loader.js";
import { TestRegistry } from "../registry/registry.js";
import { loadAjv } from "../schema/ajv.js";
import { toError } from "../types/errors.js";
import { baseDir, loadSuiteConfig, type ConfigOptions } from "./context.js";

const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export type ValidateResult =
  | { ok: true; warnings: Diagnostic[] }
  | { ok: false; errors: Diagnostic[]; warnings: Diagnostic[] };

type ManifestEntry = { unit: string; path: string; sha256: string };

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

async function checkManifest(artifactsDir: string, schemaDir: string, out: Diagnostic[]): Promise<void> {
  const manifestPath = path.join(artifactsDir, "manifest.json");
  if (!fs.existsSync(manifestPath)) return;

  let manifest: unknown;
  try {
    manifest = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
  } catch (e) {
    out.push(
      diag("error", "ARTIFACTS_MANIFEST_JSON_INVALID", `Invalid JSON manifest: ${toError(e).message}`, {
        path: manifestPath
      })
    );
    return;
  }

  const ajv = await loadAjv();
  const schema: unknown = JSON.parse(fs.readFileSync(path.join(schemaDir, "artifacts.manifest.schema.json"), "utf8"));
  const validate = ajv.compile<{ artifacts: ManifestEntry[] }>(schema);
  if (!validate(manifest)) {
    out.push(
      diag("error", "ARTIFACTS_MANIFEST_INVALID", `Artifact manifest invalid: ${ajv.errorsText(validate.errors)}`, {
        path: manifestPath
      })
    );
    return;
  }

  for (const entry of manifest.artifacts) {
    const target = path.resolve(artifactsDir, entry.path);
    if (!isWithinDir(artifactsDir, target)) {
      out.push(diag("error", "ARTIFACTS_PATH_ESCAPES_DIR", `Manifest path escapes artifacts dir: ${entry.path}`));
      continue;
    }
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
      out.push(diag("error", "ARTIFACTS_FILE_MISSING", `Missing artifact file: ${entry.path}`, { path: target }));
      continue;
    }
    const actual = await sha256File(target);
    if (actual !== entry.sha256) {
      out.push(
        diag("error", "ARTIFACTS_SHA_MISMATCH", `Checksum mismatch for ${entry.path}`, {
          path: target,
          details: { expected: entry.sha256, actual }
        })
      );
    }
  }
}

/**
 * Validate the layered config, the unit directory it points at, and the
 * artifact manifest if one exists.
 */
export async function validateAll(opts: ConfigOptions & { schemaDir?: string }): Promise<ValidateResult> {
  const diagnostics: Diagnostic[] = [];

  const cfg = await loadSuiteConfig(opts);
  if (!cfg.ok) {
    return { ok: false, errors: [diag("error", cfg.error.code, cfg.error.message)], warnings: [] };
  }
  const { config } = cfg;
  const cwd = baseDir(opts);

  const unitsRoot = path.resolve(cwd, config.units_root);
  if (!fs.existsSync(unitsRoot)) {
    diagnostics.push(diag("warn", "UNITS_ROOT_MISSING", `Units directory not found: ${unitsRoot}`, { path: unitsRoot }));
  } else {
    const registry = new TestRegistry();
    const files = await loadUnitDirectory(registry, unitsRoot, config.unit_match);
    if (files.length === 0) {
      diagnostics.push(
        diag("warn", "NO_UNIT_FILES", `No files under ${unitsRoot} match ${config.unit_match}`, { path: unitsRoot })
      );
    }
    for (const v of registry.violations()) {
      diagnostics.push(diag(config.registry.strict ? "error" : "warn", v.code, v.message, { path: v.file }));
    }
  }

  await checkManifest(path.resolve(cwd, config.artifacts_dir), opts.schemaDir ?? SCHEMA_DIR, diagnostics);

  const errors = diagnostics.filter((d) => d.level === "error");
  const warnings = diagnostics.filter((d) => d.level !== "error");
  return errors.length > 0 ? { ok: false, errors, warnings } : { ok: true, warnings };
}
