import path from "node:path";
import { ArtifactStore, type ArtifactEntry } from "../artifacts/store.js";
import { baseDir, loadSuiteConfig, type CommandError, type ConfigOptions } from "./context.js";

export type ArtifactsResult =
  | { ok: true; dir: string; artifacts: ArtifactEntry[] }
  | { ok: false; error: CommandError };

/** Recorded artifacts, optionally only those of one unit or one run. */
export async function listArtifacts(
  opts: ConfigOptions & { unit?: string; runId?: string }
): Promise<ArtifactsResult> {
  const cfg = await loadSuiteConfig(opts);
  if (!cfg.ok) return cfg;
  const store = new ArtifactStore(path.resolve(baseDir(opts), cfg.config.artifacts_dir));
  const manifest = store.readManifest();
  if (!manifest.ok) return { ok: false, error: { code: "ARTIFACTS_MANIFEST_INVALID", message: manifest.error } };
  const artifacts = manifest.artifacts.filter(
    (a) => (opts.unit === undefined || a.unit === opts.unit) && (opts.runId === undefined || a.run_id === opts.runId)
  );
  return { ok: true, dir: store.dir, artifacts };
}
