import path from "node:path";
import { ArtifactStore, type SweepResult } from "../artifacts/store.js";
import { baseDir, loadSuiteConfig, type CommandError, type ConfigOptions } from "./context.js";

export type SweepCommandResult =
  | { ok: true; dir: string; result: SweepResult }
  | { ok: false; error: CommandError };

/** Remove every artifact outside a run. */
export async function sweepArtifacts(opts: ConfigOptions): Promise<SweepCommandResult> {
  const cfg = await loadSuiteConfig(opts);
  if (!cfg.ok) return cfg;
  const store = new ArtifactStore(path.resolve(baseDir(opts), cfg.config.artifacts_dir));
  return { ok: true, dir: store.dir, result: store.sweep(false) };
}
