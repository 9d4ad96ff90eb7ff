import fs from "node:fs";
import { mkdir, open, rename, rm, stat, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createAjv, type AjvValidateFn } from "../schema/ajv.js";
import { ArtifactPathError, toError } from "../types/errors.js";
import { sha256File } from "./checksum.js";

const MANIFEST_FILE = "manifest.json";
const PARTIAL_SUFFIX = ".partial";
const MANIFEST_SCHEMA = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../schemas/artifacts.manifest.schema.json"
);

export type ArtifactRecord = {
  unit: string;
  /** Relative to the store directory. */
  path: string;
  bytes: number;
  sha256: string;
  created_at: string;
};

export type ArtifactEntry = ArtifactRecord & {
  run_id: string;
  pinned: boolean;
};

type StoreManifest = {
  schema_version: string;
  updated_at: string;
  artifacts: ArtifactEntry[];
};

export type SweepResult = {
  pinned: boolean;
  removed: string[];
  /** Files left in place because a handle still had them open. */
  skipped: string[];
  /** Set when the manifest could not be read and was started afresh. */
  manifest_error?: string;
};

export type ManifestRead = { ok: true; artifacts: ArtifactEntry[] } | { ok: false; error: string };

let manifestValidator: AjvValidateFn<StoreManifest> | undefined;
let manifestErrorsText: ((errors: unknown) => string) | undefined;

function validateManifest(data: unknown): { ok: true; manifest: StoreManifest } | { ok: false; error: string } {
  if (!manifestValidator) {
    const ajv = createAjv();
    const schema: unknown = JSON.parse(fs.readFileSync(MANIFEST_SCHEMA, "utf8"));
    manifestValidator = ajv.compile<StoreManifest>(schema);
    manifestErrorsText = (errors) => ajv.errorsText(errors);
  }
  if (manifestValidator(data)) return { ok: true, manifest: data };
  return { ok: false, error: manifestErrorsText?.(manifestValidator.errors) ?? "invalid manifest" };
}

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/**
 * Directory of per-unit debugging artifacts.
 *
 * Layout: `<dir>/<unit>/<name>`. Writes land in `<name>.partial` and are renamed
 * into place only when their handle closes on a successful path.
 */
export class ArtifactStore {
  private readonly openPaths = new Set<string>();

  constructor(readonly dir: string) {}

  init(): void {
    fs.mkdirSync(this.dir, { recursive: true });
  }

  scope(unit: string): ArtifactScope {
    return new ArtifactScope(this, unit);
  }

  /** @internal */
  resolve(unit: string, name: string): string {
    const unitDir = path.resolve(this.dir, unit);
    if (!isWithinDir(path.resolve(this.dir), unitDir)) throw new ArtifactPathError(unit, name);
    const target = path.resolve(unitDir, name);
    if (!isWithinDir(unitDir, target)) throw new ArtifactPathError(unit, name);
    return target;
  }

  /** @internal */
  markOpen(filePath: string): void {
    this.openPaths.add(filePath);
  }

  /** @internal */
  markClosed(filePath: string): void {
    this.openPaths.delete(filePath);
  }

  isOpen(filePath: string): boolean {
    return this.openPaths.has(path.resolve(filePath));
  }

  get openCount(): number {
    return this.openPaths.size;
  }

  /**
   * Remove every artifact that is not pinned. With `pinIfVerbose` set, the
   * current Run is verbose and the sweep leaves everything alone.
   * Files open for writing are never removed.
   */
  sweep(pinIfVerbose: boolean): SweepResult {
    if (pinIfVerbose) return { pinned: true, removed: [], skipped: [] };
    if (!fs.existsSync(this.dir)) return { pinned: false, removed: [], skipped: [] };

    const manifest = this.readManifest();
    const removed: string[] = [];
    const skipped: string[] = [];
    const manifestPath = path.join(this.dir, MANIFEST_FILE);

    const visit = (current: string): void => {
      for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
        const full = path.join(current, entry.name);
        if (entry.isDirectory()) {
          visit(full);
          if (fs.readdirSync(full).length === 0) fs.rmdirSync(full);
          continue;
        }
        if (full === manifestPath) continue;
        const rel = path.relative(this.dir, full);
        if (this.openPaths.has(path.resolve(full))) {
          skipped.push(rel);
          continue;
        }
        fs.rmSync(full, { force: true });
        removed.push(rel);
      }
    };
    visit(this.dir);

    const survivors = manifest.ok ? manifest.artifacts.filter((a) => skipped.includes(a.path)) : [];
    this.writeManifest(survivors);

    const result: SweepResult = { pinned: false, removed: removed.sort(), skipped: skipped.sort() };
    if (!manifest.ok) result.manifest_error = manifest.error;
    return result;
  }

  /** Record the artifacts a Run produced. */
  record(runId: string, records: readonly ArtifactRecord[], pinned: boolean): void {
    const byPath = new Map(this.list().map((a) => [a.path, a]));
    for (const r of records) {
      byPath.set(r.path, { ...r, run_id: runId, pinned });
    }
    this.writeManifest([...byPath.values()].sort((a, b) => a.path.localeCompare(b.path)));
  }

  /** Recorded artifacts; an unreadable manifest counts as empty. */
  list(): ArtifactEntry[] {
    const manifest = this.readManifest();
    return manifest.ok ? manifest.artifacts : [];
  }

  readManifest(): ManifestRead {
    const manifestPath = path.join(this.dir, MANIFEST_FILE);
    if (!fs.existsSync(manifestPath)) return { ok: true, artifacts: [] };
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
    } catch (e) {
      return { ok: false, error: `${MANIFEST_FILE}: ${toError(e).message}` };
    }
    const checked = validateManifest(data);
    if (!checked.ok) return { ok: false, error: `${MANIFEST_FILE}: ${checked.error}` };
    return { ok: true, artifacts: checked.manifest.artifacts };
  }

  /** Delete committed artifacts and drop them from the manifest. */
  async remove(records: readonly ArtifactRecord[]): Promise<void> {
    if (records.length === 0) return;
    const root = path.resolve(this.dir);
    const paths = new Set<string>();
    for (const r of records) {
      const target = path.resolve(root, r.path);
      if (!isWithinDir(root, target)) throw new ArtifactPathError(r.unit, r.path);
      await rm(target, { force: true });
      paths.add(r.path);
    }
    const manifest = this.readManifest();
    if (manifest.ok && manifest.artifacts.some((a) => paths.has(a.path))) {
      this.writeManifest(manifest.artifacts.filter((a) => !paths.has(a.path)));
    }
  }

  private writeManifest(artifacts: ArtifactEntry[]): void {
    this.init();
    const manifest: StoreManifest = {
      schema_version: "1.0.0",
      updated_at: new Date().toISOString(),
      artifacts
    };
    const target = path.join(this.dir, MANIFEST_FILE);
    const tmp = `${target}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(manifest, null, 2) + "\n", "utf8");
    fs.renameSync(tmp, target);
  }
}

/** A writable artifact. Closing commits it; discarding removes the partial file. */
export class ArtifactHandle {
  private settled = false;

  constructor(
    private readonly store: ArtifactStore,
    private readonly onSettled: (handle: ArtifactHandle, record: ArtifactRecord | null) => void,
    readonly unit: string,
    readonly path: string,
    private readonly partialPath: string,
    private readonly file: FileHandle
  ) {}

  get closed(): boolean {
    return this.settled;
  }

  async write(data: string | Uint8Array): Promise<void> {
    if (this.settled) throw new Error(`Artifact already closed: ${this.path}`);
    if (typeof data === "string") await this.file.write(data);
    else await this.file.write(data);
  }

  async close(): Promise<ArtifactRecord> {
    if (this.settled) throw new Error(`Artifact already closed: ${this.path}`);
    this.settled = true;
    let record: ArtifactRecord | null = null;
    try {
      await this.file.close();
      await rename(this.partialPath, this.path);
      const st = await stat(this.path);
      record = {
        unit: this.unit,
        path: path.relative(this.store.dir, this.path),
        bytes: st.size,
        sha256: await sha256File(this.path),
        created_at: new Date().toISOString()
      };
      return record;
    } finally {
      this.store.markClosed(this.partialPath);
      this.onSettled(this, record);
    }
  }

  async discard(): Promise<void> {
    if (this.settled) return;
    this.settled = true;
    try {
      await this.file.close();
      await rm(this.partialPath, { force: true });
    } finally {
      this.store.markClosed(this.partialPath);
      this.onSettled(this, null);
    }
  }
}

/**
 * All artifact writes of one unit go through its scope. The worker closes the
 * scope on every exit path before the unit's outcome is finalized.
 */
export class ArtifactScope {
  private readonly handles = new Set<ArtifactHandle>();
  private readonly written: ArtifactRecord[] = [];
  private closed = false;

  constructor(
    private readonly store: ArtifactStore,
    readonly unit: string
  ) {}

  async open(name: string): Promise<ArtifactHandle> {
    if (this.closed) throw new Error(`Artifact scope for ${this.unit} is closed`);
    const target = this.store.resolve(this.unit, name);
    const partial = target + PARTIAL_SUFFIX;
    if (this.store.isOpen(partial)) throw new Error(`Artifact already open: ${this.unit}/${name}`);

    await mkdir(path.dirname(target), { recursive: true });
    this.store.markOpen(partial);
    let file: FileHandle;
    try {
      file = await open(partial, "w");
    } catch (e) {
      this.store.markClosed(partial);
      throw e;
    }

    const handle = new ArtifactHandle(
      this.store,
      (h, record) => {
        this.handles.delete(h);
        if (record) this.written.push(record);
      },
      this.unit,
      target,
      partial,
      file
    );
    this.handles.add(handle);
    return handle;
  }

  /** Open, write and commit in one call. */
  async write(name: string, data: string | Uint8Array): Promise<ArtifactRecord> {
    const handle = await this.open(name);
    try {
      await handle.write(data);
    } catch (e) {
      await handle.discard();
      throw e;
    }
    return handle.close();
  }

  /**
   * Settle every handle still open: commit on success, discard otherwise.
   * Later opens on this scope fail.
   */
  async closeAll(success: boolean): Promise<void> {
    this.closed = true;
    const errors: Error[] = [];
    for (const handle of [...this.handles]) {
      try {
        if (success) await handle.close();
        else await handle.discard();
      } catch (e) {
        errors.push(toError(e));
      }
    }
    if (errors.length > 0) throw errors[0];
  }

  get openCount(): number {
    return this.handles.size;
  }

  records(): ArtifactRecord[] {
    return [...this.written];
  }
}
