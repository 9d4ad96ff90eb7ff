import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ArtifactStore } from "../src/artifacts/store.js";
import { ArtifactPathError } from "../src/types/errors.js";

describe("ArtifactStore", () => {
  let dir: string;
  let store: ArtifactStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "suitectl-artifacts-"));
    store = new ArtifactStore(dir);
    store.init();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("commits a write under the unit's directory", async () => {
    const scope = store.scope("test_x");
    const record = await scope.write("out.txt", "hello");

    expect(record.unit).toBe("test_x");
    expect(record.path).toBe(path.join("test_x", "out.txt"));
    expect(record.bytes).toBe(5);
    expect(record.sha256).toBe(createHash("sha256").update("hello").digest("hex"));
    expect(fs.readFileSync(path.join(dir, "test_x", "out.txt"), "utf8")).toBe("hello");
    expect(fs.existsSync(path.join(dir, "test_x", "out.txt.partial"))).toBe(false);
    expect(scope.records()).toEqual([record]);
  });

  it("keeps writes in a partial file until the handle closes", async () => {
    const handle = await store.scope("test_x").open("log.txt");
    await handle.write("line 1\n");
    expect(fs.existsSync(path.join(dir, "test_x", "log.txt.partial"))).toBe(true);
    expect(fs.existsSync(path.join(dir, "test_x", "log.txt"))).toBe(false);
    expect(store.openCount).toBe(1);

    await handle.close();
    expect(fs.readFileSync(path.join(dir, "test_x", "log.txt"), "utf8")).toBe("line 1\n");
    expect(store.openCount).toBe(0);
    await expect(handle.write("late")).rejects.toThrow("Artifact already closed");
  });

  it("discards open handles when a scope closes after a failure", async () => {
    const scope = store.scope("test_fail");
    const handle = await scope.open("trace.txt");
    await handle.write("half");

    await scope.closeAll(false);
    expect(handle.closed).toBe(true);
    expect(fs.existsSync(path.join(dir, "test_fail", "trace.txt.partial"))).toBe(false);
    expect(fs.existsSync(path.join(dir, "test_fail", "trace.txt"))).toBe(false);
    expect(scope.records()).toEqual([]);
    await expect(scope.open("again.txt")).rejects.toThrow("Artifact scope for test_fail is closed");
  });

  it("commits open handles when a scope closes after success", async () => {
    const scope = store.scope("test_ok");
    const handle = await scope.open("result.txt");
    await handle.write("ok");

    await scope.closeAll(true);
    expect(scope.openCount).toBe(0);
    expect(scope.records().map((r) => r.path)).toEqual([path.join("test_ok", "result.txt")]);
  });

  it("refuses names that escape the unit directory", async () => {
    await expect(store.scope("test_x").open("../evil.txt")).rejects.toThrow(ArtifactPathError);
    await expect(store.scope("../outside").open("x.txt")).rejects.toThrow(ArtifactPathError);
  });

  it("refuses to open the same artifact twice", async () => {
    const scope = store.scope("test_x");
    await scope.open("a.txt");
    await expect(scope.open("a.txt")).rejects.toThrow("Artifact already open: test_x/a.txt");
    await scope.closeAll(false);
  });

  it("leaves everything in place when the run is verbose", async () => {
    await store.scope("test_x").write("keep.txt", "keep");
    expect(store.sweep(true)).toEqual({ pinned: true, removed: [], skipped: [] });
    expect(fs.existsSync(path.join(dir, "test_x", "keep.txt"))).toBe(true);
  });

  it("sweeps committed files and leftovers but not files still open", async () => {
    await store.scope("test_x").write("done.txt", "done");
    fs.mkdirSync(path.join(dir, "test_old"));
    fs.writeFileSync(path.join(dir, "test_old", "x.bin.partial"), "stale");
    const live = await store.scope("test_x").open("live.txt");

    const res = store.sweep(false);
    expect(res).toEqual({
      pinned: false,
      removed: [path.join("test_old", "x.bin.partial"), path.join("test_x", "done.txt")],
      skipped: [path.join("test_x", "live.txt.partial")]
    });
    expect(fs.existsSync(path.join(dir, "test_old"))).toBe(false);

    await live.close();
    expect(fs.existsSync(path.join(dir, "test_x", "live.txt"))).toBe(true);
  });

  it("records artifacts in the manifest and forgets them after a sweep", async () => {
    const record = await store.scope("test_x").write("out.txt", "data");
    store.record("run-1", [record], true);
    expect(store.list()).toEqual([{ ...record, run_id: "run-1", pinned: true }]);

    store.sweep(false);
    expect(store.list()).toEqual([]);
    expect(fs.readdirSync(dir)).toEqual(["manifest.json"]);
  });

  it("treats a truncated manifest as empty and rebuilds it on sweep", async () => {
    await store.scope("test_x").write("out.txt", "data");
    fs.writeFileSync(path.join(dir, "manifest.json"), '{"schema_version":"1.0.0","artif', "utf8");

    expect(store.list()).toEqual([]);
    const read = store.readManifest();
    expect(read.ok).toBe(false);

    const first = store.sweep(false);
    expect(first.removed).toEqual([path.join("test_x", "out.txt")]);
    expect(first.manifest_error).toMatch(/^manifest\.json: /);

    expect(store.sweep(false)).toEqual({ pinned: false, removed: [], skipped: [] });
    expect(store.readManifest()).toEqual({ ok: true, artifacts: [] });
    expect(fs.readdirSync(dir)).toEqual(["manifest.json"]);
  });

  it("rejects a manifest that does not match its schema", () => {
    const manifest = { schema_version: "1.0.0", updated_at: new Date().toISOString(), artifacts: [{ unit: "test_x" }] };
    fs.writeFileSync(path.join(dir, "manifest.json"), JSON.stringify(manifest), "utf8");

    const read = store.readManifest();
    expect(read.ok).toBe(false);
    if (!read.ok) expect(read.error).toContain("must have required property 'path'");
    expect(store.list()).toEqual([]);
  });

  it("removes committed artifacts and drops them from the manifest", async () => {
    const kept = await store.scope("test_x").write("kept.txt", "kept");
    const dropped = await store.scope("test_y").write("dropped.txt", "dropped");
    store.record("run-1", [kept, dropped], true);

    await store.remove([dropped]);

    expect(fs.existsSync(path.join(dir, dropped.path))).toBe(false);
    expect(fs.existsSync(path.join(dir, kept.path))).toBe(true);
    expect(store.list()).toEqual([{ ...kept, run_id: "run-1", pinned: true }]);
  });

  it("starts a non-verbose run with no artifacts left from a verbose one", async () => {
    const record = await store.scope("test_verbose").write("plot.svg", "<svg/>");
    store.record("run-verbose", [record], true);
    store.sweep(true);
    expect(fs.existsSync(path.join(dir, record.path))).toBe(true);

    const next = new ArtifactStore(dir);
    const res = next.sweep(false);
    expect(res.removed).toEqual([path.join("test_verbose", "plot.svg")]);
    expect(next.list()).toEqual([]);
  });
});
