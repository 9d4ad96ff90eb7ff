import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ProcessWorkerContext } from "../src/pool/process-context.js";
import { WorkerPool } from "../src/pool/worker-pool.js";
import { defineTopic } from "../src/registry/define.js";
import { loadUnitDirectory } from "../src/registry/loader.js";
import { TestRegistry } from "../src/registry/registry.js";
import type { RegisteredUnit } from "../src/types/unit.js";

const FIXTURES = path.resolve(import.meta.dirname, "fixtures/process");

describe("process isolation", () => {
  let dir: string;
  let units: Map<string, RegisteredUnit>;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "suitectl-proc-"));
    const reg = new TestRegistry();
    await loadUnitDirectory(reg, FIXTURES, "**/*.units.ts");
    units = new Map(reg.discover().map((u) => [u.name, u]));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function pick(...names: string[]): RegisteredUnit[] {
    return names.map((n) => {
      const unit = units.get(n);
      if (!unit) throw new Error(`fixture unit missing: ${n}`);
      return unit;
    });
  }

  function pool(): WorkerPool {
    return new WorkerPool({
      workers: 1,
      unitTimeoutMs: 10_000,
      graceMs: 100,
      configFor: (unit) => ({
        doPlot: false,
        verbose: true,
        plotBackend: null,
        params: Object.fromEntries(unit.parameters.map((p) => [p.name, p.default]))
      }),
      createContext: (id) => new ProcessWorkerContext(id, dir)
    });
  }

  it("runs units in a child process and commits their artifacts", async () => {
    const { outcomes, artifacts } = await pool().run(pick("test_child_pass", "test_child_fail"));

    expect(outcomes.map((o) => o.status)).toEqual(["passed", "failed"]);
    expect(outcomes[0].preview).toBe("'from child'");
    expect(outcomes[1].failure?.summary).toBe("child arithmetic");
    expect(outcomes[1].failure?.expected).toBe("3");
    expect(outcomes[1].failure?.actual).toBe("2");
    expect(artifacts.map((a) => a.path)).toEqual(["test_child_pass/child.txt"]);
    expect(fs.readFileSync(path.join(dir, "test_child_pass", "child.txt"), "utf8")).toBe("from child");
  });

  it("kills a hung child on timeout and forks a fresh one for the next unit", async () => {
    const { outcomes } = await pool().run(pick("test_child_hang", "test_child_after"));

    expect(outcomes.map((o) => o.status)).toEqual(["timed_out", "passed"]);
    expect(outcomes[0].failure?.summary).toBe("test_child_hang exceeded its 300 ms timeout");
    expect(outcomes[1].preview).toBe("'fresh'");
  });

  it("treats a child that exits mid-unit as a worker fault", async () => {
    const { outcomes, faults } = await pool().run(pick("test_child_exit", "test_child_after"));

    expect(outcomes.map((o) => o.status)).toEqual(["errored", "errored"]);
    expect(outcomes[0].failure?.summary).toBe("worker 0 exited while running test_child_exit");
    expect(outcomes[0].failure?.actual).toBe("exit code 7, signal none");
    expect(outcomes[1].failure?.summary).toBe("test_child_after was not run because worker 0 exited");
    expect(faults.map((f) => [f.unit, f.code])).toEqual([["test_child_exit", 7]]);
  });

  it("loads TypeScript unit files in a child started from a JavaScript entry", async () => {
    const jsEntry = new WorkerPool({
      workers: 1,
      unitTimeoutMs: 10_000,
      graceMs: 100,
      configFor: () => ({ doPlot: false, verbose: true, plotBackend: null, params: {} }),
      createContext: (id) => new ProcessWorkerContext(id, dir, path.join(FIXTURES, "child-entry.mjs"))
    });
    const { outcomes, artifacts } = await jsEntry.run(pick("test_child_pass"));

    expect(outcomes[0].status).toBe("passed");
    expect(outcomes[0].preview).toBe("'from child'");
    expect(artifacts.map((a) => a.path)).toEqual(["test_child_pass/child.txt"]);
  });

  it("errors a unit that has no source file to load", async () => {
    const reg = new TestRegistry();
    reg.register(defineTopic("memory", [{ name: "test_in_memory", run: () => 1 }]));
    const { outcomes } = await pool().run(reg.discover());

    expect(outcomes[0].status).toBe("errored");
    expect(outcomes[0].failure?.summary).toBe("test_in_memory cannot run in a separate process");
  });
});
