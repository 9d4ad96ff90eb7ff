import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG } from "../src/config/loader.js";
import { RunEvents } from "../src/core/events.js";
import { RunOrchestrator } from "../src/core/orchestrator.js";
import { resolveRunPlan, type Invocation } from "../src/dispatch/mode.js";
import { MemorySink } from "../src/output/diagnostics.js";
import { defineTopic, type UnitSpec } from "../src/registry/define.js";
import { TestRegistry } from "../src/registry/registry.js";
import type { SuiteConfig } from "../src/types/config.js";
import type { RunPlan } from "../src/types/run.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function registryOf(topics: Record<string, UnitSpec[]>): TestRegistry {
  const reg = new TestRegistry();
  for (const [topic, specs] of Object.entries(topics)) reg.register(defineTopic(topic, specs));
  return reg;
}

function planFor(reg: TestRegistry, config: SuiteConfig, invocation: Partial<Invocation> = {}): RunPlan {
  const res = resolveRunPlan({ mode: "discovery", runId: "run-fixed", ...invocation }, reg, config);
  if (!res.ok) throw new Error(res.error.message);
  return res.plan;
}

describe("RunOrchestrator", () => {
  let cwd: string;
  let config: SuiteConfig;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), "suitectl-run-"));
    config = { ...DEFAULT_CONFIG, isolation: "inline", timeouts: { ...DEFAULT_CONFIG.timeouts, grace_ms: 50 } };
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it("reports outcomes in registry order and writes the report files", async () => {
    const reg = registryOf({
      alpha: [
        {
          name: "test_a",
          run: async () => {
            await sleep(30);
            return 1;
          }
        },
        { name: "test_b", run: () => 2 }
      ],
      beta: [{ name: "test_c", run: () => 3 }]
    });
    const events = new RunEvents();
    const seen: string[] = [];
    events.on("run:start", () => seen.push("start"));
    events.on("run:end", () => seen.push("end"));

    const out = await new RunOrchestrator(reg, { config, cwd, events }).execute(planFor(reg, config, { workers: 2 }));

    expect(out.report.outcomes.map((o) => o.unit)).toEqual(["test_a", "test_b", "test_c"]);
    expect(out.report.outcomes.map((o) => o.worker)).toEqual([0, 1, 0]);
    expect(out.report.exit_code).toBe(0);
    expect(out.report.verdict).toBe("success");
    expect(seen).toEqual(["start", "end"]);
    expect(reg.isFrozen).toBe(true);

    expect(out.reportPath).toBe(path.join(cwd, ".suitectl", "reports", "run-report.json"));
    const written: unknown = JSON.parse(fs.readFileSync(out.reportPath, "utf8"));
    expect(written).toEqual(out.report);
    expect(fs.existsSync(path.join(cwd, ".suitectl", "reports", "coverage.json"))).toBe(true);
    expect(out.junitPath).toBeUndefined();
  });

  it("cancels an automated run that exceeds its budget", async () => {
    const reg = registryOf({
      alpha: [
        { name: "test_quick", run: () => "ok" },
        {
          name: "test_sleeper",
          run: (_config, ctx) =>
            new Promise<void>((resolve) => {
              const timer = setTimeout(resolve, 5_000);
              ctx.signal.addEventListener(
                "abort",
                () => {
                  clearTimeout(timer);
                  resolve();
                },
                { once: true }
              );
            })
        },
        { name: "test_zlater", run: () => "never" }
      ]
    });
    const sink = new MemorySink();
    const events = new RunEvents();
    const cancels: string[] = [];
    events.on("run:cancel", (p) => cancels.push(p.reason));

    const plan = planFor(reg, config, { mode: "automated", workers: 1, budgetMs: 150 });
    const out = await new RunOrchestrator(reg, { config, cwd, sink, events }).execute(plan);

    expect(out.report.exit_code).toBe(3);
    expect(out.report.verdict).toBe("budget_exceeded");
    expect(out.report.budget.exceeded).toBe(true);
    expect(out.report.budget.budget_ms).toBe(150);
    expect(cancels).toEqual(["run budget of 150 ms exceeded"]);
    expect(sink.codes()).toContain("BUDGET_EXCEEDED");

    const [quick, sleeper, later] = out.report.outcomes;
    expect(quick.status).toBe("passed");
    expect(sleeper.status).toBe("timed_out");
    expect(sleeper.failure?.summary).toBe("test_sleeper was interrupted when the run was cancelled");
    expect(later.status).toBe("timed_out");
    expect(later.failure?.actual).toBe("not started");
  });

  it("fails the run on a strict coverage gate", async () => {
    const reg = registryOf({
      alpha: [
        {
          name: "test_half",
          run: (_config, ctx) => {
            ctx.coverage.declare("calc", { lines: [1], branches: { sign: 2 } });
            ctx.coverage.line("calc", 1);
            ctx.coverage.branch("calc", "sign", 0);
          }
        }
      ]
    });
    const strict: SuiteConfig = { ...config, coverage: { ...config.coverage, strict: true } };
    const sink = new MemorySink();

    const out = await new RunOrchestrator(reg, { config: strict, cwd, sink }).execute(planFor(reg, strict));

    expect(out.report.counts.passed).toBe(1);
    expect(out.report.coverage_gate.branch_pct).toBe(50);
    expect(out.report.exit_code).toBe(2);
    expect(out.report.verdict).toBe("infrastructure");
    const gateDiag = sink.diagnostics.find((d) => d.code === "COVERAGE_BELOW_MINIMUM");
    expect(gateDiag?.level).toBe("error");
    expect(gateDiag?.message).toBe("Branch coverage 50% is below the 80% minimum");
  });

  it("keeps verbose artifacts until the next non-verbose run starts", async () => {
    const writer = registryOf({
      writer: [
        {
          name: "test_writer",
          run: async (_config, ctx) => {
            await ctx.artifacts.write("log.txt", "hello");
          }
        }
      ]
    });
    const logPath = path.join(cwd, ".suitectl", "artifacts", "test_writer", "log.txt");

    const first = await new RunOrchestrator(writer, { config, cwd }).execute(planFor(writer, config, { verbose: true }));
    expect(first.sweeps.end.pinned).toBe(true);
    expect(first.report.artifacts).toEqual({ pinned: true, count: 1 });
    expect(fs.readFileSync(logPath, "utf8")).toBe("hello");

    const other = registryOf({ other: [{ name: "test_other", run: () => undefined }] });
    const sink = new MemorySink();
    const second = await new RunOrchestrator(other, { config, cwd, sink }).execute(planFor(other, config));
    expect(second.sweeps.start.removed).toEqual([path.join("test_writer", "log.txt")]);
    expect(fs.existsSync(logPath)).toBe(false);
    expect(sink.codes()).toContain("ARTIFACTS_SWEPT");
  });

  it("resets an unreadable artifact manifest at the start barrier and keeps running", async () => {
    const artifactsDir = path.join(cwd, ".suitectl", "artifacts");
    fs.mkdirSync(artifactsDir, { recursive: true });
    fs.writeFileSync(path.join(artifactsDir, "manifest.json"), "not json", "utf8");

    const reg = registryOf({ alpha: [{ name: "test_a", run: () => 1 }] });
    const sink = new MemorySink();
    const out = await new RunOrchestrator(reg, { config, cwd, sink }).execute(planFor(reg, config));

    expect(out.report.exit_code).toBe(0);
    expect(out.sweeps.start.manifest_error).toMatch(/^manifest\.json: /);
    expect(out.sweeps.end.manifest_error).toBeUndefined();
    expect(sink.codes()).toContain("ARTIFACTS_MANIFEST_RESET");
    const manifest: unknown = JSON.parse(fs.readFileSync(path.join(artifactsDir, "manifest.json"), "utf8"));
    expect(manifest).toMatchObject({ schema_version: "1.0.0", artifacts: [] });
  });

  it("sweeps a non-verbose run's artifacts at its end", async () => {
    const writer = registryOf({
      writer: [
        {
          name: "test_writer",
          run: async (_config, ctx) => {
            await ctx.artifacts.write("log.txt", "hello");
          }
        }
      ]
    });
    const out = await new RunOrchestrator(writer, { config, cwd }).execute(planFor(writer, config));
    expect(out.sweeps.end).toEqual({ pinned: false, removed: [path.join("test_writer", "log.txt")], skipped: [] });
    expect(out.report.artifacts).toEqual({ pinned: false, count: 1 });
  });

  it("reports a raising unit as errored and writes JUnit when asked", async () => {
    const reg = registryOf({
      alpha: [
        {
          name: "test_boom",
          run: () => {
            throw new Error("boom");
          }
        },
        { name: "test_fine", run: () => true }
      ]
    });
    const out = await new RunOrchestrator(reg, { config, cwd, junitPath: "out/junit.xml" }).execute(planFor(reg, config));

    expect(out.report.exit_code).toBe(1);
    expect(out.report.counts).toEqual({ passed: 1, failed: 0, skipped: 0, errored: 1, timed_out: 0 });
    expect(out.report.failures).toHaveLength(1);
    expect(out.report.failures[0].summary).toBe("test_boom raised an unexpected Error");
    expect(out.report.failures[0].actual).toBe("Error: boom");
    expect(out.junitPath).toBe(path.join(cwd, "out", "junit.xml"));
    expect(fs.readFileSync(path.join(cwd, "out", "junit.xml"), "utf8")).toContain('<testcase name="test_boom"');
  });
});
