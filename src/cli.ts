#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { listArtifacts } from "./commands/artifacts.js";
import { EXIT } from "./commands/exit-codes.js";
import { listUnits } from "./commands/list.js";
import { runCommand } from "./commands/run.js";
import { sweepArtifacts } from "./commands/sweep.js";
import { validateAll } from "./commands/validate.js";
import { createSink, diag, type OutputFormat } from "./output/diagnostics.js";

type CommonOpts = { config?: string; env?: string; format: OutputFormat };

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function formatOption(): Option {
  return new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");
}

function withConfig(cmd: Command): Command {
  return cmd
    .option("--config <dir>", "Config directory (default: the bundled config/)")
    .option("--env <name>", "Config layer to apply over base.yaml, e.g. ci")
    .addOption(formatOption());
}

function fail(format: OutputFormat, code: string, message: string, exitCode: number): never {
  createSink(format).emit(diag("error", code, message));
  process.exit(exitCode);
}

const program = new Command();

program.name("suitectl").description("Test orchestration and artifact lifecycle harness").version("0.1.0");

withConfig(
  program
    .command("run")
    .description("Run test units")
    .argument("[filters...]", "Unit names or glob patterns over unit names")
    .addOption(
      new Option("--mode <mode>", "Invocation mode").choices(["standalone", "discovery", "automated"]).default("discovery")
    )
    .option("--tags <expr>", "Tag expression, e.g. \"@unit and not @slow\"")
    .option("--workers <n>", "Number of workers", positiveInt)
    .option("--verbose", "Keep artifacts after the run")
    .option("--no-verbose", "Sweep artifacts at the run barriers")
    .option("--plot", "Enable plotting in units")
    .option("--no-plot", "Disable plotting in units")
    .option("--strict-coverage", "Fail the run when branch coverage is below the minimum")
    .option("--strict-registry", "Fail the run on structural violations in the registry")
    .option("--budget <ms>", "Wall-clock budget for automated mode", positiveInt)
    .option("--timeout <ms>", "Default per-unit timeout", positiveInt)
    .addOption(new Option("--isolation <kind>", "Worker isolation").choices(["inline", "process"]))
    .option("--set <key=value>", "Override a unit parameter (repeatable)", collect, [])
    .option("--junit <path>", "Also write a JUnit XML report")
).action(
  async (
    filters: string[],
    opts: CommonOpts & {
      mode: string;
      tags?: string;
      workers?: number;
      verbose?: boolean;
      plot?: boolean;
      strictCoverage?: boolean;
      strictRegistry?: boolean;
      budget?: number;
      timeout?: number;
      isolation?: string;
      set: string[];
      junit?: string;
    }
  ) => {
    const sink = createSink(opts.format);
    const res = await runCommand({
      selectors: filters,
      mode: opts.mode,
      tags: opts.tags,
      workers: opts.workers,
      verbose: opts.verbose,
      plot: opts.plot,
      strictCoverage: opts.strictCoverage,
      strictRegistry: opts.strictRegistry,
      budgetMs: opts.budget,
      timeoutMs: opts.timeout,
      isolation: opts.isolation,
      set: opts.set,
      junit: opts.junit,
      configDir: opts.config,
      envName: opts.env,
      format: opts.format,
      sink
    });
    if (!res.ok) fail(opts.format, res.error.code, res.error.message, res.exitCode);
    process.exit(res.exitCode);
  }
);

withConfig(
  program
    .command("list")
    .description("List the units a run would execute")
    .argument("[filters...]", "Unit names or glob patterns over unit names")
    .option("--tags <expr>", "Tag expression")
).action(async (filters: string[], opts: CommonOpts & { tags?: string }) => {
  const res = await listUnits({ selectors: filters, tags: opts.tags, configDir: opts.config, envName: opts.env });
  if (!res.ok) fail(opts.format, res.error.code, res.error.message, EXIT.INVALID_ARGS);

  const sink = createSink(opts.format);
  for (const d of res.diagnostics) sink.emit(d);
  if (opts.format === "jsonl") {
    for (const u of res.units) process.stdout.write(JSON.stringify(u) + "\n");
  } else {
    if (res.units.length === 0) console.log("No units found.");
    for (const u of res.units) {
      const tags = u.tags.length > 0 ? `  [${u.tags.join(", ")}]` : "";
      console.log(`${u.topic}  ${u.name}${tags}${u.skip !== undefined ? "  (skip)" : ""}`);
    }
  }
  if (res.diagnostics.some((d) => d.level === "error")) process.exit(EXIT.INVALID_ARGS);
});

withConfig(program.command("sweep").description("Remove every artifact that is not open")).action(
  async (opts: CommonOpts) => {
    const res = await sweepArtifacts({ configDir: opts.config, envName: opts.env });
    if (!res.ok) fail(opts.format, res.error.code, res.error.message, EXIT.INVALID_ARGS);
    const sink = createSink(opts.format);
    if (res.result.manifest_error !== undefined) {
      sink.emit(diag("warn", "ARTIFACTS_MANIFEST_RESET", res.result.manifest_error, { path: res.dir }));
    }
    sink.emit(
      diag("info", "ARTIFACTS_SWEPT", `Removed ${res.result.removed.length} file(s) from ${res.dir}`, {
        path: res.dir,
        details: { removed: res.result.removed, skipped: res.result.skipped }
      })
    );
  }
);

withConfig(
  program
    .command("artifacts")
    .description("List recorded artifacts")
    .option("--unit <name>", "Only artifacts of this unit")
    .option("--run <id>", "Only artifacts of this run")
).action(async (opts: CommonOpts & { unit?: string; run?: string }) => {
  const res = await listArtifacts({ configDir: opts.config, envName: opts.env, unit: opts.unit, runId: opts.run });
  if (!res.ok) fail(opts.format, res.error.code, res.error.message, EXIT.INVALID_ARGS);
  if (opts.format === "jsonl") {
    for (const a of res.artifacts) process.stdout.write(JSON.stringify(a) + "\n");
    return;
  }
  if (res.artifacts.length === 0) {
    console.log("No artifacts recorded.");
    return;
  }
  for (const a of res.artifacts) {
    console.log(`${a.path}  ${a.bytes} bytes  run ${a.run_id}${a.pinned ? "  pinned" : ""}`);
  }
});

withConfig(program.command("validate").description("Validate config, unit files and the artifact manifest")).action(
  async (opts: CommonOpts) => {
    const res = await validateAll({ configDir: opts.config, envName: opts.env });
    const sink = createSink(opts.format);
    for (const w of res.warnings) sink.emit(w);
    if (!res.ok) {
      for (const e of res.errors) sink.emit(e);
      process.exit(EXIT.INVALID_ARGS);
    }
    sink.emit(diag("info", "OK", "OK"));
  }
);

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INFRASTRUCTURE);
});
