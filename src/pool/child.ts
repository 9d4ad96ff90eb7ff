import { ArtifactStore } from "../artifacts/store.js";
import { importTopicModule } from "../registry/loader.js";
import { toError } from "../types/errors.js";
import type { TestUnit, TopicModule } from "../types/unit.js";
import { errorFailure, erroredExecution, executeUnit, type UnitExecution } from "./execute-unit.js";
import { isRunMessage, isShutdownMessage, type ReadyMessage, type ResultMessage, type RunMessage } from "./protocol.js";

const modules = new Map<string, TopicModule>();

async function resolveUnit(file: string, name: string): Promise<TestUnit | string> {
  let module = modules.get(file);
  if (!module) {
    const res = await importTopicModule(file);
    if (!res.ok) return res.reason;
    module = res.module;
    modules.set(file, module);
  }
  return module.units.find((u) => u.name === name) ?? `no unit named ${name} in ${file}`;
}

async function run(msg: RunMessage): Promise<UnitExecution> {
  const unit = await resolveUnit(msg.file, msg.unit);
  if (typeof unit === "string") {
    return erroredExecution({
      summary: `${msg.unit} could not be loaded in worker ${msg.worker}`,
      expected: `unit ${msg.unit} exported by ${msg.file}`,
      actual: unit,
      context: { file: msg.file }
    });
  }
  return executeUnit(unit, msg.config, {
    store: new ArtifactStore(msg.artifactsDir),
    worker: msg.worker,
    signal: new AbortController().signal
  });
}

function reply(message: ResultMessage | ReadyMessage): void {
  process.send?.(message);
}

process.on("message", (msg: unknown) => {
  if (isShutdownMessage(msg)) {
    process.disconnect?.();
    return;
  }
  if (!isRunMessage(msg)) return;
  run(msg)
    .then((execution) => reply({ type: "result", unit: msg.unit, execution }))
    .catch((e: unknown) =>
      reply({
        type: "result",
        unit: msg.unit,
        execution: erroredExecution(errorFailure(toError(e), `worker ${msg.worker} failed while running ${msg.unit}`))
      })
    );
});

reply({ type: "ready" });
