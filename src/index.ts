export { defineTopic, defineUnit, isTopicModule, type UnitSpec } from "./registry/define.js";
export { TestRegistry, type StructuralViolation, type ViolationCode } from "./registry/registry.js";
export { loadUnitDirectory, findUnitFiles, fileTopicOf } from "./registry/loader.js";
export { matchTagExpression, matchesFilter, type UnitFilter } from "./registry/filter.js";
export { parseTagExpression, evaluateTagExpression, type TagExpression } from "./registry/tags.js";
export { ArtifactStore, ArtifactScope, ArtifactHandle } from "./artifacts/store.js";
export type { ArtifactEntry, ArtifactRecord, SweepResult } from "./artifacts/store.js";
export { CoverageRecorder } from "./coverage/recorder.js";
export { checkCoverageGate, merge, mergeSamples, summarize } from "./coverage/aggregator.js";
export { writeCoverageReport } from "./coverage/writer.js";
export { WorkerPool, partition, type PoolOptions, type PoolResult } from "./pool/worker-pool.js";
export { InlineWorkerContext, type WorkerContext, type WorkerContextFactory } from "./pool/worker-context.js";
export { ProcessWorkerContext } from "./pool/process-context.js";
export { resolveRunPlan, unitConfigFor, type Invocation, type DispatchResult } from "./dispatch/mode.js";
export { RunOrchestrator, type RunOutput } from "./core/orchestrator.js";
export { RunEvents, type RunEventMap } from "./core/events.js";
export { buildReport, assertReportable, type RunReport, type FailureMessage } from "./report/builder.js";
export { renderHuman, renderFailureMessage } from "./report/render.js";
export { renderJunit } from "./report/junit.js";
export { resolveConfig } from "./config/validator.js";
export { EXIT } from "./commands/exit-codes.js";
export { ExpectationError, expectEqual, RegistryFrozenError, ArtifactPathError, TagExpressionError } from "./types/errors.js";
export type * from "./types/unit.js";
export type * from "./types/run.js";
export type * from "./types/coverage.js";
export type * from "./types/config.js";
