export { evaluateCondition, interpolate, parseCondition, resolveVariable } from "./core/condition.js";
export type { Condition } from "./core/condition.js";
export { discoverPipelines, findPipelineFiles } from "./core/discovery.js";
export { completionEvent, PipelineDispatcher } from "./core/dispatcher.js";
export type { DispatcherOptions, StartRun } from "./core/dispatcher.js";
export type {
	JobExecution,
	JobExecutor,
	JobOutcome,
	RunnerEvent,
} from "./core/engine.js";
export {
	ConditionSyntaxError,
	PipelineDefinitionError,
	ReleaseExistsError,
	ReleaseTransportError,
} from "./core/errors.js";
export { expandMatrix, expandTemplate, formatInstanceId } from "./core/matrix.js";
export { parsePipeline, parsePipelineSource } from "./core/parser.js";
export { createPipelineRun, sortJobsByNeeds, validateJobGraph } from "./core/plan.js";
export { concludeRun, JobGraphRunner } from "./core/runner.js";
export type { RunnerOptions } from "./core/runner.js";
export { evaluateTrigger, evaluateTriggers, resolveRunVariables } from "./core/trigger.js";
export * from "./core/types.js";
export { createExecutor, listRegisteredExecutors } from "./engines/factory.js";
export { NoopExecutor } from "./engines/noop/noop-executor.js";
export { ShellExecutor } from "./engines/shell/shell-executor.js";
export { loadConfig } from "./config/load-config.js";
export type { ConveyorConfig } from "./config/schema.js";
export { LocalReleaseEndpoint } from "./release/local-endpoint.js";
export { ReleasePublisher } from "./release/publisher.js";
export type {
	ReleaseEndpoint,
	ReleaseTransaction,
	StoredRelease,
} from "./release/publisher.js";
export { createRunEventPersister, RunStore } from "./store/run-store.js";
