import type { JobExecutor } from "../core/engine.js";
import type { RunStore } from "../store/run-store.js";
import { NoopExecutor } from "./noop/noop-executor.js";
import type { OutputListener } from "./shell/shell-executor.js";
import { ShellExecutor } from "./shell/shell-executor.js";

export type ExecutorSetup = {
	workdir: string;
	store: RunStore;
	onOutput?: OutputListener;
};

type ExecutorFactory = (setup: ExecutorSetup) => JobExecutor;

const EXECUTOR_REGISTRY: Record<string, ExecutorFactory> = {
	shell: (setup) => new ShellExecutor(setup),
	noop: () => new NoopExecutor(),
};

export function createExecutor(executorId: string, setup: ExecutorSetup): JobExecutor {
	const normalized = executorId.trim().toLowerCase();
	const factory = Object.hasOwn(EXECUTOR_REGISTRY, normalized)
		? EXECUTOR_REGISTRY[normalized]
		: undefined;
	if (!factory) {
		throw new Error(
			`Unsupported executor "${executorId}". Available executors: ${listRegisteredExecutors().join(", ")}`,
		);
	}
	return factory(setup);
}

export function listRegisteredExecutors(): string[] {
	return Object.keys(EXECUTOR_REGISTRY);
}
