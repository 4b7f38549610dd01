import type { JobExecution, JobExecutor, JobOutcome } from "../../core/engine.js";

/** Succeeds every job without running anything; used for dry runs. */
export class NoopExecutor implements JobExecutor {
	readonly id = "noop";

	async execute(execution: JobExecution): Promise<JobOutcome> {
		if (execution.signal.aborted) {
			return { status: "cancelled" };
		}
		return { status: "succeeded", artifacts: [] };
	}
}
