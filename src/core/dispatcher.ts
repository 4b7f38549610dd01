import { evaluateTriggers } from "./trigger.js";
import type { Pipeline, PipelineEvent, PipelineRun, RunConclusion } from "./types.js";

export type StartRun = (run: PipelineRun, signal: AbortSignal) => Promise<PipelineRun>;

export type DispatcherOptions = {
	pipelines: Pipeline[];
	startRun: StartRun;
	vars?: Record<string, string>;
	/** Feed finished runs back as workflow_completion events. Defaults to true. */
	chain?: boolean;
	onRunCreated?: (run: PipelineRun) => void;
	onSuperseded?: (previous: PipelineRun, next: PipelineRun) => void;
};

const MAX_CHAIN_DEPTH = 8;

type ActiveRun = {
	run: PipelineRun;
	controller: AbortController;
};

/**
 * Starts every pipeline an event triggers, cancels an older run of the same
 * pipeline on the same ref, and chains completion events to downstream
 * pipelines.
 */
export class PipelineDispatcher {
	private readonly active = new Map<string, ActiveRun>();

	constructor(private readonly options: DispatcherOptions) {}

	async dispatch(event: PipelineEvent, signal?: AbortSignal): Promise<PipelineRun[]> {
		return this.dispatchAt(event, 0, signal);
	}

	private async dispatchAt(
		event: PipelineEvent,
		depth: number,
		signal?: AbortSignal,
	): Promise<PipelineRun[]> {
		const runs = evaluateTriggers(event, this.options.pipelines, { vars: this.options.vars });
		const results = await Promise.all(runs.map((run) => this.execute(run, depth, signal)));
		return results.flat();
	}

	private async execute(
		run: PipelineRun,
		depth: number,
		signal?: AbortSignal,
	): Promise<PipelineRun[]> {
		const key = `${run.pipeline.name}@${run.variables.full_ref ?? run.variables.ref ?? ""}`;
		const previous = this.active.get(key);
		if (previous) {
			this.options.onSuperseded?.(previous.run, run);
			previous.controller.abort();
		}

		const controller = new AbortController();
		const forwardAbort = (): void => controller.abort();
		signal?.addEventListener("abort", forwardAbort, { once: true });
		if (signal?.aborted) {
			controller.abort();
		}
		this.active.set(key, { run, controller });
		this.options.onRunCreated?.(run);

		let finished: PipelineRun;
		try {
			finished = await this.options.startRun(run, controller.signal);
		} finally {
			signal?.removeEventListener("abort", forwardAbort);
			if (this.active.get(key)?.run === run) {
				this.active.delete(key);
			}
		}

		if (this.options.chain === false || depth >= MAX_CHAIN_DEPTH) {
			return [finished];
		}
		const downstream = await this.dispatchAt(completionEvent(finished), depth + 1, signal);
		return [finished, ...downstream];
	}
}

export function completionEvent(run: PipelineRun): PipelineEvent {
	return {
		kind: "workflow_completion",
		sourcePipeline: run.pipeline.name,
		conclusion: toConclusion(run.status),
		sourceBranch: run.variables.ref_name ?? "",
	};
}

function toConclusion(status: PipelineRun["status"]): RunConclusion {
	if (status === "success" || status === "failure" || status === "cancelled") {
		return status;
	}
	return "failure";
}
