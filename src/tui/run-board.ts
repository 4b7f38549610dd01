import type { RunnerEvent } from "../core/engine.js";
import type { JobStatus, RunStatus } from "../core/types.js";

export type BoardJob = {
	jobId: string;
	status: JobStatus;
	cancelRequested: boolean;
	reason?: string;
	durationMs?: number;
	lastLine?: string;
};

export type BoardRun = {
	runId: string;
	pipeline: string;
	status: RunStatus;
	jobs: BoardJob[];
	logDir?: string;
};

export type BoardState = {
	runs: BoardRun[];
	closed: boolean;
};

type BoardListener = (state: BoardState) => void;

/**
 * Folds runner events and job output into an immutable view state that the
 * ink view re-renders from. Runs appear in the order they start.
 */
export class RunBoard {
	private current: BoardState = { runs: [], closed: false };
	private readonly listeners = new Set<BoardListener>();

	get state(): BoardState {
		return this.current;
	}

	subscribe(listener: BoardListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	applyEvent(event: RunnerEvent): void {
		this.update(applyRunnerEvent(this.current, event));
	}

	applyOutput(runId: string, jobId: string, chunk: string): void {
		const line = lastLine(chunk);
		if (!line) {
			return;
		}
		this.update(updateJob(this.current, runId, jobId, (job) => ({ ...job, lastLine: line })));
	}

	close(): void {
		this.update({ ...this.current, closed: true });
	}

	private update(next: BoardState): void {
		if (next === this.current) {
			return;
		}
		this.current = next;
		for (const listener of this.listeners) {
			listener(next);
		}
	}
}

export function applyRunnerEvent(state: BoardState, event: RunnerEvent): BoardState {
	switch (event.type) {
		case "run-started":
			return {
				...state,
				runs: [
					...state.runs,
					{
						runId: event.runId,
						pipeline: event.pipeline,
						status: "running",
						logDir: event.logDir,
						jobs: event.jobs.map((job) => ({
							jobId: job.jobId,
							status: "pending",
							cancelRequested: false,
						})),
					},
				],
			};
		case "job-transition":
			return updateJob(state, event.runId, event.jobId, (job) => ({
				...job,
				status: event.status,
				reason: event.reason ?? job.reason,
			}));
		case "job-finished":
			return updateJob(state, event.runId, event.jobId, (job) => ({
				...job,
				status: event.status,
				cancelRequested: event.cancelRequested,
				durationMs: event.durationMs,
				reason: event.error ?? job.reason,
			}));
		case "cancel-requested":
			return updateRun(state, event.runId, (run) => ({
				...run,
				jobs: run.jobs.map((job) =>
					event.jobIds.includes(job.jobId) ? { ...job, cancelRequested: true } : job,
				),
			}));
		case "run-finished":
			return updateRun(state, event.runId, (run) => ({ ...run, status: event.status }));
	}
}

function updateRun(
	state: BoardState,
	runId: string,
	change: (run: BoardRun) => BoardRun,
): BoardState {
	if (!state.runs.some((run) => run.runId === runId)) {
		return state;
	}
	return {
		...state,
		runs: state.runs.map((run) => (run.runId === runId ? change(run) : run)),
	};
}

function updateJob(
	state: BoardState,
	runId: string,
	jobId: string,
	change: (job: BoardJob) => BoardJob,
): BoardState {
	const run = state.runs.find((item) => item.runId === runId);
	if (!run?.jobs.some((job) => job.jobId === jobId)) {
		return state;
	}
	return updateRun(state, runId, (current) => ({
		...current,
		jobs: current.jobs.map((job) => (job.jobId === jobId ? change(job) : job)),
	}));
}

function lastLine(chunk: string): string | undefined {
	const lines = chunk
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter(Boolean);
	return lines.at(-1);
}
