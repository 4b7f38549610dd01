import type { RunnerEvent } from "../core/engine.js";
import type { PipelineRun } from "../core/types.js";
import { formatDuration } from "../tui/format.js";

type Write = (text: string) => void;

/** Plain progress lines for non-interactive output. */
export function createProgressReporter(write: Write): (event: RunnerEvent) => void {
	const pipelines = new Map<string, string>();

	return (event) => {
		if (event.type === "run-started") {
			pipelines.set(event.runId, event.pipeline);
			write(`[${event.pipeline}] run ${event.runId} started with ${event.jobs.length} job(s)\n`);
			return;
		}
		const prefix = `[${pipelines.get(event.runId) ?? event.runId}]`;
		switch (event.type) {
			case "job-transition":
				if (event.status === "running") {
					write(`${prefix} ${event.jobId} started\n`);
				}
				break;
			case "job-finished": {
				const detail = event.error ? `: ${event.error}` : "";
				write(
					`${prefix} ${event.jobId} ${event.status} (${formatDuration(event.durationMs)})${detail}\n`,
				);
				if (event.release?.status === "published") {
					write(`${prefix} released ${event.release.releaseId} (${event.release.assets.join(", ")})\n`);
				}
				break;
			}
			case "cancel-requested":
				write(`${prefix} cancelling ${event.jobIds.join(", ")}: ${event.reason}\n`);
				break;
			case "run-finished":
				write(`${prefix} run ${event.runId} finished: ${event.status}\n`);
				break;
		}
	};
}

export function buildJsonSummary(
	runs: PipelineRun[],
	paths: (runId: string) => { logsDir: string; artifactsDir: string },
): Record<string, unknown> {
	return {
		runs: runs.map((run) => ({
			runId: run.id,
			pipeline: {
				id: run.pipeline.id,
				name: run.pipeline.name,
				path: run.pipeline.path,
			},
			event: run.event,
			status: run.status,
			jobs: run.jobs.map((job) => ({
				jobId: job.id,
				status: job.status,
				exitCode: job.exitCode,
				durationMs: job.durationMs,
				reason: job.statusReason ?? job.error,
				cancelRequested: job.cancelRequested || undefined,
				artifacts: job.artifacts.map((artifact) => artifact.name),
				release: job.release,
			})),
			...paths(run.id),
		})),
	};
}
