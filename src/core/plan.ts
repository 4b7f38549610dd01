import crypto from "node:crypto";
import { PipelineDefinitionError } from "./errors.js";
import { expandTemplate } from "./matrix.js";
import type { JobTemplate, Pipeline, PipelineEvent, PipelineRun } from "./types.js";

export function createPipelineRun(
	pipeline: Pipeline,
	event: PipelineEvent,
	variables: Record<string, string>,
): PipelineRun {
	return {
		id: createRunId(),
		pipeline,
		event,
		variables,
		jobs: pipeline.jobs.flatMap((template) => expandTemplate(template)),
		status: "pending",
		createdAt: new Date().toISOString(),
	};
}

/**
 * Rejects `needs` that reference unknown jobs and dependency cycles.
 */
export function validateJobGraph(jobs: JobTemplate[]): void {
	const jobMap = new Map(jobs.map((job) => [job.id, job]));

	for (const job of jobs) {
		for (const need of job.needs) {
			if (!jobMap.has(need)) {
				throw new PipelineDefinitionError(`Job '${job.id}' needs unknown job '${need}'`);
			}
		}
	}

	const visited = new Set<string>();
	const stack: string[] = [];

	const visit = (jobId: string): void => {
		const cycleStart = stack.indexOf(jobId);
		if (cycleStart !== -1) {
			const cycle = [...stack.slice(cycleStart), jobId].join(" -> ");
			throw new PipelineDefinitionError(`Circular job dependency: ${cycle}`);
		}
		if (visited.has(jobId)) {
			return;
		}
		stack.push(jobId);
		for (const need of jobMap.get(jobId)?.needs ?? []) {
			visit(need);
		}
		stack.pop();
		visited.add(jobId);
	};

	jobs.forEach((job) => visit(job.id));
}

export function sortJobsByNeeds(jobs: JobTemplate[]): string[] {
	const inDegree = new Map<string, number>();
	const edges = new Map<string, Set<string>>();

	jobs.forEach((job) => {
		inDegree.set(job.id, 0);
		edges.set(job.id, new Set());
	});

	jobs.forEach((job) => {
		job.needs.forEach((need) => {
			if (!inDegree.has(need)) {
				return;
			}
			inDegree.set(job.id, (inDegree.get(job.id) ?? 0) + 1);
			edges.get(need)?.add(job.id);
		});
	});

	const queue: string[] = [];
	for (const [jobId, degree] of inDegree.entries()) {
		if (degree === 0) {
			queue.push(jobId);
		}
	}

	const ordered: string[] = [];
	while (queue.length > 0) {
		const jobId = queue.shift();
		if (!jobId) {
			continue;
		}
		ordered.push(jobId);
		for (const next of edges.get(jobId) ?? []) {
			const degree = (inDegree.get(next) ?? 0) - 1;
			inDegree.set(next, degree);
			if (degree === 0) {
				queue.push(next);
			}
		}
	}

	const missing = jobs.map((job) => job.id).filter((jobId) => !ordered.includes(jobId));
	return ordered.concat(missing);
}

export function createRunId(): string {
	const now = new Date();
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}
