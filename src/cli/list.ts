import path from "node:path";
import { sortJobsByNeeds } from "../core/plan.js";
import type { JobTemplate, Pipeline, TriggerRule } from "../core/types.js";

export function formatPipelineList(pipelines: Pipeline[], repoRoot: string): string {
	const blocks = pipelines.map((pipeline) => {
		const lines = [`${pipeline.name} (${path.relative(repoRoot, pipeline.path)})`];
		const triggers = pipeline.triggers.map(formatTriggerRule);
		lines.push(`  on: ${triggers.length > 0 ? triggers.join(", ") : "(never)"}`);

		const byId = new Map(pipeline.jobs.map((job) => [job.id, job]));
		for (const jobId of sortJobsByNeeds(pipeline.jobs)) {
			const job = byId.get(jobId);
			if (job) {
				lines.push(`  - ${formatJob(job)}`);
			}
		}
		return lines.join("\n");
	});
	return `${blocks.join("\n\n")}\n`;
}

export function formatTriggerRule(rule: TriggerRule): string {
	const filters: string[] = [];
	if (rule.pipelines?.length) {
		filters.push(`pipelines: ${rule.pipelines.join(", ")}`);
	}
	if (rule.branches?.length) {
		filters.push(`branches: ${rule.branches.join(", ")}`);
	}
	if (rule.tags?.length) {
		filters.push(`tags: ${rule.tags.join(", ")}`);
	}
	return filters.length > 0 ? `${rule.event} [${filters.join("; ")}]` : rule.event;
}

function formatJob(job: JobTemplate): string {
	const details: string[] = [];
	if (job.matrix) {
		const shape = job.matrix.axes.map((axis) => axis.values.length).join("x");
		details.push(`matrix ${shape || "0"}`);
	}
	if (job.needs.length > 0) {
		details.push(`needs ${job.needs.join(", ")}`);
	}
	if (job.if) {
		details.push(`if ${job.if}`);
	}
	if (job.release) {
		details.push(`releases ${job.release.files.join(", ")}`);
	}
	const name = job.name === job.id ? job.id : `${job.id} "${job.name}"`;
	return details.length > 0 ? `${name} (${details.join("; ")})` : name;
}
