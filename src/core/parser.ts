import fs from "node:fs";
import path from "node:path";
import YAML, { isNode, LineCounter } from "yaml";
import type { Document } from "yaml";
import { z } from "zod";
import { parseCondition } from "./condition.js";
import { ConditionSyntaxError, PipelineDefinitionError } from "./errors.js";
import { validateJobGraph } from "./plan.js";
import type {
	JobTemplate,
	MatrixAxis,
	MatrixBinding,
	MatrixSpec,
	Pipeline,
	ReleaseSpec,
	Step,
	TriggerRule,
} from "./types.js";

const StringListSchema = z.union([z.string(), z.array(z.string())]);
const MatrixValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const MatrixBindingSchema = z.record(MatrixValueSchema);
const ConditionSourceSchema = z.union([z.string(), z.boolean()]).transform(String);

const StepSchema = z.object({
	name: z.string().optional(),
	uses: z.string().optional(),
	run: z.string().optional(),
	env: z.record(z.string()).optional(),
});

const ReleaseSchema = z.object({
	files: StringListSchema,
	name: z.string().optional(),
	tag: z.string().optional(),
	body: z.string().optional(),
	"generate-notes": z.boolean().optional(),
	generate_release_notes: z.boolean().optional(),
	draft: z.boolean().default(false),
	prerelease: z.boolean().default(false),
	if: ConditionSourceSchema.optional(),
	"on-existing": z.enum(["fail", "update"]).optional(),
});

const JobSchema = z.object({
	name: z.string().optional(),
	needs: StringListSchema.optional(),
	"runs-on": StringListSchema.optional(),
	if: ConditionSourceSchema.optional(),
	env: z.record(z.string()).optional(),
	steps: z.array(StepSchema).default([]),
	strategy: z
		.object({
			matrix: z.record(z.unknown()).optional(),
			"fail-fast": z.boolean().optional(),
			"max-parallel": z.number().int().positive().optional(),
		})
		.optional(),
	artifacts: StringListSchema.optional(),
	release: ReleaseSchema.optional(),
});

const TriggerFilterSchema = z
	.object({
		branches: StringListSchema.optional(),
		tags: StringListSchema.optional(),
		workflows: StringListSchema.optional(),
		pipelines: StringListSchema.optional(),
	})
	.passthrough()
	.nullable()
	.optional();

const PipelineSchema = z.object({
	name: z.string().optional(),
	on: z
		.union([z.string(), z.array(z.string()), z.record(TriggerFilterSchema)])
		.optional(),
	env: z.record(z.string()).optional(),
	jobs: z.record(JobSchema).default({}),
});

type PipelineYaml = z.infer<typeof PipelineSchema>;
type JobYaml = z.infer<typeof JobSchema>;
type ReleaseYaml = z.infer<typeof ReleaseSchema>;
type TriggerFilter = z.infer<typeof TriggerFilterSchema>;

const DEFAULT_RELEASE_REF = "${{ ref_name }}";

export function parsePipeline(pipelinePath: string): Pipeline {
	const raw = fs.readFileSync(pipelinePath, "utf-8");
	return parsePipelineSource(raw, pipelinePath);
}

export function parsePipelineSource(raw: string, pipelinePath: string): Pipeline {
	const lineCounter = new LineCounter();
	const doc = YAML.parseDocument(raw, { lineCounter });
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new PipelineDefinitionError(`${pipelinePath}:${line}:${col} ${error.message}`);
	}

	const result = PipelineSchema.safeParse(doc.toJSON() ?? {});
	if (!result.success) {
		const issue = result.error.issues[0];
		const where = locate(doc, lineCounter, issue?.path ?? []);
		const field = issue?.path.join(".") || "(root)";
		throw new PipelineDefinitionError(
			`${pipelinePath}:${where} ${field}: ${issue?.message ?? "invalid pipeline"}`,
		);
	}

	const parsed: PipelineYaml = result.data;
	const jobs = Object.entries(parsed.jobs).map(([jobId, job]) => {
		try {
			return parseJob(jobId, job);
		} catch (error) {
			if (error instanceof ConditionSyntaxError || error instanceof PipelineDefinitionError) {
				const where = locate(doc, lineCounter, ["jobs", jobId]);
				throw new PipelineDefinitionError(`${pipelinePath}:${where} ${error.message}`);
			}
			throw error;
		}
	});

	try {
		validateJobGraph(jobs);
	} catch (error) {
		if (error instanceof PipelineDefinitionError) {
			throw new PipelineDefinitionError(`${pipelinePath}: ${error.message}`);
		}
		throw error;
	}

	return {
		id: pipelinePath,
		name: parsed.name ?? path.basename(pipelinePath).replace(/\.ya?ml$/, ""),
		path: pipelinePath,
		triggers: parseTriggers(parsed.on),
		jobs,
		env: parsed.env,
	};
}

function parseJob(jobId: string, job: JobYaml): JobTemplate {
	const steps = job.steps.map((step, index) => parseStep(jobId, step, index));
	return {
		id: jobId,
		name: job.name ?? jobId,
		needs: toList(job.needs),
		runsOn: job["runs-on"] ? toList(job["runs-on"]).join(", ") : undefined,
		steps,
		if: job.if,
		condition: job.if === undefined ? undefined : parseCondition(job.if),
		matrix: job.strategy?.matrix
			? parseMatrix(jobId, job.strategy.matrix, job.strategy["fail-fast"], job.strategy["max-parallel"])
			: undefined,
		artifacts: toList(job.artifacts),
		release: job.release ? parseRelease(job.release) : undefined,
		env: job.env,
	};
}

function parseStep(jobId: string, step: z.infer<typeof StepSchema>, index: number): Step {
	const fallbackName = step.uses ?? step.run ?? `Step ${index + 1}`;
	return {
		id: `${jobId}-step-${index + 1}`,
		name: step.name ?? fallbackName,
		uses: step.uses,
		run: step.run,
		env: step.env,
	};
}

function parseMatrix(
	jobId: string,
	matrix: Record<string, unknown>,
	failFast: boolean | undefined,
	maxParallel: number | undefined,
): MatrixSpec {
	const axes: MatrixAxis[] = [];
	let include: MatrixBinding[] = [];
	let exclude: MatrixBinding[] = [];

	for (const [key, value] of Object.entries(matrix)) {
		if (key === "include" || key === "exclude") {
			const entries = z.array(MatrixBindingSchema).safeParse(value);
			if (!entries.success) {
				throw new PipelineDefinitionError(
					`Job '${jobId}': matrix ${key} must be a list of key/value maps`,
				);
			}
			if (key === "include") {
				include = entries.data;
			} else {
				exclude = entries.data;
			}
			continue;
		}
		const values = z.array(MatrixValueSchema).safeParse(value);
		if (!values.success) {
			throw new PipelineDefinitionError(
				`Job '${jobId}': matrix axis '${key}' must be a list of scalar values`,
			);
		}
		axes.push({ name: key, values: values.data });
	}

	return {
		axes,
		include,
		exclude,
		failFast: failFast ?? true,
		maxParallel,
	};
}

function parseRelease(release: ReleaseYaml): ReleaseSpec {
	const autoBody = release.body?.trim() === "auto";
	return {
		files: toList(release.files),
		name: release.name ?? DEFAULT_RELEASE_REF,
		tag: release.tag ?? DEFAULT_RELEASE_REF,
		body: autoBody ? undefined : release.body,
		generateNotes:
			autoBody || (release["generate-notes"] ?? release.generate_release_notes ?? false),
		draft: release.draft,
		prerelease: release.prerelease,
		if: release.if,
		condition: release.if === undefined ? undefined : parseCondition(release.if),
		onExisting: release["on-existing"],
	};
}

function parseTriggers(trigger: PipelineYaml["on"]): TriggerRule[] {
	if (!trigger) {
		return [];
	}
	if (typeof trigger === "string") {
		return rulesForEvent(trigger, null);
	}
	if (Array.isArray(trigger)) {
		return trigger.flatMap((name) => rulesForEvent(name, null));
	}
	return Object.entries(trigger).flatMap(([name, filter]) => rulesForEvent(name, filter ?? null));
}

function rulesForEvent(name: string, filter: TriggerFilter): TriggerRule[] {
	const branches = filter?.branches === undefined ? undefined : toList(filter.branches);
	const tags = filter?.tags === undefined ? undefined : toList(filter.tags);

	switch (name) {
		case "push": {
			// a push filter that only lists tags does not fire on branch pushes, and vice versa
			const rules: TriggerRule[] = [];
			if (branches || !tags) {
				rules.push({ event: "push", branches });
			}
			if (tags || !branches) {
				rules.push({ event: "tag", tags });
			}
			return rules;
		}
		case "pull_request":
			return [{ event: "pull_request", branches }];
		case "tag":
			return [{ event: "tag", tags }];
		case "workflow_completion":
		case "workflow_run": {
			const source = filter?.pipelines ?? filter?.workflows;
			return [
				{
					event: "workflow_completion",
					branches,
					pipelines: source === undefined ? undefined : toList(source),
				},
			];
		}
		default:
			return [];
	}
}

function toList(value: string | string[] | undefined): string[] {
	if (value === undefined) {
		return [];
	}
	return Array.isArray(value) ? value : [value];
}

function locate(doc: Document, lineCounter: LineCounter, issuePath: (string | number)[]): string {
	for (let depth = issuePath.length; depth >= 0; depth -= 1) {
		const node = doc.getIn(issuePath.slice(0, depth), true);
		if (isNode(node) && node.range) {
			const pos = lineCounter.linePos(node.range[0]);
			return `${pos.line}:${pos.col}`;
		}
	}
	return "1:1";
}
