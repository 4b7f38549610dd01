import { matchesAnyGlob } from "../utils/glob.js";
import { createPipelineRun } from "./plan.js";
import type { Pipeline, PipelineEvent, PipelineRun, TriggerRule } from "./types.js";

export type TriggerOptions = {
	/** Configured variables; event-derived variables take precedence. */
	vars?: Record<string, string>;
};

const BRANCH_PREFIX = "refs/heads/";
const TAG_PREFIX = "refs/tags/";

/**
 * Starts a run for the first trigger rule of the pipeline that accepts the
 * event. A pipeline with no matching rule yields null.
 */
export function evaluateTrigger(
	event: PipelineEvent,
	pipeline: Pipeline,
	options: TriggerOptions = {},
): PipelineRun | null {
	const rule = pipeline.triggers.find((candidate) => matchesRule(event, candidate));
	if (!rule) {
		return null;
	}
	return createPipelineRun(pipeline, event, resolveRunVariables(event, pipeline, options.vars));
}

export function evaluateTriggers(
	event: PipelineEvent,
	pipelines: Pipeline[],
	options: TriggerOptions = {},
): PipelineRun[] {
	const runs: PipelineRun[] = [];
	for (const pipeline of pipelines) {
		const run = evaluateTrigger(event, pipeline, options);
		if (run) {
			runs.push(run);
		}
	}
	return runs;
}

export function matchesRule(event: PipelineEvent, rule: TriggerRule): boolean {
	if (rule.event !== event.kind) {
		return false;
	}

	switch (event.kind) {
		case "push":
			return !rule.branches || matchesAnyGlob(shortRefName(event.ref), rule.branches);
		case "pull_request":
			return (
				!rule.branches ||
				(event.baseRef !== undefined && matchesAnyGlob(shortRefName(event.baseRef), rule.branches))
			);
		case "tag":
			return !rule.tags || matchesAnyGlob(event.tagName, rule.tags);
		case "workflow_completion":
			// only a successful upstream run starts a dependent pipeline
			if (event.conclusion !== "success") {
				return false;
			}
			if (rule.pipelines && !rule.pipelines.includes(event.sourcePipeline)) {
				return false;
			}
			return !rule.branches || matchesAnyGlob(event.sourceBranch, rule.branches);
	}
}

export function resolveRunVariables(
	event: PipelineEvent,
	pipeline: Pipeline,
	base: Record<string, string> = {},
): Record<string, string> {
	const variables: Record<string, string> = {
		...base,
		pipeline: pipeline.name,
		event_name: event.kind,
	};

	switch (event.kind) {
		case "push": {
			const ref = qualifyRef(event.ref);
			variables.ref = ref;
			variables.full_ref = ref;
			variables.ref_name = shortRefName(ref);
			variables.ref_type = ref.startsWith(TAG_PREFIX) ? "tag" : "branch";
			break;
		}
		case "pull_request":
			variables.ref = event.ref ?? "";
			variables.full_ref = event.ref ?? "";
			variables.ref_name = shortRefName(event.ref ?? "");
			variables.ref_type = "branch";
			variables.base_ref = event.baseRef ? shortRefName(event.baseRef) : "";
			break;
		case "tag":
			// `ref` is the bare tag name; `full_ref` keeps the refs/tags/ form
			variables.ref = event.tagName;
			variables.full_ref = `${TAG_PREFIX}${event.tagName}`;
			variables.ref_name = event.tagName;
			variables.ref_type = "tag";
			variables.tag = event.tagName;
			break;
		case "workflow_completion":
			variables.ref = `${BRANCH_PREFIX}${event.sourceBranch}`;
			variables.full_ref = variables.ref;
			variables.ref_name = event.sourceBranch;
			variables.ref_type = "branch";
			variables.upstream_pipeline = event.sourcePipeline;
			variables.upstream_conclusion = event.conclusion;
			variables.upstream_branch = event.sourceBranch;
			break;
	}

	return variables;
}

/** `main` becomes `refs/heads/main`; fully qualified refs are kept. */
export function qualifyRef(ref: string): string {
	return ref.startsWith("refs/") ? ref : `${BRANCH_PREFIX}${ref}`;
}

export function shortRefName(ref: string): string {
	return ref.replace(/^refs\/(heads|tags)\//, "");
}
