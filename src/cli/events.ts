import { qualifyRef } from "../core/trigger.js";
import type { EventKind, PipelineEvent, RunConclusion } from "../core/types.js";

export type EventInput = {
	event?: EventKind;
	ref?: string;
	base?: string;
	source?: string;
	conclusion?: RunConclusion;
	branch?: string;
};

export type EventResult = { ok: true; event: PipelineEvent } | { ok: false; error: string };

const TAG_PREFIX = "refs/tags/";

export function buildEvent(input: EventInput): EventResult {
	const kind = input.event ?? "push";
	switch (kind) {
		case "push": {
			if (!input.ref) {
				return { ok: false, error: "Missing --ref for push event" };
			}
			if (input.ref.startsWith(TAG_PREFIX)) {
				return { ok: true, event: tagEvent(input.ref) };
			}
			return { ok: true, event: { kind: "push", ref: qualifyRef(input.ref) } };
		}
		case "tag": {
			if (!input.ref) {
				return { ok: false, error: "Missing --ref for tag event" };
			}
			return { ok: true, event: tagEvent(input.ref) };
		}
		case "pull_request":
			return {
				ok: true,
				event: {
					kind: "pull_request",
					ref: input.ref,
					baseRef: input.base,
				},
			};
		case "workflow_completion": {
			if (!input.source) {
				return { ok: false, error: "Missing --source for workflow_completion event" };
			}
			return {
				ok: true,
				event: {
					kind: "workflow_completion",
					sourcePipeline: input.source,
					conclusion: input.conclusion ?? "success",
					sourceBranch: input.branch ?? "",
				},
			};
		}
	}
}

export function describeEvent(event: PipelineEvent): string {
	switch (event.kind) {
		case "push":
		case "tag":
			return `${event.kind} ${event.ref}`;
		case "pull_request":
			return event.baseRef ? `pull_request into ${event.baseRef}` : "pull_request";
		case "workflow_completion":
			return `workflow_completion of "${event.sourcePipeline}" (${event.conclusion})`;
	}
}

function tagEvent(ref: string): PipelineEvent {
	const tagName = ref.startsWith(TAG_PREFIX) ? ref.slice(TAG_PREFIX.length) : ref;
	return { kind: "tag", ref: `${TAG_PREFIX}${tagName}`, tagName };
}
