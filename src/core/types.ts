import type { Condition } from "./condition.js";

export type RunConclusion = "success" | "failure" | "cancelled";

export type PipelineEvent =
	| { kind: "push"; ref: string }
	| { kind: "pull_request"; ref?: string; baseRef?: string }
	| { kind: "tag"; ref: string; tagName: string }
	| {
			kind: "workflow_completion";
			sourcePipeline: string;
			conclusion: RunConclusion;
			sourceBranch: string;
	  };

export type EventKind = PipelineEvent["kind"];

export const EVENT_KINDS: readonly EventKind[] = [
	"push",
	"pull_request",
	"tag",
	"workflow_completion",
];

export type TriggerRule = {
	event: EventKind;
	/** Branch globs: pushed branch, pull request base, or upstream source branch. */
	branches?: string[];
	tags?: string[];
	/** Upstream pipeline names, for workflow_completion rules. */
	pipelines?: string[];
};

export type Pipeline = {
	id: string;
	name: string;
	path: string;
	triggers: TriggerRule[];
	jobs: JobTemplate[];
	env?: Record<string, string>;
};

export type Step = {
	id: string;
	name: string;
	uses?: string;
	run?: string;
	env?: Record<string, string>;
};

export type MatrixValue = string | number | boolean;

export type MatrixBinding = Record<string, MatrixValue>;

export type MatrixAxis = {
	name: string;
	values: MatrixValue[];
};

export type MatrixSpec = {
	axes: MatrixAxis[];
	include: MatrixBinding[];
	exclude: MatrixBinding[];
	failFast: boolean;
	/** Undefined means unbounded. */
	maxParallel?: number;
};

export type ExistingReleasePolicy = "fail" | "update";

export type ReleaseSpec = {
	files: string[];
	name: string;
	tag: string;
	body?: string;
	generateNotes: boolean;
	draft: boolean;
	prerelease: boolean;
	if?: string;
	condition?: Condition;
	/** Falls back to the publisher's configured policy. */
	onExisting?: ExistingReleasePolicy;
};

export type JobTemplate = {
	id: string;
	name: string;
	needs: string[];
	runsOn?: string;
	steps: Step[];
	if?: string;
	condition?: Condition;
	matrix?: MatrixSpec;
	artifacts: string[];
	release?: ReleaseSpec;
	env?: Record<string, string>;
};

export type JobStatus =
	| "pending"
	| "blocked"
	| "ready"
	| "running"
	| "succeeded"
	| "failed"
	| "cancelled"
	| "skipped";

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = [
	"succeeded",
	"failed",
	"cancelled",
	"skipped",
];

export type Artifact = {
	name: string;
	path: string;
	size: number;
	producedBy: string;
};

export type PublishFailureReason = "no-artifacts" | "already-exists" | "transport" | "cancelled";

export type PublishResult =
	| { status: "published"; releaseId: string; updated: boolean; assets: string[] }
	| { status: "skipped"; reason: string }
	| { status: "failed"; reason: PublishFailureReason; message: string };

export type JobInstance = {
	id: string;
	templateId: string;
	name: string;
	matrix: MatrixBinding | null;
	status: JobStatus;
	artifacts: Artifact[];
	cancelRequested: boolean;
	statusReason?: string;
	exitCode?: number;
	error?: string;
	release?: PublishResult;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
};

export type RunStatus = "pending" | "running" | RunConclusion;

export type PipelineRun = {
	id: string;
	pipeline: Pipeline;
	event: PipelineEvent;
	variables: Record<string, string>;
	jobs: JobInstance[];
	status: RunStatus;
	createdAt: string;
	finishedAt?: string;
};

export type JobRecord = {
	jobId: string;
	templateId: string;
	status: JobStatus;
	matrix: MatrixBinding | null;
	cancelRequested?: boolean;
	statusReason?: string;
	exitCode?: number;
	error?: string;
	artifacts?: string[];
	release?: PublishResult;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
};

export type RunRecord = {
	schemaVersion: number;
	id: string;
	pipeline: string;
	event: PipelineEvent;
	variables: Record<string, string>;
	status: RunStatus;
	createdAt: string;
	finishedAt?: string;
	jobs: JobRecord[];
	artifactDir?: string;
	logDir?: string;
};
