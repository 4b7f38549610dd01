import type {
	Artifact,
	JobInstance,
	JobStatus,
	PipelineEvent,
	PublishResult,
	RunConclusion,
	Step,
} from "./types.js";

export type JobExecution = {
	runId: string;
	job: Readonly<JobInstance>;
	steps: Step[];
	/** Run variables plus `matrix.<axis>` entries for this instance. */
	bindings: Record<string, string>;
	env: Record<string, string>;
	/** Workspace-relative globs of files the job publishes as artifacts. */
	artifactPatterns: string[];
	/** Run artifact directory; produced files are copied below it when set. */
	artifactDir?: string;
	signal: AbortSignal;
};

export type JobOutcome =
	| { status: "succeeded"; artifacts: Artifact[] }
	| { status: "failed"; exitCode?: number; error: string }
	| { status: "cancelled" };

export interface JobExecutor {
	readonly id: string;
	execute(execution: JobExecution): Promise<JobOutcome>;
}

export type RunnerEvent =
	| {
			type: "run-started";
			runId: string;
			pipeline: string;
			event: PipelineEvent;
			variables: Record<string, string>;
			jobs: { jobId: string; templateId: string; matrix: JobInstance["matrix"] }[];
			artifactDir?: string;
			logDir?: string;
			createdAt: string;
	  }
	| {
			type: "job-transition";
			runId: string;
			jobId: string;
			status: JobStatus;
			reason?: string;
			at: string;
	  }
	| {
			type: "job-finished";
			runId: string;
			jobId: string;
			status: Extract<JobStatus, "succeeded" | "failed" | "cancelled" | "skipped">;
			cancelRequested: boolean;
			exitCode?: number;
			error?: string;
			artifacts: string[];
			release?: PublishResult;
			startedAt?: string;
			finishedAt: string;
			durationMs: number;
	  }
	| {
			type: "cancel-requested";
			runId: string;
			jobIds: string[];
			reason: string;
	  }
	| {
			type: "run-finished";
			runId: string;
			status: RunConclusion;
			finishedAt: string;
	  };
