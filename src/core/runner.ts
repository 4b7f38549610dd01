import type { ReleasePublisher } from "../release/publisher.js";
import type { JobExecutor, JobOutcome, RunnerEvent } from "./engine.js";
import { errorMessage } from "./errors.js";
import { evaluateCondition } from "./condition.js";
import { matrixVariables, maxParallelFor } from "./matrix.js";
import { validateJobGraph } from "./plan.js";
import type {
	Artifact,
	JobInstance,
	JobStatus,
	JobTemplate,
	PipelineRun,
	PublishResult,
	RunConclusion,
} from "./types.js";

export type RunnerOptions = {
	executor: JobExecutor;
	/** Required when a job template carries a release. */
	publisher?: ReleasePublisher;
	/** Pipeline-wide cap on running jobs; unbounded when omitted. */
	concurrency?: number;
	env?: Record<string, string>;
	signal?: AbortSignal;
	onEvent?: (event: RunnerEvent) => void;
	artifactDir?: string;
	logDir?: string;
};

type Completion = {
	job: JobInstance;
	outcome: JobOutcome;
	release?: PublishResult;
};

const UNMET_NEED_STATUSES: readonly JobStatus[] = ["failed", "cancelled", "skipped"];

export class JobGraphRunner {
	constructor(private readonly options: RunnerOptions) {
		if (options.concurrency !== undefined && !(options.concurrency >= 1)) {
			throw new Error(`Concurrency must be at least 1, got ${options.concurrency}`);
		}
	}

	/**
	 * Drives every job instance of the run to a terminal status and returns
	 * the same run with its conclusion set.
	 */
	async run(run: PipelineRun): Promise<PipelineRun> {
		validateJobGraph(run.pipeline.jobs);
		if (!this.options.publisher && run.pipeline.jobs.some((job) => job.release)) {
			throw new Error(`Pipeline "${run.pipeline.name}" has a release job but no publisher`);
		}
		return new RunSession(run, this.options).drive();
	}
}

export function concludeRun(jobs: JobInstance[]): RunConclusion {
	if (jobs.some((job) => job.status === "failed")) {
		return "failure";
	}
	if (jobs.some((job) => job.status === "cancelled")) {
		return "cancelled";
	}
	return "success";
}

class RunSession {
	private readonly templates: Map<string, JobTemplate>;
	private readonly instancesByTemplate = new Map<string, JobInstance[]>();
	private readonly conditionResults = new Map<string, boolean>();
	private readonly controllers = new Map<string, AbortController>();
	private readonly inflight = new Map<string, Promise<Completion>>();
	private readonly budget: number;
	private cancelled = false;

	constructor(
		private readonly run: PipelineRun,
		private readonly options: RunnerOptions,
	) {
		this.templates = new Map(run.pipeline.jobs.map((job) => [job.id, job]));
		for (const job of run.jobs) {
			const group = this.instancesByTemplate.get(job.templateId) ?? [];
			group.push(job);
			this.instancesByTemplate.set(job.templateId, group);
		}
		this.budget = options.concurrency ?? Number.POSITIVE_INFINITY;
	}

	async drive(): Promise<PipelineRun> {
		const { signal } = this.options;
		const onAbort = (): void => this.cancelAll("pipeline run cancelled");

		this.run.status = "running";
		this.emit({
			type: "run-started",
			runId: this.run.id,
			pipeline: this.run.pipeline.name,
			event: this.run.event,
			variables: this.run.variables,
			jobs: this.run.jobs.map((job) => ({
				jobId: job.id,
				templateId: job.templateId,
				matrix: job.matrix,
			})),
			artifactDir: this.options.artifactDir,
			logDir: this.options.logDir,
			createdAt: this.run.createdAt,
		});

		signal?.addEventListener("abort", onAbort, { once: true });
		try {
			if (signal?.aborted) {
				this.cancelAll("pipeline run cancelled");
			}
			this.settle();
			this.dispatch();
			while (this.inflight.size > 0) {
				const completion = await Promise.race(this.inflight.values());
				this.inflight.delete(completion.job.id);
				this.complete(completion);
				this.settle();
				this.dispatch();
			}
		} finally {
			signal?.removeEventListener("abort", onAbort);
		}

		this.run.status = concludeRun(this.run.jobs);
		this.run.finishedAt = new Date().toISOString();
		this.emit({
			type: "run-finished",
			runId: this.run.id,
			status: this.run.status,
			finishedAt: this.run.finishedAt,
		});
		return this.run;
	}

	/** Moves pending and blocked instances forward until nothing changes. */
	private settle(): void {
		let changed = true;
		while (changed) {
			changed = false;
			for (const job of this.run.jobs) {
				if (job.status !== "pending" && job.status !== "blocked") {
					continue;
				}
				const next = this.assess(job);
				if (next.status !== job.status) {
					this.transition(job, next.status, next.reason);
					changed = true;
				}
			}
		}
	}

	private assess(job: JobInstance): { status: JobStatus; reason?: string } {
		const template = this.templateFor(job);
		if (!this.conditionHolds(template)) {
			return { status: "skipped", reason: `condition is false: ${template.if ?? ""}` };
		}
		const release = template.release;
		if (release?.condition && !evaluateCondition(release.condition, this.run.variables)) {
			return { status: "skipped", reason: `release condition is false: ${release.if ?? ""}` };
		}

		let waiting = false;
		for (const need of template.needs) {
			const dependencies = this.instancesByTemplate.get(need) ?? [];
			// an empty matrix leaves the needed template without instances, so it never succeeds
			if (dependencies.length === 0) {
				return { status: "skipped", reason: `needed job ${need} has no instances` };
			}
			for (const dependency of dependencies) {
				if (UNMET_NEED_STATUSES.includes(dependency.status)) {
					return {
						status: "skipped",
						reason: `needed job ${dependency.id} was ${dependency.status}`,
					};
				}
				if (dependency.status !== "succeeded") {
					waiting = true;
				}
			}
		}
		return waiting ? { status: "blocked" } : { status: "ready" };
	}

	private conditionHolds(template: JobTemplate): boolean {
		if (!template.condition) {
			return true;
		}
		const cached = this.conditionResults.get(template.id);
		if (cached !== undefined) {
			return cached;
		}
		const result = evaluateCondition(template.condition, this.run.variables);
		this.conditionResults.set(template.id, result);
		return result;
	}

	private dispatch(): void {
		if (this.cancelled) {
			return;
		}
		for (const job of this.run.jobs) {
			if (this.inflight.size >= this.budget) {
				return;
			}
			if (job.status !== "ready") {
				continue;
			}
			const template = this.templateFor(job);
			const running = (this.instancesByTemplate.get(template.id) ?? []).filter(
				(sibling) => sibling.status === "running",
			).length;
			if (running >= maxParallelFor(template)) {
				continue;
			}
			this.start(job, template);
		}
	}

	private start(job: JobInstance, template: JobTemplate): void {
		const controller = new AbortController();
		this.controllers.set(job.id, controller);
		job.startedAt = new Date().toISOString();
		this.transition(job, "running");
		this.inflight.set(job.id, this.execute(job, template, controller.signal));
	}

	private async execute(
		job: JobInstance,
		template: JobTemplate,
		signal: AbortSignal,
	): Promise<Completion> {
		let outcome: JobOutcome;
		try {
			outcome = await this.options.executor.execute({
				runId: this.run.id,
				job,
				steps: template.steps,
				bindings: { ...this.run.variables, ...matrixVariables(job.matrix) },
				env: { ...this.options.env, ...this.run.pipeline.env, ...template.env },
				artifactPatterns: template.artifacts,
				artifactDir: this.options.artifactDir,
				signal,
			});
		} catch (error) {
			outcome = { status: "failed", error: errorMessage(error, "Job executor failed.") };
		}

		if (outcome.status !== "succeeded" || !template.release || !this.options.publisher) {
			return { job, outcome };
		}

		const artifacts: Artifact[] = [
			...template.needs.flatMap((need) =>
				(this.instancesByTemplate.get(need) ?? []).flatMap((dependency) => dependency.artifacts),
			),
			...outcome.artifacts,
		];
		let release: PublishResult;
		try {
			release = await this.options.publisher.publish(
				template.release,
				this.run,
				Object.freeze(artifacts),
				signal,
			);
		} catch (error) {
			release = {
				status: "failed",
				reason: "transport",
				message: errorMessage(error, "Release publisher failed."),
			};
		}
		return { job, outcome, release };
	}

	private complete({ job, outcome, release }: Completion): void {
		this.controllers.delete(job.id);
		const finishedAt = new Date().toISOString();
		job.finishedAt = finishedAt;
		job.durationMs =
			new Date(finishedAt).getTime() - new Date(job.startedAt ?? finishedAt).getTime();

		let status: Extract<JobStatus, "succeeded" | "failed" | "cancelled" | "skipped">;
		let reason: string | undefined;
		switch (outcome.status) {
			case "succeeded":
				job.artifacts = outcome.artifacts;
				status = "succeeded";
				if (release) {
					job.release = release;
					if (release.status === "skipped") {
						status = "skipped";
						reason = release.reason;
					} else if (release.status === "failed") {
						status = release.reason === "cancelled" ? "cancelled" : "failed";
						job.error = release.message;
					}
				}
				break;
			case "failed":
				status = "failed";
				job.exitCode = outcome.exitCode;
				job.error = outcome.error;
				break;
			case "cancelled":
				status = "cancelled";
				break;
		}

		this.transition(job, status, reason);
		this.emit({
			type: "job-finished",
			runId: this.run.id,
			jobId: job.id,
			status,
			cancelRequested: job.cancelRequested,
			exitCode: job.exitCode,
			error: job.error,
			artifacts: job.artifacts.map((artifact) => artifact.name),
			release: job.release,
			startedAt: job.startedAt,
			finishedAt,
			durationMs: job.durationMs,
		});

		if (status === "failed") {
			this.failFast(job);
		}
	}

	private failFast(failed: JobInstance): void {
		const template = this.templateFor(failed);
		if (!template.matrix?.failFast) {
			return;
		}
		const reason = `fail-fast after ${failed.id} failed`;
		const running: JobInstance[] = [];
		for (const sibling of this.instancesByTemplate.get(template.id) ?? []) {
			if (sibling === failed) {
				continue;
			}
			if (isQueued(sibling.status)) {
				this.transition(sibling, "cancelled", reason);
			} else if (sibling.status === "running") {
				running.push(sibling);
			}
		}
		this.requestCancel(running, reason);
	}

	private cancelAll(reason: string): void {
		this.cancelled = true;
		const running: JobInstance[] = [];
		for (const job of this.run.jobs) {
			if (isQueued(job.status)) {
				this.transition(job, "cancelled", reason);
			} else if (job.status === "running") {
				running.push(job);
			}
		}
		this.requestCancel(running, reason);
	}

	private requestCancel(jobs: JobInstance[], reason: string): void {
		const targets = jobs.filter((job) => !job.cancelRequested);
		if (targets.length === 0) {
			return;
		}
		for (const job of targets) {
			job.cancelRequested = true;
		}
		this.emit({
			type: "cancel-requested",
			runId: this.run.id,
			jobIds: targets.map((job) => job.id),
			reason,
		});
		for (const job of targets) {
			this.controllers.get(job.id)?.abort();
		}
	}

	private transition(job: JobInstance, status: JobStatus, reason?: string): void {
		job.status = status;
		if (status === "skipped" || status === "cancelled") {
			job.statusReason = reason;
		}
		if ((status === "skipped" || status === "cancelled") && !job.finishedAt) {
			job.finishedAt = new Date().toISOString();
		}
		this.emit({
			type: "job-transition",
			runId: this.run.id,
			jobId: job.id,
			status,
			reason,
			at: new Date().toISOString(),
		});
	}

	private templateFor(job: JobInstance): JobTemplate {
		const template = this.templates.get(job.templateId);
		if (!template) {
			throw new Error(`Job ${job.id} refers to unknown template ${job.templateId}`);
		}
		return template;
	}

	private emit(event: RunnerEvent): void {
		this.options.onEvent?.(event);
	}
}

function isQueued(status: JobStatus): boolean {
	return status === "pending" || status === "blocked" || status === "ready";
}
