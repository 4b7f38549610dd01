import type { JobExecution, JobExecutor, JobOutcome } from "../src/core/engine.js";
import { ReleaseExistsError } from "../src/core/errors.js";
import type { Artifact, JobTemplate, Pipeline } from "../src/core/types.js";
import type {
	ReleaseEndpoint,
	ReleaseIdentity,
	ReleaseInput,
	ReleaseTransaction,
	StoredRelease,
} from "../src/release/publisher.js";

type Deferred<T> = {
	promise: Promise<T>;
	resolve: (value: T) => void;
};

function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>((res) => {
		resolve = res;
	});
	return { promise, resolve };
}

/** Lets every pending promise continuation run. */
export function flush(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Executor whose jobs stay running until the test finishes them, unless
 * `auto` returns an outcome straight away.
 */
export class ScriptedExecutor implements JobExecutor {
	readonly id = "scripted";
	readonly started: string[] = [];
	readonly executions = new Map<string, JobExecution>();
	private readonly pending = new Map<string, Deferred<JobOutcome>>();

	constructor(private readonly auto?: (execution: JobExecution) => JobOutcome | undefined) {}

	execute(execution: JobExecution): Promise<JobOutcome> {
		this.started.push(execution.job.id);
		this.executions.set(execution.job.id, execution);
		const outcome = this.auto?.(execution);
		if (outcome) {
			return Promise.resolve(outcome);
		}
		const result = deferred<JobOutcome>();
		this.pending.set(execution.job.id, result);
		return result.promise;
	}

	get running(): string[] {
		return [...this.pending.keys()];
	}

	signalOf(jobId: string): AbortSignal | undefined {
		return this.executions.get(jobId)?.signal;
	}

	finish(jobId: string, outcome: JobOutcome): void {
		const result = this.pending.get(jobId);
		if (!result) {
			throw new Error(`${jobId} is not running`);
		}
		this.pending.delete(jobId);
		result.resolve(outcome);
	}
}

export const succeeded = (artifacts: Artifact[] = []): JobOutcome => ({
	status: "succeeded",
	artifacts,
});

export const failed = (error = "exit 1", exitCode = 1): JobOutcome => ({
	status: "failed",
	exitCode,
	error,
});

export function artifact(name: string, producedBy: string): Artifact {
	return { name, path: `/repo/${name}`, size: 10, producedBy };
}

export function template(id: string, overrides: Partial<JobTemplate> = {}): JobTemplate {
	return { id, name: id, needs: [], steps: [], artifacts: [], ...overrides };
}

export function makePipeline(jobs: JobTemplate[], name = "CI"): Pipeline {
	return {
		id: `${name}.yml`,
		name,
		path: `/repo/.conveyor/pipelines/${name}.yml`,
		triggers: [{ event: "push" }, { event: "tag" }],
		jobs,
	};
}

const FIXED_TIME = "2026-01-01T00:00:00.000Z";

/** Release endpoint kept in memory; a release appears only once committed. */
export class MemoryReleaseEndpoint implements ReleaseEndpoint {
	readonly releases = new Map<string, StoredRelease>();
	readonly uploads: string[] = [];
	aborted = 0;
	failUploadOf?: string;
	failAbort = false;
	onUpload?: (name: string) => void;
	private counter = 0;

	async findRelease(identity: ReleaseIdentity): Promise<StoredRelease | null> {
		return this.releases.get(releaseKey(identity)) ?? null;
	}

	async beginRelease(input: ReleaseInput, replaces?: StoredRelease): Promise<ReleaseTransaction> {
		this.counter += 1;
		const id = replaces?.id ?? `release-${this.counter}`;
		const staged: string[] = [];

		return {
			location: `memory://${input.tag}`,
			uploadAsset: async (asset) => {
				this.onUpload?.(asset.name);
				if (asset.name === this.failUploadOf) {
					throw new Error(`Upload of ${asset.name} failed`);
				}
				staged.push(asset.name);
				this.uploads.push(asset.name);
			},
			commit: async () => {
				if (!replaces && this.releases.has(releaseKey(input))) {
					throw new ReleaseExistsError(`Release ${id} already exists`);
				}
				const record: StoredRelease = {
					id,
					name: input.name,
					tag: input.tag,
					draft: input.draft,
					prerelease: input.prerelease,
					body: input.body ?? "",
					assets: [...staged],
					createdAt: replaces?.createdAt ?? FIXED_TIME,
					updatedAt: FIXED_TIME,
				};
				this.releases.set(releaseKey(input), record);
				return record;
			},
			abort: async () => {
				this.aborted += 1;
				if (this.failAbort) {
					throw new Error("staging area is locked");
				}
			},
		};
	}
}

function releaseKey(identity: ReleaseIdentity): string {
	return `${identity.name}\0${identity.tag}`;
}
