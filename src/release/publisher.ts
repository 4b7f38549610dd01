import path from "node:path";
import { evaluateCondition, interpolate } from "../core/condition.js";
import { errorMessage, ReleaseExistsError } from "../core/errors.js";
import type {
	Artifact,
	ExistingReleasePolicy,
	PipelineRun,
	PublishResult,
	ReleaseSpec,
} from "../core/types.js";
import { matchesAnyGlob } from "../utils/glob.js";

export type ReleaseIdentity = {
	name: string;
	tag: string;
};

export type ReleaseInput = ReleaseIdentity & {
	body?: string;
	generateNotes: boolean;
	draft: boolean;
	prerelease: boolean;
	pipeline: string;
	runId: string;
};

export type StoredRelease = ReleaseIdentity & {
	id: string;
	draft: boolean;
	prerelease: boolean;
	body: string;
	assets: string[];
	createdAt: string;
	updatedAt: string;
};

/**
 * A release being assembled. Nothing is visible to `findRelease` until
 * `commit` resolves; `abort` discards everything staged so far.
 */
export interface ReleaseTransaction {
	/** Where staged content lives, for reporting an abort that failed. */
	readonly location: string;
	uploadAsset(asset: ReleaseAsset, signal?: AbortSignal): Promise<void>;
	commit(): Promise<StoredRelease>;
	abort(): Promise<void>;
}

export type ReleaseAsset = {
	name: string;
	artifact: Artifact;
};

export interface ReleaseEndpoint {
	findRelease(identity: ReleaseIdentity): Promise<StoredRelease | null>;
	beginRelease(input: ReleaseInput, replaces?: StoredRelease): Promise<ReleaseTransaction>;
}

export type ReleasePublisherOptions = {
	endpoint: ReleaseEndpoint;
	/** Used when a release does not set `on-existing`. */
	onExisting?: ExistingReleasePolicy;
};

export class ReleasePublisher {
	private readonly endpoint: ReleaseEndpoint;
	private readonly defaultPolicy: ExistingReleasePolicy;

	constructor(options: ReleasePublisherOptions) {
		this.endpoint = options.endpoint;
		this.defaultPolicy = options.onExisting ?? "fail";
	}

	async publish(
		spec: ReleaseSpec,
		run: PipelineRun,
		artifacts: readonly Artifact[],
		signal?: AbortSignal,
	): Promise<PublishResult> {
		if (spec.condition && !evaluateCondition(spec.condition, run.variables)) {
			return { status: "skipped", reason: `release condition is false: ${spec.if ?? ""}` };
		}
		if (signal?.aborted) {
			return cancelledResult("");
		}

		const assets = selectAssets(spec.files, artifacts);
		if (assets.length === 0) {
			return {
				status: "failed",
				reason: "no-artifacts",
				message: `No artifacts match ${spec.files.join(", ")}`,
			};
		}

		const identity: ReleaseIdentity = {
			name: interpolate(spec.name, run.variables),
			tag: interpolate(spec.tag, run.variables),
		};
		const policy = spec.onExisting ?? this.defaultPolicy;

		let existing: StoredRelease | null;
		let transaction: ReleaseTransaction;
		try {
			existing = await this.endpoint.findRelease(identity);
			if (existing && (policy === "fail" || !existing.draft)) {
				return {
					status: "failed",
					reason: "already-exists",
					message: `Release "${identity.name}" for tag ${identity.tag} already exists (${existing.id})`,
				};
			}
			transaction = await this.endpoint.beginRelease(
				{
					...identity,
					body: spec.body === undefined ? undefined : interpolate(spec.body, run.variables),
					generateNotes: spec.generateNotes,
					draft: spec.draft,
					prerelease: spec.prerelease,
					pipeline: run.pipeline.name,
					runId: run.id,
				},
				existing ?? undefined,
			);
		} catch (error) {
			return transportResult(error, "");
		}

		try {
			for (const asset of assets) {
				if (signal?.aborted) {
					return cancelledResult(await abortTransaction(transaction));
				}
				await transaction.uploadAsset(asset, signal);
			}
			if (signal?.aborted) {
				return cancelledResult(await abortTransaction(transaction));
			}
			const release = await transaction.commit();
			return {
				status: "published",
				releaseId: release.id,
				updated: existing !== null,
				assets: assets.map((asset) => asset.name),
			};
		} catch (error) {
			const abortNote = await abortTransaction(transaction);
			if (signal?.aborted) {
				return cancelledResult(abortNote);
			}
			if (error instanceof ReleaseExistsError) {
				return {
					status: "failed",
					reason: "already-exists",
					message: `Release "${identity.name}" for tag ${identity.tag} already exists${abortNote}`,
				};
			}
			return transportResult(error, abortNote);
		}
	}
}

/**
 * Artifacts matching any of the globs, by workspace-relative name. Assets are
 * named after the file; the first artifact wins a name clash.
 */
export function selectAssets(patterns: string[], artifacts: readonly Artifact[]): ReleaseAsset[] {
	const assets: ReleaseAsset[] = [];
	const names = new Set<string>();
	for (const artifact of artifacts) {
		if (!matchesAnyGlob(artifact.name, patterns)) {
			continue;
		}
		const name = path.posix.basename(artifact.name);
		if (names.has(name)) {
			continue;
		}
		names.add(name);
		assets.push({ name, artifact });
	}
	return assets;
}

async function abortTransaction(transaction: ReleaseTransaction): Promise<string> {
	try {
		await transaction.abort();
		return "";
	} catch (error) {
		return ` (staged release at ${transaction.location} could not be discarded: ${errorMessage(error)})`;
	}
}

function cancelledResult(note: string): PublishResult {
	return { status: "failed", reason: "cancelled", message: `Release publishing was cancelled${note}` };
}

function transportResult(error: unknown, note: string): PublishResult {
	return {
		status: "failed",
		reason: "transport",
		message: `${errorMessage(error, "Release upload failed.")}${note}`,
	};
}
