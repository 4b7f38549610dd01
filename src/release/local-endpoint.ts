import crypto from "node:crypto";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage, ReleaseExistsError, ReleaseTransportError } from "../core/errors.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";
import type {
	ReleaseAsset,
	ReleaseEndpoint,
	ReleaseIdentity,
	ReleaseInput,
	ReleaseTransaction,
	StoredRelease,
} from "./publisher.js";

const RELEASE_FILE = "release.json";
const STAGING_DIR = ".staging";

const StoredReleaseSchema = z.object({
	id: z.string(),
	name: z.string(),
	tag: z.string(),
	draft: z.boolean(),
	prerelease: z.boolean(),
	body: z.string(),
	assets: z.array(z.string()),
	createdAt: z.string(),
	updatedAt: z.string(),
});

/**
 * Release endpoint backed by a directory: one folder per release holding
 * `release.json` and an `assets/` folder. Releases are assembled in a staging
 * folder and renamed into place on commit.
 */
export class LocalReleaseEndpoint implements ReleaseEndpoint {
	constructor(private readonly baseDir: string) {}

	async findRelease(identity: ReleaseIdentity): Promise<StoredRelease | null> {
		const recordPath = path.join(this.releaseDir(identity), RELEASE_FILE);
		if (!fs.existsSync(recordPath)) {
			return null;
		}
		const raw = await fsp.readFile(recordPath, "utf-8");
		return StoredReleaseSchema.parse(JSON.parse(raw));
	}

	async beginRelease(input: ReleaseInput, replaces?: StoredRelease): Promise<ReleaseTransaction> {
		const id = getReleaseId(input);
		const stagingRoot = path.join(this.baseDir, STAGING_DIR);
		await fsp.mkdir(stagingRoot, { recursive: true });
		const stagingDir = await fsp.mkdtemp(path.join(stagingRoot, `${id}-`));
		const assetsDir = path.join(stagingDir, "assets");
		await fsp.mkdir(assetsDir);

		const finalDir = this.releaseDir(input);
		const uploaded: string[] = [];
		let settled = false;

		return {
			location: stagingDir,
			uploadAsset: async (asset: ReleaseAsset, signal?: AbortSignal) => {
				if (signal?.aborted) {
					throw new Error(`Upload of ${asset.name} aborted`);
				}
				const target = ensureWithinBase(assetsDir, asset.name, "asset name");
				try {
					await fsp.copyFile(asset.artifact.path, target);
				} catch (error) {
					throw new ReleaseTransportError(`Upload of ${asset.name} failed: ${errorMessage(error)}`, {
						cause: error,
					});
				}
				uploaded.push(asset.name);
			},
			commit: async () => {
				if (settled) {
					throw new Error(`Release ${id} was already committed or aborted`);
				}
				const now = new Date().toISOString();
				const record: StoredRelease = {
					id,
					name: input.name,
					tag: input.tag,
					draft: input.draft,
					prerelease: input.prerelease,
					body: buildBody(input, uploaded),
					assets: [...uploaded],
					createdAt: replaces?.createdAt ?? now,
					updatedAt: now,
				};
				await fsp.writeFile(
					path.join(stagingDir, RELEASE_FILE),
					JSON.stringify(record, null, 2),
				);

				if (!replaces && fs.existsSync(finalDir)) {
					throw new ReleaseExistsError(`Release ${id} already exists`);
				}
				try {
					if (replaces) {
						const retired = `${finalDir}.replaced-${crypto.randomBytes(3).toString("hex")}`;
						await fsp.rename(finalDir, retired);
						await fsp.rename(stagingDir, finalDir);
						await fsp.rm(retired, { recursive: true, force: true });
					} else {
						await fsp.rename(stagingDir, finalDir);
					}
				} catch (error) {
					throw new ReleaseTransportError(`Commit of release ${id} failed: ${errorMessage(error)}`, {
						cause: error,
					});
				}
				settled = true;
				return record;
			},
			abort: async () => {
				if (settled) {
					return;
				}
				settled = true;
				await fsp.rm(stagingDir, { recursive: true, force: true });
			},
		};
	}

	private releaseDir(identity: ReleaseIdentity): string {
		return ensureWithinBase(this.baseDir, getReleaseId(identity), "release id");
	}
}

export function getReleaseId(identity: ReleaseIdentity): string {
	const base = sanitizePathSegment(identity.tag, "release");
	const hash = crypto
		.createHash("sha1")
		.update(`${identity.name}\0${identity.tag}`)
		.digest("hex")
		.slice(0, 8);
	return `${base}-${hash}`;
}

function buildBody(input: ReleaseInput, assets: string[]): string {
	if (!input.generateNotes) {
		return input.body ?? "";
	}
	const notes = [
		`## ${input.name}`,
		"",
		`Built by pipeline "${input.pipeline}" (run ${input.runId}) for ${input.tag}.`,
		"",
		"### Assets",
		...assets.map((asset) => `- ${asset}`),
	].join("\n");
	return input.body ? `${input.body.trimEnd()}\n\n${notes}` : notes;
}
