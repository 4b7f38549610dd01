import { describe, expect, it } from "vitest";
import { parseCondition } from "../src/core/condition.js";
import { createPipelineRun } from "../src/core/plan.js";
import { resolveRunVariables } from "../src/core/trigger.js";
import type { PipelineEvent, PipelineRun, ReleaseSpec } from "../src/core/types.js";
import { ReleasePublisher, selectAssets } from "../src/release/publisher.js";
import { artifact, makePipeline, MemoryReleaseEndpoint, template } from "./helpers.js";

function runFor(event: PipelineEvent): PipelineRun {
	const pipeline = makePipeline([template("build")], "Run CI/CD");
	return createPipelineRun(pipeline, event, resolveRunVariables(event, pipeline));
}

const tagRun = runFor({ kind: "tag", ref: "refs/tags/v1.0.0", tagName: "v1.0.0" });

function releaseSpec(overrides: Partial<ReleaseSpec> = {}): ReleaseSpec {
	return {
		files: ["dist/*.zip"],
		name: "${{ ref_name }}",
		tag: "${{ ref_name }}",
		generateNotes: false,
		draft: false,
		prerelease: false,
		...overrides,
	};
}

const artifacts = [artifact("dist/a.zip", "build"), artifact("dist/b.zip", "build")];

describe("release publisher", () => {
	it("publishes once and reports an existing immutable release", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		const publisher = new ReleasePublisher({ endpoint });

		const first = await publisher.publish(releaseSpec(), tagRun, artifacts);
		const second = await publisher.publish(releaseSpec(), tagRun, artifacts);

		expect(first).toEqual({
			status: "published",
			releaseId: "release-1",
			updated: false,
			assets: ["a.zip", "b.zip"],
		});
		expect(second).toEqual({
			status: "failed",
			reason: "already-exists",
			message: 'Release "v1.0.0" for tag v1.0.0 already exists (release-1)',
		});
		expect(endpoint.releases.size).toBe(1);
	});

	it("reports a release committed by another publish meanwhile as existing", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		endpoint.onUpload = () => {
			endpoint.releases.set("v1.0.0\0v1.0.0", {
				id: "release-other",
				name: "v1.0.0",
				tag: "v1.0.0",
				draft: false,
				prerelease: false,
				body: "",
				assets: [],
				createdAt: "2026-01-01T00:00:00.000Z",
				updatedAt: "2026-01-01T00:00:00.000Z",
			});
		};

		const result = await new ReleasePublisher({ endpoint }).publish(releaseSpec(), tagRun, artifacts);

		expect(result).toEqual({
			status: "failed",
			reason: "already-exists",
			message: 'Release "v1.0.0" for tag v1.0.0 already exists',
		});
		expect(endpoint.aborted).toBe(1);
		expect(endpoint.releases.get("v1.0.0\0v1.0.0")?.id).toBe("release-other");
	});

	it("replaces a draft in place under the update policy", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		const publisher = new ReleasePublisher({ endpoint });
		const spec = releaseSpec({ draft: true, onExisting: "update", tag: "nightly", name: "Nightly" });

		await publisher.publish(spec, tagRun, [artifact("dist/a.zip", "build")]);
		const updated = await publisher.publish(spec, tagRun, artifacts);

		expect(updated).toEqual({
			status: "published",
			releaseId: "release-1",
			updated: true,
			assets: ["a.zip", "b.zip"],
		});
		expect(endpoint.releases.get("Nightly\0nightly")?.assets).toEqual(["a.zip", "b.zip"]);
	});

	it("never updates a published release", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		const publisher = new ReleasePublisher({ endpoint, onExisting: "update" });

		await publisher.publish(releaseSpec(), tagRun, artifacts);
		const again = await publisher.publish(releaseSpec(), tagRun, artifacts);

		expect(again).toMatchObject({ status: "failed", reason: "already-exists" });
	});

	it("falls back to the configured policy", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		const publisher = new ReleasePublisher({ endpoint, onExisting: "update" });
		const spec = releaseSpec({ draft: true });

		await publisher.publish(spec, tagRun, artifacts);
		expect(await publisher.publish(spec, tagRun, artifacts)).toMatchObject({
			status: "published",
			updated: true,
		});
	});

	it("skips when the gating condition is false", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		const spec = releaseSpec({
			if: "ref_type == 'tag'",
			condition: parseCondition("ref_type == 'tag'"),
		});

		const result = await new ReleasePublisher({ endpoint }).publish(
			spec,
			runFor({ kind: "push", ref: "refs/heads/main" }),
			artifacts,
		);

		expect(result).toEqual({ status: "skipped", reason: "release condition is false: ref_type == 'tag'" });
		expect(endpoint.uploads).toEqual([]);
	});

	it("fails without matching artifacts", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		const result = await new ReleasePublisher({ endpoint }).publish(
			releaseSpec({ files: ["dist/*.whl", "dist/*.tar.gz"] }),
			tagRun,
			artifacts,
		);

		expect(result).toEqual({
			status: "failed",
			reason: "no-artifacts",
			message: "No artifacts match dist/*.whl, dist/*.tar.gz",
		});
		expect(endpoint.releases.size).toBe(0);
	});

	it("rolls back a partial upload on transport failure", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		endpoint.failUploadOf = "b.zip";

		const result = await new ReleasePublisher({ endpoint }).publish(releaseSpec(), tagRun, artifacts);

		expect(result).toEqual({ status: "failed", reason: "transport", message: "Upload of b.zip failed" });
		expect(endpoint.releases.size).toBe(0);
		expect(endpoint.aborted).toBe(1);
	});

	it("reports the staged location when rollback fails", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		endpoint.failUploadOf = "b.zip";
		endpoint.failAbort = true;

		const result = await new ReleasePublisher({ endpoint }).publish(releaseSpec(), tagRun, artifacts);

		expect(result).toEqual({
			status: "failed",
			reason: "transport",
			message:
				"Upload of b.zip failed (staged release at memory://v1.0.0 could not be discarded: staging area is locked)",
		});
	});

	it("aborts the transaction when cancelled mid-publish", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		const controller = new AbortController();
		endpoint.onUpload = (name) => {
			if (name === "a.zip") {
				controller.abort();
			}
		};

		const result = await new ReleasePublisher({ endpoint }).publish(
			releaseSpec(),
			tagRun,
			artifacts,
			controller.signal,
		);

		expect(result).toEqual({
			status: "failed",
			reason: "cancelled",
			message: "Release publishing was cancelled",
		});
		expect(endpoint.uploads).toEqual(["a.zip"]);
		expect(endpoint.releases.size).toBe(0);
		expect(endpoint.aborted).toBe(1);
	});

	it("interpolates release metadata from run variables", async () => {
		const endpoint = new MemoryReleaseEndpoint();
		const spec = releaseSpec({ name: "${{ pipeline }} ${{ tag }}", body: "Built from ${{ github.ref }}" });

		await new ReleasePublisher({ endpoint }).publish(spec, tagRun, artifacts);

		expect(endpoint.releases.get("Run CI/CD v1.0.0\0v1.0.0")?.body).toBe("Built from refs/tags/v1.0.0");
	});
});

describe("asset selection", () => {
	it("names assets after the file and keeps the first of a clash", () => {
		const selected = selectAssets(
			["**/*.zip"],
			[
				artifact("linux/app.zip", "build (linux)"),
				artifact("windows/app.zip", "build (windows)"),
				artifact("docs/readme.md", "docs"),
				artifact("extra.zip", "build (linux)"),
			],
		);

		expect(selected.map((asset) => [asset.name, asset.artifact.producedBy])).toEqual([
			["app.zip", "build (linux)"],
			["extra.zip", "build (linux)"],
		]);
	});
});
