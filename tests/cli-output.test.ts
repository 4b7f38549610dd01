import { describe, expect, it } from "vitest";
import type { RunnerEvent } from "../src/core/engine.js";
import type { PipelineRun } from "../src/core/types.js";
import { formatPipelineList, formatTriggerRule } from "../src/cli/list.js";
import { buildJsonSummary, createProgressReporter } from "../src/cli/output.js";
import { resolveExitCode, selectPipelines } from "../src/cli/run-cli.js";
import { artifact, makePipeline, template } from "./helpers.js";

const AT = "2026-01-01T00:00:00.000Z";

function report(events: RunnerEvent[]): string[] {
	const lines: string[] = [];
	const reporter = createProgressReporter((text) => lines.push(text));
	events.forEach(reporter);
	return lines;
}

describe("progress reporter", () => {
	it("prefixes lines with the pipeline name", () => {
		const lines = report([
			{
				type: "run-started",
				runId: "run-1",
				pipeline: "CI",
				event: { kind: "push", ref: "refs/heads/main" },
				variables: {},
				jobs: [
					{ jobId: "build", templateId: "build", matrix: null },
					{ jobId: "publish", templateId: "publish", matrix: null },
				],
				createdAt: AT,
			},
			{ type: "job-transition", runId: "run-1", jobId: "build", status: "ready", at: AT },
			{ type: "job-transition", runId: "run-1", jobId: "build", status: "running", at: AT },
			{
				type: "job-finished",
				runId: "run-1",
				jobId: "build",
				status: "failed",
				cancelRequested: false,
				exitCode: 2,
				error: "Step \"make\" exited with code 2",
				artifacts: [],
				finishedAt: AT,
				durationMs: 1500,
			},
			{ type: "cancel-requested", runId: "run-1", jobIds: ["publish"], reason: "build failed" },
			{ type: "run-finished", runId: "run-1", status: "failure", finishedAt: AT },
		]);

		expect(lines).toEqual([
			"[CI] run run-1 started with 2 job(s)\n",
			"[CI] build started\n",
			"[CI] build failed (1.5s): Step \"make\" exited with code 2\n",
			"[CI] cancelling publish: build failed\n",
			"[CI] run run-1 finished: failure\n",
		]);
	});

	it("reports a published release", () => {
		const lines = report([
			{
				type: "job-finished",
				runId: "run-9",
				jobId: "release",
				status: "succeeded",
				cancelRequested: false,
				artifacts: [],
				release: { status: "published", releaseId: "v1-abc", updated: false, assets: ["a.zip", "b.zip"] },
				finishedAt: AT,
				durationMs: 250,
			},
		]);

		expect(lines).toEqual([
			"[run-9] release succeeded (250ms)\n",
			"[run-9] released v1-abc (a.zip, b.zip)\n",
		]);
	});
});

describe("json summary", () => {
	it("lists jobs with their outcome and the run directories", () => {
		const pipeline = makePipeline([template("build"), template("deploy")]);
		const run: PipelineRun = {
			id: "run-1",
			pipeline,
			event: { kind: "push", ref: "refs/heads/main" },
			variables: {},
			status: "failure",
			createdAt: AT,
			jobs: [
				{
					id: "build",
					templateId: "build",
					name: "build",
					matrix: null,
					status: "failed",
					artifacts: [artifact("dist/app.js", "build")],
					cancelRequested: false,
					exitCode: 1,
					error: "exit 1",
					durationMs: 30,
				},
				{
					id: "deploy",
					templateId: "deploy",
					name: "deploy",
					matrix: null,
					status: "skipped",
					artifacts: [],
					cancelRequested: true,
					statusReason: "needs build failed",
				},
			],
		};

		const summary = buildJsonSummary([run], (runId) => ({
			logsDir: `/runs/${runId}/logs`,
			artifactsDir: `/runs/${runId}/artifacts`,
		}));

		expect(summary).toEqual({
			runs: [
				{
					runId: "run-1",
					pipeline: { id: "CI.yml", name: "CI", path: "/repo/.conveyor/pipelines/CI.yml" },
					event: { kind: "push", ref: "refs/heads/main" },
					status: "failure",
					jobs: [
						{
							jobId: "build",
							status: "failed",
							exitCode: 1,
							durationMs: 30,
							reason: "exit 1",
							artifacts: ["dist/app.js"],
						},
						{
							jobId: "deploy",
							status: "skipped",
							reason: "needs build failed",
							cancelRequested: true,
							artifacts: [],
						},
					],
					logsDir: "/runs/run-1/logs",
					artifactsDir: "/runs/run-1/artifacts",
				},
			],
		});
	});
});

describe("pipeline list", () => {
	it("shows triggers and jobs in dependency order", () => {
		const pipeline = {
			...makePipeline([
				template("publish", {
					name: "Publish",
					needs: ["test"],
					if: "ref_type == 'tag'",
					release: {
						files: ["dist/*"],
						name: "${{ ref_name }}",
						tag: "${{ ref_name }}",
						generateNotes: false,
						draft: false,
						prerelease: false,
					},
				}),
				template("test", {
					needs: ["lint"],
					matrix: {
						axes: [
							{ name: "os", values: ["linux", "macos"] },
							{ name: "node", values: [18, 20, 22] },
						],
						include: [],
						exclude: [],
						failFast: true,
					},
				}),
				template("lint"),
			]),
			triggers: [{ event: "push" as const, branches: ["main"], tags: ["v*"] }],
		};

		expect(formatPipelineList([pipeline], "/repo")).toBe(
			[
				"CI (.conveyor/pipelines/CI.yml)",
				"  on: push [branches: main; tags: v*]",
				"  - lint",
				"  - test (matrix 2x3; needs lint)",
				"  - publish \"Publish\" (needs test; if ref_type == 'tag'; releases dist/*)",
				"",
			].join("\n"),
		);
	});

	it("formats completion triggers", () => {
		expect(formatTriggerRule({ event: "workflow_completion", pipelines: ["CI"] })).toBe(
			"workflow_completion [pipelines: CI]",
		);
		expect(formatTriggerRule({ event: "pull_request" })).toBe("pull_request");
	});
});

describe("pipeline selection", () => {
	const ci = makePipeline([template("build")], "CI");
	const nightly = makePipeline([template("build")], "Nightly");

	it("keeps every pipeline without names", () => {
		expect(selectPipelines([ci, nightly])).toEqual({ ok: true, pipelines: [ci, nightly] });
	});

	it("matches names and file ids", () => {
		expect(selectPipelines([ci, nightly], ["Nightly.yml"])).toEqual({ ok: true, pipelines: [nightly] });
	});

	it("rejects unknown names", () => {
		expect(selectPipelines([ci, nightly], ["CI", "deploy", "docs"])).toEqual({
			ok: false,
			error: "Unknown pipeline(s): deploy, docs",
		});
	});
});

describe("exit code", () => {
	const run = (status: PipelineRun["status"]): PipelineRun => ({
		id: status,
		pipeline: makePipeline([]),
		event: { kind: "push", ref: "refs/heads/main" },
		variables: {},
		jobs: [],
		status,
		createdAt: AT,
	});

	it("is 1 when any run failed", () => {
		expect(resolveExitCode([run("cancelled"), run("failure")], true)).toBe(1);
	});

	it("is 130 when interrupted or cancelled", () => {
		expect(resolveExitCode([run("success")], true)).toBe(130);
		expect(resolveExitCode([run("cancelled")], false)).toBe(130);
	});

	it("is 0 when everything succeeded or nothing ran", () => {
		expect(resolveExitCode([run("success")], false)).toBe(0);
		expect(resolveExitCode([], false)).toBe(0);
	});
});
