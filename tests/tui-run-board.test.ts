import { describe, expect, it } from "vitest";
import type { RunnerEvent } from "../src/core/engine.js";
import { formatDuration, truncate } from "../src/tui/format.js";
import { RunBoard } from "../src/tui/run-board.js";
import { colorForStatus, isTerminalStatus, renderStatusGlyph, STATUS_LABELS } from "../src/tui/status.js";

const AT = "2026-01-01T00:00:00.000Z";

const started: RunnerEvent = {
	type: "run-started",
	runId: "run-1",
	pipeline: "CI",
	event: { kind: "push", ref: "refs/heads/main" },
	variables: {},
	jobs: [
		{ jobId: "build", templateId: "build", matrix: null },
		{ jobId: "deploy", templateId: "deploy", matrix: null },
	],
	logDir: "/runs/run-1/logs",
	createdAt: AT,
};

describe("run board", () => {
	it("folds runner events into job rows", () => {
		const board = new RunBoard();
		board.applyEvent(started);
		board.applyEvent({ type: "job-transition", runId: "run-1", jobId: "build", status: "running", at: AT });
		board.applyEvent({ type: "cancel-requested", runId: "run-1", jobIds: ["build"], reason: "cancelled" });
		board.applyEvent({
			type: "job-finished",
			runId: "run-1",
			jobId: "build",
			status: "cancelled",
			cancelRequested: true,
			artifacts: [],
			finishedAt: AT,
			durationMs: 1200,
		});
		board.applyEvent({
			type: "job-transition",
			runId: "run-1",
			jobId: "deploy",
			status: "cancelled",
			reason: "pipeline run cancelled",
			at: AT,
		});
		board.applyEvent({ type: "run-finished", runId: "run-1", status: "cancelled", finishedAt: AT });

		expect(board.state.runs).toEqual([
			{
				runId: "run-1",
				pipeline: "CI",
				status: "cancelled",
				logDir: "/runs/run-1/logs",
				jobs: [
					{ jobId: "build", status: "cancelled", cancelRequested: true, durationMs: 1200 },
					{
						jobId: "deploy",
						status: "cancelled",
						cancelRequested: false,
						reason: "pipeline run cancelled",
					},
				],
			},
		]);
	});

	it("keeps the last output line of a job", () => {
		const board = new RunBoard();
		board.applyEvent(started);
		board.applyOutput("run-1", "build", "compiling\nlinking\n\n");
		board.applyOutput("run-1", "build", "   \n");

		expect(board.state.runs[0]?.jobs[0]?.lastLine).toBe("linking");
	});

	it("notifies subscribers only on change", () => {
		const board = new RunBoard();
		const seen: boolean[] = [];
		const unsubscribe = board.subscribe((state) => seen.push(state.closed));

		board.applyEvent({ type: "run-finished", runId: "unknown", status: "success", finishedAt: AT });
		board.close();
		unsubscribe();
		board.close();

		expect(seen).toEqual([true]);
	});
});

describe("status rendering", () => {
	it("labels waiting jobs", () => {
		expect(STATUS_LABELS.blocked).toBe("waiting");
		expect(STATUS_LABELS.ready).toBe("queued");
	});

	it("animates running jobs", () => {
		expect(renderStatusGlyph("running", 0)).toBe("⠋");
		expect(renderStatusGlyph("running", 11)).toBe("⠙");
		expect(renderStatusGlyph("succeeded", 3)).toBe("●");
	});

	it("separates terminal statuses", () => {
		expect(isTerminalStatus("skipped")).toBe(true);
		expect(isTerminalStatus("blocked")).toBe(false);
		expect(colorForStatus("failed")).toBe("red");
		expect(colorForStatus("pending")).toBeUndefined();
	});

	it("formats durations and truncates text", () => {
		expect(formatDuration(250)).toBe("250ms");
		expect(formatDuration(1500)).toBe("1.5s");
		expect(formatDuration(125000)).toBe("2m5s");
		expect(truncate("conveyor", 5)).toBe("conv…");
		expect(truncate("ci", 5)).toBe("ci");
	});
});
