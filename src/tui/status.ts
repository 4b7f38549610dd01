import { TERMINAL_JOB_STATUSES, type JobStatus, type RunStatus } from "../core/types.js";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export type StatusColor = "green" | "red" | "yellow" | "gray" | "cyan" | undefined;

export const STATUS_LABELS: Record<JobStatus, string> = {
	pending: "pending",
	blocked: "waiting",
	ready: "queued",
	running: "running",
	succeeded: "succeeded",
	failed: "failed",
	cancelled: "cancelled",
	skipped: "skipped",
};

export function isTerminalStatus(status: JobStatus): boolean {
	return TERMINAL_JOB_STATUSES.includes(status);
}

export function renderStatusGlyph(status: JobStatus, spinnerIndex: number): string {
	switch (status) {
		case "succeeded":
			return "●";
		case "failed":
			return "✕";
		case "running":
			return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length] ?? "⠋";
		case "cancelled":
			return "◌";
		case "skipped":
			return "⊘";
		case "ready":
			return "◔";
		default:
			return "○";
	}
}

export function colorForStatus(status: JobStatus): StatusColor {
	switch (status) {
		case "succeeded":
			return "green";
		case "failed":
			return "red";
		case "running":
			return "yellow";
		case "ready":
			return "cyan";
		case "cancelled":
		case "skipped":
			return "gray";
		default:
			return undefined;
	}
}

export function colorForRunStatus(status: RunStatus): StatusColor {
	switch (status) {
		case "success":
			return "green";
		case "failure":
			return "red";
		case "cancelled":
			return "gray";
		case "running":
			return "yellow";
		default:
			return undefined;
	}
}
