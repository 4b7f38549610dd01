import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { RunnerEvent } from "../core/engine.js";
import type { RunRecord } from "../core/types.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 1;

export class RunStore {
	constructor(private readonly baseDir: string) {}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	createRunDir(runId: string): string {
		this.ensureBaseDir();
		const runDir = ensureWithinBase(this.baseDir, runId, "run id");
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const logsDir = path.join(this.createRunDir(runId), "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	createArtifactsDir(runId: string): string {
		const artifactsDir = path.join(this.createRunDir(runId), "artifacts");
		fs.mkdirSync(artifactsDir, { recursive: true });
		return artifactsDir;
	}

	logFilePath(runId: string, jobId: string): string {
		const logsDir = this.createLogsDir(runId);
		return ensureWithinBase(logsDir, getJobLogFileName(jobId), "job log file");
	}

	writeRun(run: RunRecord): void {
		const recordPath = path.join(this.createRunDir(run.id), "run.json");
		fs.writeFileSync(recordPath, JSON.stringify(run, null, 2));
	}
}

/** Filesystem-safe name for a job; distinct job ids never share one. */
export function getJobDirName(jobId: string): string {
	const normalized = sanitizePathSegment(jobId.toLowerCase(), "job");
	const hash = crypto.createHash("sha1").update(jobId).digest("hex").slice(0, 8);
	return `${normalized}-${hash}`;
}

export function getJobLogFileName(jobId: string): string {
	return `${getJobDirName(jobId)}.log`;
}

/**
 * Keeps `run.json` in step with runner events. Each persister follows a
 * single run; events for other runs are ignored.
 */
export function createRunEventPersister(runStore: RunStore): (event: RunnerEvent) => void {
	let run: RunRecord | null = null;

	return (event) => {
		if (event.type === "run-started") {
			run = {
				schemaVersion: RUN_RECORD_SCHEMA_VERSION,
				id: event.runId,
				pipeline: event.pipeline,
				event: event.event,
				variables: event.variables,
				status: "running",
				createdAt: event.createdAt,
				jobs: event.jobs.map((job) => ({
					jobId: job.jobId,
					templateId: job.templateId,
					status: "pending",
					matrix: job.matrix,
				})),
				artifactDir: event.artifactDir,
				logDir: event.logDir,
			};
			runStore.writeRun(run);
			return;
		}
		if (!run || run.id !== event.runId) {
			return;
		}

		switch (event.type) {
			case "job-transition": {
				const job = run.jobs.find((item) => item.jobId === event.jobId);
				if (!job) {
					return;
				}
				job.status = event.status;
				if (event.status === "running") {
					job.startedAt = event.at;
				}
				if (event.reason) {
					job.statusReason = event.reason;
				}
				break;
			}
			case "job-finished": {
				const job = run.jobs.find((item) => item.jobId === event.jobId);
				if (!job) {
					return;
				}
				job.status = event.status;
				job.cancelRequested = event.cancelRequested || undefined;
				job.exitCode = event.exitCode;
				job.error = event.error;
				job.artifacts = event.artifacts;
				job.release = event.release;
				job.startedAt = event.startedAt;
				job.finishedAt = event.finishedAt;
				job.durationMs = event.durationMs;
				break;
			}
			case "cancel-requested":
				for (const jobId of event.jobIds) {
					const job = run.jobs.find((item) => item.jobId === jobId);
					if (job) {
						job.cancelRequested = true;
					}
				}
				break;
			case "run-finished":
				run.status = event.status;
				run.finishedAt = event.finishedAt;
				break;
		}
		runStore.writeRun(run);
	};
}
