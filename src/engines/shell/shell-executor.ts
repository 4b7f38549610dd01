import fs from "node:fs";
import path from "node:path";
import { spawn } from "node:child_process";
import { interpolate } from "../../core/condition.js";
import type { JobExecution, JobExecutor, JobOutcome } from "../../core/engine.js";
import type { Artifact } from "../../core/types.js";
import { getJobDirName, type RunStore } from "../../store/run-store.js";
import { matchesAnyGlob } from "../../utils/glob.js";
import { ensureWithinBase, isWithin, toPosixRelative } from "../../utils/path-safety.js";

export type OutputListener = (
	chunk: string,
	source: "stdout" | "stderr",
	jobId: string,
	runId: string,
) => void;

export type ShellExecutorOptions = {
	workdir: string;
	store: RunStore;
	onOutput?: OutputListener;
};

const IGNORED_DIRS = new Set([".git", "node_modules", ".conveyor"]);
const GLOB_CHARS = /[*?[]/;

/**
 * Runs `run` steps through the system shell in the workspace, one after the
 * other, stopping at the first non-zero exit.
 */
export class ShellExecutor implements JobExecutor {
	readonly id = "shell";

	constructor(private readonly options: ShellExecutorOptions) {}

	async execute(execution: JobExecution): Promise<JobOutcome> {
		const { job, signal } = execution;
		const { workdir } = this.options;
		const before = stampFiles(collectArtifacts(workdir, execution.artifactPatterns, job.id));
		const logPath = this.options.store.logFilePath(execution.runId, job.id);
		const logStream = fs.createWriteStream(logPath, { flags: "a" });
		const write = (text: string, source: "stdout" | "stderr" = "stdout"): void => {
			logStream.write(text);
			this.options.onOutput?.(text, source, job.id, execution.runId);
		};

		try {
			for (const step of execution.steps) {
				if (signal.aborted) {
					return { status: "cancelled" };
				}
				if (!step.run) {
					write(`▸ ${step.name} (action steps are not executed locally)\n`);
					continue;
				}

				const command = interpolate(step.run, execution.bindings);
				write(`▾ ${step.name}\n$ ${command}\n`);
				const env = {
					...process.env,
					...execution.env,
					...interpolateEnv(step.env ?? {}, execution.bindings),
					...bindingsToEnv(execution.bindings),
				};
				const exitCode = await runCommand(command, workdir, env, signal, write);
				if (signal.aborted) {
					write(`✗ ${step.name} cancelled\n`, "stderr");
					return { status: "cancelled" };
				}
				if (exitCode !== 0) {
					write(`✗ ${step.name} exited with code ${exitCode}\n`, "stderr");
					return {
						status: "failed",
						exitCode,
						error: `Step "${step.name}" exited with code ${exitCode}`,
					};
				}
				write(`✓ ${step.name}\n`);
			}

			const produced = collectArtifacts(workdir, execution.artifactPatterns, job.id).filter(
				(artifact) => changedSince(before, artifact),
			);
			return {
				status: "succeeded",
				artifacts: execution.artifactDir
					? storeArtifacts(produced, execution.artifactDir, job.id)
					: produced,
			};
		} finally {
			await new Promise<void>((resolve) => logStream.end(resolve));
		}
	}
}

export function collectArtifacts(workdir: string, patterns: string[], jobId: string): Artifact[] {
	const artifacts: Artifact[] = [];
	const seen = new Set<string>();

	for (const pattern of patterns) {
		const baseDir = path.resolve(workdir, staticPrefix(pattern));
		if (!isWithin(workdir, baseDir) || !fs.existsSync(baseDir)) {
			continue;
		}
		for (const filePath of walkFiles(baseDir)) {
			const name = toPosixRelative(workdir, filePath);
			if (seen.has(name) || !matchesAnyGlob(name, [pattern])) {
				continue;
			}
			seen.add(name);
			artifacts.push({ name, path: filePath, size: fs.statSync(filePath).size, producedBy: jobId });
		}
	}

	return artifacts;
}

type FileStamp = {
	mtimeMs: number;
	size: number;
};

function stampFiles(artifacts: Artifact[]): Map<string, FileStamp> {
	return new Map(
		artifacts.map((artifact) => {
			const stat = fs.statSync(artifact.path);
			return [artifact.path, { mtimeMs: stat.mtimeMs, size: stat.size }];
		}),
	);
}

/** True for a file that is new, or was rewritten, since the stamps were taken. */
export function changedSince(before: Map<string, FileStamp>, artifact: Artifact): boolean {
	const stamp = before.get(artifact.path);
	if (!stamp) {
		return true;
	}
	const stat = fs.statSync(artifact.path);
	return stat.mtimeMs !== stamp.mtimeMs || stat.size !== stamp.size;
}

/** Copies artifacts to `<artifactDir>/<job>/<name>` and points them at the copies. */
export function storeArtifacts(artifacts: Artifact[], artifactDir: string, jobId: string): Artifact[] {
	if (artifacts.length === 0) {
		return [];
	}
	const jobDir = ensureWithinBase(artifactDir, getJobDirName(jobId), "job artifact directory");
	return artifacts.map((artifact) => {
		const target = ensureWithinBase(jobDir, artifact.name, "artifact name");
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.copyFileSync(artifact.path, target);
		return { ...artifact, path: target };
	});
}

export function bindingsToEnv(bindings: Record<string, string>): Record<string, string> {
	const env: Record<string, string> = {};
	for (const [key, value] of Object.entries(bindings)) {
		const name = key.startsWith("matrix.")
			? `MATRIX_${toEnvName(key.slice("matrix.".length))}`
			: `CONVEYOR_${toEnvName(key)}`;
		env[name] = value;
	}
	return env;
}

function interpolateEnv(
	env: Record<string, string>,
	bindings: Record<string, string>,
): Record<string, string> {
	return Object.fromEntries(
		Object.entries(env).map(([key, value]) => [key, interpolate(value, bindings)]),
	);
}

function toEnvName(value: string): string {
	return value.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

function staticPrefix(pattern: string): string {
	const segments = pattern.split("/");
	const fixed: string[] = [];
	// the last segment names files, never a directory to walk
	for (const segment of segments.slice(0, -1)) {
		if (GLOB_CHARS.test(segment)) {
			break;
		}
		fixed.push(segment);
	}
	return fixed.join("/");
}

function* walkFiles(dir: string): Generator<string> {
	const entries = fs.readdirSync(dir, { withFileTypes: true });
	entries.sort((a, b) => a.name.localeCompare(b.name));
	for (const entry of entries) {
		const fullPath = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			if (!IGNORED_DIRS.has(entry.name)) {
				yield* walkFiles(fullPath);
			}
		} else if (entry.isFile()) {
			yield fullPath;
		}
	}
}

function runCommand(
	command: string,
	cwd: string,
	env: NodeJS.ProcessEnv,
	signal: AbortSignal,
	write: (text: string, source?: "stdout" | "stderr") => void,
): Promise<number> {
	return new Promise((resolve) => {
		const child = spawn(command, { cwd, env, shell: true });
		const onAbort = (): void => {
			child.kill("SIGTERM");
		};
		signal.addEventListener("abort", onAbort, { once: true });

		child.stdout.on("data", (chunk: Buffer) => write(chunk.toString(), "stdout"));
		child.stderr.on("data", (chunk: Buffer) => write(chunk.toString(), "stderr"));

		child.on("error", (error: Error) => {
			signal.removeEventListener("abort", onAbort);
			write(`Failed to start command: ${error.message}\n`, "stderr");
			resolve(127);
		});

		child.on("close", (code: number | null) => {
			signal.removeEventListener("abort", onAbort);
			resolve(code ?? 1);
		});
	});
}
