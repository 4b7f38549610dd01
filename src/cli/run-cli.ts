import path from "node:path";
import process from "node:process";
import { cancel, intro, isCancel, outro, select, text } from "@clack/prompts";
import { render } from "ink";
import React from "react";
import { loadConfig } from "../config/load-config.js";
import type { ConveyorConfig } from "../config/schema.js";
import { discoverPipelines } from "../core/discovery.js";
import { PipelineDispatcher } from "../core/dispatcher.js";
import type { JobExecutor, RunnerEvent } from "../core/engine.js";
import { errorMessage } from "../core/errors.js";
import { JobGraphRunner } from "../core/runner.js";
import { EVENT_KINDS, type Pipeline, type PipelineRun } from "../core/types.js";
import { createExecutor } from "../engines/factory.js";
import type { OutputListener } from "../engines/shell/shell-executor.js";
import { LocalReleaseEndpoint } from "../release/local-endpoint.js";
import { ReleasePublisher } from "../release/publisher.js";
import { createRunEventPersister, RunStore } from "../store/run-store.js";
import { RunBoard } from "../tui/run-board.js";
import { RunView } from "../tui/run-view.js";
import type { CliOptions } from "./args.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";
import { buildEvent, describeEvent, type EventInput } from "./events.js";
import { runInit } from "./init.js";
import { formatPipelineList } from "./list.js";
import { buildJsonSummary, createProgressReporter } from "./output.js";

const RUNS_DIR = path.join(".conveyor", "runs");

export async function runCli(): Promise<void> {
	const args = parseArgs(process.argv.slice(2));
	if (args.help) {
		printHelp();
		return;
	}
	if (args.version) {
		const version = readPackageVersion();
		process.stdout.write(`conveyor ${version}\n`);
		return;
	}
	if (args.errors?.length) {
		process.stderr.write(`${args.errors.join("\n")}\n`);
		process.stderr.write("Run `conveyor --help` for usage.\n");
		process.exitCode = 2;
		return;
	}
	if (args.unknown?.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `conveyor --help` for usage.\n");
		process.exitCode = 2;
		return;
	}

	const repoRoot = process.cwd();
	if (args.command === "init") {
		runInit(repoRoot);
		return;
	}

	let config: ConveyorConfig;
	try {
		config = loadConfig(repoRoot).config;
	} catch (error) {
		process.stderr.write(`Config error: ${errorMessage(error, "Unknown config error.")}\n`);
		process.exitCode = 1;
		return;
	}

	let pipelines: Pipeline[] = [];
	try {
		pipelines = discoverPipelines(repoRoot, config.pipelinesDir);
	} catch (error) {
		process.stderr.write(
			`Pipeline parse error: ${errorMessage(error, "Unknown pipeline parse error.")}\n`,
		);
		process.exitCode = 1;
		return;
	}
	if (pipelines.length === 0) {
		process.stderr.write(`No pipelines found in ${config.pipelinesDir}.\n`);
		process.exitCode = 1;
		return;
	}

	const selected = selectPipelines(pipelines, args.pipelines);
	if (!selected.ok) {
		process.stderr.write(`${selected.error}\n`);
		process.exitCode = 2;
		return;
	}

	if (args.command === "list") {
		process.stdout.write(formatPipelineList(selected.pipelines, repoRoot));
		return;
	}

	const exitCode = await runPipelines(repoRoot, config, selected.pipelines, args);
	process.exitCode = exitCode;
}

async function runPipelines(
	repoRoot: string,
	config: ConveyorConfig,
	pipelines: Pipeline[],
	args: CliOptions,
): Promise<number> {
	const interactive = Boolean(process.stdout.isTTY) && !args.json;
	if (interactive) {
		intro("conveyor");
	}

	const input = interactive ? await promptEventInput(args) : args;
	if (!input) {
		return 130;
	}
	const built = buildEvent(input);
	if (!built.ok) {
		process.stderr.write(`${built.error}\n`);
		return 2;
	}
	const event = built.event;

	const runStore = new RunStore(path.join(repoRoot, RUNS_DIR));
	const board = interactive ? new RunBoard() : null;
	const onOutput: OutputListener | undefined = board
		? (chunk, _source, jobId, runId) => board.applyOutput(runId, jobId, chunk)
		: undefined;
	const display: (event: RunnerEvent) => void = board
		? (runnerEvent) => board.applyEvent(runnerEvent)
		: args.json
			? () => {}
			: createProgressReporter((line) => process.stdout.write(line));

	const executorId = args.dryRun ? "noop" : (args.executor ?? config.executor);
	let executor: JobExecutor;
	try {
		executor = createExecutor(executorId, { workdir: repoRoot, store: runStore, onOutput });
	} catch (error) {
		process.stderr.write(`${errorMessage(error)}\n`);
		return 2;
	}

	const publisher = new ReleasePublisher({
		endpoint: new LocalReleaseEndpoint(path.resolve(repoRoot, config.release.directory)),
		onExisting: config.release.onExisting,
	});
	const concurrency = args.concurrency ?? config.concurrency;

	const dispatcher = new PipelineDispatcher({
		pipelines,
		vars: config.vars,
		chain: !args.noChain,
		startRun: (run, signal) => {
			const persist = createRunEventPersister(runStore);
			const runner = new JobGraphRunner({
				executor,
				publisher,
				concurrency,
				env: config.env,
				signal,
				logDir: runStore.createLogsDir(run.id),
				artifactDir: runStore.createArtifactsDir(run.id),
				onEvent: (runnerEvent) => {
					persist(runnerEvent);
					display(runnerEvent);
				},
			});
			return runner.run(run);
		},
		onSuperseded: (previous, next) => {
			if (!interactive && !args.json) {
				process.stdout.write(
					`[${previous.pipeline.name}] run ${previous.id} superseded by ${next.id}\n`,
				);
			}
		},
	});

	const controller = new AbortController();
	const onInterrupt = (): void => controller.abort();
	process.once("SIGINT", onInterrupt);

	let runs: PipelineRun[];
	try {
		if (board) {
			const { waitUntilExit } = render(React.createElement(RunView, { board }));
			try {
				runs = await dispatcher.dispatch(event, controller.signal);
			} finally {
				board.close();
				await waitUntilExit();
			}
		} else {
			runs = await dispatcher.dispatch(event, controller.signal);
		}
	} catch (error) {
		process.stderr.write(`Run failed: ${errorMessage(error)}\n`);
		return 1;
	} finally {
		process.off("SIGINT", onInterrupt);
	}

	if (args.json) {
		const summary = buildJsonSummary(runs, (runId) => ({
			logsDir: path.join(repoRoot, RUNS_DIR, runId, "logs"),
			artifactsDir: path.join(repoRoot, RUNS_DIR, runId, "artifacts"),
		}));
		process.stdout.write(`${JSON.stringify(summary)}\n`);
	} else if (runs.length === 0) {
		process.stdout.write(`No pipeline is triggered by ${describeEvent(event)}.\n`);
	}

	const exitCode = resolveExitCode(runs, controller.signal.aborted);
	if (interactive) {
		outro(runs.length > 0 ? `Logs: ${path.join(repoRoot, RUNS_DIR)}` : "Nothing to run.");
	}
	return exitCode;
}

export function resolveExitCode(runs: PipelineRun[], interrupted: boolean): number {
	if (runs.some((run) => run.status === "failure")) {
		return 1;
	}
	if (interrupted || runs.some((run) => run.status === "cancelled")) {
		return 130;
	}
	return 0;
}

export function selectPipelines(
	pipelines: Pipeline[],
	names?: string[],
): { ok: true; pipelines: Pipeline[] } | { ok: false; error: string } {
	if (!names?.length) {
		return { ok: true, pipelines };
	}
	const matches = (pipeline: Pipeline, name: string): boolean =>
		pipeline.name === name || pipeline.id === name;
	const unknown = names.filter((name) => !pipelines.some((pipeline) => matches(pipeline, name)));
	if (unknown.length > 0) {
		return { ok: false, error: `Unknown pipeline(s): ${unknown.join(", ")}` };
	}
	return {
		ok: true,
		pipelines: pipelines.filter((pipeline) => names.some((name) => matches(pipeline, name))),
	};
}

async function promptEventInput(args: CliOptions): Promise<EventInput | null> {
	const input: EventInput = { ...args };
	if (!input.event) {
		const selection = await select({
			message: "Select an event",
			initialValue: "push",
			options: EVENT_KINDS.map((kind) => ({ value: kind, label: kind })),
		});
		if (isCancel(selection)) {
			cancel("Canceled.");
			return null;
		}
		input.event = EVENT_KINDS.find((kind) => kind === selection) ?? "push";
	}

	if ((input.event === "push" || input.event === "tag") && !input.ref) {
		const ref = await text({
			message: input.event === "tag" ? "Tag" : "Branch or ref",
			placeholder: input.event === "tag" ? "v1.0.0" : "main",
		});
		if (isCancel(ref)) {
			cancel("Canceled.");
			return null;
		}
		input.ref = ref;
	}

	if (input.event === "workflow_completion" && !input.source) {
		const source = await text({ message: "Upstream pipeline name" });
		if (isCancel(source)) {
			cancel("Canceled.");
			return null;
		}
		input.source = source;
	}

	return input;
}
