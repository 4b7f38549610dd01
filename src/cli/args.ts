import fs from "node:fs";
import { z } from "zod";
import { EVENT_KINDS, type EventKind, type RunConclusion } from "../core/types.js";

export type CliCommand = "run" | "list" | "init";

export type CliOptions = {
	command: CliCommand;
	event?: EventKind;
	ref?: string;
	base?: string;
	source?: string;
	conclusion?: RunConclusion;
	branch?: string;
	pipelines?: string[];
	concurrency?: number;
	executor?: string;
	dryRun?: boolean;
	noChain?: boolean;
	json?: boolean;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

const COMMANDS: readonly CliCommand[] = ["run", "list", "init"];
const CONCLUSIONS: readonly RunConclusion[] = ["success", "failure", "cancelled"];

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = COMMANDS.find((item) => item === args[0]);
		if (command) {
			options.command = command;
		} else {
			options.errors?.push(`Unknown command: ${args[0]}`);
		}
		args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--event":
				{
					const value = takeValue("--event", args, options);
					if (value) {
						const kind = EVENT_KINDS.find((item) => item === value);
						if (kind) {
							options.event = kind;
						} else {
							options.errors?.push(
								`Invalid value for --event: ${value} (expected ${EVENT_KINDS.join("|")})`,
							);
						}
					}
				}
				break;
			case "--ref":
				options.ref = takeValue("--ref", args, options);
				break;
			case "--base":
				options.base = takeValue("--base", args, options);
				break;
			case "--source":
				options.source = takeValue("--source", args, options);
				break;
			case "--conclusion":
				{
					const value = takeValue("--conclusion", args, options);
					if (value) {
						const conclusion = CONCLUSIONS.find((item) => item === value);
						if (conclusion) {
							options.conclusion = conclusion;
						} else {
							options.errors?.push(
								`Invalid value for --conclusion: ${value} (expected ${CONCLUSIONS.join("|")})`,
							);
						}
					}
				}
				break;
			case "--branch":
				options.branch = takeValue("--branch", args, options);
				break;
			case "--pipeline":
				{
					const value = takeValue("--pipeline", args, options);
					if (value) {
						options.pipelines = [
							...(options.pipelines ?? []),
							...value.split(",").filter(Boolean),
						];
					}
				}
				break;
			case "--concurrency":
				{
					const value = takeValue("--concurrency", args, options);
					if (value) {
						const parsed = Number(value);
						if (Number.isInteger(parsed) && parsed > 0) {
							options.concurrency = parsed;
						} else {
							options.errors?.push(
								`Invalid value for --concurrency: ${value} (expected a positive integer)`,
							);
						}
					}
				}
				break;
			case "--executor":
				options.executor = takeValue("--executor", args, options);
				break;
			case "--dry-run":
				options.dryRun = true;
				break;
			case "--no-chain":
				options.noChain = true;
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg) {
					options.unknown?.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`conveyor <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                    Dispatch an event and run triggered pipelines (default)\n`);
	process.stdout.write(`  list                   List pipelines, triggers and jobs\n`);
	process.stdout.write(`  init                   Add .conveyor/runs and releases to .gitignore\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(
		`  --event <kind>         Event kind (push, pull_request, tag, workflow_completion)\n`,
	);
	process.stdout.write(`  --ref <ref>            Git ref, e.g. refs/heads/main or refs/tags/v1.0.0\n`);
	process.stdout.write(`  --base <branch>        Base branch for pull_request events\n`);
	process.stdout.write(`  --source <pipeline>    Upstream pipeline for workflow_completion\n`);
	process.stdout.write(`  --conclusion <c>       Upstream conclusion: success|failure|cancelled\n`);
	process.stdout.write(`  --branch <branch>      Upstream branch for workflow_completion\n`);
	process.stdout.write(`  --pipeline <names>     Only consider these pipelines (comma-separated)\n`);
	process.stdout.write(`  --concurrency <n>      Maximum jobs running at once\n`);
	process.stdout.write(`  --executor <id>        Job executor: shell|noop\n`);
	process.stdout.write(`  --dry-run              Run with the noop executor\n`);
	process.stdout.write(`  --no-chain             Do not trigger downstream pipelines\n`);
	process.stdout.write(`  --json                 Print JSON summary\n`);
	process.stdout.write(`  -h, --help             Show help\n`);
	process.stdout.write(`  -v, --version          Show version\n`);
}

const PackageSchema = z.object({ version: z.string().optional() });

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed = PackageSchema.safeParse(JSON.parse(raw));
	return parsed.success ? (parsed.data.version ?? "0.0.0") : "0.0.0";
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
