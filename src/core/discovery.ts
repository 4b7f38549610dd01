import fs from "node:fs";
import path from "node:path";
import { parsePipeline } from "./parser.js";
import type { Pipeline } from "./types.js";

export const DEFAULT_PIPELINES_DIR = path.join(".conveyor", "pipelines");

export function findPipelineFiles(repoRoot: string, pipelinesDir = DEFAULT_PIPELINES_DIR): string[] {
	const dir = path.resolve(repoRoot, pipelinesDir);
	if (!fs.existsSync(dir)) {
		return [];
	}

	return fs
		.readdirSync(dir)
		.filter((file: string) => file.endsWith(".yml") || file.endsWith(".yaml"))
		.sort()
		.map((file: string) => path.join(dir, file));
}

export function discoverPipelines(repoRoot: string, pipelinesDir?: string): Pipeline[] {
	const pipelines = findPipelineFiles(repoRoot, pipelinesDir).map((pipelinePath) =>
		parsePipeline(pipelinePath),
	);
	const seen = new Set<string>();
	for (const pipeline of pipelines) {
		if (seen.has(pipeline.name)) {
			throw new Error(`Duplicate pipeline name "${pipeline.name}" (${pipeline.path})`);
		}
		seen.add(pipeline.name);
	}
	return pipelines;
}
