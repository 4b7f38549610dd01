import { z } from "zod";

export const ReleaseConfigSchema = z.object({
	directory: z.string().default(".conveyor/releases"),
	onExisting: z.enum(["fail", "update"]).default("fail"),
});

export const ConfigSchema = z.object({
	executor: z.string().default("shell"),
	concurrency: z.number().int().positive().optional(),
	env: z.record(z.string()).default({}),
	vars: z.record(z.string()).default({}),
	pipelinesDir: z.string().default(".conveyor/pipelines"),
	release: ReleaseConfigSchema.default({
		directory: ".conveyor/releases",
		onExisting: "fail",
	}),
});

export type ConveyorConfig = z.infer<typeof ConfigSchema>;
