import os from "node:os";
import { describe, expect, it } from "vitest";
import { createExecutor, listRegisteredExecutors } from "../src/engines/factory.js";
import { RunStore } from "../src/store/run-store.js";

const setup = { workdir: os.tmpdir(), store: new RunStore(os.tmpdir()) };

describe("executor factory", () => {
	it("lists registered executors", () => {
		expect(listRegisteredExecutors()).toEqual(["shell", "noop"]);
	});

	it("resolves ids case-insensitively", () => {
		expect(createExecutor(" Noop ", setup).id).toBe("noop");
		expect(createExecutor("shell", setup).id).toBe("shell");
	});

	it("rejects unknown executors and inherited keys", () => {
		expect(() => createExecutor("docker", setup)).toThrow(
			'Unsupported executor "docker". Available executors: shell, noop',
		);
		expect(() => createExecutor("toString", setup)).toThrow('Unsupported executor "toString"');
	});

	it("cancels a dry-run job whose signal is already aborted", async () => {
		const controller = new AbortController();
		controller.abort();
		const executor = createExecutor("noop", setup);

		const outcome = await executor.execute({
			runId: "run-1",
			job: {
				id: "build",
				templateId: "build",
				name: "build",
				matrix: null,
				status: "running",
				artifacts: [],
				cancelRequested: false,
			},
			steps: [],
			bindings: {},
			env: {},
			artifactPatterns: [],
			signal: controller.signal,
		});

		expect(outcome).toEqual({ status: "cancelled" });
	});
});
