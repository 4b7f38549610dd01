import { describe, expect, it } from "vitest";
import {
	expandMatrix,
	expandTemplate,
	formatInstanceId,
	matrixVariables,
	maxParallelFor,
} from "../src/core/matrix.js";
import type { JobTemplate, MatrixSpec } from "../src/core/types.js";

function spec(overrides: Partial<MatrixSpec> = {}): MatrixSpec {
	return {
		axes: [
			{ name: "os", values: ["ubuntu-latest", "windows-latest"] },
			{ name: "python", values: ["3.10", "3.11", "3.12"] },
		],
		include: [],
		exclude: [],
		failFast: true,
		...overrides,
	};
}

function template(matrix?: MatrixSpec): JobTemplate {
	return { id: "test", name: "Test", needs: [], steps: [], artifacts: [], matrix };
}

describe("matrix expansion", () => {
	it("orders the cartesian product with the first axis slowest", () => {
		const ids = expandTemplate(template(spec())).map((job) => job.id);

		expect(ids).toEqual([
			"test (ubuntu-latest, 3.10)",
			"test (ubuntu-latest, 3.11)",
			"test (ubuntu-latest, 3.12)",
			"test (windows-latest, 3.10)",
			"test (windows-latest, 3.11)",
			"test (windows-latest, 3.12)",
		]);
	});

	it("creates pending instances carrying their bindings", () => {
		const [first] = expandTemplate(template(spec()));

		expect(first).toEqual({
			id: "test (ubuntu-latest, 3.10)",
			templateId: "test",
			name: "Test (ubuntu-latest, 3.10)",
			matrix: { os: "ubuntu-latest", python: "3.10" },
			status: "pending",
			artifacts: [],
			cancelRequested: false,
		});
	});

	it("yields one unbound instance without a matrix", () => {
		const jobs = expandTemplate(template());
		expect(jobs).toHaveLength(1);
		expect(jobs[0]?.id).toBe("test");
		expect(jobs[0]?.matrix).toBeNull();
	});

	it("yields nothing when an axis is empty", () => {
		expect(expandMatrix(spec({ axes: [{ name: "os", values: [] }, { name: "node", values: [20] }] }))).toEqual([]);
	});

	it("drops duplicate axis values", () => {
		expect(expandMatrix(spec({ axes: [{ name: "node", values: [20, 20, 22] }] }))).toEqual([
			{ node: 20 },
			{ node: 22 },
		]);
	});

	it("applies exclude and include entries", () => {
		const combinations = expandMatrix(
			spec({
				exclude: [{ os: "windows-latest", python: "3.10" }, { python: "3.12" }],
				include: [
					{ os: "macos-latest", python: "3.12" },
					{ os: "ubuntu-latest", python: "3.10" },
				],
			}),
		);

		expect(combinations).toEqual([
			{ os: "ubuntu-latest", python: "3.10" },
			{ os: "ubuntu-latest", python: "3.11" },
			{ os: "windows-latest", python: "3.11" },
			{ os: "macos-latest", python: "3.12" },
		]);
	});

	it("keeps instance ids distinct when combinations print the same values", () => {
		const jobs = expandTemplate(
			template(
				spec({
					axes: [{ name: "node", values: [1, "1"] }],
					include: [{ version: 1 }],
				}),
			),
		);

		expect(jobs.map((job) => job.id)).toEqual(["test (1)", "test (1) #2", "test (1) #3"]);
		expect(jobs.map((job) => job.matrix)).toEqual([{ node: 1 }, { node: "1" }, { version: 1 }]);
		expect(new Set(jobs.map((job) => job.id)).size).toBe(jobs.length);
	});

	it("defaults max parallel to unbounded", () => {
		expect(maxParallelFor(template(spec()))).toBe(Number.POSITIVE_INFINITY);
		expect(maxParallelFor(template(spec({ maxParallel: 2 })))).toBe(2);
	});

	it("exposes bindings as matrix variables", () => {
		expect(matrixVariables({ os: "ubuntu-latest", node: 20 })).toEqual({
			"matrix.os": "ubuntu-latest",
			"matrix.node": "20",
		});
		expect(formatInstanceId("build", null)).toBe("build");
	});
});
