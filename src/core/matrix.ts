import type { JobInstance, JobTemplate, MatrixBinding, MatrixSpec, MatrixValue } from "./types.js";

/**
 * One instance per matrix combination. Combinations that print the same
 * values (an include repeating an axis value under another key, `1` and
 * `"1"`) get a `#n` suffix so every instance id in a run is distinct.
 */
export function expandTemplate(template: JobTemplate): JobInstance[] {
	if (!template.matrix) {
		return [createInstance(template, null, template.id)];
	}
	const occurrences = new Map<string, number>();
	return expandMatrix(template.matrix).map((binding) => {
		const baseId = formatInstanceId(template.id, binding);
		const count = (occurrences.get(baseId) ?? 0) + 1;
		occurrences.set(baseId, count);
		return createInstance(template, binding, count === 1 ? baseId : `${baseId} #${count}`);
	});
}

/**
 * Cartesian product of the axes in declaration order, first axis varying
 * slowest. An empty axis produces no combinations.
 */
export function expandMatrix(spec: MatrixSpec): MatrixBinding[] {
	let combinations: MatrixBinding[] = spec.axes.length > 0 ? [{}] : [];
	for (const axis of spec.axes) {
		const values = uniqueValues(axis.values);
		const next: MatrixBinding[] = [];
		for (const combination of combinations) {
			for (const value of values) {
				next.push({ ...combination, [axis.name]: value });
			}
		}
		combinations = next;
	}

	const kept = combinations.filter(
		(combination) => !spec.exclude.some((rule) => bindingContains(combination, rule)),
	);
	for (const extra of spec.include) {
		if (!kept.some((combination) => bindingsEqual(combination, extra))) {
			kept.push({ ...extra });
		}
	}
	return kept;
}

export function formatInstanceId(templateId: string, binding: MatrixBinding | null): string {
	if (!binding) {
		return templateId;
	}
	return `${templateId} (${Object.values(binding).map(String).join(", ")})`;
}

export function maxParallelFor(template: JobTemplate): number {
	return template.matrix?.maxParallel ?? Number.POSITIVE_INFINITY;
}

export function matrixVariables(binding: MatrixBinding | null): Record<string, string> {
	const variables: Record<string, string> = {};
	for (const [key, value] of Object.entries(binding ?? {})) {
		variables[`matrix.${key}`] = String(value);
	}
	return variables;
}

function createInstance(
	template: JobTemplate,
	binding: MatrixBinding | null,
	id: string,
): JobInstance {
	const values = binding ? Object.values(binding).map(String).join(", ") : "";
	return {
		id,
		templateId: template.id,
		name: binding ? `${template.name} (${values})` : template.name,
		matrix: binding,
		status: "pending",
		artifacts: [],
		cancelRequested: false,
	};
}

function uniqueValues(values: MatrixValue[]): MatrixValue[] {
	const seen = new Set<string>();
	return values.filter((value) => {
		const key = `${typeof value}:${String(value)}`;
		if (seen.has(key)) {
			return false;
		}
		seen.add(key);
		return true;
	});
}

function bindingContains(binding: MatrixBinding, subset: MatrixBinding): boolean {
	return Object.entries(subset).every(([key, value]) => binding[key] === value);
}

function bindingsEqual(left: MatrixBinding, right: MatrixBinding): boolean {
	const leftKeys = Object.keys(left);
	return leftKeys.length === Object.keys(right).length && bindingContains(left, right);
}
