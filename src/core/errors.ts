export class PipelineDefinitionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "PipelineDefinitionError";
	}
}

export class ConditionSyntaxError extends Error {
	constructor(
		message: string,
		readonly source: string,
		readonly position: number,
	) {
		super(`${message} at position ${position} in "${source}"`);
		this.name = "ConditionSyntaxError";
	}
}

export class ReleaseTransportError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ReleaseTransportError";
	}
}

/** A release with the same name and tag appeared while this one was staged. */
export class ReleaseExistsError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ReleaseExistsError";
	}
}

export function errorMessage(error: unknown, fallback = "Unknown error."): string {
	return error instanceof Error ? error.message : fallback;
}
