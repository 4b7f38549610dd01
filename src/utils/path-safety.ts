import path from "node:path";

export function ensureWithinBase(baseDir: string, childPath: string, label: string): string {
	const base = path.resolve(baseDir);
	const resolved = path.resolve(base, childPath);
	if (!isWithin(base, resolved)) {
		throw new Error(`Invalid ${label}: path escapes base directory`);
	}
	return resolved;
}

export function isWithin(baseDir: string, candidate: string): boolean {
	const rel = path.relative(path.resolve(baseDir), path.resolve(candidate));
	return !rel.startsWith("..") && !path.isAbsolute(rel);
}

/** Path of `filePath` relative to `baseDir`, always with forward slashes. */
export function toPosixRelative(baseDir: string, filePath: string): string {
	return path.relative(baseDir, filePath).split(path.sep).join("/");
}

export function sanitizePathSegment(value: string, fallback: string): string {
	const normalized = value
		.trim()
		.replace(/[\\/]+/g, "-")
		.replace(/[^a-zA-Z0-9._-]+/g, "-")
		.replace(/^-+|-+$/g, "")
		.slice(0, 64);
	return normalized.length > 0 ? normalized : fallback;
}
