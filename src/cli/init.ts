import fs from "node:fs";
import path from "node:path";

const IGNORE_ENTRIES = [".conveyor/runs", ".conveyor/releases"];

export type GitignoreResult = "added" | "present" | "skipped";

export function ensureGitignore(repoRoot: string): GitignoreResult {
	const gitDir = path.join(repoRoot, ".git");
	if (!fs.existsSync(gitDir)) {
		return "skipped";
	}

	const ignorePath = path.join(repoRoot, ".gitignore");
	const hasIgnoreFile = fs.existsSync(ignorePath);
	const current = hasIgnoreFile ? fs.readFileSync(ignorePath, "utf-8") : "";
	const present = new Set(current.split(/\r?\n/).map(normalizeIgnoreLine));
	const missing = IGNORE_ENTRIES.filter((entry) => !present.has(entry));

	if (missing.length === 0) {
		return "present";
	}

	fs.writeFileSync(ignorePath, buildUpdatedIgnore(current, missing));
	return "added";
}

export function runInit(repoRoot: string): void {
	const result = ensureGitignore(repoRoot);
	if (result === "added") {
		process.stdout.write(`Added ${IGNORE_ENTRIES.join(" and ")} to .gitignore.\n`);
		return;
	}
	if (result === "present") {
		process.stdout.write(".gitignore already ignores conveyor runs and releases.\n");
		return;
	}
	process.stdout.write("Skipped: not a git repository.\n");
}

function normalizeIgnoreLine(line: string): string {
	const trimmed = line.trim();
	if (!trimmed) {
		return "";
	}
	return trimmed.replace(/^\/+/, "").replace(/\/+$/, "");
}

function buildUpdatedIgnore(current: string, entries: string[]): string {
	const block = entries.map((entry) => `${entry}\n`).join("");
	if (current.trim().length === 0) {
		return block;
	}
	const prefix = current.endsWith("\n") ? current : `${current}\n`;
	return `${prefix}${block}`;
}
