export function formatDuration(durationMs: number): string {
	if (durationMs < 1000) {
		return `${durationMs}ms`;
	}
	const seconds = durationMs / 1000;
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = Math.round(seconds % 60);
	return `${minutes}m${remainder}s`;
}

export function truncate(text: string, width: number): string {
	if (text.length <= width) {
		return text;
	}
	return width <= 1 ? text.slice(0, width) : `${text.slice(0, width - 1)}…`;
}
