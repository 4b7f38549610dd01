const REGEXP_SPECIAL = /[.+^${}()|[\]\\]/g;

const compiled = new Map<string, RegExp>();

/**
 * Glob matching for refs and artifact paths.
 *
 * `*` and `?` stop at `/`, `**` crosses it, `**\/` also matches zero
 * directories, and `[...]` / `[!...]` are character classes.
 */
export function matchesGlob(text: string, pattern: string): boolean {
	return globToRegExp(pattern).test(text);
}

export function matchesAnyGlob(text: string, patterns: string[]): boolean {
	return patterns.some((pattern) => matchesGlob(text, pattern));
}

export function globToRegExp(pattern: string): RegExp {
	const cached = compiled.get(pattern);
	if (cached) {
		return cached;
	}

	let source = "";
	for (let i = 0; i < pattern.length; i += 1) {
		const char = pattern[i];
		if (char === "*") {
			if (pattern[i + 1] === "*") {
				i += 1;
				if (pattern[i + 1] === "/") {
					i += 1;
					source += "(?:.*/)?";
				} else {
					source += ".*";
				}
			} else {
				source += "[^/]*";
			}
			continue;
		}
		if (char === "?") {
			source += "[^/]";
			continue;
		}
		if (char === "[") {
			const end = pattern.indexOf("]", i + 2);
			if (end !== -1) {
				const body = pattern.slice(i + 1, end).replace(/\\/g, "\\\\");
				source += body.startsWith("!") ? `[^${body.slice(1)}]` : `[${body}]`;
				i = end;
				continue;
			}
		}
		source += char.replace(REGEXP_SPECIAL, "\\$&");
	}

	const regex = new RegExp(`^${source}$`);
	compiled.set(pattern, regex);
	return regex;
}
