const REGEX_SPECIALS = /[\\^$.|+(){}[\]]/;

/**
 * Anchored glob: `*` spans any run of characters except `/`, `**` spans
 * anything, `?` is one non-separator character.
 */
export function globToRegExp(pattern: string): RegExp {
	let source = "";
	for (let i = 0; i < pattern.length; i += 1) {
		const char = pattern[i];
		if (char === "*") {
			if (pattern[i + 1] === "*") {
				source += ".*";
				i += 1;
			} else {
				source += "[^/]*";
			}
			continue;
		}
		if (char === "?") {
			source += "[^/]";
			continue;
		}
		source += REGEX_SPECIALS.test(char) ? `\\${char}` : char;
	}
	return new RegExp(`^${source}$`);
}

export function matchesGlob(value: string, pattern: string): boolean {
	return globToRegExp(pattern).test(value);
}

// Later entries win, so `["release/*", "!release/old"]` keeps release/new only.
export function matchesPatternList(value: string, patterns: string[]): boolean {
	let matched = false;
	for (const pattern of patterns) {
		if (pattern.startsWith("!")) {
			if (matched && matchesGlob(value, pattern.slice(1))) {
				matched = false;
			}
			continue;
		}
		if (!matched && matchesGlob(value, pattern)) {
			matched = true;
		}
	}
	return matched;
}
