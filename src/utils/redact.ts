export type RedactRule = {
	flag: string;
	redactNext: boolean;
};

const DEFAULT_RULES: RedactRule[] = [
	{ flag: "--token", redactNext: true },
	{ flag: "--password", redactNext: true },
	{ flag: "--secret", redactNext: true },
];

const REDACTED = "<redacted>";

/**
 * Masks the value after each credential flag in a shell command line,
 * whether given as `--flag value` or `--flag=value`. Quoted values are
 * replaced whole.
 */
export function redactCommand(command: string, rules: RedactRule[] = DEFAULT_RULES): string {
	let redacted = command;
	for (const rule of rules) {
		const flag = rule.flag.replace(/[-/\\^$*+?.()|[\]{}]/g, "\\$&");
		const separator = rule.redactNext ? "(=|\\s+)" : "(=)";
		const pattern = new RegExp(`(^|\\s)${flag}${separator}("[^"]*"|'[^']*'|\\S+)`, "g");
		redacted = redacted.replace(
			pattern,
			(_match, lead: string, sep: string) => `${lead}${rule.flag}${sep}${REDACTED}`,
		);
	}
	return redacted;
}
