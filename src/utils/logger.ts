export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (message: string, ...args: unknown[]) => void>;

export type LoggerOptions = {
	level?: LogLevel;
	prefix?: string;
	color?: boolean;
};

type LevelStyle = {
	rank: number;
	color: string;
	stream: "log" | "warn" | "error";
};

const LEVELS: Record<LogLevel, LevelStyle> = {
	debug: { rank: 0, color: "\x1b[90m", stream: "log" },
	info: { rank: 1, color: "\x1b[36m", stream: "log" },
	warn: { rank: 2, color: "\x1b[33m", stream: "warn" },
	error: { rank: 3, color: "\x1b[31m", stream: "error" },
};

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";

/**
 * Console logger for CLI progress lines: `HH:MM:SS.mmm <prefix> <message>`.
 * Colour defaults to on when stdout is a TTY.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const threshold = LEVELS[options.level ?? "info"].rank;
	const prefix = options.prefix ?? "stagerun";
	const color = options.color ?? Boolean(process.stdout.isTTY);
	const paint = (code: string, text: string): string => (color ? `${code}${text}${RESET}` : text);

	const at = (level: LogLevel) => {
		const style = LEVELS[level];
		return (message: string, ...args: unknown[]): void => {
			if (style.rank < threshold) {
				return;
			}
			const timestamp = new Date().toISOString().slice(11, 23);
			console[style.stream](`${paint(DIM, timestamp)} ${paint(style.color + BOLD, prefix)} ${message}`, ...args);
		};
	};

	return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}
