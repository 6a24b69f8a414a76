import fs from "node:fs";

export type CliCommand = "run" | "validate" | "plan" | "init";

const COMMANDS: readonly CliCommand[] = ["run", "validate", "plan", "init"];

export type CliOptions = {
	command: CliCommand;
	pipeline?: string;
	event?: string;
	ref?: string;
	baseRef?: string;
	actor?: string;
	sha?: string;
	eventPath?: string;
	concurrency?: number;
	timeoutMs?: number;
	json?: boolean;
	help?: boolean;
	version?: boolean;
	unknown: string[];
	errors: string[];
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args.shift() ?? "";
		if (isCommand(command)) {
			options.command = command;
		} else {
			options.errors.push(`Unknown command: ${command}`);
		}
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--pipeline":
				options.pipeline = takeValue("--pipeline", args, options);
				break;
			case "--event":
				options.event = takeValue("--event", args, options);
				break;
			case "--ref":
				options.ref = takeValue("--ref", args, options);
				break;
			case "--base-ref":
				options.baseRef = takeValue("--base-ref", args, options);
				break;
			case "--actor":
				options.actor = takeValue("--actor", args, options);
				break;
			case "--sha":
				options.sha = takeValue("--sha", args, options);
				break;
			case "--event-path":
				options.eventPath = takeValue("--event-path", args, options);
				break;
			case "--concurrency":
				options.concurrency = takePositiveInt("--concurrency", args, options);
				break;
			case "--timeout":
				options.timeoutMs = takePositiveInt("--timeout", args, options);
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg) {
					options.unknown.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`stagerun <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                   Run a pipeline for one event (default)\n`);
	process.stdout.write(`  validate              Check a pipeline without running it\n`);
	process.stdout.write(`  plan                  Print stage order and job instances\n`);
	process.stdout.write(`  init                  Write a starter pipeline and ignore .stagerun\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  --pipeline <file>     Pipeline file (path or name in the pipelines dir)\n`);
	process.stdout.write(`  --event <name>        Event kind: push, pull_request, tag_push\n`);
	process.stdout.write(`  --ref <ref>           Branch or tag (refs/heads/... or refs/tags/...)\n`);
	process.stdout.write(`  --base-ref <branch>   Pull request target branch\n`);
	process.stdout.write(`  --actor <name>        Who triggered the run\n`);
	process.stdout.write(`  --sha <sha>           Commit sha\n`);
	process.stdout.write(`  --event-path <file>   JSON event payload\n`);
	process.stdout.write(`  --concurrency <n>     Maximum jobs running at once\n`);
	process.stdout.write(`  --timeout <ms>        Per-job timeout\n`);
	process.stdout.write(`  --json                Print the run report as JSON\n`);
	process.stdout.write(`  -h, --help            Show help\n`);
	process.stdout.write(`  -v, --version         Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
		return parsed.version;
	}
	return "0.0.0";
}

function isCommand(value: string): value is CliCommand {
	return COMMANDS.some((command) => command === value);
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}

function takePositiveInt(flag: string, args: string[], options: CliOptions): number | undefined {
	const value = takeValue(flag, args, options);
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		options.errors.push(`Invalid value for ${flag}: ${value} (expected a positive integer)`);
		return undefined;
	}
	return parsed;
}
