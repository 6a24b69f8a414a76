import { spawn } from "node:child_process";
import type { JobContext, OutputSource, StepExecutor, StepOutcome } from "../core/engine.js";
import type { StepSpec } from "../core/types.js";
import { redactCommand } from "../utils/redact.js";

export type ShellName = "bash" | "sh";

export type ShellExecutorOptions = {
	shell?: ShellName;
	killGraceMs?: number;
};

/**
 * Runs `with.command` through `bash -c` or `sh -c`. The job env is layered
 * over the process env, step env over both. On abort the child gets SIGTERM,
 * then SIGKILL after the grace period.
 */
export class ShellExecutor implements StepExecutor {
	readonly id = "shell";
	private readonly shell: ShellName;
	private readonly killGraceMs: number;

	constructor(options: ShellExecutorOptions = {}) {
		this.shell = options.shell ?? "bash";
		this.killGraceMs = options.killGraceMs ?? 2_000;
	}

	execute(step: StepSpec, context: JobContext, signal: AbortSignal): Promise<StepOutcome> {
		const command = step.with.command;
		if (command === undefined || command.trim().length === 0) {
			return Promise.reject(new Error(`Step "${step.name}" has no command to run`));
		}

		return new Promise((resolve, reject) => {
			const logs: string[] = [];
			const emit = createLineEmitter(logs, context.onOutput);
			emit(`$ ${redactCommand(command)}\n`, "stdout");
			emit.flush();

			if (signal.aborted) {
				resolve({ exitCode: 1, logs, cancelled: true });
				return;
			}

			const child = spawn(this.shell, ["-c", command], {
				cwd: context.workdir,
				env: {
					...process.env,
					...context.env,
					...step.env,
					STAGERUN: "true",
					STAGERUN_RUN_ID: context.runId,
					STAGERUN_JOB_ID: context.jobId,
					STAGERUN_STAGE: context.stage,
				},
				stdio: ["ignore", "pipe", "pipe"],
			});

			let killTimer: NodeJS.Timeout | undefined;
			const onAbort = (): void => {
				child.kill("SIGTERM");
				killTimer = setTimeout(() => child.kill("SIGKILL"), this.killGraceMs);
				killTimer.unref();
			};
			signal.addEventListener("abort", onAbort, { once: true });

			child.stdout.on("data", (chunk: Buffer) => emit(chunk.toString(), "stdout"));
			child.stderr.on("data", (chunk: Buffer) => emit(chunk.toString(), "stderr"));

			child.on("error", (error) => {
				signal.removeEventListener("abort", onAbort);
				clearTimeout(killTimer);
				reject(error);
			});

			child.on("close", (code: number | null) => {
				signal.removeEventListener("abort", onAbort);
				clearTimeout(killTimer);
				emit.flush();
				resolve({ exitCode: code ?? 1, logs, cancelled: signal.aborted });
			});
		});
	}
}

type LineEmitter = ((chunk: string, source: OutputSource) => void) & { flush: () => void };

function createLineEmitter(
	logs: string[],
	onOutput?: (chunk: string, source: OutputSource) => void,
): LineEmitter {
	const buffers: Record<OutputSource, string> = { stdout: "", stderr: "" };

	const emit = (chunk: string, source: OutputSource): void => {
		onOutput?.(chunk, source);
		const lines = (buffers[source] + chunk).split(/\r?\n/);
		buffers[source] = lines.pop() ?? "";
		logs.push(...lines);
	};

	return Object.assign(emit, {
		flush: (): void => {
			for (const source of ["stdout", "stderr"] as const) {
				if (buffers[source].length > 0) {
					logs.push(buffers[source]);
					buffers[source] = "";
				}
			}
		},
	});
}
