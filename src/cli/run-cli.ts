import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { intro, outro } from "@clack/prompts";
import { render } from "ink";
import React from "react";
import { ZodError } from "zod";
import { loadConfig } from "../config/load-config.js";
import type { StagerunConfig } from "../config/schema.js";
import type { ArtifactStore } from "../core/artifacts.js";
import { createRunId, planPipeline, runPipeline } from "../core/controller.js";
import { findPipelineFiles } from "../core/discovery.js";
import type { EngineRuntimeEvent, ExecutorRegistry, OutputListener } from "../core/engine.js";
import { errorMessage, SpecificationError } from "../core/errors.js";
import type { RunGraph } from "../core/graph.js";
import { parsePipelineFile } from "../core/parser.js";
import type { PipelineSpec, RunReport } from "../core/types.js";
import { createExecutorRegistry } from "../executors/factory.js";
import { FileArtifactStore, InMemoryArtifactStore } from "../store/artifact-store.js";
import { createJobLogWriter, createRunEventPersister, RunStore } from "../store/run-store.js";
import { type RunHandlers, RunView } from "../tui/run-view/run-view.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { type CliOptions, parseArgs, printHelp, readPackageVersion } from "./args.js";
import { runInit } from "./init.js";
import { collectEventInput, completeEventInput, missingEventFields } from "./inputs.js";
import {
	buildJsonSummary,
	createPrefixedOutput,
	describeEvent,
	formatPlan,
	formatRunSummary,
} from "./output.js";
import { promptEventInput, selectPipeline } from "./select.js";

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_USAGE = 2;
const EXIT_CANCELLED = 130;

export type CliEnvironment = {
	cwd?: string;
	interactive?: boolean;
	/** Overrides the built-in executors, mainly for tests. */
	executors?: ExecutorRegistry;
};

/** Runs one CLI invocation and resolves to its exit code. */
export async function runCli(
	argv: string[] = process.argv.slice(2),
	environment: CliEnvironment = {},
): Promise<number> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return EXIT_OK;
	}
	if (args.version) {
		process.stdout.write(`stagerun ${readPackageVersion()}\n`);
		return EXIT_OK;
	}
	if (args.unknown.length > 0 || args.errors.length > 0) {
		for (const error of args.errors) {
			process.stderr.write(`${error}\n`);
		}
		if (args.unknown.length > 0) {
			process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		}
		process.stderr.write("Run `stagerun --help` for usage.\n");
		return EXIT_USAGE;
	}

	const repoRoot = environment.cwd ?? process.cwd();
	let config: StagerunConfig;
	let configPath: string | undefined;
	try {
		({ config, path: configPath } = loadConfig(repoRoot));
	} catch (error) {
		process.stderr.write(`Invalid .stagerun.yml: ${formatConfigError(error)}\n`);
		return EXIT_USAGE;
	}

	const interactive =
		(environment.interactive ?? Boolean(process.stdout.isTTY && process.stdin.isTTY)) && !args.json;
	const logger = createLogger({ level: config.logLevel });
	logger.debug(configPath ? `Loaded config ${configPath}` : "No .stagerun.yml; using defaults");

	if (args.command === "init") {
		runInit(repoRoot, config.pipelinesDir, logger);
		return EXIT_OK;
	}

	const pipelinePath = await resolvePipelinePath(repoRoot, config, args, interactive);
	if (!pipelinePath.ok) {
		if (pipelinePath.error) {
			process.stderr.write(`${pipelinePath.error}\n`);
		}
		return pipelinePath.exitCode;
	}

	logger.debug(`Using pipeline ${path.relative(repoRoot, pipelinePath.path)}`);
	const executors = environment.executors ?? createExecutorRegistry({ shell: config.shell });

	let pipeline: PipelineSpec;
	let graph: RunGraph;
	try {
		pipeline = parsePipelineFile(pipelinePath.path);
		graph = planPipeline(pipeline, executors);
	} catch (error) {
		return reportSpecificationError(error, pipelinePath.path);
	}

	if (args.command === "validate") {
		if (args.json) {
			writeJson({ valid: true, pipeline: pipeline.name, stages: graph.stages.length, jobs: graph.jobs.length });
		} else {
			logger.info(
				`${path.relative(repoRoot, pipelinePath.path)} is valid: ${graph.stages.length} stage(s), ${graph.jobs.length} job(s)`,
			);
		}
		return EXIT_OK;
	}

	if (args.command === "plan") {
		if (args.json) {
			writeJson({
				pipeline: pipeline.name,
				stages: graph.order.map((index) => {
					const stage = graph.stages[index];
					return {
						stage: stage.spec.id,
						needs: stage.spec.needs,
						if: stage.spec.if,
						jobs: stage.jobs.map((jobIndex) => graph.jobs[jobIndex].id),
					};
				}),
			});
		} else {
			for (const line of formatPlan(graph)) {
				process.stdout.write(`${line}\n`);
			}
		}
		return EXIT_OK;
	}

	return executeRun({ repoRoot, config, args, interactive, logger, pipeline, graph, executors });
}

type ExecuteRunInput = {
	repoRoot: string;
	config: StagerunConfig;
	args: CliOptions;
	interactive: boolean;
	logger: Logger;
	pipeline: PipelineSpec;
	graph: RunGraph;
	executors: ExecutorRegistry;
};

async function executeRun({
	repoRoot,
	config,
	args,
	interactive,
	logger,
	pipeline,
	graph,
	executors,
}: ExecuteRunInput): Promise<number> {
	const collected = collectEventInput(args);
	if (!collected.ok) {
		process.stderr.write(`${collected.error}\n`);
		return EXIT_USAGE;
	}

	let partial = collected.input;
	if (interactive && missingEventFields(partial).length > 0) {
		intro("stagerun");
		const prompted = await promptEventInput(partial);
		if (!prompted) {
			return EXIT_CANCELLED;
		}
		partial = prompted;
	}

	const event = completeEventInput(partial, config.actor);
	if (!event) {
		process.stderr.write(
			`Missing ${missingEventFields(partial).join(" and ")}; pass them as flags or via --event-path.\n`,
		);
		return EXIT_USAGE;
	}

	const runId = createRunId();
	const runStore = new RunStore(path.resolve(repoRoot, config.store.dir));
	const artifactsDir = runStore.resolveRunPath(runId, "artifacts");
	const logsDir = runStore.resolveRunPath(runId, "logs");
	const store: ArtifactStore =
		config.store.artifacts === "filesystem"
			? new FileArtifactStore(artifactsDir)
			: new InMemoryArtifactStore();
	const persist = createRunEventPersister(runStore);
	const jobLogs = createJobLogWriter(runStore, runId, logger);
	const controller = new AbortController();
	const onSignal = (): void => controller.abort("run-aborted");
	process.once("SIGINT", onSignal);
	logger.debug(`Run ${runId} records to ${runStore.resolveRunPath(runId)}`);

	const start = (handlers: {
		onEvent?: (event: EngineRuntimeEvent) => void;
		onOutput?: OutputListener;
	}): Promise<RunReport> =>
		runPipeline(pipeline, event, {
			executors,
			store,
			runId,
			concurrency: args.concurrency ?? config.concurrency,
			jobTimeoutMs: args.timeoutMs ?? config.jobTimeoutMs,
			workdir: repoRoot,
			env: config.env,
			signal: controller.signal,
			artifactDir: config.store.artifacts === "filesystem" ? artifactsDir : undefined,
			logDir: logsDir,
			onEvent: (runtimeEvent) => {
				persist(runtimeEvent);
				handlers.onEvent?.(runtimeEvent);
			},
			onOutput: (chunk, source, jobId) => {
				jobLogs.onOutput(chunk, source, jobId);
				handlers.onOutput?.(chunk, source, jobId);
			},
		});

	let report: RunReport;
	try {
		report = interactive
			? await runWithInk(graph, pipeline.name, start, () => controller.abort("run-aborted"))
			: await runPlain(start, logger, Boolean(args.json));
	} catch (error) {
		return reportSpecificationError(error, pipeline.path ?? pipeline.name);
	} finally {
		process.removeListener("SIGINT", onSignal);
		await jobLogs.close();
	}

	const triggered = report.triggered;
	const runDir = triggered ? runStore.resolveRunPath(runId) : undefined;
	if (triggered) {
		runStore.writeReport(report);
	}

	if (args.json) {
		writeJson(
			buildJsonSummary(report, {
				runDir,
				logsDir: triggered && fs.existsSync(logsDir) ? logsDir : undefined,
				artifactsDir: triggered && fs.existsSync(artifactsDir) ? artifactsDir : undefined,
			}),
		);
	} else {
		for (const line of formatRunSummary(report)) {
			process.stdout.write(`${line}\n`);
		}
		if (runDir) {
			const relative = path.relative(repoRoot, runDir);
			if (interactive) {
				outro(`Run record: ${relative}`);
			} else {
				logger.info(`Run record: ${relative}`);
			}
		}
	}

	if (!report.result) {
		return EXIT_OK;
	}
	return report.result.status === "succeeded" ? EXIT_OK : EXIT_RUN_FAILED;
}

async function runPlain(
	start: (handlers: Partial<RunHandlers>) => Promise<RunReport>,
	logger: Logger,
	json: boolean,
): Promise<RunReport> {
	if (json) {
		return start({});
	}
	const output = createPrefixedOutput((line, source) => {
		if (source === "stderr") {
			process.stderr.write(`${line}\n`);
		} else {
			process.stdout.write(`${line}\n`);
		}
	});
	try {
		return await start({
			onEvent: (event) => {
				if (event.type === "job-finished") {
					output.flush();
				}
				const line = describeEvent(event);
				if (!line) {
					return;
				}
				if (event.type === "job-finished" && event.status === "failed") {
					logger.error(line);
				} else if (event.type === "stage-gated" || event.type === "jobs-cancelled") {
					logger.warn(line);
				} else {
					logger.info(line);
				}
			},
			onOutput: output.push,
		});
	} finally {
		output.flush();
	}
}

function runWithInk(
	graph: RunGraph,
	title: string,
	start: (handlers: RunHandlers) => Promise<RunReport>,
	onAbort: () => void,
): Promise<RunReport> {
	return new Promise((resolve, reject) => {
		let report: RunReport | undefined;
		let failure: unknown;

		const { waitUntilExit } = render(
			React.createElement(RunView, {
				graph,
				title,
				start,
				onAbort,
				onComplete: (result: RunReport) => {
					report = result;
				},
				onError: (error: unknown) => {
					failure = error;
				},
			}),
		);

		waitUntilExit().then(
			() => {
				if (report) {
					resolve(report);
				} else {
					reject(failure ?? new Error("Run view closed before the run finished"));
				}
			},
			(error: unknown) => reject(error),
		);
	});
}

type PipelinePathResult =
	| { ok: true; path: string }
	| { ok: false; exitCode: number; error?: string };

async function resolvePipelinePath(
	repoRoot: string,
	config: StagerunConfig,
	args: CliOptions,
	interactive: boolean,
): Promise<PipelinePathResult> {
	const files = findPipelineFiles(repoRoot, config.pipelinesDir);

	if (args.pipeline) {
		const direct = path.resolve(repoRoot, args.pipeline);
		if (fs.existsSync(direct) && fs.statSync(direct).isFile()) {
			return { ok: true, path: direct };
		}
		const byName = files.find((file) => {
			const base = path.basename(file);
			return base === args.pipeline || base.replace(/\.ya?ml$/, "") === args.pipeline;
		});
		if (byName) {
			return { ok: true, path: byName };
		}
		return { ok: false, exitCode: EXIT_USAGE, error: `Pipeline not found: ${args.pipeline}` };
	}

	if (files.length === 1 && files[0]) {
		return { ok: true, path: files[0] };
	}
	if (files.length === 0) {
		return {
			ok: false,
			exitCode: EXIT_USAGE,
			error: `No pipelines found in ${config.pipelinesDir}. Run \`stagerun init\` or pass --pipeline.`,
		};
	}
	if (!interactive) {
		return {
			ok: false,
			exitCode: EXIT_USAGE,
			error: `Several pipelines found in ${config.pipelinesDir}; choose one with --pipeline.`,
		};
	}

	intro("stagerun");
	const selected = await selectPipeline(files, repoRoot);
	return selected ? { ok: true, path: selected } : { ok: false, exitCode: EXIT_CANCELLED };
}

function reportSpecificationError(error: unknown, source: string): number {
	if (error instanceof SpecificationError) {
		process.stderr.write(`${source}: invalid pipeline\n`);
		for (const issue of error.issues) {
			process.stderr.write(`  [${issue.code}] ${issue.message}\n`);
		}
		return EXIT_USAGE;
	}
	throw error;
}

function formatConfigError(error: unknown): string {
	if (error instanceof ZodError) {
		return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
	}
	return errorMessage(error);
}

function writeJson(value: unknown): void {
	process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}
