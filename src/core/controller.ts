import crypto from "node:crypto";
import type { ArtifactStore } from "./artifacts.js";
import { createRunContext, type RunContextInput } from "./context.js";
import type { EngineEventListener, ExecutorRegistry, OutputListener } from "./engine.js";
import { buildRunGraph, type RunGraph } from "./graph.js";
import { runGraph } from "./scheduler.js";
import { shouldRun } from "./trigger.js";
import type { PipelineSpec, RunContext, RunReport } from "./types.js";

export type RunPipelineOptions = {
	executors: ExecutorRegistry;
	store: ArtifactStore;
	runId?: string;
	concurrency?: number;
	jobTimeoutMs?: number;
	workdir?: string;
	env?: Record<string, string>;
	signal?: AbortSignal;
	disposeArtifacts?: boolean;
	artifactDir?: string;
	logDir?: string;
	onEvent?: EngineEventListener;
	onOutput?: OutputListener;
};

/**
 * Validates the pipeline, decides whether the event triggers it and, if so,
 * runs it to completion. Throws only SpecificationError, and always before
 * the trigger is looked at.
 */
export async function runPipeline(
	pipeline: PipelineSpec,
	event: RunContextInput | RunContext,
	options: RunPipelineOptions,
): Promise<RunReport> {
	const graph = buildRunGraph(pipeline, {
		isKnownExecutor: (id) => options.executors.has(id),
	});
	const context = createRunContext(event);
	const runId = options.runId ?? createRunId();

	if (!shouldRun(pipeline, context)) {
		options.onEvent?.({ type: "run-skipped", runId, pipeline: pipeline.name, context });
		return { runId, pipeline: pipeline.name, context, triggered: false };
	}

	options.onEvent?.({
		type: "run-started",
		runId,
		pipeline: pipeline.name,
		context,
		jobs: graph.jobs.map((job) => ({ jobId: job.id, stage: job.stage, matrix: job.matrix })),
		artifactDir: options.artifactDir,
		logDir: options.logDir,
		createdAt: new Date().toISOString(),
	});

	const result = await runGraph(graph, { ...options, runId, context });

	options.onEvent?.({
		type: "run-finished",
		runId,
		status: result.status,
		finishedAt: new Date().toISOString(),
	});

	return { runId, pipeline: pipeline.name, context, triggered: true, result };
}

/**
 * Validation without running: returns the graph or throws
 * SpecificationError.
 */
export function planPipeline(pipeline: PipelineSpec, executors?: ExecutorRegistry): RunGraph {
	return buildRunGraph(pipeline, {
		isKnownExecutor: executors ? (id) => executors.has(id) : undefined,
	});
}

export function createRunId(now: Date = new Date()): string {
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}
