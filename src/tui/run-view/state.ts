import type { EngineRuntimeEvent } from "../../core/engine.js";
import type { RunGraph } from "../../core/graph.js";
import type { JobStatus, MatrixAssignment, RunStatus, SkipReason } from "../../core/types.js";

export const OUTPUT_TAIL_CHARS = 16_000;

export type ViewStatus = "pending" | "running" | RunStatus;

export type JobRow = {
	jobId: string;
	stage: string;
	matrix: MatrixAssignment;
	status: JobStatus;
	durationMs?: number;
	reason?: string;
};

export type StageRow = {
	stage: string;
	name: string;
	jobIds: string[];
	skipReason?: SkipReason;
};

export type RunViewState = {
	status: ViewStatus;
	runId?: string;
	stages: StageRow[];
	jobs: Record<string, JobRow>;
	output: Record<string, string>;
};

export function createRunViewState(graph: RunGraph): RunViewState {
	const stages = graph.order.map((index): StageRow => {
		const stage = graph.stages[index];
		return {
			stage: stage.spec.id,
			name: stage.spec.name,
			jobIds: stage.jobs.map((jobIndex) => graph.jobs[jobIndex].id),
		};
	});
	const jobs = Object.fromEntries(
		graph.jobs.map((job): [string, JobRow] => [
			job.id,
			{ jobId: job.id, stage: job.stage, matrix: job.matrix, status: "pending" },
		]),
	);
	return { status: "pending", stages, jobs, output: {} };
}

export function applyRunEvent(state: RunViewState, event: EngineRuntimeEvent): RunViewState {
	switch (event.type) {
		case "run-started":
			return { ...state, status: "running", runId: event.runId };
		case "run-skipped":
			return { ...state, status: "succeeded", runId: event.runId };
		case "stage-gated":
			return {
				...state,
				stages: state.stages.map((stage) =>
					stage.stage === event.stage ? { ...stage, skipReason: event.reason } : stage,
				),
			};
		case "job-started":
			return updateJob(state, event.jobId, { status: "running" });
		case "job-finished":
			return updateJob(state, event.jobId, {
				status: event.status,
				durationMs: event.durationMs,
				reason: event.reason,
			});
		case "jobs-cancelled":
			return state;
		case "run-finished":
			return { ...state, status: event.status };
	}
}

export function appendJobOutput(state: RunViewState, jobId: string, chunk: string): RunViewState {
	const next = `${state.output[jobId] ?? ""}${chunk}`;
	return {
		...state,
		output: {
			...state.output,
			[jobId]: next.length > OUTPUT_TAIL_CHARS ? next.slice(-OUTPUT_TAIL_CHARS) : next,
		},
	};
}

export function tailLines(text: string, count: number): string[] {
	const lines = text.replace(/\r/g, "").split("\n");
	if (lines[lines.length - 1] === "") {
		lines.pop();
	}
	return lines.slice(-count);
}

export function orderedJobIds(state: RunViewState): string[] {
	return state.stages.flatMap((stage) => stage.jobIds);
}

function updateJob(state: RunViewState, jobId: string, patch: Partial<JobRow>): RunViewState {
	const job = state.jobs[jobId];
	if (!job) {
		return state;
	}
	return { ...state, jobs: { ...state.jobs, [jobId]: { ...job, ...patch } } };
}
