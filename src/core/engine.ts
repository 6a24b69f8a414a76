import type { JobArtifacts } from "./artifacts.js";
import type {
	CancelReason,
	MatrixAssignment,
	RunContext,
	RunStatus,
	SkipReason,
	StepSpec,
	TerminalJobStatus,
} from "./types.js";

export type OutputSource = "stdout" | "stderr";

export type StepOutcome = {
	exitCode: number;
	logs: string[];
	cancelled?: boolean;
};

export type JobContext = {
	run: RunContext;
	runId: string;
	jobId: string;
	stage: string;
	matrix: MatrixAssignment;
	env: Record<string, string>;
	workdir: string;
	artifacts: JobArtifacts;
	onOutput?: (chunk: string, source: OutputSource) => void;
};

/**
 * Runs one step of one job. Implementations must watch `signal` and return
 * (or throw) promptly once it aborts; a result returned after the abort is
 * still recorded.
 */
export interface StepExecutor {
	readonly id: string;
	execute(step: StepSpec, context: JobContext, signal: AbortSignal): Promise<StepOutcome>;
}

export type EngineRuntimeEvent =
	| {
			type: "run-started";
			runId: string;
			pipeline: string;
			context: RunContext;
			jobs: { jobId: string; stage: string; matrix: MatrixAssignment }[];
			artifactDir?: string;
			logDir?: string;
			createdAt: string;
	  }
	| {
			type: "run-skipped";
			runId: string;
			pipeline: string;
			context: RunContext;
	  }
	| {
			type: "stage-gated";
			runId: string;
			stage: string;
			reason: SkipReason;
			detail: string;
	  }
	| {
			type: "job-started";
			runId: string;
			jobId: string;
			stage: string;
			startedAt: string;
	  }
	| {
			type: "job-finished";
			runId: string;
			jobId: string;
			stage: string;
			status: TerminalJobStatus;
			reason?: string;
			exitCode?: number;
			startedAt?: string;
			finishedAt: string;
			durationMs: number;
	  }
	| {
			type: "jobs-cancelled";
			runId: string;
			stage?: string;
			jobIds: string[];
			reason: CancelReason;
	  }
	| {
			type: "run-finished";
			runId: string;
			status: RunStatus;
			finishedAt: string;
	  };

export type EngineEventListener = (event: EngineRuntimeEvent) => void;

export type OutputListener = (chunk: string, source: OutputSource, jobId: string) => void;

export interface ExecutorRegistry {
	get(id: string): StepExecutor | undefined;
	has(id: string): boolean;
	ids(): string[];
}
