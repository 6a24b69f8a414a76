import os from "node:os";
import {
	ArtifactStaging,
	type ArtifactStore,
	type ConsumedArtifact,
	createJobArtifacts,
	createManifestEntry,
	producerOf,
	type ProducerState,
	resolveConsumedArtifacts,
	sortManifest,
} from "./artifacts.js";
import type {
	EngineEventListener,
	EngineRuntimeEvent,
	ExecutorRegistry,
	JobContext,
	OutputListener,
	StepOutcome,
} from "./engine.js";
import {
	ConditionEvaluationError,
	errorMessage,
	JobTimeoutError,
	MissingArtifactError,
	StepExecutionFailure,
} from "./errors.js";
import {
	createScope,
	type DependencyStatus,
	evaluate,
	type ExpressionScope,
	interpolate,
	usesStatusFunction,
} from "./expression.js";
import type { GraphStage, RunGraph } from "./graph.js";
import { isTerminalStatus, transitionJob } from "./state-machine.js";
import type {
	ArtifactManifestEntry,
	CancelReason,
	FailureCause,
	JobInstance,
	JobResult,
	JobStatus,
	RunContext,
	RunResult,
	SkipReason,
	StageReport,
	StageStatus,
	StepRecord,
	StepSpec,
} from "./types.js";

export type SchedulerOptions = {
	context: RunContext;
	executors: ExecutorRegistry;
	store: ArtifactStore;
	runId?: string;
	concurrency?: number;
	jobTimeoutMs?: number;
	workdir?: string;
	env?: Record<string, string>;
	signal?: AbortSignal;
	disposeArtifacts?: boolean;
	onEvent?: EngineEventListener;
	onOutput?: OutputListener;
};

type JobOutcome =
	| { status: "succeeded"; staging: ArtifactStaging }
	| { status: "failed"; cause: FailureCause }
	| { status: "cancelled"; reason: CancelReason };

type JobState = {
	job: JobInstance;
	id: string;
	status: JobStatus;
	cause?: FailureCause;
	skipReason?: SkipReason;
	cancelReason?: CancelReason;
	detail?: string;
	steps: StepRecord[];
	artifacts: ArtifactManifestEntry[];
	controller?: AbortController;
	startedAt?: number;
	settled: boolean;
};

type StageState = {
	graph: GraphStage;
	resolved: boolean;
	skipReason?: SkipReason;
	failFastTriggered: boolean;
	running: number;
};

export function defaultConcurrency(): number {
	return Math.max(1, os.availableParallelism());
}

/**
 * Executes a validated run graph once. Job-level errors end up on the job
 * results; the returned promise only rejects on internal invariant
 * violations.
 */
export class Scheduler {
	private readonly jobs: JobState[];
	private readonly stages: StageState[];
	private readonly inFlight = new Map<string, Promise<void>>();
	private readonly runId: string;
	private readonly concurrency: number;
	private aborted = false;
	private started = false;

	constructor(
		private readonly graph: RunGraph,
		private readonly options: SchedulerOptions,
	) {
		this.jobs = graph.jobs.map((job) => ({
			job,
			id: job.id,
			status: "pending",
			steps: [],
			artifacts: [],
			settled: false,
		}));
		this.stages = graph.stages.map((stage) => ({
			graph: stage,
			resolved: false,
			failFastTriggered: false,
			running: 0,
		}));
		this.runId = options.runId ?? "local";
		this.concurrency = Math.max(1, options.concurrency ?? defaultConcurrency());
	}

	async run(): Promise<RunResult> {
		if (this.started) {
			throw new Error("Scheduler instances run once; create a new one per run");
		}
		this.started = true;

		const { signal } = this.options;
		const onAbort = (): void => this.abortRun();
		signal?.addEventListener("abort", onAbort, { once: true });
		if (signal?.aborted) {
			this.abortRun();
		}

		try {
			for (;;) {
				this.resolveStages();
				this.startReadyJobs();
				if (this.inFlight.size === 0) {
					break;
				}
				await Promise.race(this.inFlight.values());
			}
		} finally {
			signal?.removeEventListener("abort", onAbort);
		}

		const stuck = this.jobs.filter((state) => !isTerminalStatus(state.status));
		if (stuck.length > 0) {
			throw new Error(
				`Scheduler stopped with unfinished jobs: ${stuck.map((state) => state.id).join(", ")}`,
			);
		}

		const result = this.buildResult();
		if (this.options.disposeArtifacts) {
			await this.disposeArtifacts();
		}
		return result;
	}

	// -------------------------------------------------------------------------
	// Stage resolution and gating
	// -------------------------------------------------------------------------

	private resolveStages(): void {
		let changed = true;
		while (changed) {
			changed = false;
			for (const stageIndex of this.graph.order) {
				const stage = this.stages[stageIndex];
				if (stage.resolved) {
					continue;
				}
				const upstream = stage.graph.needs.flatMap((need) => this.jobsOf(need));
				if (!upstream.every((state) => isTerminalStatus(state.status))) {
					continue;
				}
				stage.resolved = true;
				changed = true;
				if (!this.aborted) {
					this.gateStage(stage, upstream);
				}
			}
		}
	}

	private gateStage(stage: StageState, upstream: JobState[]): void {
		const condition = stage.graph.condition;
		const dependencies: DependencyStatus = {
			success: upstream.every((state) => state.status === "succeeded"),
			failure: upstream.some((state) => state.status === "failed"),
			cancelled: upstream.some((state) => state.status === "cancelled"),
		};

		if (!dependencies.success && !(condition && usesStatusFunction(condition))) {
			const reason = inheritedSkipReason(upstream);
			this.skipStage(
				stage,
				reason,
				reason === "dependency-failed"
					? "a prerequisite stage failed or was cancelled"
					: "a prerequisite stage was skipped",
			);
			return;
		}

		if (condition) {
			const source = stage.graph.spec.if ?? "";
			let open: boolean;
			let detail = `condition "${source}" evaluated to false`;
			try {
				open = evaluate(condition, createScope(this.options.context, {}, dependencies));
			} catch (error) {
				if (!(error instanceof ConditionEvaluationError)) {
					throw error;
				}
				open = false;
				detail = `condition "${source}" could not be evaluated: ${error.message}`;
			}
			if (!open) {
				this.skipStage(stage, "gate-closed", detail);
				return;
			}
		}

		for (const state of this.jobsOf(stage.graph.index)) {
			transitionJob(state, "ready");
		}
	}

	private skipStage(stage: StageState, reason: SkipReason, detail: string): void {
		stage.skipReason = reason;
		this.emit({
			type: "stage-gated",
			runId: this.runId,
			stage: stage.graph.spec.id,
			reason,
			detail,
		});
		for (const state of this.jobsOf(stage.graph.index)) {
			transitionJob(state, "skipped");
			state.skipReason = reason;
			state.detail = detail;
			this.emitFinished(state);
		}
	}

	// -------------------------------------------------------------------------
	// Job execution
	// -------------------------------------------------------------------------

	private startReadyJobs(): void {
		for (const state of this.jobs) {
			if (this.inFlight.size >= this.concurrency) {
				return;
			}
			if (state.status !== "ready") {
				continue;
			}
			const stage = this.stages[state.job.stageIndex];
			const maxParallel = stage.graph.spec.maxParallel;
			if (maxParallel !== undefined && stage.running >= maxParallel) {
				continue;
			}
			transitionJob(state, "running");
			stage.running += 1;
			const task = this.executeJob(state, stage).finally(() => {
				stage.running -= 1;
				this.inFlight.delete(state.id);
			});
			this.inFlight.set(state.id, task);
		}
	}

	private async executeJob(state: JobState, stage: StageState): Promise<void> {
		const controller = new AbortController();
		state.controller = controller;
		state.startedAt = Date.now();
		this.emit({
			type: "job-started",
			runId: this.runId,
			jobId: state.id,
			stage: state.job.stage,
			startedAt: new Date(state.startedAt).toISOString(),
		});

		const timeoutMs = stage.graph.spec.timeoutMs ?? this.options.jobTimeoutMs;
		const outcome = await this.withTimeout(
			this.runSteps(state, stage, controller.signal),
			timeoutMs,
			controller,
		);
		state.settled = true;
		await this.finishJob(state, stage, outcome);
	}

	private async withTimeout(
		work: Promise<JobOutcome>,
		timeoutMs: number | undefined,
		controller: AbortController,
	): Promise<JobOutcome> {
		if (timeoutMs === undefined) {
			return work;
		}
		let timer: NodeJS.Timeout | undefined;
		const expired = new Promise<JobOutcome>((resolve) => {
			timer = setTimeout(() => {
				const error = new JobTimeoutError(timeoutMs);
				controller.abort(error);
				resolve({ status: "failed", cause: { kind: "timeout", message: error.message } });
			}, timeoutMs);
		});
		try {
			return await Promise.race([work, expired]);
		} finally {
			clearTimeout(timer);
		}
	}

	private async runSteps(
		state: JobState,
		stage: StageState,
		signal: AbortSignal,
	): Promise<JobOutcome> {
		const spec = stage.graph.spec;
		const staging = new ArtifactStaging(state.id, spec.produces);

		let inputs: ConsumedArtifact[];
		try {
			inputs = await resolveConsumedArtifacts(
				spec.consumes,
				(stageId) => this.producersOf(stageId),
				this.options.store,
			);
		} catch (error) {
			const message =
				error instanceof MissingArtifactError
					? error.message
					: `Reading consumed artifacts failed: ${errorMessage(error)}`;
			return { status: "failed", cause: { kind: "missing-artifact", message } };
		}

		const scope = createScope(this.options.context, state.job.matrix);
		let env: Record<string, string>;
		try {
			env = interpolateRecord(
				{ ...this.options.env, ...this.graph.pipeline.env, ...spec.env },
				scope,
			);
		} catch (error) {
			return { status: "failed", cause: { kind: "step-failed", message: errorMessage(error) } };
		}

		const context: JobContext = {
			run: this.options.context,
			runId: this.runId,
			jobId: state.id,
			stage: state.job.stage,
			matrix: state.job.matrix,
			env,
			workdir: this.options.workdir ?? process.cwd(),
			artifacts: createJobArtifacts(inputs, staging),
			onOutput: this.options.onOutput
				? (chunk, source) => this.options.onOutput?.(chunk, source, state.id)
				: undefined,
		};

		for (const step of state.job.steps) {
			if (signal.aborted) {
				return abortedOutcome(signal);
			}

			if (step.if !== undefined && !stepConditionHolds(step.if, scope)) {
				this.recordStep(state, step, "skipped", []);
				continue;
			}

			let resolved: StepSpec;
			try {
				resolved = resolveStepTemplates(step, scope);
			} catch (error) {
				const message = errorMessage(error);
				this.recordStep(state, step, "failed", [message]);
				return { status: "failed", cause: { kind: "step-failed", message } };
			}

			const executor = this.options.executors.get(resolved.uses);
			if (!executor) {
				const message = `No executor registered for "${resolved.uses}"`;
				this.recordStep(state, resolved, "failed", [message]);
				return { status: "failed", cause: { kind: "step-failed", message } };
			}

			let outcome: StepOutcome;
			try {
				outcome = await executor.execute(resolved, context, signal);
			} catch (error) {
				if (signal.aborted) {
					this.recordStep(state, resolved, "cancelled", [errorMessage(error)]);
					return abortedOutcome(signal);
				}
				const message = `Step "${resolved.name}" failed: ${errorMessage(error)}`;
				this.recordStep(state, resolved, "failed", [message]);
				return { status: "failed", cause: { kind: "step-failed", message } };
			}

			if (outcome.cancelled) {
				this.recordStep(state, resolved, "cancelled", outcome.logs, outcome.exitCode);
				return abortedOutcome(signal);
			}
			if (outcome.exitCode !== 0) {
				this.recordStep(state, resolved, "failed", outcome.logs, outcome.exitCode);
				const failure = new StepExecutionFailure(resolved.name, outcome.exitCode);
				return {
					status: "failed",
					cause: { kind: "step-failed", message: failure.message, exitCode: failure.exitCode },
				};
			}
			this.recordStep(state, resolved, "succeeded", outcome.logs, outcome.exitCode);
		}

		const missing = staging.missing();
		if (missing.length > 0) {
			return {
				status: "failed",
				cause: {
					kind: "missing-artifact",
					message: `Job "${state.id}" did not produce declared artifact(s): ${missing.join(", ")}`,
				},
			};
		}
		return { status: "succeeded", staging };
	}

	private async finishJob(state: JobState, stage: StageState, outcome: JobOutcome): Promise<void> {
		switch (outcome.status) {
			case "succeeded": {
				try {
					state.artifacts = await this.commitArtifacts(state.job, outcome.staging);
					transitionJob(state, "succeeded");
				} catch (error) {
					outcome.staging.discard();
					state.artifacts = [];
					state.cause = {
						kind: "step-failed",
						message: `Publishing artifacts failed: ${errorMessage(error)}`,
					};
					transitionJob(state, "failed");
				}
				break;
			}
			case "failed":
				state.cause = outcome.cause;
				transitionJob(state, "failed");
				break;
			case "cancelled":
				state.cancelReason = outcome.reason;
				state.detail =
					outcome.reason === "fail-fast"
						? "cancelled after a sibling job failed"
						: "cancelled because the run was aborted";
				transitionJob(state, "cancelled");
				break;
		}

		this.emitFinished(state);
		if (state.status === "failed") {
			this.triggerFailFast(stage, state);
		}
	}

	private async commitArtifacts(
		job: JobInstance,
		staging: ArtifactStaging,
	): Promise<ArtifactManifestEntry[]> {
		const entries: ArtifactManifestEntry[] = [];
		for (const [name, data] of staging.entries()) {
			await this.options.store.put(producerOf(job), name, data);
			entries.push(createManifestEntry(job, name, data));
		}
		return entries;
	}

	private recordStep(
		state: JobState,
		step: StepSpec,
		status: StepRecord["status"],
		logs: string[],
		exitCode?: number,
	): void {
		if (state.settled) {
			return;
		}
		state.steps.push({
			id: step.id,
			name: step.name,
			uses: step.uses,
			status,
			exitCode,
			logs,
		});
	}

	// -------------------------------------------------------------------------
	// Cancellation
	// -------------------------------------------------------------------------

	private triggerFailFast(stage: StageState, failed: JobState): void {
		if (!stage.graph.spec.failFast) {
			return;
		}
		stage.failFastTriggered = true;
		const cancelled: string[] = [];
		for (const sibling of this.jobsOf(stage.graph.index)) {
			if (sibling === failed) {
				continue;
			}
			if (sibling.status === "pending" || sibling.status === "ready") {
				transitionJob(sibling, "cancelled");
				sibling.cancelReason = "fail-fast";
				sibling.detail = `not started because "${failed.id}" failed`;
				this.emitFinished(sibling);
				cancelled.push(sibling.id);
			} else if (sibling.status === "running" && !sibling.controller?.signal.aborted) {
				sibling.controller?.abort("fail-fast");
				cancelled.push(sibling.id);
			}
		}
		if (cancelled.length > 0) {
			this.emit({
				type: "jobs-cancelled",
				runId: this.runId,
				stage: stage.graph.spec.id,
				jobIds: cancelled,
				reason: "fail-fast",
			});
		}
	}

	private abortRun(): void {
		if (this.aborted) {
			return;
		}
		this.aborted = true;
		const cancelled: string[] = [];
		for (const state of this.jobs) {
			if (state.status === "pending" || state.status === "ready") {
				transitionJob(state, "cancelled");
				state.cancelReason = "run-aborted";
				state.detail = "not started because the run was aborted";
				this.emitFinished(state);
				cancelled.push(state.id);
			} else if (state.status === "running") {
				state.controller?.abort("run-aborted");
				cancelled.push(state.id);
			}
		}
		if (cancelled.length > 0) {
			this.emit({ type: "jobs-cancelled", runId: this.runId, jobIds: cancelled, reason: "run-aborted" });
		}
	}

	// -------------------------------------------------------------------------
	// Results
	// -------------------------------------------------------------------------

	private buildResult(): RunResult {
		const stages: StageReport[] = this.graph.order.map((stageIndex) => {
			const stage = this.stages[stageIndex];
			const jobs = this.jobsOf(stageIndex);
			return {
				stage: stage.graph.spec.id,
				name: stage.graph.spec.name,
				status: stageStatus(stage, jobs),
				skipReason: stage.skipReason,
				failFastTriggered: stage.failFastTriggered,
				jobIds: jobs.map((state) => state.id),
			};
		});

		const jobs: JobResult[] = this.jobs.map((state) => {
			if (!isTerminalStatus(state.status)) {
				throw new Error(`Job "${state.id}" has no terminal status`);
			}
			return {
				jobId: state.id,
				stage: state.job.stage,
				matrix: state.job.matrix,
				status: state.status,
				cause: state.cause,
				skipReason: state.skipReason,
				cancelReason: state.cancelReason,
				detail: state.detail,
				steps: state.steps,
				artifacts: state.artifacts,
			};
		});

		const succeeded = stages.every(
			(stage) => stage.status === "succeeded" || stage.status === "skipped",
		);
		return {
			status: succeeded ? "succeeded" : "failed",
			stages,
			jobs,
			manifest: sortManifest(jobs.flatMap((job) => job.artifacts)),
		};
	}

	private async disposeArtifacts(): Promise<void> {
		for (const state of this.jobs) {
			if (state.artifacts.length > 0) {
				await this.options.store.dispose(producerOf(state.job));
			}
		}
	}

	private jobsOf(stageIndex: number): JobState[] {
		return (this.graph.stages[stageIndex]?.jobs ?? []).map((jobIndex) => this.jobs[jobIndex]);
	}

	private producersOf(stageId: string): ProducerState[] {
		const stage = this.graph.stages.find((item) => item.spec.id === stageId);
		if (!stage) {
			return [];
		}
		return this.jobsOf(stage.index).map((state) => ({ job: state.job, status: state.status }));
	}

	private emitFinished(state: JobState): void {
		if (!isTerminalStatus(state.status)) {
			return;
		}
		const finishedAt = Date.now();
		const lastStep = state.steps[state.steps.length - 1];
		this.emit({
			type: "job-finished",
			runId: this.runId,
			jobId: state.id,
			stage: state.job.stage,
			status: state.status,
			reason: state.cause?.message ?? state.detail,
			exitCode: state.cause?.exitCode ?? lastStep?.exitCode,
			startedAt: state.startedAt === undefined ? undefined : new Date(state.startedAt).toISOString(),
			finishedAt: new Date(finishedAt).toISOString(),
			durationMs: state.startedAt === undefined ? 0 : finishedAt - state.startedAt,
		});
	}

	private emit(event: EngineRuntimeEvent): void {
		this.options.onEvent?.(event);
	}
}

export function runGraph(graph: RunGraph, options: SchedulerOptions): Promise<RunResult> {
	return new Scheduler(graph, options).run();
}

function inheritedSkipReason(upstream: JobState[]): SkipReason {
	const failedUpstream = upstream.some(
		(state) =>
			state.status === "failed" ||
			state.status === "cancelled" ||
			state.skipReason === "dependency-failed",
	);
	return failedUpstream ? "dependency-failed" : "gate-closed";
}

function stageStatus(stage: StageState, jobs: JobState[]): StageStatus {
	if (jobs.every((state) => state.status === "skipped")) {
		return "skipped";
	}
	if (stage.failFastTriggered || jobs.some((state) => state.status === "failed")) {
		return "failed";
	}
	if (jobs.some((state) => state.status === "cancelled")) {
		return "cancelled";
	}
	return "succeeded";
}

function abortedOutcome(signal: AbortSignal): JobOutcome {
	const reason: unknown = signal.reason;
	if (reason instanceof JobTimeoutError) {
		return { status: "failed", cause: { kind: "timeout", message: reason.message } };
	}
	return { status: "cancelled", reason: reason === "fail-fast" ? "fail-fast" : "run-aborted" };
}

function stepConditionHolds(source: string, scope: ExpressionScope): boolean {
	try {
		return evaluate(source, scope);
	} catch (error) {
		if (error instanceof ConditionEvaluationError) {
			return false;
		}
		throw error;
	}
}

function resolveStepTemplates(step: StepSpec, scope: ExpressionScope): StepSpec {
	return {
		...step,
		name: interpolate(step.name, scope),
		with: interpolateRecord(step.with, scope),
		env: interpolateRecord(step.env, scope),
	};
}

function interpolateRecord(
	record: Record<string, string>,
	scope: ExpressionScope,
): Record<string, string> {
	return Object.fromEntries(
		Object.entries(record).map(([key, value]) => [key, interpolate(value, scope)]),
	);
}
