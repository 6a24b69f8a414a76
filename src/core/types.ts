export type EventKind = "push" | "pull_request" | "tag_push";

export type RefKind = "branch" | "tag";

export type RunContext = Readonly<{
	event: EventKind;
	ref: string;
	refName: string;
	refKind: RefKind;
	actor: string;
	baseRef?: string;
	sha?: string;
}>;

export type TriggerClause = {
	event: "push" | "pull_request";
	branches?: string[];
	branchesIgnore?: string[];
	tags?: string[];
	tagsIgnore?: string[];
};

export type PipelineSpec = {
	name: string;
	path?: string;
	triggers: TriggerClause[];
	env: Record<string, string>;
	stages: StageSpec[];
};

export type MatrixValue = string | number | boolean;

export type MatrixAssignment = Record<string, MatrixValue>;

export type MatrixSpec = {
	axes: Record<string, MatrixValue[]>;
	include: MatrixAssignment[];
	exclude: MatrixAssignment[];
};

export type StepSpec = {
	id: string;
	name: string;
	uses: string;
	with: Record<string, string>;
	if?: string;
	env: Record<string, string>;
};

export type ArtifactRequest = {
	stage: string;
	name: string;
	matrix?: MatrixAssignment;
};

export type StageSpec = {
	id: string;
	name: string;
	needs: string[];
	if?: string;
	matrix?: MatrixSpec;
	failFast: boolean;
	maxParallel?: number;
	timeoutMs?: number;
	steps: StepSpec[];
	produces: string[];
	consumes: ArtifactRequest[];
	env: Record<string, string>;
};

export type JobInstance = {
	id: string;
	stage: string;
	stageIndex: number;
	index: number;
	matrix: MatrixAssignment;
	qualifier: string;
	steps: StepSpec[];
};

export type JobStatus =
	| "pending"
	| "ready"
	| "running"
	| "succeeded"
	| "failed"
	| "cancelled"
	| "skipped";

export type TerminalJobStatus = Extract<JobStatus, "succeeded" | "failed" | "cancelled" | "skipped">;

export type SkipReason = "gate-closed" | "dependency-failed";

export type CancelReason = "fail-fast" | "run-aborted";

export type FailureKind = "step-failed" | "timeout" | "missing-artifact";

export type FailureCause = {
	kind: FailureKind;
	message: string;
	exitCode?: number;
};

export type StepRecord = {
	id: string;
	name: string;
	uses: string;
	status: "succeeded" | "failed" | "skipped" | "cancelled";
	exitCode?: number;
	logs: string[];
};

export type ArtifactManifestEntry = {
	stage: string;
	jobId: string;
	qualifier: string;
	name: string;
	key: string;
	size: number;
	sha256: string;
};

export type JobResult = {
	jobId: string;
	stage: string;
	matrix: MatrixAssignment;
	status: TerminalJobStatus;
	cause?: FailureCause;
	skipReason?: SkipReason;
	cancelReason?: CancelReason;
	detail?: string;
	steps: StepRecord[];
	artifacts: ArtifactManifestEntry[];
};

export type StageStatus = "succeeded" | "failed" | "cancelled" | "skipped";

export type StageReport = {
	stage: string;
	name: string;
	status: StageStatus;
	skipReason?: SkipReason;
	failFastTriggered: boolean;
	jobIds: string[];
};

export type RunStatus = "succeeded" | "failed";

export type RunResult = {
	status: RunStatus;
	stages: StageReport[];
	jobs: JobResult[];
	manifest: ArtifactManifestEntry[];
};

export type RunReport = {
	runId: string;
	pipeline: string;
	context: RunContext;
	triggered: boolean;
	result?: RunResult;
};

export type JobRun = {
	jobId: string;
	stage: string;
	status: JobStatus;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
	exitCode?: number;
	matrix: MatrixAssignment;
	reason?: string;
};

export type RunRecord = {
	schemaVersion: number;
	id: string;
	pipeline: string;
	context: RunContext;
	status: "running" | RunStatus;
	createdAt: string;
	finishedAt?: string;
	jobs: JobRun[];
	artifactDir?: string;
	logDir?: string;
};
