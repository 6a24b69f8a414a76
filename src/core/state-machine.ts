import type { JobStatus, TerminalJobStatus } from "./types.js";

const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
	pending: ["ready", "skipped", "cancelled"],
	ready: ["running", "skipped", "cancelled"],
	running: ["succeeded", "failed", "cancelled"],
	succeeded: [],
	failed: [],
	cancelled: [],
	skipped: [],
};

export class InvalidTransitionError extends Error {
	constructor(
		readonly jobId: string,
		readonly from: JobStatus,
		readonly to: JobStatus,
	) {
		super(`Invalid job state transition for "${jobId}": ${from} -> ${to}`);
		this.name = "InvalidTransitionError";
	}
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
	return VALID_TRANSITIONS[from].includes(to);
}

/** The only way a job's status changes. */
export function transitionJob(job: { id: string; status: JobStatus }, to: JobStatus): void {
	if (!canTransition(job.status, to)) {
		throw new InvalidTransitionError(job.id, job.status, to);
	}
	job.status = to;
}

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
	return (
		status === "succeeded" || status === "failed" || status === "cancelled" || status === "skipped"
	);
}
