export type SpecificationIssueCode =
	| "invalid-document"
	| "dangling-need"
	| "cycle"
	| "empty-matrix-axis"
	| "empty-matrix"
	| "unknown-matrix-axis"
	| "invalid-condition"
	| "unknown-executor"
	| "invalid-artifact-request";

export type SpecificationIssue = {
	code: SpecificationIssueCode;
	message: string;
	stage?: string;
};

/**
 * Raised when a pipeline document cannot be run as declared. Always thrown
 * before any job starts; carries every issue found, not only the first.
 */
export class SpecificationError extends Error {
	readonly issues: SpecificationIssue[];

	constructor(issues: SpecificationIssue[]) {
		super(formatIssues(issues));
		this.name = "SpecificationError";
		this.issues = issues;
	}
}

export class ConditionEvaluationError extends Error {
	constructor(
		message: string,
		readonly expression: string,
	) {
		super(message);
		this.name = "ConditionEvaluationError";
	}
}

export class MissingArtifactError extends Error {
	constructor(
		readonly stage: string,
		readonly artifact: string,
		message: string,
	) {
		super(message);
		this.name = "MissingArtifactError";
	}
}

export class JobTimeoutError extends Error {
	constructor(readonly timeoutMs: number) {
		super(`Job timed out after ${timeoutMs}ms`);
		this.name = "JobTimeoutError";
	}
}

export class StepExecutionFailure extends Error {
	constructor(
		readonly step: string,
		readonly exitCode: number,
	) {
		super(`Step "${step}" exited with code ${exitCode}`);
		this.name = "StepExecutionFailure";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function formatIssues(issues: SpecificationIssue[]): string {
	if (issues.length === 1) {
		return issues[0]?.message ?? "Invalid pipeline specification";
	}
	return [
		`Invalid pipeline specification (${issues.length} issues):`,
		...issues.map((issue) => `  - ${issue.message}`),
	].join("\n");
}
