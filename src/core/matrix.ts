import { SpecificationError, type SpecificationIssue } from "./errors.js";
import type {
	JobInstance,
	MatrixAssignment,
	MatrixSpec,
	MatrixValue,
	StageSpec,
	StepSpec,
} from "./types.js";

const MATRIX_PLACEHOLDER = /\$\{\{\s*matrix\.([A-Za-z0-9_-]+)\s*\}\}/g;

export function checkMatrix(stage: StageSpec): SpecificationIssue[] {
	if (!stage.matrix) {
		return [];
	}
	const issues: SpecificationIssue[] = [];
	for (const [axis, values] of Object.entries(stage.matrix.axes)) {
		if (values.length === 0) {
			issues.push({
				code: "empty-matrix-axis",
				stage: stage.id,
				message: `Stage "${stage.id}" declares matrix axis "${axis}" with no values`,
			});
		}
	}
	if (issues.length === 0 && expandMatrix(stage.matrix).length === 0) {
		issues.push({
			code: "empty-matrix",
			stage: stage.id,
			message: `Stage "${stage.id}" matrix expands to no combinations`,
		});
	}
	return issues;
}

/**
 * Cartesian product of the axes (first axis varies slowest), minus
 * `exclude` entries, then `include` entries: an include whose axis values
 * match existing combinations extends them with its extra keys, otherwise
 * it is appended as a combination of its own.
 */
export function expandMatrix(matrix: MatrixSpec): MatrixAssignment[] {
	const axisNames = Object.keys(matrix.axes);
	let combos: MatrixAssignment[] = axisNames.length > 0 ? [{}] : [];
	for (const axis of axisNames) {
		const next: MatrixAssignment[] = [];
		for (const combo of combos) {
			for (const value of matrix.axes[axis] ?? []) {
				next.push({ ...combo, [axis]: value });
			}
		}
		combos = next;
	}

	combos = combos.filter(
		(combo) => !matrix.exclude.some((entry) => assignmentMatches(combo, entry)),
	);

	const base = new Set(combos);
	const axisSet = new Set(axisNames);
	for (const entry of matrix.include) {
		const axisPart = pickKeys(entry, (key) => axisSet.has(key));
		const extraPart = pickKeys(entry, (key) => !axisSet.has(key));
		const targets = combos.filter((combo) => base.has(combo) && assignmentMatches(combo, axisPart));
		if (targets.length === 0) {
			combos.push({ ...entry });
			continue;
		}
		for (const target of targets) {
			Object.assign(target, extraPart);
		}
	}

	return dedupe(combos);
}

export function expandStage(stage: StageSpec, stageIndex: number): JobInstance[] {
	const issues = checkMatrix(stage);
	if (issues.length > 0) {
		throw new SpecificationError(issues);
	}
	const assignments = stage.matrix ? expandMatrix(stage.matrix) : [{}];
	return assignments.map((matrix, index) => {
		const qualifier = formatQualifier(matrix);
		return {
			id: formatJobId(stage.id, qualifier),
			stage: stage.id,
			stageIndex,
			index,
			matrix,
			qualifier,
			steps: stage.steps.map((step) => substituteStep(step, matrix)),
		};
	});
}

export function formatQualifier(matrix: MatrixAssignment): string {
	return Object.entries(matrix)
		.map(([axis, value]) => `${axis}=${String(value)}`)
		.join(",");
}

export function formatJobId(stage: string, qualifier: string): string {
	return qualifier ? `${stage}[${qualifier}]` : stage;
}

export function assignmentMatches(combo: MatrixAssignment, partial: MatrixAssignment): boolean {
	return Object.entries(partial).every(
		([key, value]) => Object.hasOwn(combo, key) && sameValue(combo[key], value),
	);
}

export function substituteMatrix(template: string, matrix: MatrixAssignment): string {
	return template.replace(MATRIX_PLACEHOLDER, (placeholder, axis: string) =>
		Object.hasOwn(matrix, axis) ? String(matrix[axis]) : placeholder,
	);
}

function substituteStep(step: StepSpec, matrix: MatrixAssignment): StepSpec {
	if (Object.keys(matrix).length === 0) {
		return step;
	}
	return {
		...step,
		name: substituteMatrix(step.name, matrix),
		with: mapValues(step.with, (value) => substituteMatrix(value, matrix)),
		env: mapValues(step.env, (value) => substituteMatrix(value, matrix)),
	};
}

function mapValues(
	record: Record<string, string>,
	fn: (value: string) => string,
): Record<string, string> {
	return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, fn(value)]));
}

function pickKeys(
	assignment: MatrixAssignment,
	keep: (key: string) => boolean,
): MatrixAssignment {
	return Object.fromEntries(Object.entries(assignment).filter(([key]) => keep(key)));
}

function sameValue(left: MatrixValue | undefined, right: MatrixValue): boolean {
	return left !== undefined && String(left) === String(right);
}

function dedupe(combos: MatrixAssignment[]): MatrixAssignment[] {
	const seen = new Set<string>();
	return combos.filter((combo) => {
		const key = formatQualifier(combo);
		if (seen.has(key)) {
			return false;
		}
		seen.add(key);
		return true;
	});
}
