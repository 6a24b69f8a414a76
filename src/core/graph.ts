import { SpecificationError, type SpecificationIssue } from "./errors.js";
import {
	type Expression,
	isContextVariable,
	parseExpression,
	templateExpressions,
	unknownVariables,
} from "./expression.js";
import { assignmentMatches, checkMatrix, expandMatrix, expandStage } from "./matrix.js";
import type { JobInstance, PipelineSpec, StageSpec } from "./types.js";

export type GraphStage = {
	spec: StageSpec;
	index: number;
	needs: number[];
	dependents: number[];
	jobs: number[];
	condition?: Expression;
};

/**
 * Validated pipeline: stage references resolved to indices, a topological
 * order, and every job instance materialized up front.
 */
export type RunGraph = {
	pipeline: PipelineSpec;
	stages: GraphStage[];
	order: number[];
	jobs: JobInstance[];
};

export type BuildGraphOptions = {
	isKnownExecutor?: (id: string) => boolean;
};

export function buildRunGraph(pipeline: PipelineSpec, options: BuildGraphOptions = {}): RunGraph {
	const issues: SpecificationIssue[] = [];
	const indexById = new Map(pipeline.stages.map((stage, index) => [stage.id, index]));

	const needs = pipeline.stages.map((stage) => {
		const resolved: number[] = [];
		for (const need of stage.needs) {
			const target = indexById.get(need);
			if (target === undefined) {
				issues.push({
					code: "dangling-need",
					stage: stage.id,
					message: `Stage "${stage.id}" needs unknown stage "${need}"`,
				});
				continue;
			}
			if (!resolved.includes(target)) {
				resolved.push(target);
			}
		}
		return resolved;
	});

	const cycle = findCycle(needs);
	if (cycle) {
		const path = cycle.map((index) => pipeline.stages[index]?.id ?? String(index));
		issues.push({
			code: "cycle",
			stage: path[0],
			message: `Dependency cycle detected: ${path.join(" -> ")}`,
		});
	}

	for (const stage of pipeline.stages) {
		issues.push(...checkMatrix(stage));
	}

	const conditions = pipeline.stages.map((stage) =>
		stage.if === undefined ? undefined : checkCondition(stage, stage.if, () => false, issues),
	);

	for (const stage of pipeline.stages) {
		issues.push(...checkSteps(stage, options));
	}

	if (issues.length === 0) {
		issues.push(...checkArtifactRequests(pipeline, needs, indexById));
	}

	if (issues.length > 0) {
		throw new SpecificationError(issues);
	}

	const order = topologicalOrder(needs);
	const dependents = pipeline.stages.map((): number[] => []);
	needs.forEach((targets, index) => {
		for (const target of targets) {
			dependents[target]?.push(index);
		}
	});

	const stages: GraphStage[] = pipeline.stages.map((spec, index) => ({
		spec,
		index,
		needs: needs[index] ?? [],
		dependents: dependents[index] ?? [],
		jobs: [],
		condition: conditions[index],
	}));

	const jobs: JobInstance[] = [];
	for (const stageIndex of order) {
		const stage = stages[stageIndex];
		for (const job of expandStage(stage.spec, stageIndex)) {
			stage.jobs.push(jobs.length);
			jobs.push(job);
		}
	}

	return { pipeline, stages, order, jobs };
}

export function transitiveNeeds(needs: number[][], stageIndex: number): Set<number> {
	const visited = new Set<number>();
	const stack = [...(needs[stageIndex] ?? [])];
	while (stack.length > 0) {
		const next = stack.pop();
		if (next === undefined || visited.has(next)) {
			continue;
		}
		visited.add(next);
		stack.push(...(needs[next] ?? []));
	}
	return visited;
}

/**
 * Kahn's algorithm; among stages that become ready together the one
 * declared first goes first.
 */
export function topologicalOrder(needs: number[][]): number[] {
	const inDegree = needs.map((targets) => targets.length);
	const dependents = needs.map((): number[] => []);
	needs.forEach((targets, index) => {
		for (const target of targets) {
			dependents[target]?.push(index);
		}
	});

	const ready = inDegree.flatMap((degree, index) => (degree === 0 ? [index] : []));
	const ordered: number[] = [];
	while (ready.length > 0) {
		ready.sort((a, b) => a - b);
		const next = ready.shift();
		if (next === undefined) {
			break;
		}
		ordered.push(next);
		for (const dependent of dependents[next] ?? []) {
			inDegree[dependent] -= 1;
			if (inDegree[dependent] === 0) {
				ready.push(dependent);
			}
		}
	}
	return ordered;
}

function findCycle(needs: number[][]): number[] | undefined {
	const state = needs.map((): "new" | "active" | "done" => "new");
	const stack: number[] = [];

	const visit = (index: number): number[] | undefined => {
		state[index] = "active";
		stack.push(index);
		for (const target of needs[index] ?? []) {
			if (state[target] === "active") {
				return [...stack.slice(stack.indexOf(target)), target];
			}
			if (state[target] === "new") {
				const found = visit(target);
				if (found) {
					return found;
				}
			}
		}
		stack.pop();
		state[index] = "done";
		return undefined;
	};

	for (let index = 0; index < needs.length; index += 1) {
		if (state[index] === "new") {
			const found = visit(index);
			if (found) {
				return found;
			}
		}
	}
	return undefined;
}

type Analysis = { expression?: Expression; error?: string; unknown: string[] };

function analyzeExpression(source: string, isKnown: (name: string) => boolean): Analysis {
	try {
		const expression = parseExpression(source);
		return { expression, unknown: unknownVariables(expression, isKnown) };
	} catch (error) {
		return { error: error instanceof Error ? error.message : String(error), unknown: [] };
	}
}

function checkCondition(
	stage: StageSpec,
	source: string,
	isExtraVariable: (name: string) => boolean,
	issues: SpecificationIssue[],
): Expression | undefined {
	const analysis = analyzeExpression(
		source,
		(name) => isContextVariable(name) || isExtraVariable(name),
	);
	if (analysis.error !== undefined) {
		issues.push({
			code: "invalid-condition",
			stage: stage.id,
			message: `Stage "${stage.id}": ${analysis.error}`,
		});
		return undefined;
	}
	if (analysis.unknown.length > 0) {
		const matrixOnly = analysis.unknown.every((name) => name.startsWith("matrix."));
		issues.push({
			code: matrixOnly ? "unknown-matrix-axis" : "invalid-condition",
			stage: stage.id,
			message: `Stage "${stage.id}": expression "${source}" references unknown variable(s): ${analysis.unknown.join(", ")}`,
		});
		return undefined;
	}
	return analysis.expression;
}

function checkSteps(stage: StageSpec, options: BuildGraphOptions): SpecificationIssue[] {
	const issues: SpecificationIssue[] = [];
	const axes = new Set(
		stage.matrix && checkMatrix(stage).length === 0
			? expandMatrix(stage.matrix).flatMap((assignment) => Object.keys(assignment))
			: [],
	);
	const isMatrixVariable = (name: string): boolean =>
		name.startsWith("matrix.") && axes.has(name.slice("matrix.".length));

	for (const step of stage.steps) {
		if (options.isKnownExecutor && !options.isKnownExecutor(step.uses)) {
			issues.push({
				code: "unknown-executor",
				stage: stage.id,
				message: `Stage "${stage.id}" step "${step.name}" uses unknown executor "${step.uses}"`,
			});
		}
		if (step.if !== undefined) {
			checkCondition(stage, step.if, isMatrixVariable, issues);
		}
		const templates = [step.name, ...Object.values(step.with), ...Object.values(step.env)];
		for (const body of templates.flatMap(templateExpressions)) {
			checkCondition(stage, body, isMatrixVariable, issues);
		}
	}
	return issues;
}

function checkArtifactRequests(
	pipeline: PipelineSpec,
	needs: number[][],
	indexById: Map<string, number>,
): SpecificationIssue[] {
	const issues: SpecificationIssue[] = [];
	pipeline.stages.forEach((stage, index) => {
		const upstream = transitiveNeeds(needs, index);
		for (const request of stage.consumes) {
			const label = `Stage "${stage.id}" consumes "${request.stage}/${request.name}"`;
			const producerIndex = indexById.get(request.stage);
			const producer = producerIndex === undefined ? undefined : pipeline.stages[producerIndex];
			if (producerIndex === undefined || !producer) {
				issues.push(artifactIssue(stage, `${label} from an unknown stage`));
				continue;
			}
			if (!upstream.has(producerIndex)) {
				issues.push(
					artifactIssue(stage, `${label} but does not depend on stage "${request.stage}"`),
				);
				continue;
			}
			if (!producer.produces.includes(request.name)) {
				issues.push(
					artifactIssue(
						stage,
						`${label} but stage "${request.stage}" does not declare it in produces`,
					),
				);
				continue;
			}
			const filter = request.matrix;
			if (filter) {
				const assignments = producer.matrix ? expandMatrix(producer.matrix) : [{}];
				if (!assignments.some((assignment) => assignmentMatches(assignment, filter))) {
					issues.push(
						artifactIssue(stage, `${label} with a matrix filter that selects no producer job`),
					);
				}
			}
		}
	});
	return issues;
}

function artifactIssue(stage: StageSpec, message: string): SpecificationIssue {
	return { code: "invalid-artifact-request", stage: stage.id, message };
}
