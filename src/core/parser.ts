import fs from "node:fs";
import path from "node:path";
import YAML, { type LineCounter } from "yaml";
import { z } from "zod";
import { SpecificationError, type SpecificationIssue } from "./errors.js";
import type {
	ArtifactRequest,
	MatrixAssignment,
	MatrixSpec,
	PipelineSpec,
	StageSpec,
	StepSpec,
	TriggerClause,
} from "./types.js";

const Scalar = z.union([z.string(), z.number(), z.boolean()]);

const StringList = z
	.union([z.string(), z.array(z.string())])
	.transform((value) => (Array.isArray(value) ? value : [value]));

const StringRecord = z
	.record(Scalar)
	.transform((record) =>
		Object.fromEntries(Object.entries(record).map(([key, value]) => [key, String(value)])),
	);

const Condition = z.union([z.string(), z.boolean()]).transform((value) => String(value));

const EventName = z.enum(["push", "pull_request"]);

const EventFilter = z
	.object({
		branches: StringList.optional(),
		"branches-ignore": StringList.optional(),
		tags: StringList.optional(),
		"tags-ignore": StringList.optional(),
	})
	.strict()
	.nullable();

const OnSchema = z.union([
	EventName,
	z.array(EventName),
	z
		.object({
			push: EventFilter.optional(),
			pull_request: EventFilter.optional(),
		})
		.strict(),
]);

const Assignment = z.record(Scalar);

const MatrixSchema = z
	.object({
		include: z.array(Assignment).optional(),
		exclude: z.array(Assignment).optional(),
	})
	.catchall(z.array(Scalar));

const StepSchema = z
	.object({
		id: z.string().optional(),
		name: z.string().optional(),
		uses: z.string().optional(),
		run: z.string().optional(),
		with: StringRecord.optional(),
		if: Condition.optional(),
		env: StringRecord.optional(),
	})
	.refine((step) => step.uses !== undefined || step.run !== undefined, {
		message: "A step needs either `uses` or `run`",
	})
	.refine((step) => step.uses === undefined || step.run === undefined, {
		message: "A step cannot declare both `uses` and `run`",
	});

const ConsumeSchema = z.object({
	stage: z.string(),
	name: z.string(),
	matrix: Assignment.optional(),
});

const StageSchema = z.object({
	name: z.string().optional(),
	needs: StringList.optional(),
	if: Condition.optional(),
	strategy: z
		.object({
			matrix: MatrixSchema.optional(),
			"fail-fast": z.boolean().optional(),
			"max-parallel": z.number().int().positive().optional(),
		})
		.optional(),
	"timeout-minutes": z.number().positive().optional(),
	env: StringRecord.optional(),
	produces: StringList.optional(),
	consumes: z.array(ConsumeSchema).optional(),
	steps: z.array(StepSchema).min(1, "A stage needs at least one step"),
});

const PipelineSchema = z
	.object({
		name: z.string().optional(),
		on: OnSchema.optional(),
		env: StringRecord.optional(),
		stages: z.record(StageSchema).optional(),
		jobs: z.record(StageSchema).optional(),
	})
	.refine((doc) => doc.stages !== undefined || doc.jobs !== undefined, {
		message: "A pipeline needs a `stages` (or `jobs`) map",
	})
	.refine((doc) => doc.stages === undefined || doc.jobs === undefined, {
		message: "Use either `stages` or `jobs`, not both",
	});

type PipelineYaml = z.infer<typeof PipelineSchema>;
type StageYaml = z.infer<typeof StageSchema>;
type StepYaml = z.infer<typeof StepSchema>;
type OnYaml = z.infer<typeof OnSchema>;

export function parsePipelineFile(pipelinePath: string): PipelineSpec {
	const raw = fs.readFileSync(pipelinePath, "utf-8");
	return parsePipeline(raw, pipelinePath);
}

/**
 * Parses and shape-checks a pipeline document. Structural problems (bad
 * YAML, wrong types) are reported as `invalid-document` issues with a
 * `file:line:col` prefix; graph-level checks happen in buildRunGraph.
 */
export function parsePipeline(source: string, file = "<pipeline>"): PipelineSpec {
	const lineCounter = new YAML.LineCounter();
	const doc = YAML.parseDocument(source, { lineCounter });
	if (doc.errors.length > 0) {
		throw new SpecificationError(
			doc.errors.map((error) => {
				const line = error.linePos?.[0]?.line ?? 0;
				const col = error.linePos?.[0]?.col ?? 0;
				return invalidDocument(`${file}:${line}:${col} ${error.message}`);
			}),
		);
	}

	const parsed = PipelineSchema.safeParse(doc.toJS() ?? {});
	if (!parsed.success) {
		throw new SpecificationError(
			parsed.error.issues.map((issue) => {
				const node = doc.getIn(issue.path, true);
				const offset = YAML.isNode(node) ? node.range?.[0] : undefined;
				const where = offset === undefined ? file : formatPosition(file, lineCounter, offset);
				const at = issue.path.length > 0 ? ` ${issue.path.join(".")}:` : "";
				return invalidDocument(`${where}${at} ${issue.message}`);
			}),
		);
	}

	return toPipelineSpec(parsed.data, file);
}

function toPipelineSpec(doc: PipelineYaml, file: string): PipelineSpec {
	const stages = Object.entries(doc.stages ?? doc.jobs ?? {}).map(([stageId, stage]) =>
		toStageSpec(stageId, stage),
	);
	return {
		name: doc.name ?? path.basename(file, path.extname(file)),
		path: file,
		triggers: toTriggers(doc.on),
		env: doc.env ?? {},
		stages,
	};
}

function toTriggers(on: OnYaml | undefined): TriggerClause[] {
	if (on === undefined) {
		return [];
	}
	if (typeof on === "string") {
		return [{ event: on }];
	}
	if (Array.isArray(on)) {
		return on.map((event) => ({ event }));
	}
	const clauses: TriggerClause[] = [];
	for (const event of EventName.options) {
		if (!Object.hasOwn(on, event)) {
			continue;
		}
		const filter = on[event];
		clauses.push({
			event,
			branches: filter?.branches,
			branchesIgnore: filter?.["branches-ignore"],
			tags: filter?.tags,
			tagsIgnore: filter?.["tags-ignore"],
		});
	}
	return clauses;
}

function toStageSpec(stageId: string, stage: StageYaml): StageSpec {
	const strategy = stage.strategy ?? {};
	const minutes = stage["timeout-minutes"];
	return {
		id: stageId,
		name: stage.name ?? stageId,
		needs: stage.needs ?? [],
		if: stage.if,
		matrix: strategy.matrix ? toMatrixSpec(strategy.matrix) : undefined,
		failFast: strategy["fail-fast"] ?? true,
		maxParallel: strategy["max-parallel"],
		timeoutMs: minutes === undefined ? undefined : Math.round(minutes * 60_000),
		steps: stage.steps.map((step, index) => toStepSpec(stageId, step, index)),
		produces: stage.produces ?? [],
		consumes: (stage.consumes ?? []).map(
			(request): ArtifactRequest => ({
				stage: request.stage,
				name: request.name,
				matrix: request.matrix,
			}),
		),
		env: stage.env ?? {},
	};
}

function toMatrixSpec(matrix: z.infer<typeof MatrixSchema>): MatrixSpec {
	const { include = [], exclude = [], ...axes } = matrix;
	return {
		axes,
		include: include.map((entry): MatrixAssignment => ({ ...entry })),
		exclude: exclude.map((entry): MatrixAssignment => ({ ...entry })),
	};
}

function toStepSpec(stageId: string, step: StepYaml, index: number): StepSpec {
	const fallbackName = step.uses ?? step.run ?? `Step ${index + 1}`;
	const withInputs = step.with ?? {};
	return {
		id: step.id ?? `${stageId}-step-${index + 1}`,
		name: step.name ?? firstLine(fallbackName),
		uses: step.uses ?? "shell",
		with: step.run === undefined ? withInputs : { ...withInputs, command: step.run },
		if: step.if,
		env: step.env ?? {},
	};
}

function firstLine(value: string): string {
	return value.trim().split("\n")[0] ?? value;
}

function formatPosition(file: string, lineCounter: LineCounter, offset: number): string {
	const { line, col } = lineCounter.linePos(offset);
	return `${file}:${line}:${col}`;
}

function invalidDocument(message: string): SpecificationIssue {
	return { code: "invalid-document", message };
}
