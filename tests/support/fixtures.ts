import { createRunContext, type RunContextInput } from "../../src/core/context.js";
import type { EngineRuntimeEvent, JobContext, StepExecutor, StepOutcome } from "../../src/core/engine.js";
import type { PipelineSpec, RunContext, StageSpec, StepSpec } from "../../src/core/types.js";
import { createExecutorRegistry } from "../../src/executors/factory.js";

export function step(id: string, overrides: Partial<StepSpec> = {}): StepSpec {
	return { id, name: id, uses: "fake", with: {}, env: {}, ...overrides };
}

export function stage(id: string, overrides: Partial<StageSpec> = {}): StageSpec {
	return {
		id,
		name: id,
		needs: [],
		failFast: true,
		steps: [step(`${id}-run`)],
		produces: [],
		consumes: [],
		env: {},
		...overrides,
	};
}

export function pipeline(stages: StageSpec[], overrides: Partial<PipelineSpec> = {}): PipelineSpec {
	return { name: "test", triggers: [{ event: "push" }], env: {}, stages, ...overrides };
}

export function context(overrides: Partial<RunContextInput> = {}): RunContext {
	return createRunContext({ event: "push", ref: "main", actor: "tester", ...overrides });
}

export type FakeCall = {
	jobId: string;
	step: string;
	with: Record<string, string>;
	env: Record<string, string>;
	inputs: string[];
};

/**
 * Step executor driven by `with`:
 * `exit` (exit code, default 0), `delay` (ms), `hang` ("true" waits for
 * abort), `produce` (comma separated artifact names, content
 * `<jobId>:<name>`), `throw` (error message).
 */
export class FakeExecutor implements StepExecutor {
	readonly id = "fake";
	readonly calls: FakeCall[] = [];
	running = 0;
	maxRunning = 0;

	async execute(step: StepSpec, context: JobContext, signal: AbortSignal): Promise<StepOutcome> {
		this.calls.push({
			jobId: context.jobId,
			step: step.id,
			with: step.with,
			env: context.env,
			inputs: context.artifacts.inputs.map(
				(input) => `${input.jobId}/${input.name}=${new TextDecoder().decode(input.data)}`,
			),
		});
		this.running += 1;
		this.maxRunning = Math.max(this.maxRunning, this.running);
		try {
			if (step.with.throw) {
				throw new Error(step.with.throw);
			}
			const delay = Number(step.with.delay ?? "0");
			if (step.with.hang === "true" || delay > 0) {
				const completed = await wait(step.with.hang === "true" ? undefined : delay, signal);
				if (!completed) {
					return { exitCode: 130, logs: ["aborted"], cancelled: true };
				}
			}
			for (const name of (step.with.produce ?? "").split(",").filter(Boolean)) {
				context.artifacts.put(name, `${context.jobId}:${name}`);
			}
			return { exitCode: Number(step.with.exit ?? "0"), logs: [`ran ${step.id}`] };
		} finally {
			this.running -= 1;
		}
	}

	jobsRun(): string[] {
		return [...new Set(this.calls.map((call) => call.jobId))];
	}
}

function wait(ms: number | undefined, signal: AbortSignal): Promise<boolean> {
	return new Promise((resolve) => {
		if (signal.aborted) {
			resolve(false);
			return;
		}
		const timer = ms === undefined ? undefined : setTimeout(() => done(true), ms);
		const onAbort = (): void => done(false);
		const done = (completed: boolean): void => {
			clearTimeout(timer);
			signal.removeEventListener("abort", onAbort);
			resolve(completed);
		};
		signal.addEventListener("abort", onAbort, { once: true });
	});
}

export function fakeRegistry(fake = new FakeExecutor()) {
	return { fake, executors: createExecutorRegistry({ overrides: [fake] }) };
}

export function collectEvents(): {
	events: EngineRuntimeEvent[];
	onEvent: (event: EngineRuntimeEvent) => void;
} {
	const events: EngineRuntimeEvent[] = [];
	return { events, onEvent: (event) => events.push(event) };
}
