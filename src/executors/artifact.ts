import fs from "node:fs/promises";
import path from "node:path";
import type { JobContext, StepExecutor, StepOutcome } from "../core/engine.js";
import type { StepSpec } from "../core/types.js";
import { ensureWithinBase, uniquePathSegment } from "../utils/path-safety.js";

export class ArtifactUploadExecutor implements StepExecutor {
	readonly id = "artifact/upload";

	async execute(step: StepSpec, context: JobContext, signal: AbortSignal): Promise<StepOutcome> {
		const name = requireInput(step, "name");
		const source = ensureWithinBase(context.workdir, requireInput(step, "path"), "artifact path");
		const data = await fs.readFile(source, { signal });
		context.artifacts.put(name, data);
		return {
			exitCode: 0,
			logs: [`Staged ${path.relative(context.workdir, source)} as "${name}" (${data.byteLength} bytes)`],
		};
	}
}

/**
 * Writes consumed artifacts under `with.path` (default `artifacts`), one
 * file per producer job: `<path>/<name>` when the stage has a single
 * producer, `<path>/<qualifier>/<name>` for matrix producers (qualifier
 * as uniquePathSegment writes it).
 */
export class ArtifactDownloadExecutor implements StepExecutor {
	readonly id = "artifact/download";

	async execute(step: StepSpec, context: JobContext, signal: AbortSignal): Promise<StepOutcome> {
		const target = ensureWithinBase(
			context.workdir,
			step.with.path ?? "artifacts",
			"artifact destination",
		);
		const wanted = step.with.name;
		const inputs = context.artifacts.inputs.filter(
			(input) => wanted === undefined || input.name === wanted,
		);
		if (inputs.length === 0) {
			throw new Error(
				wanted === undefined
					? "No artifacts were consumed by this stage"
					: `Artifact "${wanted}" is not consumed by this stage`,
			);
		}

		const logs: string[] = [];
		for (const input of inputs) {
			signal.throwIfAborted();
			const segments = input.qualifier
				? [uniquePathSegment(input.qualifier, "default"), input.name]
				: [input.name];
			const destination = ensureWithinBase(target, path.join(...segments), "artifact name");
			await fs.mkdir(path.dirname(destination), { recursive: true });
			await fs.writeFile(destination, input.data, { signal });
			logs.push(`Downloaded "${input.name}" from ${input.jobId} to ${path.relative(context.workdir, destination)}`);
		}
		return { exitCode: 0, logs };
	}
}

function requireInput(step: StepSpec, key: string): string {
	const value = step.with[key];
	if (value === undefined || value.length === 0) {
		throw new Error(`Step "${step.name}" requires "with.${key}"`);
	}
	return value;
}
