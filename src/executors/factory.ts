import type { ExecutorRegistry, StepExecutor } from "../core/engine.js";
import { ArtifactDownloadExecutor, ArtifactUploadExecutor } from "./artifact.js";
import { type ShellExecutorOptions, ShellExecutor } from "./shell.js";

export type ExecutorRegistryOptions = ShellExecutorOptions & {
	overrides?: StepExecutor[];
};

export function createExecutorRegistry(options: ExecutorRegistryOptions = {}): ExecutorRegistry {
	const executors = new Map<string, StepExecutor>();
	for (const executor of [
		new ShellExecutor(options),
		new ArtifactUploadExecutor(),
		new ArtifactDownloadExecutor(),
		...(options.overrides ?? []),
	]) {
		executors.set(normalizeExecutorId(executor.id), executor);
	}

	return {
		get: (id) => executors.get(normalizeExecutorId(id)),
		has: (id) => executors.has(normalizeExecutorId(id)),
		ids: () => [...executors.keys()].sort(),
	};
}

function normalizeExecutorId(id: string): string {
	return id.trim().toLowerCase();
}
