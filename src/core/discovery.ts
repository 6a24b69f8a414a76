import fs from "node:fs";
import path from "node:path";

export const DEFAULT_PIPELINES_DIR = path.join(".stagerun", "pipelines");

export function findPipelineFiles(repoRoot: string, pipelinesDir = DEFAULT_PIPELINES_DIR): string[] {
	const dir = path.resolve(repoRoot, pipelinesDir);
	if (!fs.existsSync(dir)) {
		return [];
	}

	return fs
		.readdirSync(dir)
		.filter((file: string) => file.endsWith(".yml") || file.endsWith(".yaml"))
		.sort()
		.map((file: string) => path.join(dir, file));
}
