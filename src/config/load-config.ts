import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigSchema, type StagerunConfig } from "./schema.js";

export type ConfigLoadResult = {
	config: StagerunConfig;
	path?: string;
};

export const DEFAULT_CONFIG_PATH = ".stagerun.yml";

export function loadConfig(repoRoot: string, configFile = DEFAULT_CONFIG_PATH): ConfigLoadResult {
	const configPath = path.resolve(repoRoot, configFile);
	if (!fs.existsSync(configPath)) {
		return { config: ConfigSchema.parse({}), path: undefined };
	}

	const raw = fs.readFileSync(configPath, "utf-8");
	const parsed: unknown = YAML.parse(raw);
	return { config: ConfigSchema.parse(parsed ?? {}), path: configPath };
}
