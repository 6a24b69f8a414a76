import fs from "node:fs";
import path from "node:path";
import { DEFAULT_PIPELINES_DIR } from "../core/discovery.js";
import type { Logger } from "../utils/logger.js";

const IGNORE_ENTRY = ".stagerun";
const STARTER_PIPELINE = "ci.yml";
const TEMPLATE_URL = new URL("../../templates/pipeline.yml", import.meta.url);

export type GitignoreResult = "added" | "present" | "skipped";

export type InitResult = {
	gitignore: GitignoreResult;
	pipelinePath?: string;
};

export function ensureGitignore(repoRoot: string): GitignoreResult {
	if (!fs.existsSync(path.join(repoRoot, ".git"))) {
		return "skipped";
	}

	const ignorePath = path.join(repoRoot, ".gitignore");
	const current = fs.existsSync(ignorePath) ? fs.readFileSync(ignorePath, "utf-8") : "";
	if (current.split(/\r?\n/).some((line) => normalizeIgnoreLine(line) === IGNORE_ENTRY)) {
		return "present";
	}

	const separator = current.length === 0 || current.endsWith("\n") ? "" : "\n";
	fs.writeFileSync(ignorePath, `${current}${separator}${IGNORE_ENTRY}/\n`);
	return "added";
}

/**
 * Writes a starter pipeline unless the pipelines directory already holds
 * one. Returns the written path.
 */
export function scaffoldPipeline(
	repoRoot: string,
	pipelinesDir = DEFAULT_PIPELINES_DIR,
): string | undefined {
	const dir = path.resolve(repoRoot, pipelinesDir);
	if (fs.existsSync(dir) && fs.readdirSync(dir).some((file) => /\.ya?ml$/.test(file))) {
		return undefined;
	}
	fs.mkdirSync(dir, { recursive: true });
	const target = path.join(dir, STARTER_PIPELINE);
	fs.writeFileSync(target, fs.readFileSync(TEMPLATE_URL, "utf-8"));
	return target;
}

export function runInit(repoRoot: string, pipelinesDir: string, logger: Logger): InitResult {
	const gitignore = ensureGitignore(repoRoot);
	if (gitignore === "added") {
		logger.info(`Added '${IGNORE_ENTRY}/' to .gitignore.`);
	} else if (gitignore === "present") {
		logger.info(`'${IGNORE_ENTRY}' is already in .gitignore.`);
	} else {
		logger.warn("Skipped .gitignore: not a git repository.");
	}

	const pipelinePath = scaffoldPipeline(repoRoot, pipelinesDir);
	if (pipelinePath) {
		logger.info(`Wrote starter pipeline ${path.relative(repoRoot, pipelinePath)}.`);
	}
	return { gitignore, pipelinePath };
}

function normalizeIgnoreLine(line: string): string {
	return line.trim().replace(/^\/+/, "").replace(/\/+$/, "");
}
