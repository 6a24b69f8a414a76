import { matchesPatternList } from "../utils/glob.js";
import type { PipelineSpec, RunContext, TriggerClause } from "./types.js";

/**
 * Pipeline-level trigger check. Fails closed: with no matching clause the
 * run does not start.
 */
export function shouldRun(pipeline: Pick<PipelineSpec, "triggers">, context: RunContext): boolean {
	return pipeline.triggers.some((clause) => clauseMatches(clause, context));
}

export function clauseMatches(clause: TriggerClause, context: RunContext): boolean {
	if (clause.event === "pull_request") {
		if (context.event !== "pull_request") {
			return false;
		}
		return passesFilter(context.baseRef ?? context.refName, clause.branches, clause.branchesIgnore);
	}

	if (context.event !== "push" && context.event !== "tag_push") {
		return false;
	}

	const hasBranchFilters = Boolean(clause.branches || clause.branchesIgnore);
	const hasTagFilters = Boolean(clause.tags || clause.tagsIgnore);

	if (context.refKind === "tag") {
		if (hasTagFilters) {
			return passesFilter(context.refName, clause.tags, clause.tagsIgnore);
		}
		return !hasBranchFilters;
	}

	if (hasBranchFilters) {
		return passesFilter(context.refName, clause.branches, clause.branchesIgnore);
	}
	return !hasTagFilters;
}

function passesFilter(value: string, include?: string[], ignore?: string[]): boolean {
	if (include && !matchesPatternList(value, include)) {
		return false;
	}
	if (ignore && matchesPatternList(value, ignore)) {
		return false;
	}
	return true;
}
