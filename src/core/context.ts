import type { EventKind, RefKind, RunContext } from "./types.js";

export type RunContextInput = {
	event: EventKind;
	ref: string;
	refKind?: RefKind;
	actor: string;
	baseRef?: string;
	sha?: string;
};

const HEADS_PREFIX = "refs/heads/";
const TAGS_PREFIX = "refs/tags/";

export function createRunContext(input: RunContextInput): RunContext {
	const refKind = resolveRefKind(input);
	const refName = stripRefPrefix(input.ref);
	// A heads/tags prefix always matches refKind; other qualified refs pass through.
	const ref =
		refName === input.ref && input.ref.startsWith("refs/")
			? input.ref
			: `${refKind === "tag" ? TAGS_PREFIX : HEADS_PREFIX}${refName}`;
	const event: EventKind = input.event === "push" && refKind === "tag" ? "tag_push" : input.event;

	return Object.freeze({
		event,
		ref,
		refName,
		refKind,
		actor: input.actor,
		baseRef: input.baseRef ? stripRefPrefix(input.baseRef) : undefined,
		sha: input.sha,
	});
}

export function isEventKind(value: string): value is EventKind {
	return value === "push" || value === "pull_request" || value === "tag_push";
}

function resolveRefKind(input: RunContextInput): RefKind {
	if (input.event === "tag_push" || input.ref.startsWith(TAGS_PREFIX)) {
		return "tag";
	}
	if (input.ref.startsWith(HEADS_PREFIX)) {
		return "branch";
	}
	return input.refKind ?? "branch";
}

function stripRefPrefix(ref: string): string {
	if (ref.startsWith(HEADS_PREFIX)) {
		return ref.slice(HEADS_PREFIX.length);
	}
	if (ref.startsWith(TAGS_PREFIX)) {
		return ref.slice(TAGS_PREFIX.length);
	}
	return ref;
}
