import fs from "node:fs";
import { z } from "zod";
import { isEventKind, type RunContextInput } from "../core/context.js";
import type { EventKind } from "../core/types.js";
import type { CliOptions } from "./args.js";

/**
 * Accepts both the flat form (`event`, `ref`, `base_ref`, `actor`, `sha`)
 * and the fields a VCS webhook payload carries.
 */
const EventPayloadSchema = z
	.object({
		event: z.string().optional(),
		ref: z.string().optional(),
		base_ref: z.string().nullish(),
		actor: z.string().optional(),
		sha: z.string().optional(),
		after: z.string().optional(),
		sender: z.object({ login: z.string().optional() }).passthrough().optional(),
		pull_request: z
			.object({
				base: z.object({ ref: z.string().optional() }).passthrough().optional(),
				head: z
					.object({ ref: z.string().optional(), sha: z.string().optional() })
					.passthrough()
					.optional(),
			})
			.passthrough()
			.optional(),
	})
	.passthrough();

export type EventPayload = z.infer<typeof EventPayloadSchema>;

export type PartialEventInput = {
	event?: EventKind;
	ref?: string;
	baseRef?: string;
	actor?: string;
	sha?: string;
};

export type EventInputResult =
	| { ok: true; input: PartialEventInput }
	| { ok: false; error: string };

export function readEventPayload(eventPath: string): EventPayload {
	const raw = fs.readFileSync(eventPath, "utf-8");
	return EventPayloadSchema.parse(JSON.parse(raw));
}

export function eventInputFromPayload(payload: EventPayload): PartialEventInput {
	const pullRequest = payload.pull_request;
	const event = payload.event ?? (pullRequest ? "pull_request" : undefined);
	return {
		event: event !== undefined && isEventKind(event) ? event : undefined,
		ref: payload.ref ?? pullRequest?.head?.ref,
		baseRef: payload.base_ref ?? pullRequest?.base?.ref,
		actor: payload.actor ?? payload.sender?.login,
		sha: payload.sha ?? payload.after ?? pullRequest?.head?.sha,
	};
}

/**
 * Flags override the payload. The payload itself is never echoed: read
 * failures report only the path.
 */
export function collectEventInput(args: CliOptions): EventInputResult {
	if (args.event !== undefined && !isEventKind(args.event)) {
		return {
			ok: false,
			error: `Invalid value for --event: ${args.event} (expected push|pull_request|tag_push)`,
		};
	}

	let fromPayload: PartialEventInput = {};
	if (args.eventPath) {
		try {
			fromPayload = eventInputFromPayload(readEventPayload(args.eventPath));
		} catch {
			return { ok: false, error: `Could not read event payload ${args.eventPath}` };
		}
	}

	return {
		ok: true,
		input: {
			event: args.event ?? fromPayload.event,
			ref: args.ref ?? fromPayload.ref,
			baseRef: args.baseRef ?? fromPayload.baseRef,
			actor: args.actor ?? fromPayload.actor,
			sha: args.sha ?? fromPayload.sha,
		},
	};
}

export function missingEventFields(input: PartialEventInput): string[] {
	const missing: string[] = [];
	if (!input.event) {
		missing.push("--event");
	}
	if (!input.ref) {
		missing.push("--ref");
	}
	return missing;
}

export function completeEventInput(
	input: PartialEventInput,
	defaultActor: string,
): RunContextInput | undefined {
	if (!input.event || !input.ref) {
		return undefined;
	}
	return {
		event: input.event,
		ref: input.ref,
		baseRef: input.baseRef,
		actor: input.actor ?? defaultActor,
		sha: input.sha,
	};
}
