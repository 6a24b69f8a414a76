import path from "node:path";
import { cancel, isCancel, select, text } from "@clack/prompts";
import type { EventKind } from "../core/types.js";
import type { PartialEventInput } from "./inputs.js";

export async function selectPipeline(files: string[], repoRoot: string): Promise<string | null> {
	const selection = await select<{ value: string; label: string }[], string>({
		message: "Select a pipeline",
		options: files.map((file) => ({ value: file, label: path.relative(repoRoot, file) })),
	});
	if (isCancel(selection)) {
		cancel("Cancelled.");
		return null;
	}
	return selection;
}

export async function selectEvent(defaultEvent: EventKind): Promise<EventKind | null> {
	const selection = await select<{ value: EventKind; label: string }[], EventKind>({
		message: "Select an event",
		initialValue: defaultEvent,
		options: [
			{ value: "push", label: "push" },
			{ value: "pull_request", label: "pull_request" },
			{ value: "tag_push", label: "tag_push" },
		],
	});
	if (isCancel(selection)) {
		cancel("Cancelled.");
		return null;
	}
	return selection;
}

async function promptText(message: string, placeholder: string, initial?: string): Promise<string | null> {
	const value = await text({
		message,
		placeholder,
		initialValue: initial,
		validate: (input) => (input.trim().length === 0 ? "A value is required" : undefined),
	});
	if (isCancel(value)) {
		cancel("Cancelled.");
		return null;
	}
	return value.trim();
}

/**
 * Asks for whatever the flags and payload left open. Returns null when the
 * user cancels.
 */
export async function promptEventInput(input: PartialEventInput): Promise<PartialEventInput | null> {
	const event = input.event ?? (await selectEvent("push"));
	if (!event) {
		return null;
	}

	let ref = input.ref;
	if (!ref) {
		const prompted =
			event === "tag_push"
				? await promptText("Tag", "v1.2.3")
				: await promptText(
						event === "pull_request" ? "Source branch" : "Branch",
						"main",
						event === "push" ? "main" : undefined,
					);
		if (prompted === null) {
			return null;
		}
		ref = prompted;
	}

	let baseRef = input.baseRef;
	if (event === "pull_request" && !baseRef) {
		const prompted = await promptText("Target branch", "main", "main");
		if (prompted === null) {
			return null;
		}
		baseRef = prompted;
	}

	return { ...input, event, ref, baseRef };
}
