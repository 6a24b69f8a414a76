import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";
import {
	collectEventInput,
	completeEventInput,
	eventInputFromPayload,
	missingEventFields,
} from "../src/cli/inputs.js";

let tempDir: string;

beforeEach(() => {
	tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "stagerun-inputs-"));
});

afterEach(() => {
	fs.rmSync(tempDir, { recursive: true, force: true });
});

function writePayload(payload: unknown): string {
	const file = path.join(tempDir, "event.json");
	fs.writeFileSync(file, JSON.stringify(payload));
	return file;
}

describe("eventInputFromPayload", () => {
	it("reads the flat form", () => {
		expect(
			eventInputFromPayload({ event: "push", ref: "refs/heads/main", actor: "dev", sha: "abc123" }),
		).toEqual({ event: "push", ref: "refs/heads/main", baseRef: undefined, actor: "dev", sha: "abc123" });
	});

	it("reads a pull request webhook payload", () => {
		expect(
			eventInputFromPayload({
				pull_request: { head: { ref: "feature/login", sha: "def456" }, base: { ref: "main" } },
				sender: { login: "contributor" },
			}),
		).toEqual({
			event: "pull_request",
			ref: "feature/login",
			baseRef: "main",
			actor: "contributor",
			sha: "def456",
		});
	});

	it("ignores unknown event names", () => {
		expect(eventInputFromPayload({ event: "release", ref: "main" }).event).toBeUndefined();
	});
});

describe("collectEventInput", () => {
	it("rejects an unknown --event", () => {
		expect(collectEventInput(parseArgs(["run", "--event", "deploy"]))).toEqual({
			ok: false,
			error: "Invalid value for --event: deploy (expected push|pull_request|tag_push)",
		});
	});

	it("lets flags override the payload", () => {
		const eventPath = writePayload({ event: "push", ref: "refs/heads/main", after: "abc123" });

		expect(
			collectEventInput(parseArgs(["run", "--event-path", eventPath, "--ref", "release", "--actor", "ci"])),
		).toEqual({
			ok: true,
			input: { event: "push", ref: "release", baseRef: undefined, actor: "ci", sha: "abc123" },
		});
	});

	it("reports an unreadable payload by path only", () => {
		const eventPath = path.join(tempDir, "missing.json");

		expect(collectEventInput(parseArgs(["run", "--event-path", eventPath]))).toEqual({
			ok: false,
			error: `Could not read event payload ${eventPath}`,
		});
	});

	it("reports a malformed payload by path only", () => {
		const eventPath = path.join(tempDir, "broken.json");
		fs.writeFileSync(eventPath, "{ not json token=test-secret");

		const result = collectEventInput(parseArgs(["run", "--event-path", eventPath]));

		expect(result).toEqual({ ok: false, error: `Could not read event payload ${eventPath}` });
	});
});

describe("completeEventInput", () => {
	it("names the missing fields", () => {
		expect(missingEventFields({})).toEqual(["--event", "--ref"]);
		expect(missingEventFields({ event: "push" })).toEqual(["--ref"]);
		expect(completeEventInput({ event: "push" }, "local")).toBeUndefined();
	});

	it("falls back to the configured actor", () => {
		expect(completeEventInput({ event: "pull_request", ref: "feature", baseRef: "main" }, "local")).toEqual({
			event: "pull_request",
			ref: "feature",
			baseRef: "main",
			actor: "local",
			sha: undefined,
		});
	});
});
