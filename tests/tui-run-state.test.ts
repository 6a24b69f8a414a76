import { describe, expect, it } from "vitest";
import { buildRunGraph } from "../src/core/graph.js";
import { formatDuration, formatMatrix } from "../src/tui/run-view/format.js";
import {
	appendJobOutput,
	applyRunEvent,
	createRunViewState,
	OUTPUT_TAIL_CHARS,
	orderedJobIds,
	tailLines,
} from "../src/tui/run-view/state.js";
import { colorForStatus, renderStatusGlyph, STATUS_LABELS } from "../src/tui/run-view/status.js";
import { context, pipeline, stage } from "./support/fixtures.js";

function graph() {
	return buildRunGraph(
		pipeline([
			stage("deploy", { needs: ["test"] }),
			stage("test", { matrix: { axes: { node: [18, 20] }, include: [], exclude: [] } }),
		]),
	);
}

describe("run view state", () => {
	it("lists stages in run order with every job queued", () => {
		const state = createRunViewState(graph());

		expect(state.status).toBe("pending");
		expect(state.stages.map((row) => [row.stage, row.jobIds])).toEqual([
			["test", ["test[node=18]", "test[node=20]"]],
			["deploy", ["deploy"]],
		]);
		expect(orderedJobIds(state)).toEqual(["test[node=18]", "test[node=20]", "deploy"]);
		expect(Object.values(state.jobs).map((job) => job.status)).toEqual(["pending", "pending", "pending"]);
	});

	it("follows the run through its events", () => {
		let state = createRunViewState(graph());
		state = applyRunEvent(state, {
			type: "run-started",
			runId: "run-1",
			pipeline: "test",
			context: context(),
			jobs: [],
			createdAt: "2024-01-01T00:00:00.000Z",
		});
		state = applyRunEvent(state, {
			type: "job-started",
			runId: "run-1",
			jobId: "test[node=18]",
			stage: "test",
			startedAt: "2024-01-01T00:00:00.000Z",
		});

		expect(state.status).toBe("running");
		expect(state.runId).toBe("run-1");
		expect(state.jobs["test[node=18]"].status).toBe("running");

		state = applyRunEvent(state, {
			type: "job-finished",
			runId: "run-1",
			jobId: "test[node=18]",
			stage: "test",
			status: "failed",
			reason: "exit 1",
			startedAt: "2024-01-01T00:00:00.000Z",
			finishedAt: "2024-01-01T00:00:02.000Z",
			durationMs: 2000,
		});
		state = applyRunEvent(state, {
			type: "stage-gated",
			runId: "run-1",
			stage: "deploy",
			reason: "dependency-failed",
			detail: "test failed",
		});
		state = applyRunEvent(state, {
			type: "run-finished",
			runId: "run-1",
			status: "failed",
			finishedAt: "2024-01-01T00:00:03.000Z",
		});

		expect(state.jobs["test[node=18]"]).toEqual({
			jobId: "test[node=18]",
			stage: "test",
			matrix: { node: 18 },
			status: "failed",
			durationMs: 2000,
			reason: "exit 1",
		});
		expect(state.stages[1].skipReason).toBe("dependency-failed");
		expect(state.status).toBe("failed");
	});

	it("ignores events for unknown jobs", () => {
		const state = createRunViewState(graph());
		const next = applyRunEvent(state, {
			type: "job-started",
			runId: "run-1",
			jobId: "other",
			stage: "other",
			startedAt: "2024-01-01T00:00:00.000Z",
		});

		expect(next).toBe(state);
	});

	it("keeps only the tail of job output", () => {
		let state = createRunViewState(graph());
		state = appendJobOutput(state, "deploy", "a".repeat(OUTPUT_TAIL_CHARS));
		state = appendJobOutput(state, "deploy", "bc");

		expect(state.output.deploy).toHaveLength(OUTPUT_TAIL_CHARS);
		expect(state.output.deploy.endsWith("abc")).toBe(true);
	});
});

describe("tailLines", () => {
	it("returns the last lines without the trailing newline", () => {
		expect(tailLines("one\r\ntwo\nthree\n", 2)).toEqual(["two", "three"]);
		expect(tailLines("", 3)).toEqual([]);
	});
});

describe("format helpers", () => {
	it("formats durations by magnitude", () => {
		expect(formatDuration(250)).toBe("250ms");
		expect(formatDuration(1500)).toBe("1.5s");
		expect(formatDuration(125_000)).toBe("2m5s");
	});

	it("formats matrix assignments", () => {
		expect(formatMatrix({ node: 20, os: "linux" })).toBe("node: 20, os: linux");
		expect(formatMatrix({})).toBe("");
	});

	it("maps statuses to labels, glyphs and colors", () => {
		expect(STATUS_LABELS.pending).toBe("queued");
		expect(renderStatusGlyph("succeeded", 0)).toBe("●");
		expect(renderStatusGlyph("running", 11)).toBe("⠙");
		expect(renderStatusGlyph("pending", 0)).toBe("○");
		expect(colorForStatus("failed")).toBe("red");
		expect(colorForStatus("pending")).toBeUndefined();
	});
});
