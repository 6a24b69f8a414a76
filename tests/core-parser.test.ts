import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { SpecificationError } from "../src/core/errors.js";
import { parsePipeline, parsePipelineFile } from "../src/core/parser.js";

function issueMessages(run: () => unknown): string[] {
	try {
		run();
	} catch (error) {
		if (error instanceof SpecificationError) {
			return error.issues.map((issue) => issue.message);
		}
		throw error;
	}
	throw new Error("expected a SpecificationError");
}

describe("core parser", () => {
	it("parses triggers, env, stages and steps", () => {
		const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "stagerun-parser-"));
		const pipelinePath = path.join(tmpDir, "release.yml");
		fs.writeFileSync(
			pipelinePath,
			[
				"name: Release",
				"on:",
				"  push:",
				"    branches: main",
				'    tags: ["v*"]',
				"  pull_request:",
				"env:",
				"  CI: true",
				"stages:",
				"  test:",
				"    strategy:",
				"      matrix:",
				"        node: [18, 20]",
				"      fail-fast: false",
				"    steps:",
				"      - run: |",
				"          npm ci",
				"          npm test",
				"  build:",
				"    needs: test",
				"    if: event != 'pull_request'",
				"    timeout-minutes: 1.5",
				"    produces: dist",
				"    steps:",
				"      - name: Compile",
				"        run: npm run build",
				"      - uses: artifact/upload",
				"        with:",
				"          name: dist",
				"          path: dist",
			].join("\n"),
		);

		const pipeline = parsePipelineFile(pipelinePath);

		expect(pipeline.name).toBe("Release");
		expect(pipeline.path).toBe(pipelinePath);
		expect(pipeline.env).toEqual({ CI: "true" });
		expect(pipeline.triggers).toEqual([
			{ event: "push", branches: ["main"], tags: ["v*"] },
			{ event: "pull_request" },
		]);
		expect(pipeline.stages).toHaveLength(2);
		expect(pipeline.stages[0]).toEqual({
			id: "test",
			name: "test",
			needs: [],
			matrix: { axes: { node: [18, 20] }, include: [], exclude: [] },
			failFast: false,
			steps: [
				{
					id: "test-step-1",
					name: "npm ci",
					uses: "shell",
					with: { command: "npm ci\nnpm test\n" },
					env: {},
				},
			],
			produces: [],
			consumes: [],
			env: {},
		});
		expect(pipeline.stages[1]).toMatchObject({
			id: "build",
			needs: ["test"],
			if: "event != 'pull_request'",
			failFast: true,
			timeoutMs: 90_000,
			produces: ["dist"],
		});
		expect(pipeline.stages[1]?.steps).toEqual([
			{
				id: "build-step-1",
				name: "Compile",
				uses: "shell",
				with: { command: "npm run build" },
				env: {},
			},
			{
				id: "build-step-2",
				name: "artifact/upload",
				uses: "artifact/upload",
				with: { name: "dist", path: "dist" },
				env: {},
			},
		]);
	});

	it("parses on as string and array", () => {
		const single = parsePipeline(["on: push", "stages:", "  a:", "    steps: [{run: 'true'}]"].join("\n"));
		expect(single.triggers).toEqual([{ event: "push" }]);

		const multi = parsePipeline(
			["on: [push, pull_request]", "stages:", "  a:", "    steps: [{run: 'true'}]"].join("\n"),
		);
		expect(multi.triggers).toEqual([{ event: "push" }, { event: "pull_request" }]);
	});

	it("accepts jobs as an alias and names the pipeline after its file", () => {
		const pipeline = parsePipeline(
			["jobs:", "  lint:", "    if: true", "    steps:", "      - run: eslint ."].join("\n"),
			"/work/deploy.yaml",
		);

		expect(pipeline.name).toBe("deploy");
		expect(pipeline.triggers).toEqual([]);
		expect(pipeline.stages.map((stage) => [stage.id, stage.if])).toEqual([["lint", "true"]]);
	});

	it("rejects events it cannot evaluate", () => {
		const messages = issueMessages(() =>
			parsePipeline(["on: [push, workflow_dispatch]", "stages:", "  a:", "    steps: [{run: x}]"].join("\n")),
		);
		expect(messages.length).toBeGreaterThan(0);
	});

	it("includes file and location when yaml is invalid", () => {
		const pipelinePath = "/work/broken.yml";

		expect(() => parsePipeline(["name: CI", "on", "stages: {}"].join("\n"), pipelinePath)).toThrowError(
			/\/work\/broken\.yml:\d+:\d+/,
		);
	});

	it("points shape errors at the offending node", () => {
		const messages = issueMessages(() =>
			parsePipeline(["stages:", "  build:", "    steps: []"].join("\n"), "ci.yml"),
		);

		expect(messages).toHaveLength(1);
		expect(messages[0]).toMatch(/^ci\.yml:3:\d+ stages\.build\.steps: A stage needs at least one step$/);
	});

	it("rejects steps declaring both uses and run", () => {
		const messages = issueMessages(() =>
			parsePipeline(["stages:", "  a:", "    steps:", "      - uses: shell", "        run: echo"].join("\n")),
		);

		expect(messages.some((message) => message.endsWith("A step cannot declare both `uses` and `run`"))).toBe(
			true,
		);
	});

	it("rejects documents declaring both stages and jobs", () => {
		const messages = issueMessages(() =>
			parsePipeline(
				["stages:", "  a:", "    steps: [{run: x}]", "jobs:", "  b:", "    steps: [{run: y}]"].join("\n"),
			),
		);

		expect(messages.some((message) => message.endsWith("Use either `stages` or `jobs`, not both"))).toBe(true);
	});
});
