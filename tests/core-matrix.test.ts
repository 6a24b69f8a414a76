import { describe, expect, it } from "vitest";
import { SpecificationError } from "../src/core/errors.js";
import {
	checkMatrix,
	expandMatrix,
	expandStage,
	formatJobId,
	formatQualifier,
	substituteMatrix,
} from "../src/core/matrix.js";
import { stage, step } from "./support/fixtures.js";

describe("matrix expansion", () => {
	it("takes the cartesian product with the first axis varying slowest", () => {
		expect(
			expandMatrix({ axes: { os: ["linux", "mac"], node: [18, 20] }, include: [], exclude: [] }),
		).toEqual([
			{ os: "linux", node: 18 },
			{ os: "linux", node: 20 },
			{ os: "mac", node: 18 },
			{ os: "mac", node: 20 },
		]);
	});

	it("removes excluded combinations, comparing values as strings", () => {
		expect(
			expandMatrix({
				axes: { os: ["linux", "mac"], node: [18, 20] },
				include: [],
				exclude: [{ os: "mac", node: "18" }],
			}),
		).toEqual([
			{ os: "linux", node: 18 },
			{ os: "linux", node: 20 },
			{ os: "mac", node: 20 },
		]);
	});

	it("extends matching combinations with include entries or appends new ones", () => {
		expect(
			expandMatrix({
				axes: { os: ["linux", "mac"] },
				include: [{ os: "linux", experimental: true }, { os: "windows" }],
				exclude: [],
			}),
		).toEqual([{ os: "linux", experimental: true }, { os: "mac" }, { os: "windows" }]);
	});

	it("builds combinations from include alone", () => {
		expect(expandMatrix({ axes: {}, include: [{ os: "linux" }], exclude: [] })).toEqual([{ os: "linux" }]);
	});

	it("reports empty axes and empty expansions", () => {
		expect(
			checkMatrix(stage("test", { matrix: { axes: { node: [] }, include: [], exclude: [] } })).map(
				(issue) => issue.code,
			),
		).toEqual(["empty-matrix-axis"]);
		expect(
			checkMatrix(
				stage("test", { matrix: { axes: { node: [18] }, include: [], exclude: [{ node: 18 }] } }),
			).map((issue) => issue.message),
		).toEqual(['Stage "test" matrix expands to no combinations']);
	});
});

describe("stage expansion", () => {
	it("creates one job per combination with matrix values substituted", () => {
		const jobs = expandStage(
			stage("test", {
				matrix: { axes: { node: [18, 20] }, include: [], exclude: [] },
				steps: [
					step("unit", {
						name: "Test on ${{ matrix.node }}",
						with: { command: "nvm use ${{ matrix.node }}" },
						env: { NODE: "${{matrix.node}}" },
					}),
				],
			}),
			2,
		);

		expect(jobs.map((job) => [job.id, job.qualifier, job.stageIndex, job.index])).toEqual([
			["test[node=18]", "node=18", 2, 0],
			["test[node=20]", "node=20", 2, 1],
		]);
		expect(jobs[1]?.steps[0]).toEqual({
			id: "unit",
			name: "Test on 20",
			uses: "fake",
			with: { command: "nvm use 20" },
			env: { NODE: "20" },
		});
	});

	it("creates a single unqualified job without a matrix", () => {
		const jobs = expandStage(stage("build"), 0);
		expect(jobs.map((job) => job.id)).toEqual(["build"]);
		expect(jobs[0]?.matrix).toEqual({});
	});

	it("throws for an empty matrix axis", () => {
		expect(() =>
			expandStage(stage("test", { matrix: { axes: { node: [] }, include: [], exclude: [] } }), 0),
		).toThrow(SpecificationError);
	});

	it("formats qualifiers and job ids", () => {
		expect(formatQualifier({ os: "linux", node: 20 })).toBe("os=linux,node=20");
		expect(formatJobId("build", "")).toBe("build");
		expect(formatJobId("test", "os=linux")).toBe("test[os=linux]");
	});

	it("leaves unknown matrix placeholders untouched", () => {
		expect(substituteMatrix("${{ matrix.arch }}-${{ matrix.os }}", { os: "mac" })).toBe(
			"${{ matrix.arch }}-mac",
		);
	});
});
