import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
	ArtifactStaging,
	artifactKey,
	createJobArtifacts,
	createManifestEntry,
	resolveConsumedArtifacts,
} from "../src/core/artifacts.js";
import { MissingArtifactError } from "../src/core/errors.js";
import { expandStage } from "../src/core/matrix.js";
import { FileArtifactStore, InMemoryArtifactStore } from "../src/store/artifact-store.js";
import { stage } from "./support/fixtures.js";

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);
const text = (data: Uint8Array | undefined): string | undefined =>
	data ? new TextDecoder().decode(data) : undefined;

describe("artifact keys and staging", () => {
	it("keys artifacts by stage, qualifier and name", () => {
		expect(artifactKey({ stage: "build", qualifier: "" }, "dist")).toBe("build/dist");
		expect(artifactKey({ stage: "build", qualifier: "os=linux" }, "dist")).toBe("build/os=linux/dist");
	});

	it("stages only declared artifacts and lists the missing ones", () => {
		const staging = new ArtifactStaging("build", ["dist", "docs"]);
		staging.put("dist", "payload");

		expect(() => staging.put("coverage", "x")).toThrowError(
			'Job "build" produced undeclared artifact "coverage" (declared: dist, docs)',
		);
		expect(staging.missing()).toEqual(["docs"]);
		expect(staging.entries().map(([name, data]) => [name, text(data)])).toEqual([["dist", "payload"]]);

		staging.discard();
		expect(staging.missing()).toEqual(["dist", "docs"]);
	});

	it("describes a published artifact in the manifest", () => {
		const [job] = expandStage(stage("build"), 0);
		if (!job) {
			throw new Error("expected a job");
		}

		expect(createManifestEntry(job, "dist", bytes("abc"))).toEqual({
			stage: "build",
			jobId: "build",
			qualifier: "",
			name: "dist",
			key: "build/dist",
			size: 3,
			sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
		});
	});
});

describe("consumed artifacts", () => {
	const jobs = expandStage(
		stage("build", { matrix: { axes: { os: ["linux", "mac"] }, include: [], exclude: [] } }),
		0,
	);

	it("fails when a producer has not succeeded or never stored the artifact", async () => {
		const store = new InMemoryArtifactStore();
		const producers = jobs.map((job) => ({ job, status: "succeeded" as const }));

		await expect(
			resolveConsumedArtifacts([{ stage: "build", name: "dist" }], () => producers, store),
		).rejects.toThrowError('Artifact "dist" from "build[os=linux]" was not found in the artifact store');
		await expect(
			resolveConsumedArtifacts([{ stage: "build", name: "dist" }], () => [], store),
		).rejects.toBeInstanceOf(MissingArtifactError);
	});

	it("tells apart several inputs by qualifier", async () => {
		const store = new InMemoryArtifactStore();
		for (const job of jobs) {
			await store.put({ stage: job.stage, qualifier: job.qualifier }, "dist", bytes(job.qualifier));
		}
		const inputs = await resolveConsumedArtifacts(
			[{ stage: "build", name: "dist" }],
			() => jobs.map((job) => ({ job, status: "succeeded" as const })),
			store,
		);
		const artifacts = createJobArtifacts(inputs, new ArtifactStaging("deploy", []));

		expect(text(artifacts.get("build", "dist", "os=mac"))).toBe("os=mac");
		expect(() => artifacts.get("build", "dist")).toThrowError(
			'Artifact "build/dist" is ambiguous; name one of: os=linux | os=mac',
		);
		expect(() => artifacts.get("build", "docs")).toThrowError(
			'Artifact "build/docs" was not consumed by this job',
		);
	});
});

describe("in-memory artifact store", () => {
	it("stores a copy once per producer and name", async () => {
		const store = new InMemoryArtifactStore();
		const data = bytes("v1");
		await store.put({ stage: "build", qualifier: "" }, "dist", data);
		data[0] = 0;

		expect(text(await store.get({ stage: "build", qualifier: "" }, "dist"))).toBe("v1");
		await expect(store.put({ stage: "build", qualifier: "" }, "dist", bytes("v2"))).rejects.toThrowError(
			'Artifact "build/dist" was already published',
		);
	});

	it("hands out copies that cannot change the stored artifact", async () => {
		const store = new InMemoryArtifactStore();
		const producer = { stage: "build", qualifier: "" };
		await store.put(producer, "dist", bytes("abc"));

		(await store.get(producer, "dist"))?.fill(0);

		expect(text(await store.get(producer, "dist"))).toBe("abc");
	});

	it("disposes only the given producer", async () => {
		const store = new InMemoryArtifactStore();
		await store.put({ stage: "build", qualifier: "os=linux" }, "dist", bytes("a"));
		await store.put({ stage: "build", qualifier: "os=mac" }, "dist", bytes("b"));

		await store.dispose({ stage: "build", qualifier: "os=linux" });
		expect(store.keys()).toEqual(["build/os=mac/dist"]);
	});
});

describe("file artifact store", () => {
	it("writes artifacts under stage and qualifier directories", async () => {
		const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "stagerun-artifacts-"));
		const store = new FileArtifactStore(baseDir);

		await store.put({ stage: "build", qualifier: "os=linux" }, "dist", bytes("linux"));
		await store.put({ stage: "build", qualifier: "" }, "docs", bytes("docs"));

		expect(fs.readFileSync(path.join(baseDir, "build", "os=linux", "dist"), "utf-8")).toBe("linux");
		expect(fs.readFileSync(path.join(baseDir, "build", "default", "docs"), "utf-8")).toBe("docs");
		expect(text(await store.get({ stage: "build", qualifier: "os=linux" }, "dist"))).toBe("linux");
		expect(await store.get({ stage: "build", qualifier: "os=mac" }, "dist")).toBeUndefined();
	});

	it("keeps qualifiers that sanitize alike in separate directories", async () => {
		const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "stagerun-artifacts-"));
		const store = new FileArtifactStore(baseDir);

		await store.put({ stage: "build", qualifier: "lang=c" }, "binary", bytes("c"));
		await store.put({ stage: "build", qualifier: "lang=c++" }, "binary", bytes("c++"));

		expect(fs.readdirSync(path.join(baseDir, "build")).sort()).toEqual([
			"lang=c",
			expect.stringMatching(/^lang=c@[0-9a-f]{8}$/),
		]);
		expect(text(await store.get({ stage: "build", qualifier: "lang=c" }, "binary"))).toBe("c");
		expect(text(await store.get({ stage: "build", qualifier: "lang=c++" }, "binary"))).toBe("c++");
	});

	it("refuses to overwrite and keeps names inside the producer directory", async () => {
		const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "stagerun-artifacts-"));
		const store = new FileArtifactStore(baseDir);
		const producer = { stage: "build", qualifier: "" };

		await store.put(producer, "dist", bytes("one"));
		await expect(store.put(producer, "dist", bytes("two"))).rejects.toThrow();
		expect(path.dirname(store.pathFor(producer, "../../escape"))).toBe(path.join(baseDir, "build", "default"));
		expect(path.basename(store.pathFor(producer, "../../escape"))).toMatch(/^escape@[0-9a-f]{8}$/);
	});

	it("removes a producer's directory on dispose", async () => {
		const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "stagerun-artifacts-"));
		const store = new FileArtifactStore(baseDir);
		await store.put({ stage: "build", qualifier: "" }, "dist", bytes("x"));

		await store.dispose({ stage: "build", qualifier: "" });
		expect(fs.existsSync(path.join(baseDir, "build", "default"))).toBe(false);
	});
});
