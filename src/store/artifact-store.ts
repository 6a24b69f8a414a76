import fs from "node:fs/promises";
import path from "node:path";
import { type ArtifactProducer, type ArtifactStore, artifactKey } from "../core/artifacts.js";
import { ensureWithinBase, uniquePathSegment } from "../utils/path-safety.js";

export class InMemoryArtifactStore implements ArtifactStore {
	private readonly blobs = new Map<string, Uint8Array>();

	async put(producer: ArtifactProducer, name: string, data: Uint8Array): Promise<void> {
		const key = artifactKey(producer, name);
		if (this.blobs.has(key)) {
			throw new Error(`Artifact "${key}" was already published`);
		}
		this.blobs.set(key, new Uint8Array(data));
	}

	async get(producer: ArtifactProducer, name: string): Promise<Uint8Array | undefined> {
		const blob = this.blobs.get(artifactKey(producer, name));
		return blob ? new Uint8Array(blob) : undefined;
	}

	async dispose(producer: ArtifactProducer): Promise<void> {
		const prefix = artifactKey(producer, "");
		for (const key of [...this.blobs.keys()]) {
			if (key.startsWith(prefix)) {
				this.blobs.delete(key);
			}
		}
	}

	keys(): string[] {
		return [...this.blobs.keys()].sort();
	}
}

/**
 * Artifacts as files under `<baseDir>/<stage>/<qualifier>/<name>`; every
 * segment goes through uniquePathSegment and must stay inside baseDir.
 */
export class FileArtifactStore implements ArtifactStore {
	constructor(private readonly baseDir: string) {}

	async put(producer: ArtifactProducer, name: string, data: Uint8Array): Promise<void> {
		const filePath = this.pathFor(producer, name);
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(filePath, data, { flag: "wx" });
	}

	async get(producer: ArtifactProducer, name: string): Promise<Uint8Array | undefined> {
		try {
			return new Uint8Array(await fs.readFile(this.pathFor(producer, name)));
		} catch (error) {
			if (isMissingFile(error)) {
				return undefined;
			}
			throw error;
		}
	}

	async dispose(producer: ArtifactProducer): Promise<void> {
		await fs.rm(this.producerDir(producer), { recursive: true, force: true });
	}

	pathFor(producer: ArtifactProducer, name: string): string {
		return ensureWithinBase(
			this.producerDir(producer),
			uniquePathSegment(name, "artifact"),
			"artifact name",
		);
	}

	private producerDir(producer: ArtifactProducer): string {
		return ensureWithinBase(
			this.baseDir,
			path.join(
				uniquePathSegment(producer.stage, "stage"),
				uniquePathSegment(producer.qualifier, "default"),
			),
			"artifact producer",
		);
	}
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
