import crypto from "node:crypto";
import { MissingArtifactError } from "./errors.js";
import type { ArtifactManifestEntry, ArtifactRequest, JobInstance, JobStatus } from "./types.js";
import { assignmentMatches } from "./matrix.js";

export type ArtifactProducer = {
	stage: string;
	qualifier: string;
};

/**
 * Backing storage for artifacts handed between stages. Single writer per
 * (producer, name); readers only ever see artifacts of succeeded jobs
 * because the scheduler commits after success.
 */
export interface ArtifactStore {
	put(producer: ArtifactProducer, name: string, data: Uint8Array): Promise<void>;
	get(producer: ArtifactProducer, name: string): Promise<Uint8Array | undefined>;
	dispose(producer: ArtifactProducer): Promise<void>;
}

export type ConsumedArtifact = {
	stage: string;
	name: string;
	qualifier: string;
	jobId: string;
	data: Uint8Array;
};

export type JobArtifacts = {
	readonly inputs: ConsumedArtifact[];
	get(stage: string, name: string, qualifier?: string): Uint8Array;
	put(name: string, data: Uint8Array | string): void;
};

export function artifactKey(producer: ArtifactProducer, name: string): string {
	return producer.qualifier
		? `${producer.stage}/${producer.qualifier}/${name}`
		: `${producer.stage}/${name}`;
}

export function producerOf(job: Pick<JobInstance, "stage" | "qualifier">): ArtifactProducer {
	return { stage: job.stage, qualifier: job.qualifier };
}

export function toBytes(data: Uint8Array | string): Uint8Array {
	return typeof data === "string" ? new TextEncoder().encode(data) : data;
}

export function createManifestEntry(
	job: JobInstance,
	name: string,
	data: Uint8Array,
): ArtifactManifestEntry {
	return {
		stage: job.stage,
		jobId: job.id,
		qualifier: job.qualifier,
		name,
		key: artifactKey(producerOf(job), name),
		size: data.byteLength,
		sha256: crypto.createHash("sha256").update(data).digest("hex"),
	};
}

export function sortManifest(entries: ArtifactManifestEntry[]): ArtifactManifestEntry[] {
	return [...entries].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * Per-job output buffer. Nothing here is visible to other jobs until the
 * scheduler commits it.
 */
export class ArtifactStaging {
	private readonly staged = new Map<string, Uint8Array>();

	constructor(
		private readonly jobId: string,
		private readonly declared: string[],
	) {}

	put(name: string, data: Uint8Array | string): void {
		if (!this.declared.includes(name)) {
			throw new Error(
				`Job "${this.jobId}" produced undeclared artifact "${name}" (declared: ${this.declared.join(", ") || "none"})`,
			);
		}
		this.staged.set(name, toBytes(data));
	}

	missing(): string[] {
		return this.declared.filter((name) => !this.staged.has(name));
	}

	entries(): [string, Uint8Array][] {
		return this.declared.flatMap((name) => {
			const data = this.staged.get(name);
			return data ? [[name, data] as [string, Uint8Array]] : [];
		});
	}

	discard(): void {
		this.staged.clear();
	}
}

export type ProducerState = {
	job: JobInstance;
	status: JobStatus;
};

export async function resolveConsumedArtifacts(
	requests: ArtifactRequest[],
	producersFor: (stage: string) => ProducerState[],
	store: ArtifactStore,
): Promise<ConsumedArtifact[]> {
	const consumed: ConsumedArtifact[] = [];
	for (const request of requests) {
		const filter = request.matrix;
		const producers = producersFor(request.stage).filter(
			(producer) => !filter || assignmentMatches(producer.job.matrix, filter),
		);
		if (producers.length === 0) {
			throw new MissingArtifactError(
				request.stage,
				request.name,
				`No job of stage "${request.stage}" matches the requested artifact "${request.name}"`,
			);
		}
		for (const { job, status } of producers) {
			if (status !== "succeeded") {
				throw new MissingArtifactError(
					request.stage,
					request.name,
					`Artifact "${request.name}" from "${job.id}" is unavailable: producer ${status}`,
				);
			}
			const data = await store.get(producerOf(job), request.name);
			if (!data) {
				throw new MissingArtifactError(
					request.stage,
					request.name,
					`Artifact "${request.name}" from "${job.id}" was not found in the artifact store`,
				);
			}
			consumed.push({
				stage: job.stage,
				name: request.name,
				qualifier: job.qualifier,
				jobId: job.id,
				data,
			});
		}
	}
	return consumed;
}

export function createJobArtifacts(
	inputs: ConsumedArtifact[],
	staging: ArtifactStaging,
): JobArtifacts {
	return {
		inputs,
		get(stage, name, qualifier) {
			const matches = inputs.filter(
				(input) =>
					input.stage === stage &&
					input.name === name &&
					(qualifier === undefined || input.qualifier === qualifier),
			);
			const [match] = matches;
			if (!match) {
				throw new MissingArtifactError(stage, name, `Artifact "${stage}/${name}" was not consumed by this job`);
			}
			if (matches.length > 1) {
				throw new MissingArtifactError(
					stage,
					name,
					`Artifact "${stage}/${name}" is ambiguous; name one of: ${matches.map((item) => item.qualifier).join(" | ")}`,
				);
			}
			return match.data;
		},
		put(name, data) {
			staging.put(name, data);
		},
	};
}
