import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { EngineRuntimeEvent, OutputListener } from "../core/engine.js";
import { errorMessage } from "../core/errors.js";
import type { JobRun, RunRecord, RunReport } from "../core/types.js";
import type { Logger } from "../utils/logger.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 1;

/**
 * On-disk layout of one run:
 * `<baseDir>/<runId>/{run.json,report.json,manifest.json,logs/,artifacts/}`.
 */
export class RunStore {
	constructor(private readonly baseDir: string) {}

	/** Path inside the run directory; nothing is created. */
	resolveRunPath(runId: string, ...segments: string[]): string {
		return path.join(ensureWithinBase(this.baseDir, runId, "run id"), ...segments);
	}

	createRunDir(runId: string): string {
		const runDir = this.resolveRunPath(runId);
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const logsDir = path.join(this.createRunDir(runId), "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	logFilePath(runId: string, jobId: string): string {
		return ensureWithinBase(this.createLogsDir(runId), getJobLogFileName(jobId), "job log file");
	}

	writeRun(run: RunRecord): void {
		this.writeJson(run.id, "run.json", run);
	}

	writeReport(report: RunReport): string {
		if (report.result) {
			this.writeJson(report.runId, "manifest.json", report.result.manifest);
		}
		return this.writeJson(report.runId, "report.json", report);
	}

	private writeJson(runId: string, fileName: string, value: unknown): string {
		const recordPath = path.join(this.createRunDir(runId), fileName);
		fs.writeFileSync(recordPath, `${JSON.stringify(value, null, 2)}\n`);
		return recordPath;
	}
}

export function getJobLogFileName(jobId: string): string {
	const normalized = sanitizePathSegment(jobId.toLowerCase(), "job");
	const hash = crypto.createHash("sha1").update(jobId).digest("hex").slice(0, 8);
	return `${normalized}-${hash}.log`;
}

export function createRunEventPersister(runStore: RunStore): (event: EngineRuntimeEvent) => void {
	let run: RunRecord | null = null;

	const findJob = (runId: string, jobId: string): JobRun | undefined =>
		run && run.id === runId ? run.jobs.find((item) => item.jobId === jobId) : undefined;

	return (event) => {
		switch (event.type) {
			case "run-started":
				run = {
					schemaVersion: RUN_RECORD_SCHEMA_VERSION,
					id: event.runId,
					pipeline: event.pipeline,
					context: event.context,
					status: "running",
					createdAt: event.createdAt,
					jobs: event.jobs.map((job) => ({
						jobId: job.jobId,
						stage: job.stage,
						status: "pending",
						matrix: job.matrix,
					})),
					artifactDir: event.artifactDir,
					logDir: event.logDir,
				};
				runStore.writeRun(run);
				return;
			case "job-started": {
				const job = findJob(event.runId, event.jobId);
				if (!run || !job) {
					return;
				}
				job.status = "running";
				job.startedAt = event.startedAt;
				runStore.writeRun(run);
				return;
			}
			case "job-finished": {
				const job = findJob(event.runId, event.jobId);
				if (!run || !job) {
					return;
				}
				job.status = event.status;
				job.exitCode = event.exitCode;
				job.startedAt = event.startedAt;
				job.finishedAt = event.finishedAt;
				job.durationMs = event.durationMs;
				job.reason = event.reason;
				runStore.writeRun(run);
				return;
			}
			case "run-finished":
				if (!run || run.id !== event.runId) {
					return;
				}
				run.status = event.status;
				run.finishedAt = event.finishedAt;
				runStore.writeRun(run);
				return;
			case "run-skipped":
			case "stage-gated":
			case "jobs-cancelled":
				return;
		}
	};
}

/**
 * Appends step output to one log file per job. `close` must be called once
 * the run is over. A job whose log cannot be written is reported once and
 * its later output is dropped; the run itself carries on.
 */
export function createJobLogWriter(
	runStore: RunStore,
	runId: string,
	logger: Pick<Logger, "warn">,
): { onOutput: OutputListener; close: () => Promise<void> } {
	const streams = new Map<string, fs.WriteStream>();
	const broken = new Set<string>();

	const drop = (jobId: string, error: unknown): void => {
		streams.delete(jobId);
		if (!broken.has(jobId)) {
			broken.add(jobId);
			logger.warn(`Log for ${jobId} is not being written: ${errorMessage(error)}`);
		}
	};

	const streamFor = (jobId: string): fs.WriteStream | undefined => {
		if (broken.has(jobId)) {
			return undefined;
		}
		let stream = streams.get(jobId);
		if (!stream) {
			try {
				stream = fs.createWriteStream(runStore.logFilePath(runId, jobId), { flags: "a" });
			} catch (error) {
				drop(jobId, error);
				return undefined;
			}
			stream.on("error", (error) => drop(jobId, error));
			streams.set(jobId, stream);
		}
		return stream;
	};

	return {
		onOutput: (chunk, _source, jobId) => {
			streamFor(jobId)?.write(chunk);
		},
		close: async () => {
			await Promise.all(
				[...streams.values()].map(
					(stream) =>
						new Promise<void>((resolve) => {
							stream.once("error", () => resolve());
							stream.end(() => resolve());
						}),
				),
			);
			streams.clear();
		},
	};
}
