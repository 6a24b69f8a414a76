import type { EngineRuntimeEvent, OutputSource } from "../core/engine.js";
import type { RunGraph } from "../core/graph.js";
import type { JobResult, RunReport } from "../core/types.js";
import { formatDuration } from "../tui/run-view/format.js";

export type RunPaths = {
	runDir?: string;
	logsDir?: string;
	artifactsDir?: string;
};

/** One log line per runtime event; undefined for events not worth a line. */
export function describeEvent(event: EngineRuntimeEvent): string | undefined {
	switch (event.type) {
		case "run-started":
			return `Run ${event.runId}: ${event.pipeline} on ${event.context.event} ${event.context.ref} (${event.jobs.length} job(s))`;
		case "run-skipped":
			return `No trigger of ${event.pipeline} matches ${event.context.event} ${event.context.ref}; nothing to run`;
		case "stage-gated":
			return `Stage ${event.stage} skipped (${event.reason}): ${event.detail}`;
		case "job-started":
			return `▸ ${event.jobId} started`;
		case "job-finished": {
			const duration = event.startedAt ? ` in ${formatDuration(event.durationMs)}` : "";
			if (event.status === "skipped") {
				return undefined;
			}
			const reason = event.reason && event.status !== "succeeded" ? `: ${event.reason}` : "";
			return `${statusMark(event.status)} ${event.jobId} ${event.status}${duration}${reason}`;
		}
		case "jobs-cancelled":
			return `Cancelling ${event.jobIds.join(", ")} (${event.reason})`;
		case "run-finished":
			return `Run ${event.runId} ${event.status}`;
	}
}

export function formatRunSummary(report: RunReport): string[] {
	if (!report.result) {
		return [`${report.pipeline}: not triggered by ${report.context.event} ${report.context.ref}`];
	}
	const { result } = report;
	const lines = [`${report.pipeline}: ${result.status}`];
	for (const stage of result.stages) {
		const reason = stage.skipReason ? ` (${stage.skipReason})` : "";
		const failFast = stage.failFastTriggered ? " [fail-fast]" : "";
		lines.push(`  ${stage.stage}: ${stage.status}${reason}${failFast}`);
		for (const jobId of stage.jobIds) {
			const job = result.jobs.find((item) => item.jobId === jobId);
			if (job && stage.jobIds.length > 1) {
				lines.push(`    ${job.jobId}: ${describeJob(job)}`);
			} else if (job?.cause) {
				lines.push(`    ${job.cause.kind}: ${job.cause.message}`);
			}
		}
	}
	if (result.manifest.length > 0) {
		lines.push("Artifacts:");
		for (const entry of result.manifest) {
			lines.push(`  ${entry.key} ${entry.size}B sha256:${entry.sha256.slice(0, 12)}`);
		}
	}
	return lines;
}

export function formatPlan(graph: RunGraph): string[] {
	const lines = [`${graph.pipeline.name}: ${graph.stages.length} stage(s), ${graph.jobs.length} job(s)`];
	for (const index of graph.order) {
		const stage = graph.stages[index];
		const needs = stage.spec.needs.length > 0 ? ` <- ${stage.spec.needs.join(", ")}` : "";
		const condition = stage.spec.if ? ` if ${stage.spec.if}` : "";
		lines.push(`  ${stage.spec.id}${needs}${condition}`);
		for (const jobIndex of stage.jobs) {
			const job = graph.jobs[jobIndex];
			lines.push(`    ${job.id} (${job.steps.length} step(s))`);
		}
	}
	return lines;
}

export function buildJsonSummary(report: RunReport, paths: RunPaths = {}): Record<string, unknown> {
	return {
		...report,
		runDir: paths.runDir,
		logsDir: paths.logsDir,
		artifactsDir: paths.artifactsDir,
	};
}

/**
 * Prefixes every complete output line with its job id. Partial lines wait
 * for the rest of the line or for `flush`.
 */
export function createPrefixedOutput(write: (line: string, source: OutputSource) => void): {
	push: (chunk: string, source: OutputSource, jobId: string) => void;
	flush: () => void;
} {
	const partial = new Map<string, { text: string; source: OutputSource }>();

	return {
		push: (chunk, source, jobId) => {
			const key = `${jobId}\u0000${source}`;
			const lines = `${partial.get(key)?.text ?? ""}${chunk}`.split(/\r?\n/);
			const rest = lines.pop() ?? "";
			for (const line of lines) {
				write(`[${jobId}] ${line}`, source);
			}
			if (rest.length > 0) {
				partial.set(key, { text: rest, source });
			} else {
				partial.delete(key);
			}
		},
		flush: () => {
			for (const [key, { text, source }] of partial) {
				write(`[${key.split("\u0000")[0]}] ${text}`, source);
			}
			partial.clear();
		},
	};
}

function describeJob(job: JobResult): string {
	if (job.status === "failed" && job.cause) {
		return `failed (${job.cause.kind}): ${job.cause.message}`;
	}
	if (job.status === "skipped" && job.skipReason) {
		return `skipped (${job.skipReason})`;
	}
	if (job.status === "cancelled" && job.cancelReason) {
		return `cancelled (${job.cancelReason})`;
	}
	return job.status;
}

function statusMark(status: JobResult["status"]): string {
	switch (status) {
		case "succeeded":
			return "✓";
		case "failed":
			return "✕";
		case "cancelled":
			return "◌";
		case "skipped":
			return "–";
	}
}
