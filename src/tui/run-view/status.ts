import type { JobStatus } from "../../core/types.js";
import type { ViewStatus } from "./state.js";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export const STATUS_LABELS: Record<JobStatus | ViewStatus, string> = {
	pending: "queued",
	ready: "ready",
	running: "running",
	succeeded: "succeeded",
	failed: "failed",
	cancelled: "cancelled",
	skipped: "skipped",
};

export function renderStatusGlyph(status: JobStatus | ViewStatus, spinnerIndex: number): string {
	switch (status) {
		case "succeeded":
			return "●";
		case "failed":
			return "✕";
		case "running":
			return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length] ?? "⠋";
		case "cancelled":
			return "◌";
		case "skipped":
			return "–";
		default:
			return "○";
	}
}

export function colorForStatus(
	status: JobStatus | ViewStatus,
): "green" | "red" | "yellow" | "gray" | undefined {
	switch (status) {
		case "succeeded":
			return "green";
		case "failed":
			return "red";
		case "running":
			return "yellow";
		case "cancelled":
		case "skipped":
			return "gray";
		default:
			return undefined;
	}
}
