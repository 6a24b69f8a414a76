import type { MatrixAssignment } from "../../core/types.js";

export function formatDuration(durationMs: number): string {
	if (durationMs < 1000) {
		return `${durationMs}ms`;
	}
	const seconds = durationMs / 1000;
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = Math.round(seconds % 60);
	return `${minutes}m${remainder}s`;
}

export function formatMatrix(matrix: MatrixAssignment): string {
	return Object.entries(matrix)
		.map(([axis, value]) => `${axis}: ${String(value)}`)
		.join(", ");
}
