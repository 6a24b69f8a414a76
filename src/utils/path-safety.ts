import crypto from "node:crypto";
import path from "node:path";

export function ensureWithinBase(baseDir: string, childPath: string, label: string): string {
	const base = path.resolve(baseDir);
	const resolved = path.resolve(base, childPath);
	const rel = path.relative(base, resolved);
	if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
		throw new Error(`Invalid ${label}: "${childPath}" escapes ${base}`);
	}
	return resolved;
}

/**
 * One file-name segment. Matrix qualifiers keep their `=` and `,` so
 * `os=linux,node=20` stays readable on disk.
 */
export function sanitizePathSegment(value: string, fallback: string): string {
	const normalized = value
		.trim()
		.replace(/[\\/]+/g, "-")
		.replace(/[^a-zA-Z0-9._=,-]+/g, "-")
		.replace(/^[-.]+|-+$/g, "")
		.slice(0, 128);
	return normalized.length > 0 ? normalized : fallback;
}

/**
 * Like sanitizePathSegment, but distinct values never share a segment. A
 * value that survives sanitizing unchanged is used as is; any other value
 * gets `@` and a short hash of the raw text appended. `@` never survives
 * sanitizing, so the two forms cannot collide. An empty value maps to the
 * fallback.
 */
export function uniquePathSegment(value: string, fallback: string): string {
	const sanitized = sanitizePathSegment(value, fallback);
	if (sanitized === value || value.length === 0) {
		return sanitized;
	}
	const hash = crypto.createHash("sha1").update(value).digest("hex").slice(0, 8);
	return `${sanitized.slice(0, 119)}@${hash}`;
}
