import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const StoreSchema = z
	.object({
		dir: z.string().min(1).default(".stagerun/runs"),
		artifacts: z.enum(["memory", "filesystem"]).default("filesystem"),
	})
	.default({
		dir: ".stagerun/runs",
		artifacts: "filesystem",
	});

export const ConfigSchema = z.object({
	concurrency: z.number().int().positive().optional(),
	jobTimeoutMs: z.number().int().positive().optional(),
	pipelinesDir: z.string().min(1).default(".stagerun/pipelines"),
	store: StoreSchema,
	shell: z.enum(["bash", "sh"]).default("bash"),
	env: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default({}),
	logLevel: LogLevelSchema.default("info"),
	actor: z.string().min(1).default("local"),
});

export type StagerunConfig = z.infer<typeof ConfigSchema>;
