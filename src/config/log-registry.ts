import { readFileSync } from "node:fs";
import { z } from "zod";
import type { LogFetchSpec, LogRegistry } from "../types";

const maxLines = z.number().int().positive().max(10_000);

const LogFetchSpecSchema = z.discriminatedUnion("strategy", [
	z.object({
		strategy: z.literal("tail-file"),
		path: z.string().min(1),
		maxLines: maxLines.optional(),
	}),
	z.object({
		strategy: z.literal("newest-of-glob"),
		pattern: z.string().min(1),
		maxLines: maxLines.optional(),
	}),
	z.object({
		strategy: z.literal("journal-query"),
		unit: z.string().min(1),
		userUnit: z.boolean().optional(),
		maxLines: maxLines.optional(),
	}),
]);

const LogRegistryFileSchema = z.object({
	services: z.record(z.string().min(1), LogFetchSpecSchema),
});

export type LogRegistryFile = z.input<typeof LogRegistryFileSchema>;

export function parseLogRegistry(
	raw: unknown,
	defaultMaxLines: number,
): LogRegistry {
	const result = LogRegistryFileSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid log registry: ${issues}`);
	}

	const entries: Array<[string, LogFetchSpec]> = Object.entries(
		result.data.services,
	).map(([serviceName, spec]) => [
		serviceName,
		{ ...spec, maxLines: spec.maxLines ?? defaultMaxLines },
	]);
	return buildLogRegistry(entries);
}

/** Freezes the per-service specs into a read-only lookup built once at startup. */
export function buildLogRegistry(
	entries: Iterable<[string, LogFetchSpec]>,
): LogRegistry {
	const registry = new Map<string, Readonly<LogFetchSpec>>();
	for (const [serviceName, spec] of entries) {
		registry.set(serviceName, Object.freeze({ ...spec }));
	}
	return registry;
}

export function loadLogRegistry(
	path: string,
	defaultMaxLines: number,
): LogRegistry {
	const text = readFileSync(path, "utf8");
	return parseLogRegistry(JSON.parse(text), defaultMaxLines);
}
