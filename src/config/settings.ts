import "dotenv/config";
import { z } from "zod";

const JOURNAL_TIMEOUT_CEILING_MS = 10_000;

const booleanFlag = z
	.enum(["true", "false", "1", "0"])
	.transform((value) => value === "true" || value === "1");

const listOf = z
	.string()
	.transform((value) =>
		value
			.split(",")
			.map((item) => item.trim())
			.filter((item) => item.length > 0),
	);

const EnvSchema = z.object({
	MONITOR_URL: z
		.string()
		.url()
		.default("http://localhost:2812/_status?format=xml"),
	MONITOR_USER: z.string().default(""),
	MONITOR_PASSWORD: z.string().default(""),
	MONITOR_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
	POLL_INTERVAL_SEC: z.coerce.number().int().positive().default(300),
	RUN_ON_START: booleanFlag.default("true"),
	RETENTION_DAYS: z.coerce.number().int().positive().default(30),
	DATABASE_PATH: z.string().min(1).default("./data/health-history.db"),
	LOG_REGISTRY_PATH: z.string().min(1).default("./config/log-registry.json"),
	LOG_ROOTS: listOf.default("/var/log,/data"),
	LOG_DEFAULT_MAX_LINES: z.coerce.number().int().positive().default(100),
	LOG_MAX_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
	FILE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
	JOURNAL_TIMEOUT_MS: z.coerce
		.number()
		.int()
		.positive()
		.default(JOURNAL_TIMEOUT_CEILING_MS)
		.transform((value) => Math.min(value, JOURNAL_TIMEOUT_CEILING_MS)),
	JOURNAL_FALLBACK: booleanFlag.default("true"),
	ANALYSIS_URL: z.string().default(""),
	ANALYSIS_MODEL: z.string().min(1).default("llama3.1:8b"),
	ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
	HOST: z.string().default("0.0.0.0"),
	PORT: z.coerce.number().int().positive().default(8000),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type LogLevel = "debug" | "info" | "warn" | "error";

export function loadSettings(env: NodeJS.ProcessEnv = process.env) {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid configuration: ${issues}`);
	}
	const e = parsed.data;

	return {
		monitor: {
			url: e.MONITOR_URL,
			username: e.MONITOR_USER,
			password: e.MONITOR_PASSWORD,
			timeoutMs: e.MONITOR_TIMEOUT_MS,
		},
		scheduler: {
			pollIntervalSec: e.POLL_INTERVAL_SEC,
			runOnStart: e.RUN_ON_START,
		},
		retention: {
			days: e.RETENTION_DAYS,
		},
		database: {
			path: e.DATABASE_PATH,
		},
		logs: {
			registryPath: e.LOG_REGISTRY_PATH,
			roots: e.LOG_ROOTS,
			defaultMaxLines: e.LOG_DEFAULT_MAX_LINES,
			maxBytes: e.LOG_MAX_BYTES,
			fileTimeoutMs: e.FILE_TIMEOUT_MS,
			journalTimeoutMs: e.JOURNAL_TIMEOUT_MS,
			journalFallback: e.JOURNAL_FALLBACK,
		},
		analysis: {
			url: e.ANALYSIS_URL,
			model: e.ANALYSIS_MODEL,
			timeoutMs: e.ANALYSIS_TIMEOUT_MS,
		},
		server: {
			host: e.HOST,
			port: e.PORT,
		},
		logLevel: e.LOG_LEVEL satisfies LogLevel,
	};
}

export type Settings = ReturnType<typeof loadSettings>;

export const settings: Settings = loadSettings();
