import { type LogLevel, settings } from "../config/settings";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

let threshold: LogLevel = settings.logLevel;

export function setLogLevel(level: LogLevel): void {
	threshold = level;
}

function enabled(level: LogLevel): boolean {
	return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}

export const logger = {
	debug: (msg: string, meta?: object) => {
		if (!enabled("debug")) return;
		console.debug(
			JSON.stringify({
				level: "debug",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
	info: (msg: string, meta?: object) => {
		if (!enabled("info")) return;
		console.log(
			JSON.stringify({
				level: "info",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
	warn: (msg: string, meta?: object) => {
		if (!enabled("warn")) return;
		console.warn(
			JSON.stringify({
				level: "warn",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
	error: (msg: string, error?: unknown, meta?: object) => {
		if (!enabled("error")) return;
		console.error(
			JSON.stringify({
				level: "error",
				message: msg,
				...meta,
				error: describeError(error),
				timestamp: Date.now(),
			}),
		);
	},
};
