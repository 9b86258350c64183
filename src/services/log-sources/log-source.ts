import type { LogFetchSpec, LogStrategyKind } from "../../types";

export interface FetchContext {
	signal: AbortSignal;
	maxBytes: number;
}

export interface LogSourceOutput {
	source: string | null;
	lines: string[];
	truncated: boolean;
	reason?: string;
}

export interface LogSource {
	readonly strategy: LogStrategyKind;
	fetch(spec: LogFetchSpec, context: FetchContext): Promise<LogSourceOutput>;
}

export function emptyOutput(source: string | null, reason: string): LogSourceOutput {
	return { source, lines: [], truncated: false, reason };
}

/**
 * Narrows the incoming spec to the strategy a source handles and hands it to
 * `read`. A spec for another strategy produces an empty output.
 */
export abstract class TypedLogSource<S extends LogFetchSpec> implements LogSource {
	abstract readonly strategy: S["strategy"];

	protected abstract read(spec: S, context: FetchContext): Promise<LogSourceOutput>;

	protected accepts(spec: LogFetchSpec): spec is S {
		return spec.strategy === this.strategy;
	}

	async fetch(spec: LogFetchSpec, context: FetchContext): Promise<LogSourceOutput> {
		if (!this.accepts(spec)) {
			return emptyOutput(null, `strategy ${spec.strategy} is not handled by ${this.strategy}`);
		}
		if (context.signal.aborted) {
			return emptyOutput(null, "fetch cancelled before start");
		}
		return this.read(spec, context);
	}
}

/** Keeps the newest `maxLines` lines. */
export function lastLines(lines: string[], maxLines: number): { lines: string[]; truncated: boolean } {
	if (lines.length <= maxLines) {
		return { lines, truncated: false };
	}
	return { lines: lines.slice(lines.length - maxLines), truncated: true };
}
