import type {
	JournalQuerySpec,
	LogFetchResult,
	LogFetchSpec,
	LogRegistry,
	LogStrategyKind,
} from "../types";
import { logger } from "../utils/logger";
import {
	type CommandRunner,
	emptyOutput,
	JournalQuerySource,
	type LogSource,
	type LogSourceOutput,
	NewestOfGlobSource,
	runCommand,
	TailFileSource,
} from "./log-sources";

export interface LogAggregatorOptions {
	roots: readonly string[];
	defaultMaxLines: number;
	maxBytes: number;
	fileTimeoutMs: number;
	journalTimeoutMs: number;
	journalFallback: boolean;
}

export function fallbackUnits(serviceName: string): string[] {
	const candidates = [
		`${serviceName}.service`,
		`${serviceName.replace(/_/g, "-")}.service`,
		serviceName,
	];
	return [...new Set(candidates)];
}

/** Drops the oldest lines until the block fits in `maxBytes`. */
export function capBytes(
	lines: string[],
	maxBytes: number,
): { lines: string[]; truncated: boolean } {
	let total = 0;
	let keepFrom = lines.length;
	for (let i = lines.length - 1; i >= 0; i--) {
		const size = Buffer.byteLength(lines[i] ?? "", "utf8") + 1;
		if (total + size > maxBytes) break;
		total += size;
		keepFrom = i;
	}
	return keepFrom === 0
		? { lines, truncated: false }
		: { lines: lines.slice(keepFrom), truncated: true };
}

export class LogAggregatorService {
	private readonly sources: Readonly<Record<LogStrategyKind, LogSource>>;

	constructor(
		private readonly registry: LogRegistry,
		private readonly options: LogAggregatorOptions,
		runner: CommandRunner = runCommand,
	) {
		this.sources = {
			"tail-file": new TailFileSource(options.roots),
			"newest-of-glob": new NewestOfGlobSource(options.roots),
			"journal-query": new JournalQuerySource(options.journalTimeoutMs, runner),
		};
	}

	hasSpec(serviceName: string): boolean {
		return this.registry.has(serviceName);
	}

	async fetchForService(serviceName: string): Promise<LogFetchResult> {
		const spec = this.registry.get(serviceName);
		if (spec) {
			return this.fetch(serviceName, spec);
		}
		if (!this.options.journalFallback) {
			return {
				serviceName,
				strategy: null,
				source: null,
				lines: [],
				truncated: false,
				reason: `no log source configured for ${serviceName}`,
			};
		}
		return this.fetchFromJournalFallback(serviceName);
	}

	async fetch(
		serviceName: string,
		spec: Readonly<LogFetchSpec>,
	): Promise<LogFetchResult> {
		const output = await this.runWithTimeout(spec);
		const byLines =
			output.lines.length > spec.maxLines
				? output.lines.slice(output.lines.length - spec.maxLines)
				: output.lines;
		const capped = capBytes(byLines, this.options.maxBytes);

		const result: LogFetchResult = {
			serviceName,
			strategy: spec.strategy,
			source: output.source,
			lines: capped.lines,
			truncated:
				output.truncated ||
				capped.truncated ||
				byLines.length < output.lines.length,
			...(output.reason ? { reason: output.reason } : {}),
		};

		if (result.reason) {
			logger.warn("Log source unavailable", {
				service: serviceName,
				strategy: spec.strategy,
				reason: result.reason,
			});
		}
		return result;
	}

	private async fetchFromJournalFallback(
		serviceName: string,
	): Promise<LogFetchResult> {
		const units = fallbackUnits(serviceName);
		for (const unit of units) {
			const spec: JournalQuerySpec = {
				strategy: "journal-query",
				unit,
				maxLines: this.options.defaultMaxLines,
			};
			const output = await this.runWithTimeout(spec);
			if (output.lines.length > 0) {
				logger.debug("Resolved logs through journal fallback", {
					service: serviceName,
					unit,
				});
				const capped = capBytes(
					output.lines.slice(-spec.maxLines),
					this.options.maxBytes,
				);
				return {
					serviceName,
					strategy: "journal-query",
					source: output.source,
					lines: capped.lines,
					truncated: output.truncated || capped.truncated,
				};
			}
		}

		return {
			serviceName,
			strategy: null,
			source: null,
			lines: [],
			truncated: false,
			reason: `no log source configured for ${serviceName} and no journal entries for ${units.join(", ")}`,
		};
	}

	private timeoutFor(strategy: LogStrategyKind): number {
		return strategy === "journal-query"
			? this.options.journalTimeoutMs
			: this.options.fileTimeoutMs;
	}

	/**
	 * Runs one strategy under its own deadline. When the deadline passes the
	 * source is signalled to abort and the caller gets an empty output at once,
	 * whether or not the source has settled.
	 */
	private async runWithTimeout(
		spec: Readonly<LogFetchSpec>,
	): Promise<LogSourceOutput> {
		const timeoutMs = this.timeoutFor(spec.strategy);
		const controller = new AbortController();
		let timer: NodeJS.Timeout | undefined;

		const deadline = new Promise<LogSourceOutput>((resolve) => {
			timer = setTimeout(() => {
				controller.abort();
				resolve(
					emptyOutput(null, `${spec.strategy} fetch timed out after ${timeoutMs}ms`),
				);
			}, timeoutMs);
		});

		const source = this.sources[spec.strategy];
		const work = source
			.fetch(spec, { signal: controller.signal, maxBytes: this.options.maxBytes })
			.catch((error: unknown) =>
				emptyOutput(null, `${spec.strategy} fetch failed: ${String(error)}`),
			);

		try {
			return await Promise.race([work, deadline]);
		} finally {
			clearTimeout(timer);
		}
	}
}
