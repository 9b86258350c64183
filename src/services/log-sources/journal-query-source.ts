import { type ExecFileException, execFile } from "node:child_process";
import type { JournalQuerySpec } from "../../types";
import {
	emptyOutput,
	type FetchContext,
	type LogSourceOutput,
	lastLines,
	TypedLogSource,
} from "./log-source";

export interface CommandOptions {
	timeout: number;
	maxBuffer: number;
	signal: AbortSignal;
}

export interface CommandOutput {
	stdout: string;
	stderr: string;
}

export class CommandError extends Error {
	constructor(
		message: string,
		readonly code: number | string | null,
		readonly timedOut: boolean,
		readonly stderr: string,
	) {
		super(message);
		this.name = "CommandError";
	}
}

export type CommandRunner = (
	file: string,
	args: readonly string[],
	options: CommandOptions,
) => Promise<CommandOutput>;

function toCommandError(error: ExecFileException, stderr: string): CommandError {
	const timedOut =
		error.killed === true || error.signal === "SIGTERM" || error.name === "AbortError";
	return new CommandError(
		error.message,
		error.code ?? null,
		timedOut,
		stderr,
	);
}

export const runCommand: CommandRunner = (file, args, options) =>
	new Promise((resolve, reject) => {
		execFile(
			file,
			[...args],
			{
				encoding: "utf8",
				timeout: options.timeout,
				maxBuffer: options.maxBuffer,
				signal: options.signal,
				windowsHide: true,
			},
			(error, stdout, stderr) => {
				if (error) {
					reject(toCommandError(error, stderr));
					return;
				}
				resolve({ stdout, stderr });
			},
		);
	});

// journalctl prints "-- No entries --", "-- Boot ... --" and similar markers
const JOURNAL_MARKER = /^-- .* --$/;

export function parseJournalOutput(stdout: string): string[] {
	return stdout
		.split(/\r?\n/)
		.filter((line) => line.length > 0 && !JOURNAL_MARKER.test(line));
}

export function journalArgs(spec: JournalQuerySpec): string[] {
	return [
		...(spec.userUnit ? ["--user"] : []),
		"--no-pager",
		"--unit",
		spec.unit,
		"--lines",
		String(spec.maxLines),
		"--output",
		"short-iso",
	];
}

function describeFailure(error: unknown, unit: string, timeoutMs: number): string {
	if (error instanceof CommandError) {
		if (error.code === "ENOENT") {
			return "journalctl is not available on this host";
		}
		if (error.timedOut) {
			return `journal query for ${unit} timed out after ${timeoutMs}ms`;
		}
		if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
			return `journal output for ${unit} exceeded the size cap`;
		}
		const detail = error.stderr.trim().split(/\r?\n/)[0] ?? "";
		return `journalctl exited with code ${String(error.code)} for ${unit}${detail ? `: ${detail}` : ""}`;
	}
	return `journal query for ${unit} failed: ${String(error)}`;
}

export class JournalQuerySource extends TypedLogSource<JournalQuerySpec> {
	readonly strategy = "journal-query";

	constructor(
		private readonly timeoutMs: number,
		private readonly runner: CommandRunner = runCommand,
	) {
		super();
	}

	protected async read(
		spec: JournalQuerySpec,
		context: FetchContext,
	): Promise<LogSourceOutput> {
		const source = spec.userUnit ? `user:${spec.unit}` : spec.unit;
		try {
			const { stdout } = await this.runner("journalctl", journalArgs(spec), {
				timeout: this.timeoutMs,
				maxBuffer: context.maxBytes,
				signal: context.signal,
			});
			const tail = lastLines(parseJournalOutput(stdout), spec.maxLines);
			if (tail.lines.length === 0) {
				return emptyOutput(source, `no journal entries for unit ${spec.unit}`);
			}
			return { source, lines: tail.lines, truncated: tail.truncated };
		} catch (error) {
			return emptyOutput(source, describeFailure(error, spec.unit, this.timeoutMs));
		}
	}
}
