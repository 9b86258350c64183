import { open } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { emptyOutput, type LogSourceOutput, lastLines } from "./log-source";

export type RootCheck = { ok: true; path: string } | { ok: false; reason: string };

/**
 * Resolves a locator against the configured log roots. Relative locators are
 * anchored at the first root; an empty root list leaves paths unrestricted.
 */
export function resolveWithinRoots(
	locator: string,
	roots: readonly string[],
): RootCheck {
	const [primary] = roots;
	const path = primary ? resolve(primary, locator) : resolve(locator);
	if (roots.length === 0 || isWithinRoots(path, roots)) {
		return { ok: true, path };
	}
	return { ok: false, reason: `${path} is outside the configured log roots` };
}

export function isWithinRoots(path: string, roots: readonly string[]): boolean {
	return roots.some((root) => {
		const rel = relative(resolve(root), path);
		return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
	});
}

function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

/**
 * Reads at most `maxBytes` from the end of a file and returns its last
 * `maxLines` lines. A partial first line from a mid-file start is dropped.
 */
export async function tailFile(
	path: string,
	maxLines: number,
	maxBytes: number,
	signal: AbortSignal,
): Promise<LogSourceOutput> {
	let handle: Awaited<ReturnType<typeof open>> | undefined;
	try {
		handle = await open(path, "r");
		const { size } = await handle.stat();
		if (signal.aborted) {
			return emptyOutput(path, "fetch cancelled");
		}

		const start = Math.max(0, size - maxBytes);
		const length = size - start;
		const buffer = Buffer.alloc(length);
		let offset = 0;
		while (offset < length) {
			const { bytesRead } = await handle.read(
				buffer,
				offset,
				length - offset,
				start + offset,
			);
			if (bytesRead === 0) break;
			offset += bytesRead;
		}

		const lines = buffer.subarray(0, offset).toString("utf8").split(/\r?\n/);
		if (lines.length > 0 && lines[lines.length - 1] === "") {
			lines.pop();
		}
		if (start > 0) {
			lines.shift();
		}

		const tail = lastLines(lines, maxLines);
		return {
			source: path,
			lines: tail.lines,
			truncated: tail.truncated || start > 0,
			...(tail.lines.length === 0 ? { reason: `${path} is empty` } : {}),
		};
	} catch (error) {
		const code = errorCode(error);
		if (code === "ENOENT") {
			return emptyOutput(path, `${path} does not exist`);
		}
		if (code === "EACCES" || code === "EPERM") {
			return emptyOutput(path, `${path} is not readable`);
		}
		if (code === "EISDIR") {
			return emptyOutput(path, `${path} is a directory`);
		}
		return emptyOutput(path, `failed to read ${path}: ${String(error)}`);
	} finally {
		await handle?.close();
	}
}
