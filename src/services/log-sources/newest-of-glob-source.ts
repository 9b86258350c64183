import fg from "fast-glob";
import type { NewestOfGlobSpec } from "../../types";
import { isWithinRoots, resolveWithinRoots, tailFile } from "./file-reader";
import {
	emptyOutput,
	type FetchContext,
	type LogSourceOutput,
	TypedLogSource,
} from "./log-source";

export interface GlobCandidate {
	path: string;
	mtimeMs: number;
}

/** Most recently modified candidate; equal mtimes go to the greatest path. */
export function pickNewest(
	candidates: readonly GlobCandidate[],
): GlobCandidate | undefined {
	let newest: GlobCandidate | undefined;
	for (const candidate of candidates) {
		if (
			!newest ||
			candidate.mtimeMs > newest.mtimeMs ||
			(candidate.mtimeMs === newest.mtimeMs && candidate.path > newest.path)
		) {
			newest = candidate;
		}
	}
	return newest;
}

export class NewestOfGlobSource extends TypedLogSource<NewestOfGlobSpec> {
	readonly strategy = "newest-of-glob";

	constructor(private readonly roots: readonly string[]) {
		super();
	}

	protected async read(
		spec: NewestOfGlobSpec,
		context: FetchContext,
	): Promise<LogSourceOutput> {
		const target = resolveWithinRoots(spec.pattern, this.roots);
		if (!target.ok) {
			return emptyOutput(spec.pattern, target.reason);
		}

		const entries = await fg(target.path, {
			onlyFiles: true,
			absolute: true,
			stats: true,
			suppressErrors: true,
		});

		const candidates: GlobCandidate[] = [];
		for (const entry of entries) {
			if (!entry.stats) continue;
			if (this.roots.length > 0 && !isWithinRoots(entry.path, this.roots)) {
				continue;
			}
			candidates.push({ path: entry.path, mtimeMs: entry.stats.mtimeMs });
		}

		const newest = pickNewest(candidates);
		if (!newest) {
			return emptyOutput(target.path, `no files match ${target.path}`);
		}
		if (context.signal.aborted) {
			return emptyOutput(newest.path, "fetch cancelled");
		}
		return tailFile(newest.path, spec.maxLines, context.maxBytes, context.signal);
	}
}
