import type { TailFileSpec } from "../../types";
import { resolveWithinRoots, tailFile } from "./file-reader";
import {
	emptyOutput,
	type FetchContext,
	type LogSourceOutput,
	TypedLogSource,
} from "./log-source";

export class TailFileSource extends TypedLogSource<TailFileSpec> {
	readonly strategy = "tail-file";

	constructor(private readonly roots: readonly string[]) {
		super();
	}

	protected async read(
		spec: TailFileSpec,
		context: FetchContext,
	): Promise<LogSourceOutput> {
		const target = resolveWithinRoots(spec.path, this.roots);
		if (!target.ok) {
			return emptyOutput(spec.path, target.reason);
		}
		return tailFile(target.path, spec.maxLines, context.maxBytes, context.signal);
	}
}
