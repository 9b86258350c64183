export { isWithinRoots, resolveWithinRoots, tailFile } from "./file-reader";
export {
	type CommandRunner,
	JournalQuerySource,
	runCommand,
} from "./journal-query-source";
export {
	emptyOutput,
	type FetchContext,
	type LogSource,
	type LogSourceOutput,
} from "./log-source";
export { NewestOfGlobSource } from "./newest-of-glob-source";
export { TailFileSource } from "./tail-file-source";
