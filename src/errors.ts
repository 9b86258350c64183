export class MonitorSourceError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = "MonitorSourceError";
	}
}

/** Raised when the transition classifier sees a status it cannot place. */
export class ClassificationInvariantError extends Error {
	constructor(
		message: string,
		readonly serviceName?: string,
	) {
		super(message);
		this.name = "ClassificationInvariantError";
	}
}
