export type SnapshotPayload = Record<string, unknown>;

export interface SnapshotInput {
	serviceName: string;
	timestamp: number;
	status: number;
	payload: SnapshotPayload;
}

export interface HealthEntry {
	serviceName: string;
	status: number;
	payload: SnapshotPayload;
}

export interface TimeRange {
	from: number;
	to: number;
}

export interface FailureStateRecord {
	serviceName: string;
	lastStatus: number;
	lastChecked: number;
	timesFailed: number;
	firstFailureTime: number | null;
	lastFailureTime: number | null;
}

export type TransitionKind =
	| "healthy"
	| "new"
	| "ongoing"
	| "changed"
	| "recovered";

export type TransitionOutcome =
	| { kind: "healthy" }
	| { kind: "new"; status: number }
	| { kind: "ongoing"; status: number }
	| { kind: "changed"; previousStatus: number; status: number }
	| { kind: "recovered"; previousStatus: number };

export type LogStrategyKind = "tail-file" | "newest-of-glob" | "journal-query";

interface LogFetchSpecBase {
	maxLines: number;
}

export interface TailFileSpec extends LogFetchSpecBase {
	strategy: "tail-file";
	path: string;
}

export interface NewestOfGlobSpec extends LogFetchSpecBase {
	strategy: "newest-of-glob";
	pattern: string;
}

export interface JournalQuerySpec extends LogFetchSpecBase {
	strategy: "journal-query";
	unit: string;
	userUnit?: boolean;
}

export type LogFetchSpec = TailFileSpec | NewestOfGlobSpec | JournalQuerySpec;

export type LogRegistry = ReadonlyMap<string, Readonly<LogFetchSpec>>;

export interface LogFetchResult {
	serviceName: string;
	strategy: LogStrategyKind | null;
	source: string | null;
	lines: string[];
	truncated: boolean;
	reason?: string;
}

export interface ServiceAssessment {
	serviceName: string;
	status: number;
	observedAt: number;
	outcome: TransitionOutcome;
	isCritical: boolean;
	timesFailed: number;
}

export interface WorkflowContext {
	cycleId: string;
	startedAt: number;
	assessments: ServiceAssessment[];
	critical: string[];
	logs: Record<string, LogFetchResult>;
}

export interface CycleResult {
	context: WorkflowContext;
	analysis: string | null;
}
