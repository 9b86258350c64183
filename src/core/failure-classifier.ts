import { ClassificationInvariantError } from "../errors";
import type {
	FailureStateRecord,
	TransitionKind,
	TransitionOutcome,
} from "../types";

export const HEALTHY_STATUS = 0;

/** Previous side of a transition. `null` means the service has no stored row yet. */
export type PreviousStatus = number | null;

function assertStatus(value: number, label: string): void {
	if (!Number.isInteger(value)) {
		throw new ClassificationInvariantError(
			`${label} status must be an integer, got ${String(value)}`,
		);
	}
}

export function isFailing(status: number): boolean {
	return status !== HEALTHY_STATUS;
}

/**
 * Classifies one status transition. The coarse state is binary (healthy vs
 * failing); two failing statuses count as the same failure only when their
 * codes are equal, so a different root cause reported under the same code
 * stays "ongoing".
 */
export function classifyTransition(
	previous: PreviousStatus,
	next: number,
): TransitionOutcome {
	const prior = previous ?? HEALTHY_STATUS;
	assertStatus(prior, "previous");
	assertStatus(next, "next");

	if (!isFailing(prior)) {
		return isFailing(next) ? { kind: "new", status: next } : { kind: "healthy" };
	}

	if (!isFailing(next)) {
		return { kind: "recovered", previousStatus: prior };
	}

	return prior === next
		? { kind: "ongoing", status: next }
		: { kind: "changed", previousStatus: prior, status: next };
}

export function isCriticalOutcome(outcome: TransitionOutcome): boolean {
	switch (outcome.kind) {
		case "new":
		case "changed":
			return true;
		case "healthy":
		case "ongoing":
		case "recovered":
			return false;
		default:
			return assertNever(outcome);
	}
}

/**
 * Next persisted failure state for a service after observing `status` at
 * `observedAt`. Only "new" and "changed" increment the failure counter.
 */
export function applyTransition(
	serviceName: string,
	previous: FailureStateRecord | undefined,
	outcome: TransitionOutcome,
	status: number,
	observedAt: number,
): FailureStateRecord {
	const base: FailureStateRecord = previous ?? {
		serviceName,
		lastStatus: HEALTHY_STATUS,
		lastChecked: observedAt,
		timesFailed: 0,
		firstFailureTime: null,
		lastFailureTime: null,
	};

	switch (outcome.kind) {
		case "healthy":
		case "recovered":
			return { ...base, lastStatus: status, lastChecked: observedAt };
		case "ongoing":
			return { ...base, lastChecked: observedAt };
		case "new":
			return {
				...base,
				lastStatus: status,
				lastChecked: observedAt,
				timesFailed: base.timesFailed + 1,
				firstFailureTime: observedAt,
				lastFailureTime: observedAt,
			};
		case "changed":
			return {
				...base,
				lastStatus: status,
				lastChecked: observedAt,
				timesFailed: base.timesFailed + 1,
				lastFailureTime: observedAt,
			};
		default:
			return assertNever(outcome);
	}
}

export function outcomeLabel(kind: TransitionKind): string {
	return kind.toUpperCase();
}

function assertNever(value: never): never {
	throw new ClassificationInvariantError(
		`Unhandled transition outcome: ${JSON.stringify(value)}`,
	);
}
