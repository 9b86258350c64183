import {
	applyTransition,
	classifyTransition,
	isCriticalOutcome,
	outcomeLabel,
} from "../core/failure-classifier";
import {
	getFailureState,
	listFailureStates,
	type RegistryDb,
	upsertFailureState,
} from "../db/registry";
import type { FailureState } from "../db/schema";
import type { ServiceAssessment } from "../types";
import { logger } from "../utils/logger";

export interface Observation {
	serviceName: string;
	status: number;
	timestamp: number;
}

export class FailureTrackerService {
	constructor(private readonly db: RegistryDb) {}

	/**
	 * Classifies one observation against the stored state and persists the
	 * result in a single transaction. Returns `null` when the observation is
	 * not newer than the last one classified for the service, so replaying a
	 * cycle never counts a failure twice.
	 */
	assess(observation: Observation): ServiceAssessment | null {
		const assessment = this.db.transaction((tx): ServiceAssessment | null => {
			const previous = getFailureState(tx, observation.serviceName);
			if (previous && previous.lastChecked >= observation.timestamp) {
				return null;
			}

			const outcome = classifyTransition(
				previous ? previous.lastStatus : null,
				observation.status,
			);
			const next = applyTransition(
				observation.serviceName,
				previous,
				outcome,
				observation.status,
				observation.timestamp,
			);
			upsertFailureState(tx, next);

			return {
				serviceName: observation.serviceName,
				status: observation.status,
				observedAt: observation.timestamp,
				outcome,
				isCritical: isCriticalOutcome(outcome),
				timesFailed: next.timesFailed,
			};
		});

		if (assessment && assessment.outcome.kind !== "healthy") {
			logger.info("Service transition classified", {
				service: assessment.serviceName,
				outcome: outcomeLabel(assessment.outcome.kind),
				status: assessment.status,
				timesFailed: assessment.timesFailed,
				critical: assessment.isCritical,
			});
		}
		return assessment;
	}

	getState(serviceName: string): FailureState | undefined {
		return getFailureState(this.db, serviceName);
	}

	listStates(): FailureState[] {
		return listFailureStates(this.db);
	}
}
