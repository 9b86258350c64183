import { randomUUID } from "node:crypto";
import { ClassificationInvariantError } from "../errors";
import type {
	CycleResult,
	LogFetchResult,
	ServiceAssessment,
	WorkflowContext,
} from "../types";
import { logger } from "../utils/logger";
import type { AnalysisClient } from "./analysis-client";
import type { FailureTrackerService } from "./failure-tracker-service";
import type { LogAggregatorService } from "./log-aggregator-service";
import type { SnapshotStore } from "./snapshot-store";

/**
 * Detect, fetch, hand off. Logs are fetched for critical services only and
 * the analysis result is returned to the caller, never written back.
 */
export class PipelineService {
	constructor(
		private readonly store: SnapshotStore,
		private readonly tracker: FailureTrackerService,
		private readonly aggregator: LogAggregatorService,
		private readonly analysisClient: AnalysisClient | null,
		private readonly now: () => number = Date.now,
	) {}

	async runCycle(): Promise<CycleResult> {
		const context: WorkflowContext = {
			cycleId: randomUUID(),
			startedAt: this.now(),
			assessments: this.detect(),
			critical: [],
			logs: {},
		};
		context.critical = context.assessments
			.filter((assessment) => assessment.isCritical)
			.map((assessment) => assessment.serviceName);

		if (context.critical.length === 0) {
			logger.info("No new failures this cycle", {
				cycleId: context.cycleId,
				assessed: context.assessments.length,
				failing: context.assessments.filter((a) => a.status !== 0).length,
			});
			return { context, analysis: null };
		}

		context.logs = await this.fetchLogs(context.critical);
		const analysis = await this.handoff(context);
		return { context, analysis };
	}

	/** Stage 1: classify the latest snapshot of every service that has a fresh one. */
	detect(): ServiceAssessment[] {
		const assessments: ServiceAssessment[] = [];
		for (const snapshot of this.store.latestPerService()) {
			try {
				const assessment = this.tracker.assess({
					serviceName: snapshot.serviceName,
					status: snapshot.status,
					timestamp: snapshot.timestamp,
				});
				if (assessment) {
					assessments.push(assessment);
				}
			} catch (error) {
				if (error instanceof ClassificationInvariantError) {
					throw error;
				}
				logger.error("Failed to classify service", error, {
					service: snapshot.serviceName,
				});
			}
		}
		return assessments;
	}

	/** Stage 2: fetch concurrently; each fetch carries its own deadline. */
	private async fetchLogs(
		services: string[],
	): Promise<Record<string, LogFetchResult>> {
		const results = await Promise.all(
			services.map((serviceName) =>
				this.aggregator.fetchForService(serviceName),
			),
		);
		const logs: Record<string, LogFetchResult> = {};
		for (const result of results) {
			logs[result.serviceName] = result;
		}
		return logs;
	}

	/** Stage 3: one attempt, no retry. */
	private async handoff(context: WorkflowContext): Promise<string | null> {
		if (!this.analysisClient) {
			logger.info("Critical failures detected, no analysis endpoint configured", {
				cycleId: context.cycleId,
				critical: context.critical,
			});
			return null;
		}

		try {
			const analysis = await this.analysisClient.analyze(context);
			logger.info("Analysis completed", {
				cycleId: context.cycleId,
				critical: context.critical,
				analysis,
			});
			return analysis;
		} catch (error) {
			logger.error("Analysis handoff failed", error, {
				cycleId: context.cycleId,
				critical: context.critical,
			});
			return null;
		}
	}
}
