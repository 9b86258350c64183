import type { CycleResult } from "../types";
import { logger } from "../utils/logger";
import type { IngestionReport, IngestionService } from "./ingestion-service";
import type { PipelineService } from "./pipeline-service";

export interface CycleReport {
	ingestion: IngestionReport;
	result: CycleResult | null;
}

export class MonitorCycleService {
	constructor(
		private readonly ingestion: IngestionService,
		private readonly pipeline: PipelineService,
	) {}

	async run(): Promise<CycleReport> {
		const ingestion = await this.ingestion.runIngestion();
		if (ingestion.abandoned) {
			logger.warn("Skipping detection, no fresh snapshots this tick");
			return { ingestion, result: null };
		}
		const result = await this.pipeline.runCycle();
		return { ingestion, result };
	}
}
