import { serve } from "@hono/node-server";
import { createApp } from "./api/app";
import { loadLogRegistry } from "./config/log-registry";
import { settings } from "./config/settings";
import { PeriodicTask } from "./core/periodic-task";
import { initializeRegistry, openRegistry } from "./db/registry";
import {
	type AnalysisClient,
	OllamaAnalysisClient,
} from "./services/analysis-client";
import { FailureTrackerService } from "./services/failure-tracker-service";
import { IngestionService } from "./services/ingestion-service";
import { LogAggregatorService } from "./services/log-aggregator-service";
import { MonitorClient } from "./services/monitor-client";
import {
	type CycleReport,
	MonitorCycleService,
} from "./services/monitor-cycle-service";
import { PipelineService } from "./services/pipeline-service";
import { SnapshotStore } from "./services/snapshot-store";
import { logger } from "./utils/logger";

// Initialize services
const registry = openRegistry(settings.database.path);
initializeRegistry(registry);

const logRegistry = loadLogRegistry(
	settings.logs.registryPath,
	settings.logs.defaultMaxLines,
);

const snapshotStore = new SnapshotStore(registry.db);
const failureTracker = new FailureTrackerService(registry.db);
const logAggregator = new LogAggregatorService(logRegistry, {
	roots: settings.logs.roots,
	defaultMaxLines: settings.logs.defaultMaxLines,
	maxBytes: settings.logs.maxBytes,
	fileTimeoutMs: settings.logs.fileTimeoutMs,
	journalTimeoutMs: settings.logs.journalTimeoutMs,
	journalFallback: settings.logs.journalFallback,
});
const monitorClient = new MonitorClient(settings.monitor);
const analysisClient: AnalysisClient | null = settings.analysis.url
	? new OllamaAnalysisClient(settings.analysis)
	: null;

const ingestionService = new IngestionService(monitorClient, snapshotStore, {
	retentionDays: settings.retention.days,
});
const pipelineService = new PipelineService(
	snapshotStore,
	failureTracker,
	logAggregator,
	analysisClient,
);
const cycleService = new MonitorCycleService(ingestionService, pipelineService);
const cycleTask = new PeriodicTask<CycleReport>(() => cycleService.run(), {
	name: "monitor-cycle",
	intervalMs: settings.scheduler.pollIntervalSec * 1000,
	runOnStart: settings.scheduler.runOnStart,
});

const app = createApp({
	snapshotStore,
	failureTracker,
	logAggregator,
	cycleTask,
});

function startServer(): void {
	logger.info("Starting health triage", {
		database: settings.database.path,
		monitoredLogSources: logRegistry.size,
		pollIntervalSec: settings.scheduler.pollIntervalSec,
		retentionDays: settings.retention.days,
		analysis: analysisClient ? settings.analysis.url : "disabled",
	});

	const server = serve(
		{
			fetch: app.fetch,
			hostname: settings.server.host,
			port: settings.server.port,
		},
		(info) => {
			logger.info("Server running", { host: info.address, port: info.port });
		},
	);

	cycleTask.start();

	const shutdown = async (signal: string) => {
		logger.info("Shutting down gracefully", { signal });
		await cycleTask.stop();
		server.close();
		registry.close();
		process.exit(0);
	};
	process.once("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.once("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

try {
	startServer();
} catch (error) {
	logger.error("Failed to start server", error);
	process.exit(1);
}

export {
	app,
	cycleTask,
	failureTracker,
	logAggregator,
	pipelineService,
	snapshotStore,
};
