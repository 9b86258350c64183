import { Hono } from "hono";
import type { PeriodicTask } from "../core/periodic-task";
import type { FailureTrackerService } from "../services/failure-tracker-service";
import type { LogAggregatorService } from "../services/log-aggregator-service";
import type { CycleReport } from "../services/monitor-cycle-service";
import type { SnapshotStore } from "../services/snapshot-store";
import { logger } from "../utils/logger";
import { analysisRoutes } from "./routes/analysis";
import { healthRoutes } from "./routes/health";
import { logRoutes } from "./routes/logs";
import { statusRoutes } from "./routes/status";

export interface AppServices {
	snapshotStore: SnapshotStore;
	failureTracker: FailureTrackerService;
	logAggregator: LogAggregatorService;
	cycleTask: PeriodicTask<CycleReport>;
}

export function createApp(services: AppServices): Hono {
	const app = new Hono();

	app.onError((err, c) => {
		logger.error("Unhandled request error", err);
		return c.json({ error: "internal_error" }, 500);
	});

	app.notFound((c) => c.json({ error: "not_found" }, 404));

	// Middleware to inject services
	app.use("*", async (c, next) => {
		c.set("snapshotStore", services.snapshotStore);
		c.set("failureTracker", services.failureTracker);
		c.set("logAggregator", services.logAggregator);
		c.set("cycleTask", services.cycleTask);
		await next();
	});

	app.route("/", healthRoutes);
	app.route("/", statusRoutes);
	app.route("/logs", logRoutes);
	app.route("/", analysisRoutes);

	return app;
}
