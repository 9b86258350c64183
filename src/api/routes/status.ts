import { Hono } from "hono";
import { z } from "zod";
import type { Snapshot } from "../../db/schema";
import type { FailureTrackerService } from "../../services/failure-tracker-service";

const app = new Hono();
const DAY_MS = 24 * 60 * 60 * 1000;

declare module "hono" {
	interface ContextVariableMap {
		failureTracker: FailureTrackerService;
	}
}

const HistoryQuerySchema = z.object({
	days: z.coerce.number().int().positive().max(365).default(7),
});

const RecentQuerySchema = z.object({
	limit: z.coerce.number().int().positive().max(500).default(5),
});

function toHistoryPoint(snapshot: Snapshot) {
	return {
		timestamp: new Date(snapshot.timestamp).toISOString(),
		status: snapshot.status,
		healthy: snapshot.status === 0,
	};
}

app.get("/status", (c) => {
	const snapshotStore = c.get("snapshotStore");
	const services = snapshotStore.latestPerService().map((snapshot) => ({
		name: snapshot.serviceName,
		status: snapshot.status,
		healthy: snapshot.status === 0,
		last_checked: new Date(snapshot.timestamp).toISOString(),
	}));
	return c.json({ services });
});

app.get("/failures", (c) => {
	const failureTracker = c.get("failureTracker");
	const states = failureTracker.listStates().map((state) => ({
		service: state.serviceName,
		last_status: state.lastStatus,
		last_checked: new Date(state.lastChecked).toISOString(),
		times_failed: state.timesFailed,
		first_failure_time:
			state.firstFailureTime === null
				? null
				: new Date(state.firstFailureTime).toISOString(),
		last_failure_time:
			state.lastFailureTime === null
				? null
				: new Date(state.lastFailureTime).toISOString(),
	}));
	return c.json({ failures: states });
});

app.get("/history/:service", (c) => {
	const snapshotStore = c.get("snapshotStore");
	const service = c.req.param("service");

	const result = HistoryQuerySchema.safeParse({ days: c.req.query("days") });
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const now = Date.now();
	const history = snapshotStore
		.query(service, { from: now - result.data.days * DAY_MS, to: now })
		.map(toHistoryPoint);

	if (history.length === 0) {
		return c.json(
			{
				error: `No history found for service '${service}' in last ${result.data.days} days`,
			},
			404,
		);
	}

	return c.json({
		service,
		days: result.data.days,
		total_checks: history.length,
		failures: history.filter((point) => !point.healthy).length,
		history,
	});
});

app.get("/history/:service/recent", (c) => {
	const snapshotStore = c.get("snapshotStore");
	const service = c.req.param("service");

	const result = RecentQuerySchema.safeParse({ limit: c.req.query("limit") });
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const recent = snapshotStore
		.recentStatus(service, result.data.limit)
		.map(toHistoryPoint);
	return c.json({ service, recent });
});

export const statusRoutes = app;
