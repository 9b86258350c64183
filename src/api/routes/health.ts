import { Hono } from "hono";
import type { SnapshotStore } from "../../services/snapshot-store";

const app = new Hono();
const SERVICE_NAME = "health-triage";
const SERVICE_VERSION = "1.0.0";

declare module "hono" {
	interface ContextVariableMap {
		snapshotStore: SnapshotStore;
	}
}

app.get("/", (c) => {
	return c.json({
		status: "ok",
		service: SERVICE_NAME,
		version: SERVICE_VERSION,
		endpoints: [
			"/health",
			"/status",
			"/failures",
			"/history/:service",
			"/history/:service/recent",
			"/logs/:service",
			"/analyze",
		],
	});
});

app.get("/health", (c) => {
	const snapshotStore = c.get("snapshotStore");
	try {
		const snapshots = snapshotStore.count();
		return c.json({
			status: "healthy",
			database: "connected",
			snapshots,
			timestamp: new Date().toISOString(),
		});
	} catch (error) {
		return c.json(
			{ status: "unhealthy", database: "error", error: String(error) },
			503,
		);
	}
});

export const healthRoutes = app;
