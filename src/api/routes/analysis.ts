import { Hono } from "hono";
import { outcomeLabel } from "../../core/failure-classifier";
import type { PeriodicTask } from "../../core/periodic-task";
import type { CycleReport } from "../../services/monitor-cycle-service";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		cycleTask: PeriodicTask<CycleReport>;
	}
}

app.post("/analyze", async (c) => {
	const cycleTask = c.get("cycleTask");
	const run = await cycleTask.runExclusive();

	if (run.status === "skipped") {
		return c.json({ error: "A monitoring cycle is already running" }, 409);
	}
	if (run.status === "failed") {
		return c.json({ error: "cycle_failed", details: String(run.error) }, 500);
	}

	const { ingestion, result } = run.result;
	return c.json({
		ingestion: {
			abandoned: ingestion.abandoned,
			stored: ingestion.stored,
			skipped: ingestion.skipped,
			deleted: ingestion.deleted,
		},
		cycle_id: result?.context.cycleId ?? null,
		assessments: (result?.context.assessments ?? []).map((a) => ({
			service: a.serviceName,
			status: a.status,
			transition: outcomeLabel(a.outcome.kind),
			is_critical: a.isCritical,
			times_failed: a.timesFailed,
		})),
		critical: result?.context.critical ?? [],
		analysis:
			result?.analysis ?? "No failures detected or analysis skipped",
		timestamp: new Date().toISOString(),
	});
});

app.get("/scheduler", (c) => {
	const cycleTask = c.get("cycleTask");
	return c.json(cycleTask.getStats());
});

export const analysisRoutes = app;
