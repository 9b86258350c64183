import { Hono } from "hono";
import type { LogAggregatorService } from "../../services/log-aggregator-service";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		logAggregator: LogAggregatorService;
	}
}

app.get("/:service", async (c) => {
	const logAggregator = c.get("logAggregator");
	const service = c.req.param("service");
	const result = await logAggregator.fetchForService(service);

	if (result.lines.length === 0) {
		return c.json(
			{
				service,
				strategy: result.strategy,
				source: result.source,
				error: result.reason ?? "No logs found",
			},
			404,
		);
	}

	return c.json({
		service,
		strategy: result.strategy,
		source: result.source,
		truncated: result.truncated,
		lines: result.lines,
		timestamp: new Date().toISOString(),
	});
});

export const logRoutes = app;
