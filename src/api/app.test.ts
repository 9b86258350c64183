import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildLogRegistry } from "../config/log-registry";
import { PeriodicTask } from "../core/periodic-task";
import { initializeRegistry, openRegistry, type Registry } from "../db/registry";
import { FailureTrackerService } from "../services/failure-tracker-service";
import { LogAggregatorService } from "../services/log-aggregator-service";
import type { CommandRunner } from "../services/log-sources";
import type { CycleReport } from "../services/monitor-cycle-service";
import { SnapshotStore } from "../services/snapshot-store";
import { createApp } from "./app";

const DAY_MS = 24 * 60 * 60 * 1000;

const report: CycleReport = {
	ingestion: {
		timestamp: 1_000,
		abandoned: false,
		fetched: 1,
		stored: 1,
		skipped: 0,
		deleted: 0,
	},
	result: {
		context: {
			cycleId: "cycle-1",
			startedAt: 1_000,
			assessments: [
				{
					serviceName: "smbd",
					status: 1,
					observedAt: 1_000,
					outcome: { kind: "new", status: 1 },
					isCritical: true,
					timesFailed: 1,
				},
			],
			critical: ["smbd"],
			logs: {},
		},
		analysis: "restart smbd",
	},
};

describe("HTTP API", () => {
	let registry: Registry;
	let store: SnapshotStore;
	let tracker: FailureTrackerService;
	let work: () => Promise<CycleReport>;
	let cycleTask: PeriodicTask<CycleReport>;
	let app: ReturnType<typeof createApp>;

	beforeEach(() => {
		registry = openRegistry(":memory:");
		initializeRegistry(registry);
		store = new SnapshotStore(registry.db);
		tracker = new FailureTrackerService(registry.db);
		const runner = vi.fn<CommandRunner>(async () => ({
			stdout: "smbd[42]: share mounted\n",
			stderr: "",
		}));
		const logAggregator = new LogAggregatorService(
			buildLogRegistry([
				["smbd", { strategy: "journal-query", unit: "smbd.service", maxLines: 75 }],
			]),
			{
				roots: [],
				defaultMaxLines: 100,
				maxBytes: 1024 * 1024,
				fileTimeoutMs: 1_000,
				journalTimeoutMs: 1_000,
				journalFallback: false,
			},
			runner,
		);
		work = async () => report;
		cycleTask = new PeriodicTask(() => work(), { name: "test-cycle", intervalMs: 60_000 });
		app = createApp({ snapshotStore: store, failureTracker: tracker, logAggregator, cycleTask });
	});

	afterEach(() => {
		registry.close();
	});

	it("reports database health", async () => {
		store.append({ serviceName: "smbd", timestamp: 1_000, status: 0, payload: {} });

		const res = await app.request("/health");
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({
			status: "healthy",
			database: "connected",
			snapshots: 1,
		});
	});

	it("lists the latest status of every service", async () => {
		store.append({ serviceName: "smbd", timestamp: 1_000, status: 0, payload: {} });
		store.append({ serviceName: "smbd", timestamp: 2_000, status: 1, payload: {} });
		store.append({ serviceName: "sshd", timestamp: 2_000, status: 0, payload: {} });

		const res = await app.request("/status");
		expect(await res.json()).toEqual({
			services: [
				{
					name: "smbd",
					status: 1,
					healthy: false,
					last_checked: "1970-01-01T00:00:02.000Z",
				},
				{
					name: "sshd",
					status: 0,
					healthy: true,
					last_checked: "1970-01-01T00:00:02.000Z",
				},
			],
		});
	});

	it("lists tracked failure states", async () => {
		tracker.assess({ serviceName: "smbd", status: 1, timestamp: 1_000 });

		const res = await app.request("/failures");
		expect(await res.json()).toEqual({
			failures: [
				{
					service: "smbd",
					last_status: 1,
					last_checked: "1970-01-01T00:00:01.000Z",
					times_failed: 1,
					first_failure_time: "1970-01-01T00:00:01.000Z",
					last_failure_time: "1970-01-01T00:00:01.000Z",
				},
			],
		});
	});

	it("summarizes history within the requested window", async () => {
		const now = Date.now();
		store.append({ serviceName: "smbd", timestamp: now - 10 * DAY_MS, status: 1, payload: {} });
		store.append({ serviceName: "smbd", timestamp: now - 2 * DAY_MS, status: 1, payload: {} });
		store.append({ serviceName: "smbd", timestamp: now - 60_000, status: 0, payload: {} });

		const res = await app.request("/history/smbd?days=7");
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({
			service: "smbd",
			days: 7,
			total_checks: 2,
			failures: 1,
		});
	});

	it("answers 404 for a service without history", async () => {
		const res = await app.request("/history/ghost");
		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({
			error: "No history found for service 'ghost' in last 7 days",
		});
	});

	it("rejects a malformed window", async () => {
		const res = await app.request("/history/smbd?days=soon");
		expect(res.status).toBe(400);
	});

	it("returns the most recent checks", async () => {
		for (const timestamp of [1_000, 2_000, 3_000]) {
			store.append({ serviceName: "smbd", timestamp, status: 0, payload: {} });
		}

		const res = await app.request("/history/smbd/recent?limit=2");
		expect(await res.json()).toEqual({
			service: "smbd",
			recent: [
				{ timestamp: "1970-01-01T00:00:02.000Z", status: 0, healthy: true },
				{ timestamp: "1970-01-01T00:00:03.000Z", status: 0, healthy: true },
			],
		});
	});

	it("serves logs for a configured service", async () => {
		const res = await app.request("/logs/smbd");
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({
			service: "smbd",
			strategy: "journal-query",
			source: "smbd.service",
			truncated: false,
			lines: ["smbd[42]: share mounted"],
		});
	});

	it("answers 404 with a reason when no logs are available", async () => {
		const res = await app.request("/logs/unknown");
		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({
			service: "unknown",
			strategy: null,
			source: null,
			error: "no log source configured for unknown",
		});
	});

	it("runs a cycle on demand", async () => {
		const res = await app.request("/analyze", { method: "POST" });
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({
			ingestion: { abandoned: false, stored: 1, skipped: 0, deleted: 0 },
			cycle_id: "cycle-1",
			assessments: [
				{
					service: "smbd",
					status: 1,
					transition: "NEW",
					is_critical: true,
					times_failed: 1,
				},
			],
			critical: ["smbd"],
			analysis: "restart smbd",
		});
	});

	it("refuses a manual cycle while one is running", async () => {
		let release: (value: CycleReport) => void = () => {};
		work = () =>
			new Promise<CycleReport>((resolve) => {
				release = resolve;
			});
		const running = cycleTask.runExclusive();

		const res = await app.request("/analyze", { method: "POST" });
		expect(res.status).toBe(409);
		expect(await res.json()).toEqual({ error: "A monitoring cycle is already running" });

		release(report);
		await running;
	});

	it("answers unknown routes with a JSON 404", async () => {
		const res = await app.request("/nope");
		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({ error: "not_found" });
	});
});
