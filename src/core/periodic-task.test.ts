import { afterEach, describe, expect, it, vi } from "vitest";
import { PeriodicTask } from "./periodic-task";

function deferred<T>() {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>((res) => {
		resolve = res;
	});
	return { promise, resolve };
}

describe("PeriodicTask", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("skips a run requested while another is in flight", async () => {
		const gate = deferred<string>();
		const task = new PeriodicTask(() => gate.promise, {
			name: "test",
			intervalMs: 60_000,
		});

		const first = task.runExclusive();
		expect(task.isRunning).toBe(true);
		await expect(task.runExclusive()).resolves.toEqual({ status: "skipped" });

		gate.resolve("done");
		await expect(first).resolves.toEqual({ status: "completed", result: "done" });
		expect(task.isRunning).toBe(false);
		expect(task.getStats()).toMatchObject({ runs: 1, skipped: 1, failures: 0, running: false });
	});

	it("records a failed run and keeps going", async () => {
		const failure = new Error("boom");
		const work = vi
			.fn<() => Promise<number>>()
			.mockRejectedValueOnce(failure)
			.mockResolvedValueOnce(2);
		const task = new PeriodicTask(work, { name: "test", intervalMs: 60_000 });

		await expect(task.runExclusive()).resolves.toEqual({ status: "failed", error: failure });
		await expect(task.runExclusive()).resolves.toEqual({ status: "completed", result: 2 });
		expect(task.getStats()).toMatchObject({ runs: 2, failures: 1 });
	});

	it("ticks on its interval until stopped", async () => {
		vi.useFakeTimers();
		const work = vi.fn(async () => "tick");
		const task = new PeriodicTask(work, { name: "test", intervalMs: 1_000, runOnStart: true });

		task.start();
		expect(work).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(3_000);
		expect(work).toHaveBeenCalledTimes(4);

		await task.stop();
		await vi.advanceTimersByTimeAsync(5_000);
		expect(work).toHaveBeenCalledTimes(4);
	});

	it("waits for the run in flight when stopping", async () => {
		const gate = deferred<void>();
		const task = new PeriodicTask(() => gate.promise, { name: "test", intervalMs: 60_000 });

		const run = task.runExclusive();
		let stopped = false;
		const stopping = task.stop().then(() => {
			stopped = true;
		});

		await Promise.resolve();
		expect(stopped).toBe(false);

		gate.resolve();
		await run;
		await stopping;
		expect(stopped).toBe(true);
	});
});
