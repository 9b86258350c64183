import { logger } from "../utils/logger";

export type TaskRun<T> =
	| { status: "completed"; result: T }
	| { status: "skipped" }
	| { status: "failed"; error: unknown };

export interface PeriodicTaskStats {
	runs: number;
	skipped: number;
	failures: number;
	running: boolean;
	lastRunAt: number | null;
	lastDurationMs: number | null;
}

export interface PeriodicTaskOptions {
	name: string;
	intervalMs: number;
	runOnStart?: boolean;
}

/**
 * Fixed-interval ticker with a non-reentrant guard: a tick that fires while
 * the previous run is still in flight is skipped, never queued.
 */
export class PeriodicTask<T> {
	private timer: NodeJS.Timeout | null = null;
	private inFlight: Promise<TaskRun<T>> | null = null;
	private stats: PeriodicTaskStats = {
		runs: 0,
		skipped: 0,
		failures: 0,
		running: false,
		lastRunAt: null,
		lastDurationMs: null,
	};

	constructor(
		private readonly task: () => Promise<T>,
		private readonly options: PeriodicTaskOptions,
	) {}

	start(): void {
		if (this.timer) {
			return;
		}
		this.timer = setInterval(() => {
			void this.runExclusive();
		}, this.options.intervalMs);

		logger.info("Periodic task scheduled", {
			task: this.options.name,
			intervalMs: this.options.intervalMs,
		});

		if (this.options.runOnStart) {
			void this.runExclusive();
		}
	}

	/** Stops the ticker and waits for a run in flight to settle. */
	async stop(): Promise<void> {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		if (this.inFlight) {
			await this.inFlight;
		}
	}

	get isRunning(): boolean {
		return this.inFlight !== null;
	}

	async runExclusive(): Promise<TaskRun<T>> {
		if (this.inFlight) {
			this.stats.skipped += 1;
			logger.warn("Previous run still in flight, skipping tick", {
				task: this.options.name,
			});
			return { status: "skipped" };
		}

		this.inFlight = this.execute();
		this.stats.running = true;
		try {
			return await this.inFlight;
		} finally {
			this.inFlight = null;
			this.stats.running = false;
		}
	}

	private async execute(): Promise<TaskRun<T>> {
		const startedAt = Date.now();
		this.stats.runs += 1;
		this.stats.lastRunAt = startedAt;
		try {
			const result = await this.task();
			return { status: "completed", result };
		} catch (error) {
			this.stats.failures += 1;
			logger.error("Periodic task run failed", error, {
				task: this.options.name,
			});
			return { status: "failed", error };
		} finally {
			this.stats.lastDurationMs = Date.now() - startedAt;
		}
	}

	getStats(): PeriodicTaskStats {
		return { ...this.stats };
	}
}
