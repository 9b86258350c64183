import { logger } from "../utils/logger";
import type { MonitorListing, MonitorSource } from "./monitor-client";
import { retentionCutoff, type SnapshotStore } from "./snapshot-store";

export interface IngestionOptions {
	retentionDays: number;
}

export interface IngestionReport {
	timestamp: number;
	abandoned: boolean;
	fetched: number;
	stored: number;
	skipped: number;
	deleted: number;
}

export class IngestionService {
	constructor(
		private readonly monitor: MonitorSource,
		private readonly store: SnapshotStore,
		private readonly options: IngestionOptions,
		private readonly now: () => number = Date.now,
	) {}

	/**
	 * Fetches the current listing and appends one snapshot per entry. An
	 * unreachable or unparsable source abandons the tick; a bad entry only
	 * costs that entry. The retention sweep runs once every write is done.
	 */
	async runIngestion(): Promise<IngestionReport> {
		const timestamp = this.now();
		const report: IngestionReport = {
			timestamp,
			abandoned: false,
			fetched: 0,
			stored: 0,
			skipped: 0,
			deleted: 0,
		};

		let listing: MonitorListing;
		try {
			listing = await this.monitor.fetchStatus();
		} catch (error) {
			logger.error("Monitor fetch failed, abandoning tick", error);
			return { ...report, abandoned: true };
		}

		report.fetched = listing.entries.length + listing.rejected.length;

		for (const rejected of listing.rejected) {
			report.skipped += 1;
			logger.warn("Skipping malformed service entry", {
				index: rejected.index,
				service: rejected.serviceName,
				reason: rejected.reason,
			});
		}

		for (const entry of listing.entries) {
			try {
				this.store.append({
					serviceName: entry.serviceName,
					timestamp,
					status: entry.status,
					payload: entry.payload,
				});
				report.stored += 1;
			} catch (error) {
				report.skipped += 1;
				logger.error("Failed to store snapshot", error, {
					service: entry.serviceName,
				});
			}
		}

		report.deleted = this.sweepRetention(timestamp);

		logger.info("Ingested health snapshots", {
			fetched: report.fetched,
			stored: report.stored,
			skipped: report.skipped,
			deleted: report.deleted,
		});
		return report;
	}

	sweepRetention(now: number = this.now()): number {
		const cutoff = retentionCutoff(now, this.options.retentionDays);
		try {
			const deleted = this.store.deleteOlderThan(cutoff);
			if (deleted > 0) {
				logger.info("Deleted expired snapshots", {
					deleted,
					retentionDays: this.options.retentionDays,
				});
			}
			return deleted;
		} catch (error) {
			logger.error("Retention sweep failed, retrying next interval", error, {
				cutoff,
			});
			return 0;
		}
	}
}
