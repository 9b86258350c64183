import {
	countSnapshots,
	deleteSnapshotsBefore,
	insertSnapshot,
	listLatestSnapshots,
	listRecentSnapshots,
	listSnapshotsInRange,
	type RegistryDb,
} from "../db/registry";
import type { Snapshot } from "../db/schema";
import type { SnapshotInput, TimeRange } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

export function retentionCutoff(now: number, retentionDays: number): number {
	return now - retentionDays * DAY_MS;
}

/**
 * Time series of health snapshots. Rows are never updated; reads come back in
 * timestamp order.
 */
export class SnapshotStore {
	constructor(private readonly db: RegistryDb) {}

	append(input: SnapshotInput): Snapshot {
		return insertSnapshot(this.db, input);
	}

	recentStatus(serviceName: string, limit: number = 5): Snapshot[] {
		return listRecentSnapshots(this.db, serviceName, Math.max(1, limit));
	}

	query(serviceName: string, range: TimeRange): Snapshot[] {
		if (range.from > range.to) {
			return [];
		}
		return listSnapshotsInRange(this.db, serviceName, range);
	}

	latestPerService(): Snapshot[] {
		return listLatestSnapshots(this.db);
	}

	/** Removes rows strictly older than `cutoff`; returns how many went. */
	deleteOlderThan(cutoff: number): number {
		return deleteSnapshotsBefore(this.db, cutoff);
	}

	count(): number {
		return countSnapshots(this.db);
	}
}
