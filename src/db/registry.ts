import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { and, asc, count, desc, eq, gte, lt, lte } from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import type { FailureStateRecord, SnapshotInput, TimeRange } from "../types";
import type { FailureState, Snapshot } from "./schema";
import * as schema from "./schema";

export type RegistryDb = BaseSQLiteDatabase<
	"sync",
	Database.RunResult,
	typeof schema
>;

export interface Registry {
	db: RegistryDb;
	sqlite: Database.Database;
	close(): void;
}

export function openRegistry(filename: string): Registry {
	if (filename !== ":memory:") {
		mkdirSync(dirname(filename), { recursive: true });
	}
	const sqlite = new Database(filename);
	sqlite.pragma("journal_mode = WAL");
	sqlite.pragma("busy_timeout = 5000");

	const db = drizzle(sqlite, { schema });
	return {
		db,
		sqlite,
		close: () => sqlite.close(),
	};
}

export function initializeRegistry(registry: Registry): void {
	registry.sqlite.exec(`
		CREATE TABLE IF NOT EXISTS snapshots (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			service_name TEXT NOT NULL,
			timestamp INTEGER NOT NULL,
			status INTEGER NOT NULL,
			payload TEXT NOT NULL,
			created_at INTEGER NOT NULL
		);

		CREATE INDEX IF NOT EXISTS snapshots_service_time_idx
			ON snapshots (service_name, timestamp);

		CREATE INDEX IF NOT EXISTS snapshots_time_idx
			ON snapshots (timestamp);

		CREATE TABLE IF NOT EXISTS failure_state (
			service_name TEXT PRIMARY KEY,
			last_status INTEGER NOT NULL,
			last_checked INTEGER NOT NULL,
			times_failed INTEGER NOT NULL DEFAULT 0,
			first_failure_time INTEGER,
			last_failure_time INTEGER
		);
	`);
}

// Snapshot functions
export function insertSnapshot(db: RegistryDb, input: SnapshotInput): Snapshot {
	return db
		.insert(schema.snapshots)
		.values({
			serviceName: input.serviceName,
			timestamp: input.timestamp,
			status: input.status,
			payload: input.payload,
			createdAt: Date.now(),
		})
		.returning()
		.get();
}

export function listRecentSnapshots(
	db: RegistryDb,
	serviceName: string,
	limit: number,
): Snapshot[] {
	const rows = db
		.select()
		.from(schema.snapshots)
		.where(eq(schema.snapshots.serviceName, serviceName))
		.orderBy(desc(schema.snapshots.timestamp), desc(schema.snapshots.id))
		.limit(limit)
		.all();
	return rows.reverse();
}

export function listSnapshotsInRange(
	db: RegistryDb,
	serviceName: string,
	range: TimeRange,
): Snapshot[] {
	return db
		.select()
		.from(schema.snapshots)
		.where(
			and(
				eq(schema.snapshots.serviceName, serviceName),
				gte(schema.snapshots.timestamp, range.from),
				lte(schema.snapshots.timestamp, range.to),
			),
		)
		.orderBy(asc(schema.snapshots.timestamp), asc(schema.snapshots.id))
		.all();
}

export function listLatestSnapshots(db: RegistryDb): Snapshot[] {
	const services = db
		.selectDistinct({ serviceName: schema.snapshots.serviceName })
		.from(schema.snapshots)
		.orderBy(asc(schema.snapshots.serviceName))
		.all();

	const latest: Snapshot[] = [];
	for (const { serviceName } of services) {
		const row = db
			.select()
			.from(schema.snapshots)
			.where(eq(schema.snapshots.serviceName, serviceName))
			.orderBy(desc(schema.snapshots.timestamp), desc(schema.snapshots.id))
			.limit(1)
			.get();
		if (row) {
			latest.push(row);
		}
	}
	return latest;
}

export function deleteSnapshotsBefore(db: RegistryDb, cutoff: number): number {
	const result = db
		.delete(schema.snapshots)
		.where(lt(schema.snapshots.timestamp, cutoff))
		.run();
	return result.changes;
}

export function countSnapshots(db: RegistryDb): number {
	const row = db.select({ total: count() }).from(schema.snapshots).get();
	return row?.total ?? 0;
}

// Failure state functions
export function getFailureState(
	db: RegistryDb,
	serviceName: string,
): FailureState | undefined {
	return db
		.select()
		.from(schema.failureState)
		.where(eq(schema.failureState.serviceName, serviceName))
		.get();
}

export function listFailureStates(db: RegistryDb): FailureState[] {
	return db
		.select()
		.from(schema.failureState)
		.orderBy(asc(schema.failureState.serviceName))
		.all();
}

export function upsertFailureState(
	db: RegistryDb,
	record: FailureStateRecord,
): void {
	db.insert(schema.failureState)
		.values(record)
		.onConflictDoUpdate({
			target: schema.failureState.serviceName,
			set: {
				lastStatus: record.lastStatus,
				lastChecked: record.lastChecked,
				timesFailed: record.timesFailed,
				firstFailureTime: record.firstFailureTime,
				lastFailureTime: record.lastFailureTime,
			},
		})
		.run();
}
