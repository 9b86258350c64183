import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import type { SnapshotPayload } from "../types";

// Append-only health observations; rows leave only through the retention sweep
export const snapshots = sqliteTable(
	"snapshots",
	{
		id: integer("id").primaryKey({ autoIncrement: true }),
		serviceName: text("service_name").notNull(),
		timestamp: integer("timestamp").notNull(),
		status: integer("status").notNull(),
		payload: text("payload", { mode: "json" }).$type<SnapshotPayload>().notNull(),
		createdAt: integer("created_at").notNull(),
	},
	(table) => ({
		serviceTimeIdx: index("snapshots_service_time_idx").on(
			table.serviceName,
			table.timestamp,
		),
		timeIdx: index("snapshots_time_idx").on(table.timestamp),
	}),
);

// One row per service, written only by the transition classifier
export const failureState = sqliteTable("failure_state", {
	serviceName: text("service_name").primaryKey(),
	lastStatus: integer("last_status").notNull(),
	lastChecked: integer("last_checked").notNull(),
	timesFailed: integer("times_failed").notNull().default(0),
	firstFailureTime: integer("first_failure_time"),
	lastFailureTime: integer("last_failure_time"),
});

export type Snapshot = typeof snapshots.$inferSelect;
export type NewSnapshot = typeof snapshots.$inferInsert;
export type FailureState = typeof failureState.$inferSelect;
