/**
 * Time Tracking Tables
 *
 * users, workplaces, records
 */
import { index, integer, numeric, pgTable, serial, text, timestamp, varchar } from "drizzle-orm/pg-core";

// users: one row per chat identity
export const users = pgTable("users", {
	id: text("id").primaryKey(),
	displayName: text("display_name"),
	timezone: text("timezone").notNull().default("UTC"),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

// workplaces: named earning contexts with an hourly rate
export const workplaces = pgTable(
	"workplaces",
	{
		id: serial("id").primaryKey(),
		userId: text("user_id")
			.notNull()
			.references(() => users.id, { onDelete: "cascade" }),
		name: varchar("name", { length: 100 }).notNull(),
		rate: numeric("rate", { precision: 10, scale: 2 }).notNull(),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [index("idx_workplaces_user_id").on(table.userId)],
);

// records: logged time intervals, end_time null while open
export const records = pgTable(
	"records",
	{
		id: serial("id").primaryKey(),
		userId: text("user_id")
			.notNull()
			.references(() => users.id, { onDelete: "cascade" }),
		workplaceId: integer("workplace_id")
			.notNull()
			.references(() => workplaces.id, { onDelete: "cascade" }),
		startTime: timestamp("start_time", { withTimezone: true }).notNull(),
		endTime: timestamp("end_time", { withTimezone: true }),
		note: varchar("note", { length: 500 }),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
		updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [
		index("idx_records_user_start").on(table.userId, table.startTime),
		index("idx_records_workplace_id").on(table.workplaceId),
	],
);
