/**
 * Drizzle Relations
 */
import { relations } from "drizzle-orm";
import { records, users, workplaces } from "./time-tracking.js";

export const usersRelations = relations(users, ({ many }) => ({
	workplaces: many(workplaces),
	records: many(records),
}));

export const workplacesRelations = relations(workplaces, ({ one, many }) => ({
	user: one(users, {
		fields: [workplaces.userId],
		references: [users.id],
	}),
	records: many(records),
}));

export const recordsRelations = relations(records, ({ one }) => ({
	user: one(users, {
		fields: [records.userId],
		references: [users.id],
	}),
	workplace: one(workplaces, {
		fields: [records.workplaceId],
		references: [workplaces.id],
	}),
}));
