/**
 * Records Repository (Drizzle ORM)
 */
import { NotFoundError, type RecordInput, type TimeRecord } from "@shiftlog/domain";
import { and, asc, eq, gte, isNull, lt } from "drizzle-orm";
import type { Database } from "../db.js";
import { assertClosable, guard } from "../errors.js";
import { records, workplaces } from "../schema/index.js";
import type { RecordStore } from "../types.js";

type RecordRow = typeof records.$inferSelect;

function mapRow(row: RecordRow): TimeRecord {
	return {
		id: row.id,
		userId: row.userId,
		workplaceId: row.workplaceId,
		startTime: row.startTime,
		endTime: row.endTime,
		note: row.note,
	};
}

export class RecordsRepository implements RecordStore {
	constructor(private readonly db: Database) {}

	listStartedBetween(userId: string, start: Date, end: Date): Promise<TimeRecord[]> {
		return guard("records.listStartedBetween", async () => {
			const rows = await this.db
				.select()
				.from(records)
				.where(and(eq(records.userId, userId), gte(records.startTime, start), lt(records.startTime, end)))
				.orderBy(asc(records.startTime), asc(records.id));
			return rows.map(mapRow);
		});
	}

	listOpenStartedBefore(userId: string, before: Date): Promise<TimeRecord[]> {
		return guard("records.listOpenStartedBefore", async () => {
			const rows = await this.db
				.select()
				.from(records)
				.where(and(eq(records.userId, userId), isNull(records.endTime), lt(records.startTime, before)))
				.orderBy(asc(records.startTime), asc(records.id));
			return rows.map(mapRow);
		});
	}

	findById(userId: string, id: number): Promise<TimeRecord | null> {
		return guard("records.findById", async () => {
			const [row] = await this.db
				.select()
				.from(records)
				.where(and(eq(records.id, id), eq(records.userId, userId)))
				.limit(1);
			return row ? mapRow(row) : null;
		});
	}

	create(userId: string, input: RecordInput): Promise<TimeRecord> {
		return guard("records.create", async () => {
			const [workplace] = await this.db
				.select({ id: workplaces.id })
				.from(workplaces)
				.where(and(eq(workplaces.id, input.workplaceId), eq(workplaces.userId, userId)))
				.limit(1);
			if (!workplace) {
				throw new NotFoundError("workplace", input.workplaceId);
			}

			const [row] = await this.db
				.insert(records)
				.values({
					userId,
					workplaceId: input.workplaceId,
					startTime: input.startTime,
					endTime: input.endTime,
					note: input.note,
				})
				.returning();
			if (!row) {
				throw new Error("Insert returned no row");
			}
			return mapRow(row);
		});
	}

	close(userId: string, id: number, endTime: Date): Promise<TimeRecord> {
		return guard("records.close", async () => {
			const existing = await this.findById(userId, id);
			if (!existing) {
				throw new NotFoundError("record", id);
			}
			assertClosable(existing, endTime);

			const [row] = await this.db
				.update(records)
				.set({ endTime, updatedAt: new Date() })
				.where(and(eq(records.id, id), eq(records.userId, userId), isNull(records.endTime)))
				.returning();
			if (!row) {
				throw new NotFoundError("record", id);
			}
			return mapRow(row);
		});
	}

	deleteStartedBefore(cutoff: Date): Promise<number> {
		return guard("records.deleteStartedBefore", async () => {
			const deleted = await this.db
				.delete(records)
				.where(lt(records.startTime, cutoff))
				.returning({ id: records.id });
			return deleted.length;
		});
	}
}
