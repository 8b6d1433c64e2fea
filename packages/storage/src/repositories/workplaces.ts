/**
 * Workplaces Repository (Drizzle ORM)
 */
import type { Workplace, WorkplaceInput } from "@shiftlog/domain";
import { and, asc, eq, notExists, sql } from "drizzle-orm";
import type { Database } from "../db.js";
import { guard } from "../errors.js";
import { records, workplaces } from "../schema/index.js";
import type { WorkplaceStore } from "../types.js";

type WorkplaceRow = typeof workplaces.$inferSelect;

// numeric columns come back as strings
function mapRow(row: WorkplaceRow): Workplace {
	return {
		id: row.id,
		userId: row.userId,
		name: row.name,
		rate: Number(row.rate),
		createdAt: row.createdAt,
	};
}

export class WorkplacesRepository implements WorkplaceStore {
	constructor(private readonly db: Database) {}

	listByUser(userId: string): Promise<Workplace[]> {
		return guard("workplaces.listByUser", async () => {
			const rows = await this.db
				.select()
				.from(workplaces)
				.where(eq(workplaces.userId, userId))
				.orderBy(asc(workplaces.id));
			return rows.map(mapRow);
		});
	}

	findById(userId: string, id: number): Promise<Workplace | null> {
		return guard("workplaces.findById", async () => {
			const [row] = await this.db
				.select()
				.from(workplaces)
				.where(and(eq(workplaces.id, id), eq(workplaces.userId, userId)))
				.limit(1);
			return row ? mapRow(row) : null;
		});
	}

	create(userId: string, input: WorkplaceInput): Promise<Workplace> {
		return guard("workplaces.create", async () => {
			const [row] = await this.db
				.insert(workplaces)
				.values({ userId, name: input.name, rate: input.rate.toFixed(2) })
				.returning();
			if (!row) {
				throw new Error("Insert returned no row");
			}
			return mapRow(row);
		});
	}

	deleteUnreferenced(): Promise<number> {
		return guard("workplaces.deleteUnreferenced", async () => {
			const deleted = await this.db
				.delete(workplaces)
				.where(
					notExists(
						this.db
							.select({ one: sql`1` })
							.from(records)
							.where(eq(records.workplaceId, workplaces.id)),
					),
				)
				.returning({ id: workplaces.id });
			return deleted.length;
		});
	}
}
