/**
 * Users Repository (Drizzle ORM)
 */
import { NotFoundError, type User } from "@shiftlog/domain";
import { asc, eq } from "drizzle-orm";
import type { Database } from "../db.js";
import { guard } from "../errors.js";
import { users } from "../schema/index.js";
import type { RegisterUserInput, UserStore } from "../types.js";

type UserRow = typeof users.$inferSelect;

function mapRow(row: UserRow): User {
	return {
		id: row.id,
		displayName: row.displayName,
		timezone: row.timezone,
		createdAt: row.createdAt,
	};
}

export class UsersRepository implements UserStore {
	constructor(private readonly db: Database) {}

	findById(id: string): Promise<User | null> {
		return guard("users.findById", async () => {
			const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
			return row ? mapRow(row) : null;
		});
	}

	register(input: RegisterUserInput): Promise<{ user: User; created: boolean }> {
		return guard("users.register", async () => {
			const [inserted] = await this.db
				.insert(users)
				.values({ id: input.id, displayName: input.displayName ?? null })
				.onConflictDoNothing({ target: users.id })
				.returning();

			if (inserted) {
				return { user: mapRow(inserted), created: true };
			}

			const [existing] = await this.db.select().from(users).where(eq(users.id, input.id)).limit(1);
			if (!existing) {
				throw new NotFoundError("user", input.id);
			}
			return { user: mapRow(existing), created: false };
		});
	}

	updateTimezone(id: string, timezone: string): Promise<User> {
		return guard("users.updateTimezone", async () => {
			const [row] = await this.db.update(users).set({ timezone }).where(eq(users.id, id)).returning();
			if (!row) {
				throw new NotFoundError("user", id);
			}
			return mapRow(row);
		});
	}

	listAll(): Promise<User[]> {
		return guard("users.listAll", async () => {
			const rows = await this.db.select().from(users).orderBy(asc(users.id));
			return rows.map(mapRow);
		});
	}
}
