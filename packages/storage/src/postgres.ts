/**
 * PostgreSQL Store
 *
 * Wires the drizzle repositories over one connection pool.
 */

import type { Pool } from "pg";
import { createDatabase, createPool, type Database, type DatabaseOptions, pingDatabase } from "./db.js";
import { guard } from "./errors.js";
import { RecordsRepository, UsersRepository, WorkplacesRepository } from "./repositories/index.js";
import type { TimeTrackingStore } from "./types.js";

export class PostgresStore implements TimeTrackingStore {
	readonly users: UsersRepository;
	readonly workplaces: WorkplacesRepository;
	readonly records: RecordsRepository;

	constructor(
		private readonly pool: Pool,
		readonly db: Database = createDatabase(pool),
	) {
		this.users = new UsersRepository(db);
		this.workplaces = new WorkplacesRepository(db);
		this.records = new RecordsRepository(db);
	}

	ping(): Promise<void> {
		return guard("ping", () => pingDatabase(this.db));
	}

	async close(): Promise<void> {
		await this.pool.end();
	}
}

export function createPostgresStore(options: DatabaseOptions): PostgresStore {
	return new PostgresStore(createPool(options));
}
