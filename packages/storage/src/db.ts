/**
 * Drizzle PostgreSQL Database Client
 *
 * @example
 * const pool = createPool({ url: config.database.url });
 * const db = createDatabase(pool);
 * const rows = await db.select().from(schema.users);
 */

import { sql } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import type { Pool } from "pg";
import * as schema from "./schema/index.js";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseOptions {
	url: string;
	/** Per-statement timeout applied by the server */
	statementTimeoutMs?: number;
	maxConnections?: number;
}

export function createPool(options: DatabaseOptions): Pool {
	return new pg.Pool({
		connectionString: options.url,
		max: options.maxConnections ?? 10,
		idleTimeoutMillis: 20000, // Close idle connections after 20 seconds
		connectionTimeoutMillis: 10000,
		statement_timeout: options.statementTimeoutMs ?? 10000,
	});
}

export function createDatabase(pool: Pool): Database {
	return drizzle(pool, { schema });
}

/**
 * Round trip a trivial query. Rejects when the database is unreachable.
 */
export async function pingDatabase(db: Database): Promise<void> {
	await db.execute(sql`SELECT 1`);
}

export type { NodePgDatabase };
