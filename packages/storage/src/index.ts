/**
 * @shiftlog/storage - Persistence for users, workplaces and time records
 */

export { createDatabase, createPool, type Database, type DatabaseOptions, pingDatabase } from "./db.js";
export { guard, toStorageError } from "./errors.js";
export { InMemoryStore, type InMemoryStoreOptions } from "./memory.js";
export { createPostgresStore, PostgresStore } from "./postgres.js";
export { RecordsRepository, UsersRepository, WorkplacesRepository } from "./repositories/index.js";
export * as schema from "./schema/index.js";
export type * from "./types.js";
