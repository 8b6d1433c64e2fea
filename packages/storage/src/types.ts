/**
 * Store Contracts
 *
 * The narrow read-filtered queries and write intents the core issues
 * against persistence. Implemented over PostgreSQL and in memory.
 */

import type { RecordInput, TimeRecord, User, Workplace, WorkplaceInput } from "@shiftlog/domain";

export interface RegisterUserInput {
	id: string;
	displayName?: string | null;
}

export interface UserStore {
	findById(id: string): Promise<User | null>;
	/** Insert the user if missing; an existing row is returned untouched */
	register(input: RegisterUserInput): Promise<{ user: User; created: boolean }>;
	updateTimezone(id: string, timezone: string): Promise<User>;
	listAll(): Promise<User[]>;
}

export interface WorkplaceStore {
	listByUser(userId: string): Promise<Workplace[]>;
	findById(userId: string, id: number): Promise<Workplace | null>;
	create(userId: string, input: WorkplaceInput): Promise<Workplace>;
	/** Delete workplaces no record references. Returns the number deleted. */
	deleteUnreferenced(): Promise<number>;
}

export interface RecordStore {
	/** Records of `userId` whose start is in `[start, end)`, oldest first */
	listStartedBetween(userId: string, start: Date, end: Date): Promise<TimeRecord[]>;
	listOpenStartedBefore(userId: string, before: Date): Promise<TimeRecord[]>;
	findById(userId: string, id: number): Promise<TimeRecord | null>;
	create(userId: string, input: RecordInput): Promise<TimeRecord>;
	close(userId: string, id: number, endTime: Date): Promise<TimeRecord>;
	/** Returns the number deleted */
	deleteStartedBefore(cutoff: Date): Promise<number>;
}

export interface TimeTrackingStore {
	users: UserStore;
	workplaces: WorkplaceStore;
	records: RecordStore;
	/** Resolves when the backing store answers a trivial query */
	ping(): Promise<void>;
	close(): Promise<void>;
}
