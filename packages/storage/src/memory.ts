/**
 * In-Memory Store
 *
 * Implements the store contracts over plain maps for tests and local runs.
 * Ids are assigned sequentially, as a serial column would.
 */

import {
	DependencyUnavailableError,
	NotFoundError,
	type RecordInput,
	type TimeRecord,
	type User,
	type Workplace,
	type WorkplaceInput,
} from "@shiftlog/domain";
import { assertClosable } from "./errors.js";
import type {
	RecordStore,
	RegisterUserInput,
	TimeTrackingStore,
	UserStore,
	WorkplaceStore,
} from "./types.js";

export interface InMemoryStoreOptions {
	now?: () => Date;
}

function byStart(a: TimeRecord, b: TimeRecord): number {
	return a.startTime.getTime() - b.startTime.getTime() || a.id - b.id;
}

function copyRecord(record: TimeRecord): TimeRecord {
	return {
		...record,
		startTime: new Date(record.startTime.getTime()),
		endTime: record.endTime ? new Date(record.endTime.getTime()) : null,
	};
}

export class InMemoryStore implements TimeTrackingStore {
	readonly users: UserStore;
	readonly workplaces: WorkplaceStore;
	readonly records: RecordStore;

	private readonly userRows = new Map<string, User>();
	private readonly workplaceRows = new Map<number, Workplace>();
	private readonly recordRows = new Map<number, TimeRecord>();
	private nextWorkplaceId = 1;
	private nextRecordId = 1;
	private available = true;
	private readonly now: () => Date;

	constructor(options: InMemoryStoreOptions = {}) {
		this.now = options.now ?? (() => new Date());
		this.users = this.createUserStore();
		this.workplaces = this.createWorkplaceStore();
		this.records = this.createRecordStore();
	}

	/** Make ping() and every query fail, as an unreachable database would */
	setAvailable(available: boolean): void {
		this.available = available;
	}

	async ping(): Promise<void> {
		this.ensureAvailable();
	}

	async close(): Promise<void> {
		this.userRows.clear();
		this.workplaceRows.clear();
		this.recordRows.clear();
	}

	private ensureAvailable(): void {
		if (!this.available) {
			throw new DependencyUnavailableError("storage", "In-memory store is unavailable");
		}
	}

	private deleteUser(id: string): void {
		this.userRows.delete(id);
		for (const [workplaceId, workplace] of this.workplaceRows) {
			if (workplace.userId === id) {
				this.deleteWorkplace(workplaceId);
			}
		}
	}

	// Cascades to records like the foreign key does
	private deleteWorkplace(id: number): void {
		this.workplaceRows.delete(id);
		for (const [recordId, record] of this.recordRows) {
			if (record.workplaceId === id) {
				this.recordRows.delete(recordId);
			}
		}
	}

	/** Remove a user with everything they own */
	async removeUser(id: string): Promise<void> {
		this.ensureAvailable();
		this.deleteUser(id);
	}

	private createUserStore(): UserStore {
		return {
			findById: async (id) => {
				this.ensureAvailable();
				const user = this.userRows.get(id);
				return user ? { ...user } : null;
			},
			register: async (input: RegisterUserInput) => {
				this.ensureAvailable();
				const existing = this.userRows.get(input.id);
				if (existing) {
					return { user: { ...existing }, created: false };
				}
				const user: User = {
					id: input.id,
					displayName: input.displayName ?? null,
					timezone: "UTC",
					createdAt: this.now(),
				};
				this.userRows.set(user.id, user);
				return { user: { ...user }, created: true };
			},
			updateTimezone: async (id, timezone) => {
				this.ensureAvailable();
				const user = this.userRows.get(id);
				if (!user) {
					throw new NotFoundError("user", id);
				}
				user.timezone = timezone;
				return { ...user };
			},
			listAll: async () => {
				this.ensureAvailable();
				return [...this.userRows.values()]
					.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
					.map((user) => ({ ...user }));
			},
		};
	}

	private createWorkplaceStore(): WorkplaceStore {
		return {
			listByUser: async (userId) => {
				this.ensureAvailable();
				return [...this.workplaceRows.values()]
					.filter((workplace) => workplace.userId === userId)
					.sort((a, b) => a.id - b.id)
					.map((workplace) => ({ ...workplace }));
			},
			findById: async (userId, id) => {
				this.ensureAvailable();
				const workplace = this.workplaceRows.get(id);
				return workplace && workplace.userId === userId ? { ...workplace } : null;
			},
			create: async (userId, input: WorkplaceInput) => {
				this.ensureAvailable();
				if (!this.userRows.has(userId)) {
					throw new NotFoundError("user", userId);
				}
				const workplace: Workplace = {
					id: this.nextWorkplaceId++,
					userId,
					name: input.name,
					rate: input.rate,
					createdAt: this.now(),
				};
				this.workplaceRows.set(workplace.id, workplace);
				return { ...workplace };
			},
			deleteUnreferenced: async () => {
				this.ensureAvailable();
				const referenced = new Set([...this.recordRows.values()].map((record) => record.workplaceId));
				let deleted = 0;
				for (const id of [...this.workplaceRows.keys()]) {
					if (!referenced.has(id)) {
						this.workplaceRows.delete(id);
						deleted++;
					}
				}
				return deleted;
			},
		};
	}

	private createRecordStore(): RecordStore {
		return {
			listStartedBetween: async (userId, start, end) => {
				this.ensureAvailable();
				return [...this.recordRows.values()]
					.filter(
						(record) =>
							record.userId === userId &&
							record.startTime.getTime() >= start.getTime() &&
							record.startTime.getTime() < end.getTime(),
					)
					.sort(byStart)
					.map(copyRecord);
			},
			listOpenStartedBefore: async (userId, before) => {
				this.ensureAvailable();
				return [...this.recordRows.values()]
					.filter(
						(record) =>
							record.userId === userId &&
							record.endTime === null &&
							record.startTime.getTime() < before.getTime(),
					)
					.sort(byStart)
					.map(copyRecord);
			},
			findById: async (userId, id) => {
				this.ensureAvailable();
				const record = this.recordRows.get(id);
				return record && record.userId === userId ? copyRecord(record) : null;
			},
			create: async (userId, input: RecordInput) => {
				this.ensureAvailable();
				const workplace = this.workplaceRows.get(input.workplaceId);
				if (!workplace || workplace.userId !== userId) {
					throw new NotFoundError("workplace", input.workplaceId);
				}
				const record: TimeRecord = {
					id: this.nextRecordId++,
					userId,
					workplaceId: input.workplaceId,
					startTime: input.startTime,
					endTime: input.endTime,
					note: input.note,
				};
				this.recordRows.set(record.id, copyRecord(record));
				return copyRecord(record);
			},
			close: async (userId, id, endTime) => {
				this.ensureAvailable();
				const record = this.recordRows.get(id);
				if (!record || record.userId !== userId) {
					throw new NotFoundError("record", id);
				}
				assertClosable(record, endTime);
				record.endTime = new Date(endTime.getTime());
				return copyRecord(record);
			},
			deleteStartedBefore: async (cutoff) => {
				this.ensureAvailable();
				let deleted = 0;
				for (const [id, record] of [...this.recordRows]) {
					if (record.startTime.getTime() < cutoff.getTime()) {
						this.recordRows.delete(id);
						deleted++;
					}
				}
				return deleted;
			},
		};
	}
}
