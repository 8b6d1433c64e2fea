/**
 * Report Aggregator
 *
 * Fetches a user's records and workplaces and runs the pure aggregation.
 * Window boundaries are UTC instants resolved by the caller.
 */

import {
	aggregateRecords,
	assertWindow,
	exportRows,
	type RecordRow,
	type Report,
	type TimeRecord,
	type Workplace,
} from "@shiftlog/domain";
import type { TimeTrackingStore } from "@shiftlog/storage";

export class ReportAggregator {
	constructor(private readonly store: Pick<TimeTrackingStore, "records" | "workplaces">) {}

	async aggregate(userId: string, windowStart: Date, windowEnd: Date, now: Date = new Date()): Promise<Report> {
		const window = { start: windowStart, end: windowEnd };
		const { records, workplaces } = await this.load(userId, window);
		return aggregateRecords(records, workplaces, window, now);
	}

	/** Per-record rows for the same window a report would cover */
	async exportRecords(userId: string, windowStart: Date, windowEnd: Date, now: Date = new Date()): Promise<RecordRow[]> {
		const window = { start: windowStart, end: windowEnd };
		const { records, workplaces } = await this.load(userId, window);
		return exportRows(records, workplaces, window, now);
	}

	private async load(
		userId: string,
		window: { start: Date; end: Date },
	): Promise<{ records: TimeRecord[]; workplaces: Workplace[] }> {
		assertWindow(window);
		const [records, workplaces] = await Promise.all([
			this.store.records.listStartedBetween(userId, window.start, window.end),
			this.store.workplaces.listByUser(userId),
		]);
		return { records, workplaces };
	}
}
