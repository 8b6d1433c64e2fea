/**
 * Record Handlers
 *
 * `add_record` and `close_record`. Both count against the `add_record`
 * rate limit class. Times are ISO instants or `YYYY-MM-DD HH:MM` wall
 * times in the user's zone.
 */

import { DateStringSchema, parseInput, RecordInputSchema, TimeOfDaySchema, toUtc } from "@shiftlog/domain";
import type { RecordStore } from "@shiftlog/storage";
import { z } from "zod";
import type { CommandHandler } from "../pipeline.js";

const LOCAL_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{1,2}:\d{2})$/;
const IsoInstantSchema = z.string().datetime({ offset: true });

export function instantSchema(zone: string) {
	return z.string().transform((value, ctx) => {
		const local = LOCAL_DATE_TIME.exec(value.trim());
		if (local) {
			const date = DateStringSchema.safeParse(local[1]);
			const time = TimeOfDaySchema.safeParse(local[2]);
			if (!date.success || !time.success) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Not a valid local date and time" });
				return z.NEVER;
			}
			return toUtc({ ...date.data, ...time.data, second: 0, millisecond: 0 }, zone);
		}

		if (!IsoInstantSchema.safeParse(value).success) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Use an ISO timestamp or YYYY-MM-DD HH:MM" });
			return z.NEVER;
		}
		return new Date(value);
	});
}

export function createAddRecordHandler(records: Pick<RecordStore, "create">): CommandHandler {
	return async ({ user, args, log }) => {
		const parsed = parseInput(
			z.object({
				workplaceId: z.unknown(),
				start: instantSchema(user.timezone),
				end: instantSchema(user.timezone).optional(),
				note: z.string().optional(),
			}),
			args,
			"record",
		);
		const input = parseInput(
			RecordInputSchema,
			{
				workplaceId: parsed.workplaceId,
				startTime: parsed.start,
				endTime: parsed.end ?? null,
				note: parsed.note ?? null,
			},
			"record",
		);

		const record = await records.create(user.id, input);
		log.info({ recordId: record.id, workplaceId: record.workplaceId, open: record.endTime === null }, "Record added");
		return { kind: "record", record };
	};
}

export function createCloseRecordHandler(records: Pick<RecordStore, "close">): CommandHandler {
	return async ({ user, args, log }) => {
		const { recordId, end } = parseInput(
			z.object({
				recordId: z.coerce.number().int().positive(),
				end: instantSchema(user.timezone),
			}),
			args,
			"record",
		);

		const record = await records.close(user.id, recordId, end);
		log.info({ recordId: record.id }, "Record closed");
		return { kind: "record", record };
	};
}
