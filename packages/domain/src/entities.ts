/**
 * Entity Schemas
 *
 * Users own workplaces; workplaces own time records. Input schemas trim and
 * normalise user-supplied values and are applied before any write.
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";

// ============================================
// Entities
// ============================================

export const UserSchema = z.object({
	/** Chat platform identity */
	id: z.string().min(1),
	displayName: z.string().nullable(),
	/** IANA zone name */
	timezone: z.string().min(1),
	createdAt: z.date(),
});
export type User = z.infer<typeof UserSchema>;

export const WorkplaceSchema = z.object({
	id: z.number().int().positive(),
	userId: z.string().min(1),
	name: z.string().min(1).max(100),
	/** Hourly rate */
	rate: z.number().nonnegative(),
	createdAt: z.date(),
});
export type Workplace = z.infer<typeof WorkplaceSchema>;

export const TimeRecordSchema = z
	.object({
		id: z.number().int().positive(),
		userId: z.string().min(1),
		workplaceId: z.number().int().positive(),
		startTime: z.date(),
		/** Null while the record is open */
		endTime: z.date().nullable(),
		note: z.string().max(500).nullable(),
	})
	.refine((record) => record.endTime === null || record.endTime > record.startTime, {
		message: "endTime must be after startTime",
		path: ["endTime"],
	});
export type TimeRecord = z.infer<typeof TimeRecordSchema>;

export function isOpenRecord(record: Pick<TimeRecord, "endTime">, now?: Date): boolean {
	if (record.endTime === null) {
		return true;
	}
	return now !== undefined && record.endTime > now;
}

// ============================================
// Input Schemas
// ============================================

export const WorkplaceNameSchema = z
	.string()
	.trim()
	.min(1, "Name must not be empty")
	.max(100, "Name must be at most 100 characters");

/** Largest value the `numeric(10, 2)` rate column holds */
export const MAX_RATE = 99_999_999.99;

export const RateSchema = z.coerce
	.number()
	.finite()
	.nonnegative("Rate must not be negative")
	.max(MAX_RATE, `Rate must be at most ${MAX_RATE}`)
	.transform((rate) => Math.round(rate * 100) / 100);

export const NoteSchema = z
	.string()
	.trim()
	.max(500, "Note must be at most 500 characters")
	.transform((note) => (note === "" ? null : note));

export const WorkplaceInputSchema = z.object({
	name: WorkplaceNameSchema,
	rate: RateSchema,
});
export type WorkplaceInput = z.infer<typeof WorkplaceInputSchema>;

export const RecordInputSchema = z
	.object({
		workplaceId: z.coerce.number().int().positive(),
		startTime: z.coerce.date(),
		endTime: z.coerce.date().nullable().default(null),
		note: NoteSchema.nullable().default(null),
	})
	.refine((input) => input.endTime === null || input.endTime > input.startTime, {
		message: "End time must be after start time",
		path: ["endTime"],
	});
export type RecordInput = z.infer<typeof RecordInputSchema>;

/** Calendar date as `YYYY-MM-DD` */
export const DateStringSchema = z
	.string()
	.regex(/^\d{4}-\d{2}-\d{2}$/, "Use the YYYY-MM-DD format")
	.transform((value, ctx) => {
		const [year, month, day] = value.split("-").map(Number);
		if (year === undefined || month === undefined || day === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Use the YYYY-MM-DD format" });
			return z.NEVER;
		}
		const probe = new Date(Date.UTC(year, month - 1, day));
		if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Not a calendar date" });
			return z.NEVER;
		}
		return { year, month, day };
	});
export type CalendarDate = z.output<typeof DateStringSchema>;

/** Wall clock time as `HH:MM` */
export const TimeOfDaySchema = z
	.string()
	.regex(/^([01]?\d|2[0-3]):[0-5]\d$/, "Use the HH:MM format")
	.transform((value) => {
		const [hour, minute] = value.split(":").map(Number);
		return { hour: hour ?? 0, minute: minute ?? 0 };
	});
export type TimeOfDay = z.output<typeof TimeOfDaySchema>;

/**
 * Parse `input` with `schema`, throwing ValidationError on failure.
 */
export function parseInput<S extends z.ZodTypeAny>(
	schema: S,
	input: unknown,
	subject?: string,
): z.output<S> {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw ValidationError.fromZod(result.error, subject);
	}
	return result.data;
}
