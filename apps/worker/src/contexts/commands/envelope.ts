/**
 * Command Envelope and Responses
 *
 * Inbound commands arrive from the chat integration as envelopes and leave
 * as structured responses. Rendering either side is the integration's job.
 */

import type {
	EfficiencyMetrics,
	RecordRow,
	Report,
	ReportWindow,
	TimeRecord,
	ValidationIssue,
	Workplace,
	ZoneInfo,
} from "@shiftlog/domain";
import { z } from "zod";
import type { ReportPeriod } from "../reporting/periods.js";

// ============================================
// Envelope
// ============================================

export const CommandEnvelopeSchema = z.object({
	userId: z.string().min(1),
	/** Handler name, unless `command` is given */
	commandClass: z.string().min(1),
	/** Handler name when it differs from the class, as `close_record` does */
	command: z.string().min(1).optional(),
	arguments: z.record(z.unknown()).default({}),
	receivedAt: z.coerce.date(),
	displayName: z.string().trim().min(1).max(100).optional(),
	requestId: z.string().optional(),
});

export type CommandEnvelope = z.infer<typeof CommandEnvelopeSchema>;

// ============================================
// Results
// ============================================

export type CommandResult =
	| { kind: "report"; period: ReportPeriod; timezone: string; report: Report }
	| { kind: "export"; period: ReportPeriod; timezone: string; window: ReportWindow; rows: RecordRow[] }
	| { kind: "stats"; timezone: string; window: ReportWindow; metrics: EfficiencyMetrics }
	| { kind: "record"; record: TimeRecord }
	| { kind: "workplaces"; workplaces: Workplace[] }
	| { kind: "workplace"; workplace: Workplace }
	| { kind: "timezone"; zone: ZoneInfo };

export type CommandResponse =
	| { status: "ok"; command: string; result: CommandResult }
	| { status: "throttled"; commandClass: string; retryAfterMs: number }
	| { status: "invalid"; message: string; issues: ValidationIssue[] }
	| { status: "unknown_command"; command: string }
	| { status: "error"; code: string; message: string; retryable: boolean };
