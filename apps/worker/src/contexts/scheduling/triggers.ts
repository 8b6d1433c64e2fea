/**
 * Job Triggers
 *
 * Next-fire computation for cron (via croner) and fixed-interval triggers.
 */

import { isValidTimeZone, ValidationError } from "@shiftlog/domain";
import { Cron } from "croner";

export type JobTrigger =
	| { kind: "cron"; expression: string; timezone: string }
	| { kind: "interval"; everyMs: number };

export interface TriggerEvaluator {
	readonly trigger: JobTrigger;
	/** First fire time strictly after `from` */
	nextAfter(from: Date): Date | null;
}

class CronEvaluator implements TriggerEvaluator {
	private readonly pattern: Cron;

	constructor(readonly trigger: Extract<JobTrigger, { kind: "cron" }>) {
		// No callback: croner only computes times and never arms a timer
		this.pattern = new Cron(trigger.expression, { timezone: trigger.timezone });
	}

	nextAfter(from: Date): Date | null {
		return this.pattern.nextRun(from);
	}
}

class IntervalEvaluator implements TriggerEvaluator {
	constructor(readonly trigger: Extract<JobTrigger, { kind: "interval" }>) {}

	nextAfter(from: Date): Date | null {
		return new Date(from.getTime() + this.trigger.everyMs);
	}
}

/**
 * Validate a trigger and build its evaluator.
 *
 * @throws ValidationError for malformed expressions, unknown zones or non-positive intervals
 */
export function createTriggerEvaluator(trigger: JobTrigger): TriggerEvaluator {
	if (trigger.kind === "interval") {
		if (!Number.isFinite(trigger.everyMs) || trigger.everyMs <= 0) {
			throw new ValidationError(`Invalid interval ${trigger.everyMs}`, [
				{ path: "trigger.everyMs", message: "Must be a positive number of milliseconds" },
			]);
		}
		return new IntervalEvaluator(trigger);
	}

	if (!isValidTimeZone(trigger.timezone)) {
		throw new ValidationError(`Unknown time zone "${trigger.timezone}"`, [
			{ path: "trigger.timezone", message: "Must be an IANA time zone name" },
		]);
	}

	try {
		return new CronEvaluator(trigger);
	} catch (error) {
		throw new ValidationError(`Invalid cron expression "${trigger.expression}"`, [
			{
				path: "trigger.expression",
				message: error instanceof Error ? error.message : "Unparseable expression",
			},
		]);
	}
}

export function describeTrigger(trigger: JobTrigger): string {
	return trigger.kind === "cron"
		? `cron "${trigger.expression}" (${trigger.timezone})`
		: `every ${trigger.everyMs}ms`;
}
