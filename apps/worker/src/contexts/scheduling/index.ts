/**
 * Scheduling Bounded Context
 *
 * Owns recurring jobs: trigger evaluation, single-flight execution and the
 * run ledger read by health checks.
 */

export {
	type JobCallback,
	type JobDescriptor,
	type JobOutcome,
	type JobResult,
	type JobRunContext,
	JobScheduler,
	type JobSchedulerOptions,
	type JobStatus,
	type SchedulerLedger,
	SchedulerStoppingError,
	SKIPPED_REASON,
	type StopResult,
} from "./job-scheduler.js";
export { isInLocalSlot, type LocalSlot, QUARTER_HOUR_CRON, selectUsersInSlot } from "./local-slot.js";
export { createTriggerEvaluator, describeTrigger, type JobTrigger, type TriggerEvaluator } from "./triggers.js";
