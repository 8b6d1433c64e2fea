import type { User } from "@shiftlog/domain";
import { formatError } from "@shiftlog/logger";
import type { JobCallback, JobDescriptor, JobResult, JobRunContext } from "../scheduling/job-scheduler.js";
import type { JobTrigger } from "../scheduling/triggers.js";

/** A job definition ready for `JobScheduler.register` */
export interface ScheduledJob {
	descriptor: JobDescriptor;
	trigger: JobTrigger;
	callback: JobCallback;
}

/**
 * Run `work` for each user in turn. The signal is checked between users;
 * a failing user is logged and counted. `work` returns the units it
 * processed for that user.
 */
export async function forEachUser(
	users: readonly User[],
	context: JobRunContext,
	work: (user: User) => Promise<number>,
): Promise<JobResult> {
	const result: JobResult = { processed: 0, failed: 0 };

	for (const user of users) {
		context.signal.throwIfAborted();
		try {
			result.processed += await work(user);
		} catch (error) {
			result.failed++;
			context.log.warn({ userId: user.id, error: formatError(error) }, "Job failed for user");
		}
	}

	return result;
}

export function logInvalidZones(context: JobRunContext, users: readonly User[]): void {
	for (const user of users) {
		context.log.warn({ userId: user.id, timezone: user.timezone }, "Skipping user with unknown time zone");
	}
}
