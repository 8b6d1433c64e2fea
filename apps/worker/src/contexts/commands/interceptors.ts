/**
 * Command Interceptors
 *
 * Installed in this order: error boundary, rate limit, user registration.
 */

import { DomainError, QuotaExceededError, ValidationError } from "@shiftlog/domain";
import { formatError } from "@shiftlog/logger";
import type { UserStore } from "@shiftlog/storage";
import type { RateGovernor } from "../throttling/rate-governor.js";
import type { Interceptor } from "./pipeline.js";

/**
 * Turns every error thrown further down the chain into a response.
 * Domain errors map to their own status; anything else is logged and
 * answered with a generic error.
 */
export function errorBoundary(): Interceptor {
	return async (context, next) => {
		try {
			return await next(context);
		} catch (error) {
			if (error instanceof ValidationError) {
				context.log.info({ issues: error.issues }, "Command rejected");
				return { status: "invalid", message: error.message, issues: error.issues };
			}
			if (error instanceof QuotaExceededError) {
				return { status: "throttled", commandClass: error.commandClass, retryAfterMs: error.retryAfterMs };
			}
			if (error instanceof DomainError) {
				context.log.warn({ code: error.code, error: error.message }, "Command failed");
				return { status: "error", code: error.code, message: error.message, retryable: error.retryable };
			}

			context.log.error({ command: context.command, error: formatError(error) }, "Unexpected command failure");
			return { status: "error", code: "INTERNAL", message: "Unexpected error", retryable: false };
		}
	};
}

/** Registers the sender on first contact */
export function ensureUser(users: Pick<UserStore, "register">): Interceptor {
	return async (context, next) => {
		const { user, created } = await users.register({
			id: context.envelope.userId,
			displayName: context.envelope.displayName ?? null,
		});
		if (created) {
			context.log.info({ userId: user.id }, "Registered new user");
		}
		return next({ ...context, user });
	};
}

/**
 * Counts the command against its class and stops it once over quota.
 * Runs before registration, so a throttled command never reaches the store.
 */
export function rateLimit(governor: Pick<RateGovernor, "admit" | "inspect">): Interceptor {
	return async (context, next) => {
		const { envelope, commandClass } = context;
		const now = envelope.receivedAt.getTime();
		if (!governor.admit(envelope.userId, commandClass, now)) {
			const decision = governor.inspect(envelope.userId, commandClass, now);
			context.log.warn({ limit: decision.limit, retryAfterMs: decision.retryAfterMs }, "Command throttled");
			throw new QuotaExceededError(commandClass, decision.retryAfterMs);
		}
		return next(context);
	};
}
