/**
 * Domain Error Classes
 *
 * Every failure the core surfaces is one of these. Callers branch on the
 * class (or `code`) and on `retryable`, never on message text.
 *
 * | Error class                 | Code                   | Retryable |
 * |-----------------------------|------------------------|-----------|
 * | ValidationError             | VALIDATION             | No        |
 * | QuotaExceededError          | QUOTA_EXCEEDED         | No        |
 * | DependencyUnavailableError  | DEPENDENCY_UNAVAILABLE | Yes       |
 * | JobExecutionError           | JOB_EXECUTION          | No        |
 * | NotFoundError               | NOT_FOUND              | No        |
 */

import type { ZodError } from "zod";

// ============================================
// Base Error Class
// ============================================

export type ErrorCode =
	| "VALIDATION"
	| "QUOTA_EXCEEDED"
	| "DEPENDENCY_UNAVAILABLE"
	| "JOB_EXECUTION"
	| "NOT_FOUND";

/**
 * Base class for all domain errors
 */
export class DomainError extends Error {
	readonly code: ErrorCode;

	/** Whether repeating the same call may succeed */
	readonly retryable: boolean;

	constructor(
		message: string,
		code: ErrorCode,
		options: {
			retryable?: boolean;
			cause?: unknown;
		} = {},
	) {
		super(message, { cause: options.cause });
		this.name = this.constructor.name;
		this.code = code;
		this.retryable = options.retryable ?? false;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Convert to JSON for logging
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			retryable: this.retryable,
		};
	}
}

// ============================================
// Specific Error Classes
// ============================================

export interface ValidationIssue {
	path: string;
	message: string;
}

/**
 * Bad user input. Raised before any state is mutated.
 */
export class ValidationError extends DomainError {
	readonly issues: ValidationIssue[];

	constructor(message: string, issues: ValidationIssue[] = []) {
		super(message, "VALIDATION");
		this.issues = issues;
	}

	static fromZod(error: ZodError, subject = "input"): ValidationError {
		const issues = error.issues.map((issue) => ({
			path: issue.path.join("."),
			message: issue.message,
		}));
		const summary = issues
			.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
			.join("; ");
		return new ValidationError(`Invalid ${subject}: ${summary}`, issues);
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), issues: this.issues };
	}
}

/**
 * Rate governor rejection surfaced as an error.
 */
export class QuotaExceededError extends DomainError {
	readonly commandClass: string;
	readonly retryAfterMs: number;

	constructor(commandClass: string, retryAfterMs: number) {
		super(`Quota exceeded for command class "${commandClass}"`, "QUOTA_EXCEEDED");
		this.commandClass = commandClass;
		this.retryAfterMs = retryAfterMs;
	}
}

export type Dependency = "timezone" | "storage" | "messaging";

/**
 * An external collaborator failed or timed out.
 */
export class DependencyUnavailableError extends DomainError {
	readonly dependency: Dependency;

	constructor(dependency: Dependency, message: string, options: { cause?: unknown } = {}) {
		super(message, "DEPENDENCY_UNAVAILABLE", { retryable: true, cause: options.cause });
		this.dependency = dependency;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), dependency: this.dependency };
	}
}

/**
 * A scheduled job callback threw.
 */
export class JobExecutionError extends DomainError {
	readonly jobId: string;

	constructor(jobId: string, cause: unknown) {
		super(`Job "${jobId}" failed: ${describeCause(cause)}`, "JOB_EXECUTION", { cause });
		this.jobId = jobId;
	}
}

export type EntityKind = "user" | "workplace" | "record" | "job";

/**
 * A referenced entity does not exist or does not belong to the user.
 */
export class NotFoundError extends DomainError {
	readonly entity: EntityKind;
	readonly entityId: string | number;

	constructor(entity: EntityKind, entityId: string | number) {
		super(`${entity} ${entityId} not found`, "NOT_FOUND");
		this.entity = entity;
		this.entityId = entityId;
	}
}

// ============================================
// Type Guards
// ============================================

export function isDomainError(error: unknown): error is DomainError {
	return error instanceof DomainError;
}

export function isRetryableError(error: unknown): boolean {
	return error instanceof DomainError && error.retryable;
}

function describeCause(cause: unknown): string {
	if (cause instanceof Error) {
		return cause.message;
	}
	return typeof cause === "string" ? cause : "Unknown error";
}
