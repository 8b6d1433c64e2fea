/**
 * Retry Policy
 *
 * Bounded exponential backoff wrapped around calls to external
 * collaborators. Business functions never retry on their own.
 */

import { isRetryableError } from "./errors.js";

export interface RetryPolicyOptions {
	/** Total attempts including the first one */
	maxAttempts: number;
	baseDelayMs: number;
	multiplier: number;
	maxDelayMs: number;
}

export interface RetryAttempt {
	attempt: number;
	delayMs: number;
	error: unknown;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
	maxAttempts: 3,
	baseDelayMs: 250,
	multiplier: 2,
	maxDelayMs: 4_000,
};

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryPolicy {
	readonly options: RetryPolicyOptions;
	private readonly sleep: Sleep;
	private readonly shouldRetry: (error: unknown) => boolean;

	constructor(
		options: Partial<RetryPolicyOptions> = {},
		deps: {
			sleep?: Sleep;
			shouldRetry?: (error: unknown) => boolean;
		} = {},
	) {
		this.options = { ...DEFAULT_RETRY_POLICY, ...options };
		if (this.options.maxAttempts < 1) {
			throw new RangeError("maxAttempts must be at least 1");
		}
		this.sleep = deps.sleep ?? defaultSleep;
		this.shouldRetry = deps.shouldRetry ?? isRetryableError;
	}

	/**
	 * Delay before attempt `attempt + 1`, where `attempt` starts at 1.
	 */
	delayFor(attempt: number): number {
		const exponential = this.options.baseDelayMs * this.options.multiplier ** (attempt - 1);
		return Math.min(exponential, this.options.maxDelayMs);
	}

	/**
	 * Run `fn` until it succeeds, throws a non-retryable error, or the
	 * attempts are used up. The last error is rethrown.
	 */
	async execute<T>(
		fn: (attempt: number) => Promise<T>,
		onRetry?: (info: RetryAttempt) => void,
	): Promise<T> {
		for (let attempt = 1; ; attempt++) {
			try {
				return await fn(attempt);
			} catch (error) {
				if (attempt >= this.options.maxAttempts || !this.shouldRetry(error)) {
					throw error;
				}
				const delayMs = this.delayFor(attempt);
				onRetry?.({ attempt, delayMs, error });
				await this.sleep(delayMs);
			}
		}
	}
}
