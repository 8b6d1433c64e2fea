/**
 * Rate Governor
 *
 * Fixed-window admission counting per (user, command class). Counters live
 * in memory only and start from zero after a restart.
 *
 * A burst straddling a window boundary can see up to twice the limit within
 * one window length.
 */

import type { RateLimitRule, RateLimits } from "@shiftlog/config";

// ============================================
// Types
// ============================================

export interface RateDecision {
	admitted: boolean;
	commandClass: string;
	limit: number;
	/** Admissions left in the current window */
	remaining: number;
	/** Time until the current window closes */
	retryAfterMs: number;
}

interface Bucket {
	windowIndex: number;
	windowMs: number;
	count: number;
}

const DEFAULT_CLASS = "default";

// ============================================
// Governor
// ============================================

export class RateGovernor {
	private readonly limits: RateLimits;
	private readonly buckets = new Map<string, Bucket>();

	constructor(limits: RateLimits) {
		if (!limits[DEFAULT_CLASS]) {
			throw new Error('Rate limits must define a "default" rule');
		}
		this.limits = limits;
	}

	/**
	 * Count one invocation and decide whether it is admitted.
	 */
	admit(userId: string, commandClass: string, now: number = Date.now()): boolean {
		return this.consume(userId, commandClass, now).admitted;
	}

	consume(userId: string, commandClass: string, now: number = Date.now()): RateDecision {
		const rule = this.ruleFor(commandClass);
		const bucket = this.currentBucket(userId, commandClass, rule, now);
		bucket.count += 1;
		return this.decide(commandClass, rule, bucket.count, bucket.windowIndex, now);
	}

	/**
	 * Decision the next call would get, without counting it.
	 */
	inspect(userId: string, commandClass: string, now: number = Date.now()): RateDecision {
		const rule = this.ruleFor(commandClass);
		const windowMs = rule.windowSeconds * 1000;
		const windowIndex = Math.floor(now / windowMs);
		const bucket = this.buckets.get(bucketKey(userId, commandClass));
		const count = bucket && bucket.windowIndex === windowIndex ? bucket.count : 0;
		return this.decide(commandClass, rule, count + 1, windowIndex, now);
	}

	ruleFor(commandClass: string): RateLimitRule {
		const rule = this.limits[commandClass] ?? this.limits[DEFAULT_CLASS];
		if (!rule) {
			throw new Error('Rate limits must define a "default" rule');
		}
		return rule;
	}

	/**
	 * Drop buckets whose window has closed. Returns the number removed.
	 */
	evictExpired(now: number = Date.now()): number {
		let evicted = 0;
		for (const [key, bucket] of this.buckets) {
			if (Math.floor(now / bucket.windowMs) !== bucket.windowIndex) {
				this.buckets.delete(key);
				evicted++;
			}
		}
		return evicted;
	}

	get size(): number {
		return this.buckets.size;
	}

	private currentBucket(userId: string, commandClass: string, rule: RateLimitRule, now: number): Bucket {
		const key = bucketKey(userId, commandClass);
		const windowMs = rule.windowSeconds * 1000;
		const windowIndex = Math.floor(now / windowMs);

		const existing = this.buckets.get(key);
		if (existing && existing.windowIndex === windowIndex) {
			return existing;
		}

		const bucket: Bucket = { windowIndex, windowMs, count: 0 };
		this.buckets.set(key, bucket);
		return bucket;
	}

	private decide(
		commandClass: string,
		rule: RateLimitRule,
		count: number,
		windowIndex: number,
		now: number,
	): RateDecision {
		const windowMs = rule.windowSeconds * 1000;
		const admitted = count <= rule.limit;
		return {
			admitted,
			commandClass,
			limit: rule.limit,
			remaining: Math.max(0, rule.limit - count),
			retryAfterMs: admitted ? 0 : (windowIndex + 1) * windowMs - now,
		};
	}
}

function bucketKey(userId: string, commandClass: string): string {
	return `${userId}\u0000${commandClass}`;
}
