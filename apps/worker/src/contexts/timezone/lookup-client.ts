/**
 * Timezone Lookup Client
 *
 * Client for a TimeZoneDB-compatible `get-time-zone` endpoint. Every
 * request carries a timeout and runs under the retry policy.
 */

import { DependencyUnavailableError, RetryPolicy, ValidationError } from "@shiftlog/domain";
import { formatError } from "@shiftlog/logger";
import { z } from "zod";
import { log } from "../../shared/logger.js";

// ============================================
// Types
// ============================================

export const LookupResponseSchema = z.object({
	status: z.string(),
	message: z.string().optional(),
	zoneName: z.string().optional(),
	gmtOffset: z.coerce.number().optional(),
});

export interface LookupResult {
	zoneName: string;
	utcOffsetSeconds: number;
}

export interface TimezoneLookupClient {
	byPosition(lat: number, lng: number): Promise<LookupResult>;
	byZone(zoneName: string): Promise<LookupResult>;
}

export interface TimeZoneDbClientOptions {
	baseUrl: string;
	apiKey: string;
	timeoutMs: number;
	retry?: RetryPolicy;
	fetch?: typeof fetch;
}

// ============================================
// Client
// ============================================

export class TimeZoneDbClient implements TimezoneLookupClient {
	private readonly baseUrl: string;
	private readonly apiKey: string;
	private readonly timeoutMs: number;
	private readonly retry: RetryPolicy;
	private readonly fetchImpl: typeof fetch;

	constructor(options: TimeZoneDbClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.apiKey = options.apiKey;
		this.timeoutMs = options.timeoutMs;
		this.retry = options.retry ?? new RetryPolicy();
		this.fetchImpl = options.fetch ?? fetch;
	}

	byPosition(lat: number, lng: number): Promise<LookupResult> {
		return this.request({ by: "position", lat: String(lat), lng: String(lng) });
	}

	byZone(zoneName: string): Promise<LookupResult> {
		return this.request({ by: "zone", zone: zoneName });
	}

	private request(params: Record<string, string>): Promise<LookupResult> {
		return this.retry.execute(
			() => this.requestOnce(params),
			({ attempt, delayMs, error }) => {
				log.warn({ attempt, delayMs, by: params.by, error: formatError(error) }, "Timezone lookup failed, retrying");
			},
		);
	}

	private async requestOnce(params: Record<string, string>): Promise<LookupResult> {
		const url = new URL(`${this.baseUrl}/get-time-zone`);
		url.searchParams.set("key", this.apiKey);
		url.searchParams.set("format", "json");
		for (const [name, value] of Object.entries(params)) {
			url.searchParams.set(name, value);
		}

		let body: unknown;
		try {
			const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
			if (!response.ok) {
				throw new DependencyUnavailableError("timezone", `Timezone lookup returned HTTP ${response.status}`);
			}
			body = await response.json();
		} catch (error) {
			if (error instanceof DependencyUnavailableError) {
				throw error;
			}
			throw new DependencyUnavailableError("timezone", `Timezone lookup request failed: ${formatError(error)}`, {
				cause: error,
			});
		}

		const parsed = LookupResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new DependencyUnavailableError("timezone", "Timezone lookup returned a malformed response");
		}

		const { status, message, zoneName, gmtOffset } = parsed.data;
		if (status !== "OK") {
			throw new ValidationError(`Timezone lookup rejected the request: ${message ?? status}`, [
				{ path: params.by ?? "query", message: message ?? "Lookup failed" },
			]);
		}
		if (!zoneName || gmtOffset === undefined) {
			throw new DependencyUnavailableError("timezone", "Timezone lookup response is missing zoneName or gmtOffset");
		}

		return { zoneName, utcOffsetSeconds: gmtOffset };
	}
}
