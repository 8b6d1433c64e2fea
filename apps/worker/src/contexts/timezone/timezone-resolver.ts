/**
 * Timezone Resolver
 *
 * Resolves coordinates and zone names to ZoneInfo through the lookup
 * service, falling back to local data when the lookup keeps failing:
 *
 * - by name: the name itself through Intl, then the user's cached zone,
 *   then the zone stored on the user
 * - by coordinates: the user's cached zone, then the stored zone
 *
 * Conversions are pure Intl arithmetic.
 */

import {
	canonicalZoneName,
	convert,
	DependencyUnavailableError,
	isValidTimeZone,
	type LocalDateTime,
	startOfLocalDay,
	toLocal,
	toUtc,
	ValidationError,
	type ZoneInfo,
	zoneInfoFor,
} from "@shiftlog/domain";
import { formatError, type Logger } from "@shiftlog/logger";
import type { UserStore } from "@shiftlog/storage";
import { z } from "zod";
import { log as defaultLog } from "../../shared/logger.js";
import type { LookupResult, TimezoneLookupClient } from "./lookup-client.js";

export const CoordinatesSchema = z.object({
	lat: z.number().min(-90).max(90),
	lng: z.number().min(-180).max(180),
});

export interface ResolveOptions {
	/** Enables the per-user cache and stored-zone fallbacks */
	userId?: string;
}

export interface TimezoneResolverDeps {
	/** Absent when no lookup service is configured */
	lookup?: TimezoneLookupClient;
	users?: Pick<UserStore, "findById">;
	logger?: Logger;
	now?: () => Date;
}

export class TimezoneResolver {
	private readonly cache = new Map<string, ZoneInfo>();
	private readonly lookup: TimezoneLookupClient | undefined;
	private readonly users: Pick<UserStore, "findById"> | undefined;
	private readonly log: Logger;
	private readonly now: () => Date;

	constructor(deps: TimezoneResolverDeps = {}) {
		this.lookup = deps.lookup;
		this.users = deps.users;
		this.log = deps.logger ?? defaultLog;
		this.now = deps.now ?? (() => new Date());
	}

	async resolveByCoordinates(lat: number, lng: number, options: ResolveOptions = {}): Promise<ZoneInfo> {
		const coordinates = CoordinatesSchema.safeParse({ lat, lng });
		if (!coordinates.success) {
			throw ValidationError.fromZod(coordinates.error, "coordinates");
		}

		let failure: unknown = new DependencyUnavailableError("timezone", "No timezone lookup service configured");
		if (this.lookup) {
			try {
				const info = this.fromLookup(await this.lookup.byPosition(lat, lng));
				this.remember(options.userId, info);
				return info;
			} catch (error) {
				if (error instanceof ValidationError) {
					throw error;
				}
				failure = error;
			}
		}

		return this.fallback(failure, options.userId);
	}

	async resolveByName(zoneName: string, options: ResolveOptions = {}): Promise<ZoneInfo> {
		const name = zoneName.trim();
		if (name === "") {
			throw new ValidationError("Time zone name is empty", [{ path: "timezone", message: "Must not be empty" }]);
		}

		let failure: unknown = new DependencyUnavailableError("timezone", "No timezone lookup service configured");
		if (this.lookup) {
			try {
				const info = this.fromLookup(await this.lookup.byZone(name));
				this.remember(options.userId, info);
				return info;
			} catch (error) {
				failure = error;
			}
		}

		if (isValidTimeZone(name)) {
			const info = zoneInfoFor(name, this.now(), "local");
			this.remember(options.userId, info);
			return info;
		}

		if (failure instanceof ValidationError) {
			throw failure;
		}
		return this.fallback(failure, options.userId);
	}

	convert(local: LocalDateTime, fromZone: string, toZone: string): LocalDateTime {
		return convert(local, fromZone, toZone);
	}

	toUtc(local: LocalDateTime, zone: string): Date {
		return toUtc(local, zone);
	}

	toLocal(instant: Date, zone: string): LocalDateTime {
		return toLocal(instant, zone);
	}

	startOfLocalDay(instant: Date, zone: string): Date {
		return startOfLocalDay(instant, zone);
	}

	isValidTimeZone(zone: string): boolean {
		return isValidTimeZone(zone);
	}

	zoneInfoFor(zone: string, at: Date = this.now()): ZoneInfo {
		return zoneInfoFor(zone, at);
	}

	/** Last successful resolution for a user */
	cachedFor(userId: string): ZoneInfo | undefined {
		return this.cache.get(userId);
	}

	private fromLookup(result: LookupResult): ZoneInfo {
		return {
			zoneName: isValidTimeZone(result.zoneName) ? canonicalZoneName(result.zoneName) : result.zoneName,
			utcOffsetSeconds: result.utcOffsetSeconds,
			source: "lookup",
		};
	}

	private remember(userId: string | undefined, info: ZoneInfo): void {
		if (userId) {
			this.cache.set(userId, info);
		}
	}

	private async fallback(failure: unknown, userId: string | undefined): Promise<ZoneInfo> {
		if (userId) {
			const cached = this.cache.get(userId);
			if (cached) {
				this.log.warn({ userId, zone: cached.zoneName, error: formatError(failure) }, "Timezone lookup failed, using cached zone");
				return { ...cached, source: "cache" };
			}

			const user = this.users ? await this.users.findById(userId) : null;
			if (user && isValidTimeZone(user.timezone)) {
				this.log.warn({ userId, zone: user.timezone, error: formatError(failure) }, "Timezone lookup failed, using stored zone");
				return zoneInfoFor(user.timezone, this.now(), "stored");
			}
		}

		if (failure instanceof DependencyUnavailableError) {
			throw failure;
		}
		throw new DependencyUnavailableError("timezone", `Timezone lookup failed: ${formatError(failure)}`, {
			cause: failure,
		});
	}
}
