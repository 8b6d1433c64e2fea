/**
 * @shiftlog/worker
 *
 * Wires the time-tracking core: the job scheduler with its recurring jobs,
 * the command pipeline, the health monitor and its HTTP endpoint.
 *
 * Configuration is parsed once from the environment; a configuration error
 * is the only fatal startup path.
 */

import { ConfigError, loadConfig, type ShiftlogConfig, sanitizeConfig } from "@shiftlog/config";
import { RetryPolicy } from "@shiftlog/domain";
import { flushLogger, formatError } from "@shiftlog/logger";
import { createPostgresStore } from "@shiftlog/storage";
import { type CommandPipeline, createCommandPipeline } from "./contexts/commands/index.js";
import { WebhookEventSink } from "./contexts/events/webhook-sink.js";
import { createJobs } from "./contexts/jobs/index.js";
import { HealthMonitor } from "./contexts/monitoring/index.js";
import { ReportAggregator } from "./contexts/reporting/report-aggregator.js";
import { JobScheduler } from "./contexts/scheduling/index.js";
import { RateGovernor } from "./contexts/throttling/rate-governor.js";
import { TimeZoneDbClient } from "./contexts/timezone/lookup-client.js";
import { TimezoneResolver } from "./contexts/timezone/timezone-resolver.js";
import { createHealthServer } from "./shared/health-server.js";
import { log } from "./shared/logger.js";

const RATE_EVICTION_INTERVAL_MS = 60_000;

// ============================================
// Worker
// ============================================

interface Worker {
	pipeline: CommandPipeline;
	scheduler: JobScheduler;
	monitor: HealthMonitor;
	shutdown: () => Promise<void>;
}

function startWorker(config: ShiftlogConfig): Worker {
	const startedAt = new Date();
	const store = createPostgresStore({
		url: config.database.url,
		statementTimeoutMs: config.database.statementTimeoutMs,
	});
	const events = new WebhookEventSink({
		url: config.eventSink.url,
		healthUrl: config.eventSink.healthUrl,
		timeoutMs: config.eventSink.timeoutMs,
	});
	const resolver = new TimezoneResolver({
		lookup: config.timezoneLookup.apiKey
			? new TimeZoneDbClient({
					baseUrl: config.timezoneLookup.baseUrl,
					apiKey: config.timezoneLookup.apiKey,
					timeoutMs: config.timezoneLookup.timeoutMs,
					retry: new RetryPolicy(),
				})
			: undefined,
		users: store.users,
	});
	if (!config.timezoneLookup.apiKey) {
		log.warn({}, "TIMEZONE_LOOKUP_KEY not configured. Zone names resolve locally; coordinates need a stored zone.");
	}

	const aggregator = new ReportAggregator(store);
	const governor = new RateGovernor(config.rateLimits);
	const pipeline = createCommandPipeline({ store, aggregator, resolver, governor });

	const scheduler = new JobScheduler({ tickMs: config.scheduler.tickMs, events });
	for (const job of createJobs({
		store,
		events,
		aggregator,
		resolver,
		serviceTimezone: config.serviceTimezone,
		staleRecordHours: config.jobs.staleRecordHours,
		retentionDays: config.jobs.retentionDays,
	})) {
		scheduler.register(job.descriptor, job.trigger, job.callback);
	}

	const monitor = new HealthMonitor({
		store,
		events,
		scheduler,
		probeTimeoutMs: config.health.probeTimeoutMs,
	});
	const healthServer = createHealthServer({ monitor, scheduler, startedAt }, config.health.port);

	const evictionTimer = setInterval(() => {
		const evicted = governor.evictExpired();
		if (evicted > 0) {
			log.debug({ evicted, remaining: governor.size }, "Evicted expired rate limit buckets");
		}
	}, RATE_EVICTION_INTERVAL_MS);
	evictionTimer.unref();

	scheduler.start();
	monitor.start(config.health.intervalMs);
	healthServer.start();

	let stopping: Promise<void> | null = null;
	async function stop(): Promise<void> {
		clearInterval(evictionTimer);
		monitor.stop();

		const result = await scheduler.stop(config.scheduler.shutdownDeadlineMs);
		if (result.pending.length > 0) {
			log.warn({ pending: result.pending }, "Jobs still running at shutdown deadline");
		}

		const closing = await Promise.allSettled([healthServer.stop(), store.close()]);
		for (const outcome of closing) {
			if (outcome.status === "rejected") {
				log.error({ error: formatError(outcome.reason) }, "Shutdown step failed");
			}
		}
		log.info({}, "Worker stopped");
	}

	return {
		pipeline,
		scheduler,
		monitor,
		shutdown: () => {
			stopping ??= stop();
			return stopping;
		},
	};
}

// ============================================
// Main Entry Point
// ============================================

async function main(): Promise<void> {
	let config: ShiftlogConfig;
	try {
		config = loadConfig(process.env);
	} catch (error) {
		if (error instanceof ConfigError) {
			log.error({ issues: error.issues }, "Invalid configuration");
		} else {
			log.error({ error: formatError(error) }, "Failed to load configuration");
		}
		await flushLogger(log);
		process.exit(1);
	}

	log.info({ config: sanitizeConfig(config) }, "Worker starting");
	const worker = startWorker(config);

	const onSignal = (signal: NodeJS.Signals) => {
		log.info({ signal }, "Shutdown requested");
		worker
			.shutdown()
			.then(() => flushLogger(log))
			.catch((error: unknown) => {
				log.error({ error: formatError(error) }, "Shutdown failed");
				process.exitCode = 1;
			});
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
	log.error({ error: formatError(error) }, "Worker crashed during startup");
	process.exitCode = 1;
});
