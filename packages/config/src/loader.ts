/**
 * Configuration Loader
 *
 * Parses the process environment once at startup into the typed
 * configuration the worker is wired from.
 */

import type { z } from "zod";
import { type EnvConfig, EnvSchema, type NodeEnvironment } from "./schemas/env.js";
import { DEFAULT_RATE_LIMITS, type RateLimits, RateLimitsSchema } from "./schemas/rate-limits.js";

// ============================================
// Types
// ============================================

export interface ShiftlogConfig {
  environment: NodeEnvironment;
  logLevel: EnvConfig["LOG_LEVEL"];
  database: {
    url: string;
    statementTimeoutMs: number;
  };
  /** Zone used by service-level job triggers */
  serviceTimezone: string;
  timezoneLookup: {
    baseUrl: string;
    apiKey?: string;
    timeoutMs: number;
  };
  eventSink: {
    url: string;
    healthUrl?: string;
    timeoutMs: number;
  };
  health: {
    port: number;
    intervalMs: number;
    probeTimeoutMs: number;
  };
  scheduler: {
    tickMs: number;
    shutdownDeadlineMs: number;
  };
  jobs: {
    staleRecordHours: number;
    retentionDays: number;
  };
  rateLimits: RateLimits;
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      `Invalid configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================
// Loading
// ============================================

function toIssues(error: z.ZodError, prefix?: string): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: [prefix, ...issue.path].filter((part) => part !== undefined && part !== "").join("."),
    message: issue.message,
  }));
}

/**
 * Merge a RATE_LIMITS JSON override over the defaults.
 */
export function parseRateLimits(raw: string | undefined): RateLimits {
  if (raw === undefined || raw.trim() === "") {
    return { ...DEFAULT_RATE_LIMITS };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError([{ path: "RATE_LIMITS", message: "Must be a JSON object" }]);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError([{ path: "RATE_LIMITS", message: "Must be a JSON object" }]);
  }

  const result = RateLimitsSchema.safeParse({ ...DEFAULT_RATE_LIMITS, ...parsed });
  if (!result.success) {
    throw new ConfigError(toIssues(result.error, "RATE_LIMITS"));
  }
  return result.data;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ShiftlogConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(toIssues(result.error));
  }

  const vars = result.data;

  return {
    environment: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    database: {
      url: vars.DATABASE_URL,
      statementTimeoutMs: vars.DATABASE_STATEMENT_TIMEOUT_MS,
    },
    serviceTimezone: vars.SERVICE_TIMEZONE,
    timezoneLookup: {
      baseUrl: vars.TIMEZONE_LOOKUP_URL,
      apiKey: vars.TIMEZONE_LOOKUP_KEY,
      timeoutMs: vars.TIMEZONE_LOOKUP_TIMEOUT_MS,
    },
    eventSink: {
      url: vars.EVENT_SINK_URL,
      healthUrl: vars.EVENT_SINK_HEALTH_URL,
      timeoutMs: vars.EVENT_SINK_TIMEOUT_MS,
    },
    health: {
      port: vars.HEALTH_PORT,
      intervalMs: vars.HEALTH_INTERVAL_MS,
      probeTimeoutMs: vars.HEALTH_PROBE_TIMEOUT_MS,
    },
    scheduler: {
      tickMs: vars.SCHEDULER_TICK_MS,
      shutdownDeadlineMs: vars.SHUTDOWN_DEADLINE_MS,
    },
    jobs: {
      staleRecordHours: vars.STALE_RECORD_HOURS,
      retentionDays: vars.RETENTION_DAYS,
    },
    rateLimits: parseRateLimits(vars.RATE_LIMITS),
  };
}
