/**
 * Environment Variable Schema
 *
 * Every setting the worker reads from the process environment, with defaults.
 * Numbers are coerced from their string form.
 */

import { z } from "zod";

export const NodeEnvironment = z.enum(["development", "test", "production"]);
export type NodeEnvironment = z.infer<typeof NodeEnvironment>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

export const EnvSchema = z.object({
  NODE_ENV: NodeEnvironment.default("development"),
  LOG_LEVEL: LogLevelSchema.default("info"),

  DATABASE_URL: z.string().url().describe("PostgreSQL connection string"),
  DATABASE_STATEMENT_TIMEOUT_MS: positiveInt(10_000),

  SERVICE_TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, { message: "Must be an IANA time zone name" })
    .describe("Zone for service-level job triggers"),

  TIMEZONE_LOOKUP_URL: z.string().url().default("http://api.timezonedb.com/v2.1"),
  TIMEZONE_LOOKUP_KEY: z.string().min(1).optional(),
  TIMEZONE_LOOKUP_TIMEOUT_MS: positiveInt(5_000),

  EVENT_SINK_URL: z.string().url().describe("Messaging collaborator endpoint receiving events"),
  EVENT_SINK_HEALTH_URL: z.string().url().optional(),
  EVENT_SINK_TIMEOUT_MS: positiveInt(5_000),

  HEALTH_PORT: z.coerce.number().int().min(1).max(65_535).default(3002),
  HEALTH_INTERVAL_MS: positiveInt(60_000),
  HEALTH_PROBE_TIMEOUT_MS: positiveInt(5_000),

  SCHEDULER_TICK_MS: positiveInt(30_000),
  SHUTDOWN_DEADLINE_MS: positiveInt(10_000),

  STALE_RECORD_HOURS: positiveInt(8),
  RETENTION_DAYS: positiveInt(365),

  RATE_LIMITS: z.string().optional().describe("JSON object overriding per-class rate limits"),
});
export type EnvConfig = z.infer<typeof EnvSchema>;
