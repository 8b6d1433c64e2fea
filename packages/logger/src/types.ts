import type { DestinationStream, LevelWithSilent, LoggerOptions } from "pino";

export type LogLevel = LevelWithSilent;

export interface NodeLoggerOptions {
  /** Service name stamped on every line */
  service: string;
  level?: LogLevel;
  environment?: string;
  version?: string;
  /** Human-readable output through pino-pretty (defaults to NODE_ENV=development) */
  pretty?: boolean;
  /** Extra paths to redact, merged with the defaults */
  redactPaths?: string[];
  base?: Record<string, unknown>;
  pinoOptions?: Partial<LoggerOptions>;
  /** Write to this stream instead of stdout (ignored when pretty) */
  destination?: DestinationStream;
}

/**
 * Fields attached to every line logged while handling one inbound command.
 */
export interface CommandContext {
  userId: string;
  commandClass: string;
  requestId?: string;
}

/**
 * Fields attached to every line logged during one scheduled job run.
 */
export interface JobContext {
  jobId: string;
  runId: string;
  firedAt?: string;
}
