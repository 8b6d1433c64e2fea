import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { CommandContext, JobContext, NodeLoggerOptions } from "./types.js";

export function createNodeLogger(options: NodeLoggerOptions): Logger {
  const {
    service,
    level = "info",
    environment,
    version,
    pretty,
    redactPaths,
    base = {},
    pinoOptions = {},
    destination,
  } = options;

  const isPretty = pretty ?? process.env.NODE_ENV === "development";

  const loggerOptions: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    redact: {
      paths: mergeRedactPaths(redactPaths),
      censor: "[REDACTED]",
    },
    // Replaces pino's default pid/hostname bindings
    base: {
      service,
      environment,
      version,
      ...base,
    },
    ...pinoOptions,
  };

  if (isPretty) {
    return pino(
      loggerOptions,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,service,environment,version",
          customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
          singleLine: true,
        },
      })
    );
  }

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Flush buffered lines, e.g. right before process exit.
 */
export function flushLogger(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}

export function withCommandContext(logger: Logger, context: CommandContext): Logger {
  return logger.child({
    userId: context.userId,
    commandClass: context.commandClass,
    requestId: context.requestId,
  });
}

export function withJobContext(logger: Logger, context: JobContext): Logger {
  return logger.child({
    jobId: context.jobId,
    runId: context.runId,
    firedAt: context.firedAt,
  });
}

/**
 * Normalise a thrown value into the `error` field the services log.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown error";
}
