/**
 * Shared Logger
 *
 * Centralized logging for all worker bounded contexts.
 */

import { LogLevelSchema } from "@shiftlog/config";
import { createNodeLogger, type Logger } from "@shiftlog/logger";

export const log: Logger = createNodeLogger({
	service: "worker",
	level: LogLevelSchema.catch("info").parse(process.env.LOG_LEVEL),
	environment: process.env.NODE_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});
