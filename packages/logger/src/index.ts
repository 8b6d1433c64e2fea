import pino from "pino";

export { createNodeLogger, flushLogger, formatError, withCommandContext, withJobContext } from "./node.js";
export * from "./redaction.js";
export type * from "./types.js";
export type { Logger } from "pino";

export { pino };
