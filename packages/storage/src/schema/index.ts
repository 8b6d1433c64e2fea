/**
 * Drizzle Schema Index
 *
 * @example
 * import * as schema from "./schema/index.js";
 */

export * from "./time-tracking.js";
export * from "./relations.js";
