/**
 * @shiftlog/domain - Entities, errors and pure time-tracking logic
 */

export * from "./entities.js";
export * from "./errors.js";
export * from "./events.js";
export * from "./report.js";
export * from "./retry.js";
export * from "./timezone.js";
