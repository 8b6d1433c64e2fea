export * from "./env.js";
export * from "./rate-limits.js";
