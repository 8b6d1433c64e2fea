/**
 * @shiftlog/config - Configuration schemas and loaders
 *
 * This package contains:
 * - Zod schemas for environment variables and rate limit rules
 * - The startup configuration loader
 * - Sanitization for logging the loaded configuration
 */

export { ConfigError, type ConfigIssue, loadConfig, parseRateLimits, type ShiftlogConfig } from "./loader.js";
export { sanitizeConfig } from "./sanitize.js";
export {
  DEFAULT_RATE_LIMITS,
  type EnvConfig,
  EnvSchema,
  LogLevelSchema,
  NodeEnvironment,
  type RateLimitRule,
  RateLimitRuleSchema,
  type RateLimits,
  RateLimitsSchema,
} from "./schemas/index.js";
