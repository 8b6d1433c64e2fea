/**
 * Rate Limit Configuration Schema
 *
 * Per command class quotas for the inbound command pipeline. A class that is
 * not listed falls back to `default`.
 */

import { z } from "zod";

export const RateLimitRuleSchema = z.object({
  /** Admissions allowed per window */
  limit: z.number().int().positive(),
  /** Window length in seconds */
  windowSeconds: z.number().int().positive(),
});
export type RateLimitRule = z.infer<typeof RateLimitRuleSchema>;

export const RateLimitsSchema = z
  .record(z.string().min(1), RateLimitRuleSchema)
  .refine((rules) => rules.default !== undefined, {
    message: "A 'default' rule is required",
  });
export type RateLimits = z.infer<typeof RateLimitsSchema>;

/**
 * Report generation is the most expensive command and gets the strictest quota.
 */
export const DEFAULT_RATE_LIMITS: RateLimits = {
  add_record: { limit: 5, windowSeconds: 60 },
  workplaces: { limit: 10, windowSeconds: 60 },
  reports: { limit: 3, windowSeconds: 60 },
  settings: { limit: 5, windowSeconds: 60 },
  default: { limit: 20, windowSeconds: 60 },
};
