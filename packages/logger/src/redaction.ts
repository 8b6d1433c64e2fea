/**
 * Redaction paths for secrets that may end up in log payloads
 * (configuration dumps, outbound request options, error details).
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
  "password",
  "*.password",
  "token",
  "*.token",
  "apiKey",
  "*.apiKey",
  "authorization",
  "*.authorization",
  "headers.authorization",
  "DATABASE_URL",
  "*.DATABASE_URL",
  "TIMEZONE_LOOKUP_KEY",
  "*.TIMEZONE_LOOKUP_KEY",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
  return Array.from(new Set([...DEFAULT_REDACT_PATHS, ...extra]));
}
