/**
 * Configuration Sanitization
 *
 * Produces a copy of a configuration object that is safe to log at startup.
 */

const SENSITIVE_PATTERNS = [/key$/i, /secret$/i, /token$/i, /password$/i, /credential/i, /auth/i];

const REDACTED = "[REDACTED]";

/** Connection strings carry credentials in their userinfo part */
const URL_FIELDS = [/^url$/i, /database_url$/i];

function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(fieldName));
}

function stripUrlCredentials(value: string): string {
  try {
    const url = new URL(value);
    if (url.username || url.password) {
      url.username = url.username ? REDACTED : "";
      url.password = url.password ? REDACTED : "";
    }
    return url.toString();
  } catch {
    return value;
  }
}

/**
 * Recursively sanitize an object, redacting sensitive values
 *
 * @param depth - Current recursion depth (prevents infinite loops)
 */
export function sanitizeConfig(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return REDACTED;
  }

  if (obj === null || obj === undefined || typeof obj !== "object") {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => sanitizeConfig(item, depth + 1));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveField(key)) {
      // Redact sensitive values, but indicate if present or missing
      sanitized[key] = value ? REDACTED : "[NOT SET]";
    } else if (typeof value === "string" && URL_FIELDS.some((pattern) => pattern.test(key))) {
      sanitized[key] = stripUrlCredentials(value);
    } else if (typeof value === "object" && value !== null) {
      sanitized[key] = sanitizeConfig(value, depth + 1);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
