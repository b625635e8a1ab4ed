/**
 * Utilities to detect and redact personally identifiable information (PII)
 * and sensitive values from log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "ssn",
  "accesstoken",
  "refreshtoken",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const SSN_REGEX = /\b\d{3}-\d{2}-\d{4}\b/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Replace e-mail addresses and US social security numbers in free text.
 */
export function redactText(text: string): string {
  return text.replace(EMAIL_REGEX, REDACTED).replace(SSN_REGEX, REDACTED);
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string, e-mail and SSN patterns inside it are replaced.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return redactText(value);
  }

  return value;
}

/**
 * Short, redacted excerpt of user text suitable for a log line.
 */
export function previewText(text: string, maxLength = 50): string {
  const redacted = redactText(text);
  return redacted.length > maxLength ? `${redacted.slice(0, maxLength)}...` : redacted;
}

/**
 * JSON-path strings for Pino's `redact` option.
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "ssn",
  "accessToken",
  "refreshToken",
  // Also cover one level of nesting (e.g. req.headers.authorization)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.cookie",
  "*.ssn",
  "*.accessToken",
  "*.refreshToken",
];
