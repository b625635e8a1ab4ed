/**
 * @docguard/logger
 *
 * Structured logging with PII redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactText, previewText, REDACT_PATHS } from "./pii-redactor.js";
