/**
 * @docboard/logger
 *
 * Structured logging with secret redaction.
 */

export { createLogger, createChildLogger, createSilentLogger, redactLogRecord } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactPresignedUrl, isSensitiveKey, REDACT_PATHS } from "./redactor.js";
