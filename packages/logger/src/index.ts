/**
 * @gapscout/logger
 *
 * Structured logging with secret and e-mail redaction.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, previewText, REDACT_PATHS } from "./pii-redactor.js";
