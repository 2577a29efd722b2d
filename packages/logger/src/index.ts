/**
 * @docindex/logger
 *
 * Structured logging with secret redaction for the indexing pipeline.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactUrl, REDACT_PATHS } from "./redaction.js";
