/**
 * @studydesk/logger
 *
 * Structured logging with secret redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, REDACT_CENSOR } from "./redact.js";
