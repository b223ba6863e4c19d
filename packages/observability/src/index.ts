/**
 * @kakeibo/observability
 *
 * Structured logging for the ledger API, built on Pino.
 */

export { createLogger } from './logger.js';
export type { CreateLoggerOptions, Logger, LogLevel } from './logger.js';
