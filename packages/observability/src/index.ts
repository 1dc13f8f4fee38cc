/**
 * @repo/observability
 *
 * Structured logging for the custody ledger (Pino).
 * Redacts secrets and renders bigint amounts as strings.
 */

export { createLogger, logger, serializeBigInts } from './logger.js';
export type { Logger } from 'pino';
