import pino from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization headers
 * - RPC endpoints (often embed provider API keys)
 * - Private keys and other secrets
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  'authorization',
  'privateKey',
  'secret',
  'apiKey',
  'rpcUrl',
];

/**
 * Render bigint values (balances, amounts, rates) as decimal strings
 * so they survive JSON serialization without losing precision
 */
export function serializeBigInts(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(serializeBigInts);
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = serializeBigInts(entry);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of sensitive data
 * - Bigint-safe structured JSON output
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
) {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    // Format timestamps as ISO 8601
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log(object) {
        const result: Record<string, unknown> = {};
        for (const [key, entry] of Object.entries(object)) {
          result[key] = serializeBigInts(entry);
        }
        return result;
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
