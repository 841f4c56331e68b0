import pino from 'pino';

/**
 * Paths censored in every log line
 * - Authorization headers (admin bearer key)
 * - Admin API key and other secrets passed as structured fields
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'adminApiKey',
  'apiKey',
  'api_key',
  'password',
  'secret',
  'token',
  'databaseUrl',
];

const BEARER_PREFIX = 'Bearer ';

/**
 * Rewrite bearer credentials found in a string field
 */
export function redactString(value: string): string {
  if (value.startsWith(BEARER_PREFIX)) {
    return `${BEARER_PREFIX}[REDACTED]`;
  }
  // Connection strings carry the password between ':' and '@'
  return value.replace(/(postgres(?:ql)?:\/\/[^:/@\s]+:)[^@\s]+@/g, '$1[REDACTED]@');
}

/**
 * Recursively redact credentials in a structured log payload
 */
export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactString(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (value && typeof value === 'object') {
    return redactRecord(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    result[key] = redactValue(entry);
  }
  return result;
}

export type Logger = pino.Logger;

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of credentials (bearer keys, connection strings)
 * - Structured JSON output with ISO 8601 timestamps
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log(object) {
        return redactRecord(object);
      },
    },
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
