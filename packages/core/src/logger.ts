import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Clinical logger with PHI redaction
 *
 * Tooth observations carry free-text clinical notes (patient complaints,
 * diagnoses, treatment notes). Those fields never reach the log stream;
 * identifiers (patient id, tooth number, examination id) do, so that
 * operations stay traceable.
 */

// Fields to completely redact (case-insensitive matching)
const REDACTED_FIELDS = [
  'description',
  'descriptions',
  'diagnosis',
  'treatmentperformed',
  'notes',
  'name',
  'fullname',
  'phone',
  'email',
  'password',
  'secret',
  'token',
  'authorization',
  'cookie',
  'connectionstring',
];

/**
 * Check whether a key names a redacted field
 */
export function shouldRedactKey(key: string): boolean {
  const keyLower = key.toLowerCase();
  return REDACTED_FIELDS.some((field) => keyLower === field || keyLower.includes(field));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively redact PHI from an object. Errors, dates and other class
 * instances pass through untouched so pino's serializers still see them.
 */
export function redactObject(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(redactObject);
  }

  if (isPlainObject(obj)) {
    return redactRecord(obj);
  }

  return obj;
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    redacted[key] = shouldRedactKey(key) ? '[REDACTED]' : redactObject(value);
  }
  return redacted;
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

/**
 * Create a logger instance with PHI redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId, destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie'],
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
      log: redactRecord,
    },
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

// Default logger instance
export const logger = createLogger({ name: 'dentalcore' });

export type { Logger };
