import { createLogger, type Logger, type LoggerOptions } from './logger.js';

interface ScrubPattern {
  pattern: RegExp;
  replacement: string;
}

/**
 * PII patterns that should be scrubbed from logs
 */
const PII_PATTERNS: readonly (ScrubPattern & { name: string })[] = [
  // Email addresses
  {
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    replacement: '[EMAIL:REDACTED]',
    name: 'email',
  },
  // Taiwan mobile numbers (09xx-xxx-xxx)
  {
    pattern: /\b09\d{2}[\s-]?\d{3}[\s-]?\d{3}\b/g,
    replacement: '[PHONE:REDACTED]',
    name: 'phone-tw',
  },
  // International phone numbers
  {
    pattern: /\+\d{1,3}[\s\-.]?\(?\d{2,4}\)?[\s\-.]?\d{3,4}[\s\-.]?\d{3,4}/g,
    replacement: '[PHONE:REDACTED]',
    name: 'phone-intl',
  },
  // Mobile barcode carrier (slash + 7 chars)
  {
    pattern: /(?<![\w/])\/[0-9A-Z.+-]{7}(?![\w.+-])/g,
    replacement: '[CARRIER:REDACTED]',
    name: 'carrier-mobile',
  },
  // Citizen digital certificate carrier
  {
    pattern: /\b[A-Z]{2}\d{14}\b/g,
    replacement: '[CARRIER:REDACTED]',
    name: 'carrier-certificate',
  },
  // Credit card numbers (basic pattern)
  {
    pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g,
    replacement: '[CC:REDACTED]',
    name: 'creditcard',
  },
];

/**
 * Context keys (lowercased) whose values are always redacted
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'password',
  'apipassword',
  'api_password',
  'source',
  'secret',
  'token',
  'authorization',
  'credential',
  'credentials',
  'email',
  'buyeremail',
  'address',
  'buyeraddress',
  'phone',
  'mobile',
  'carrierid',
  'carrierid1',
  'carrierid2',
]);

function scrubString(value: string, patterns: readonly ScrubPattern[]): string {
  let result = value;
  for (const { pattern, replacement } of patterns) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function scrubValue(value: unknown, patterns: readonly ScrubPattern[], depth: number): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_REACHED]';
  }

  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    return scrubString(value, patterns);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => scrubValue(item, patterns, depth + 1));
  }

  if (value instanceof Error) {
    return { name: value.name, message: scrubString(value.message, patterns) };
  }

  if (typeof value === 'object') {
    return scrubRecord(Object.fromEntries(Object.entries(value)), patterns, depth + 1);
  }

  // Functions, symbols, bigints
  return '[UNSUPPORTED_TYPE]';
}

function scrubRecord(
  record: Record<string, unknown>,
  patterns: readonly ScrubPattern[],
  depth = 0,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase())
      ? '[REDACTED]'
      : scrubValue(value, patterns, depth);
  }
  return result;
}

/**
 * Create a logger that scrubs PII and credentials from messages and context.
 *
 * - Scrubs e-mail addresses, phone numbers, carrier ids and card numbers
 * - Redacts known sensitive keys such as `apiPassword` and `source`
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ level: 'info' }).child({ correlationId: 'cor-abc' });
 *
 * logger.info('Issuing invoice', {
 *   orderId: 'A0001',
 *   buyerEmail: 'buyer@example.com', // redacted
 * });
 * ```
 */
export function createSafeLogger(options: LoggerOptions = {}): Logger {
  const baseLogger = createLogger(
    options.context !== undefined ? { ...options, context: scrubRecord(options.context, PII_PATTERNS) } : options,
  );

  const prepare = (message: string, context?: Record<string, unknown>): [string, Record<string, unknown>] => [
    scrubString(message, PII_PATTERNS),
    scrubRecord({ ...context }, PII_PATTERNS),
  ];

  return {
    debug(message, context) {
      baseLogger.debug(...prepare(message, context));
    },

    info(message, context) {
      baseLogger.info(...prepare(message, context));
    },

    warn(message, context) {
      baseLogger.warn(...prepare(message, context));
    },

    error(message, context) {
      baseLogger.error(...prepare(message, context));
    },

    child(context: Record<string, unknown>): Logger {
      return createSafeLogger({
        ...options,
        context: { ...options.context, ...context },
      });
    },
  };
}
