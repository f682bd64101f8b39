/**
 * @einvoice-tw/shared
 *
 * Shared utilities for the e-invoice SDK.
 *
 * @packageDocumentation
 */

export { createLogger, type Logger, type LogLevel, type LogSink, type LoggerOptions } from './logging/logger.js';
export { createSafeLogger } from './logging/safe-logger.js';
export {
  SdkError,
  ValidationError,
  ConfigurationError,
  TransportError,
  ApiError,
  isSdkError,
} from './errors/errors.js';
export {
  generateCorrelationId,
  defaultIdGenerator,
  type IdGenerator,
  type GenerateIdOptions,
} from './utils/ids.js';

// Decimal arithmetic
export {
  add,
  multiply,
  sum,
  round,
  fromNumber,
  isRepresentableNumber,
  DEFAULT_DECIMAL_PLACES,
  MAX_DECIMAL_PLACES,
} from './decimal/decimal-utils.js';
