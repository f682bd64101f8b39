/**
 * @einvoice-tw/client
 *
 * Client for the Cetustek Taiwan e-invoice SOAP API:
 * issue, query and void invoices with typed requests and responses.
 *
 * @packageDocumentation
 */

// Client
export { CetustekClient } from './client.js';
export {
  resolveClientConfig,
  CETUSTEK_PRODUCTION_ENDPOINT,
  DEFAULT_CLIENT_CONFIG,
  SDK_VERSION,
  type CetustekClientConfig,
  type ResolvedClientConfig,
} from './config.js';

// Transport
export { createDefaultHttpClient } from './http-client.js';
export { MockHttpClient, createSoapResponse, type RecordedRequest, type MockResponseInit } from './mock-http-client.js';

// Building blocks (for direct use)
export { calculateInvoiceAmounts } from './amounts.js';
export {
  validateCreateInvoiceInput,
  validateQueryInvoiceInput,
  validateCancelInvoiceInput,
  isValidOrderDate,
} from './validate.js';
export {
  buildSoapEnvelope,
  buildCreateInvoiceXml,
  buildCancelInvoiceXml,
  CETUSTEK_NAMESPACE,
  SOAP_ENVELOPE_NAMESPACE,
  INVOICE_XSD_VERSION,
} from './soap/envelope.js';
export { extractReturnValue, invoiceYearOf } from './soap/response.js';

// Re-exported so most callers need a single import
export * from '@einvoice-tw/contracts';
export {
  SdkError,
  ValidationError,
  ConfigurationError,
  TransportError,
  ApiError,
  isSdkError,
  createLogger,
  createSafeLogger,
  type Logger,
  type LogLevel,
} from '@einvoice-tw/shared';
