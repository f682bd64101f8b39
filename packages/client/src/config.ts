import type { HttpClient } from '@einvoice-tw/contracts';
import { ConfigurationError, createSafeLogger, type Logger } from '@einvoice-tw/shared';
import { createDefaultHttpClient } from './http-client.js';

/**
 * Production endpoint of the Cetustek invoice API
 */
export const CETUSTEK_PRODUCTION_ENDPOINT = 'https://invoice.cetustek.com.tw/InvoiceMultiWeb/InvoiceAPI';

export const SDK_VERSION = '0.1.0';

/**
 * Defaults applied by resolveClientConfig
 */
export const DEFAULT_CLIENT_CONFIG = {
  userAgent: `einvoice-tw/${SDK_VERSION}`,
  logLevel: 'warn',
  logPrefix: 'einvoice-tw',
} as const;

/**
 * Options accepted by the CetustekClient constructor
 */
export interface CetustekClientConfig {
  /** SOAP endpoint URL, usually CETUSTEK_PRODUCTION_ENDPOINT */
  endpoint: string;

  /** Tenant id assigned by the vendor (the seller's business number) */
  rentId: string;

  /** Site code assigned by the vendor */
  siteCode: string;

  /** API password assigned by the vendor */
  apiPassword: string;

  /**
   * HTTP client for the SOAP calls.
   * If not provided, uses the default fetch-based implementation.
   */
  httpClient?: HttpClient;

  /**
   * Logger for request tracing.
   * If not provided, a PII-scrubbing console logger at `warn` level is used.
   */
  logger?: Logger;

  /** User-Agent header sent with each request */
  userAgent?: string;
}

/**
 * Validated, immutable client configuration
 */
export interface ResolvedClientConfig {
  readonly endpoint: string;
  readonly rentId: string;

  /** Vendor credential: site code followed by the API password */
  readonly source: string;

  readonly userAgent: string;
  readonly httpClient: HttpClient;
  readonly logger: Logger;
}

function requireValue(config: CetustekClientConfig, field: 'endpoint' | 'rentId' | 'siteCode' | 'apiPassword'): string {
  const value: unknown = config[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${field} is required`, { field });
  }
  return value.trim();
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validate constructor options and apply defaults.
 *
 * @throws ConfigurationError when a credential is empty or the endpoint is not an http(s) URL
 */
export function resolveClientConfig(config: CetustekClientConfig): ResolvedClientConfig {
  const endpoint = requireValue(config, 'endpoint');
  if (!isHttpUrl(endpoint)) {
    throw new ConfigurationError('endpoint must be an http(s) URL', { field: 'endpoint', endpoint });
  }

  const rentId = requireValue(config, 'rentId');
  const siteCode = requireValue(config, 'siteCode');
  const apiPassword = requireValue(config, 'apiPassword');

  return Object.freeze({
    endpoint,
    rentId,
    source: `${siteCode}${apiPassword}`,
    userAgent: config.userAgent ?? DEFAULT_CLIENT_CONFIG.userAgent,
    httpClient: config.httpClient ?? createDefaultHttpClient(),
    logger:
      config.logger ??
      createSafeLogger({ level: DEFAULT_CLIENT_CONFIG.logLevel, prefix: DEFAULT_CLIENT_CONFIG.logPrefix }),
  });
}
