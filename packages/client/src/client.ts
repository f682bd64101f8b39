import {
  DEFAULT_TAX_RATE,
  type CancelInvoiceInput,
  type CancelInvoiceOptions,
  type CancelInvoiceResponse,
  type CreateInvoiceInput,
  type CreateInvoiceResponse,
  type HttpResponse,
  type QueryInvoiceInput,
  type QueryInvoiceResponse,
  type SoapAction,
} from '@einvoice-tw/contracts';
import { ApiError, TransportError, generateCorrelationId, type Logger } from '@einvoice-tw/shared';
import { calculateInvoiceAmounts } from './amounts.js';
import { resolveClientConfig, type CetustekClientConfig, type ResolvedClientConfig } from './config.js';
import {
  buildCancelInvoiceXml,
  buildCreateInvoiceXml,
  buildSoapEnvelope,
  invoiceDocumentPayload,
  type SoapCredentials,
  type SoapPayload,
} from './soap/envelope.js';
import {
  extractReturnValue,
  extractSoapFault,
  parseCancelResponse,
  parseCreateResponse,
  parseQueryResponse,
} from './soap/response.js';
import {
  assertValid,
  validateCancelInvoiceInput,
  validateCreateInvoiceInput,
  validateQueryInvoiceInput,
} from './validate.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Client for the Cetustek e-invoice SOAP API.
 *
 * Each operation validates its input, sends exactly one request and
 * either returns a typed response or rejects with an SdkError:
 * ValidationError before any request, TransportError for HTTP failures,
 * ApiError for errors reported by the service.
 *
 * @example
 * ```typescript
 * const client = new CetustekClient({
 *   endpoint: CETUSTEK_PRODUCTION_ENDPOINT,
 *   rentId: '12345678',
 *   siteCode: 'S01',
 *   apiPassword: 'test-secret',
 * });
 *
 * const { invoiceNumber, invoiceYear } = await client.createInvoice(input);
 * await client.cancelInvoice({ invoiceNumber, invoiceYear, remark: 'Order refunded' });
 * ```
 */
export class CetustekClient {
  private readonly config: ResolvedClientConfig;

  constructor(config: CetustekClientConfig) {
    this.config = resolveClientConfig(config);
  }

  /**
   * Issue a new invoice.
   *
   * @throws ValidationError when the input is incomplete or out of range
   * @throws ApiError when the service rejects the invoice
   */
  async createInvoice(input: CreateInvoiceInput): Promise<CreateInvoiceResponse> {
    const action: SoapAction = 'CreateInvoiceV3';
    const logger = this.callLogger(action);
    assertValid('createInvoice', validateCreateInvoiceInput(input));

    const amounts = calculateInvoiceAmounts(input.items, input.taxType, input.taxRate ?? DEFAULT_TAX_RATE);
    logger.debug('Invoice amounts calculated', { orderId: input.orderId, itemCount: input.items.length, ...amounts });

    const payload = invoiceDocumentPayload(buildCreateInvoiceXml(input), this.credentials());
    const result = await this.send(action, payload, logger, parseCreateResponse);

    logger.info('Invoice issued', { orderId: input.orderId, invoiceNumber: result.invoiceNumber });
    return result;
  }

  /**
   * Look up an issued invoice.
   *
   * @throws ValidationError when the invoice number or year is malformed
   * @throws ApiError when the service returns an error code instead of the invoice
   */
  async queryInvoice(input: QueryInvoiceInput): Promise<QueryInvoiceResponse> {
    const action: SoapAction = 'QueryInvoice';
    const logger = this.callLogger(action);
    assertValid('queryInvoice', validateQueryInvoiceInput(input));

    const payload: SoapPayload = {
      invoicenumber: input.invoiceNumber,
      invoiceyear: input.invoiceYear,
      ...this.credentials(),
    };
    const result = await this.send(action, payload, logger, (returnValue) =>
      parseQueryResponse(returnValue, input.invoiceNumber),
    );

    logger.debug('Invoice queried', { invoiceNumber: result.invoiceNumber, invoiceStatus: result.invoiceStatus });
    return result;
  }

  /**
   * Void an issued invoice. A code other than `C0` resolves with
   * `success: false`; it is not thrown.
   *
   * @throws ValidationError when the invoice number or year is malformed
   */
  async cancelInvoice(input: CancelInvoiceInput, options: CancelInvoiceOptions = {}): Promise<CancelInvoiceResponse> {
    const action: SoapAction = options.noCheck ? 'CancelInvoiceNoCheck' : 'CancelInvoice';
    const logger = this.callLogger(action);
    assertValid('cancelInvoice', validateCancelInvoiceInput(input));

    const payload = invoiceDocumentPayload(buildCancelInvoiceXml(input), this.credentials());
    const result = await this.send(action, payload, logger, parseCancelResponse);

    if (result.success) {
      logger.info('Invoice cancelled', { invoiceNumber: input.invoiceNumber });
    } else {
      logger.warn('Invoice cancellation rejected', { invoiceNumber: input.invoiceNumber, vendorCode: result.code });
    }
    return result;
  }

  private credentials(): SoapCredentials {
    return { rentid: this.config.rentId, source: this.config.source };
  }

  private callLogger(action: SoapAction): Logger {
    return this.config.logger.child({ correlationId: generateCorrelationId(), action });
  }

  /**
   * POST one SOAP call and interpret its `<return>` value.
   */
  private async send<T>(
    action: SoapAction,
    payload: SoapPayload,
    logger: Logger,
    parse: (returnValue: string) => T,
  ): Promise<T> {
    const body = await this.post(action, buildSoapEnvelope(action, payload), logger);
    const returnValue = extractReturnValue(body);

    try {
      return parse(returnValue);
    } catch (error) {
      if (error instanceof ApiError) {
        logger.warn('Service returned an error', { vendorCode: error.vendorCode });
      }
      throw error;
    }
  }

  private async post(action: SoapAction, envelope: string, logger: Logger): Promise<string> {
    const startTime = Date.now();
    logger.debug('Sending SOAP request', { endpoint: this.config.endpoint, bytes: envelope.length });

    let response: HttpResponse;
    try {
      response = await this.config.httpClient.post(this.config.endpoint, envelope, {
        headers: {
          'Content-Type': 'text/xml; charset=utf-8',
          Accept: 'text/xml',
          'User-Agent': this.config.userAgent,
        },
      });
    } catch (error) {
      logger.error('SOAP request failed', { error: errorMessage(error) });
      throw new TransportError(`${action} request failed: ${errorMessage(error)}`, {
        cause: error,
        context: { action },
      });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      logger.error('Reading SOAP response failed', { status: response.status, error: errorMessage(error) });
      throw new TransportError(`${action} response could not be read: ${errorMessage(error)}`, {
        cause: error,
        status: response.status,
        context: { action },
      });
    }

    const durationMs = Date.now() - startTime;

    if (!response.ok) {
      const fault = extractSoapFault(body);
      logger.error('SOAP request returned an HTTP error', { status: response.status, fault, durationMs });
      throw new TransportError(
        `${action} returned HTTP ${String(response.status)} ${response.statusText}`.trimEnd() +
          (fault ? `: ${fault}` : ''),
        { status: response.status, context: { action } },
      );
    }

    logger.debug('SOAP response received', { status: response.status, bytes: body.length, durationMs });
    return body;
  }
}
