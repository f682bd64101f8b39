import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { CreateInvoiceInput } from '@einvoice-tw/contracts';
import { ApiError, SdkError, TransportError, ValidationError, createLogger, type LogSink } from '@einvoice-tw/shared';
import { XMLParser } from 'fast-xml-parser';
import { CetustekClient } from './client.js';
import { MockHttpClient, createSoapResponse } from './mock-http-client.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function loadFixture(name: string): string {
  return readFileSync(path.join(__dirname, '..', 'fixtures', name), 'utf-8');
}

const ENDPOINT = 'https://einvoice.test/InvoiceAPI';

const VALID_INPUT: CreateInvoiceInput = {
  orderId: 'A20260105001',
  orderDate: '2026/01/05',
  donateMark: '0',
  invoiceType: '07',
  taxType: '1',
  payWay: '1',
  buyerIdentifier: '12345678',
  buyerName: 'Test Buyer Ltd.',
  items: [
    { productionCode: 'P001', description: 'Widget', quantity: 2, unitPrice: 500 },
    { productionCode: 'P002', description: 'Gadget', quantity: 1, unitPrice: 1000, unit: 'pcs' },
  ],
};

const envelopeParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  cdataPropName: '__cdata',
});

function valueAt(node: unknown, keys: readonly string[]): unknown {
  let current = node;
  for (const key of keys) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Object.fromEntries(Object.entries(current))[key];
  }
  return current;
}

function createClient(http: MockHttpClient, sink?: LogSink): CetustekClient {
  return new CetustekClient({
    endpoint: ENDPOINT,
    rentId: '12345678',
    siteCode: 'S01',
    apiPassword: 'test-secret',
    httpClient: http,
    logger: createLogger({ level: sink ? 'debug' : 'silent', ...(sink ? { sink } : {}) }),
  });
}

describe('CetustekClient', () => {
  describe('createInvoice', () => {
    it('should return invoice number, random code and invoice year', async () => {
      const http = new MockHttpClient().respondWith(loadFixture('create-success.xml'));
      const client = createClient(http);

      const result = await client.createInvoice(VALID_INPUT);

      expect(result).toEqual({ invoiceNumber: 'WP20260002', randomCode: '6827', invoiceYear: '2026' });
    });

    it('should post a CreateInvoiceV3 envelope with credentials to the endpoint', async () => {
      const http = new MockHttpClient().respondWith(createSoapResponse('CreateInvoiceV3', 'WP20260002;6827'));
      const client = createClient(http);

      await client.createInvoice(VALID_INPUT);

      expect(http.requests).toHaveLength(1);
      const request = http.requests[0];
      expect(request?.url).toBe(ENDPOINT);
      expect(request?.headers).toEqual({
        'Content-Type': 'text/xml; charset=utf-8',
        Accept: 'text/xml',
        'User-Agent': 'einvoice-tw/0.1.0',
      });

      const parsed: unknown = envelopeParser.parse(request?.body ?? '');
      expect(parsed).toMatchObject({
        Envelope: {
          Body: {
            CreateInvoiceV3: {
              rentid: '12345678',
              source: 'S01test-secret',
            },
          },
        },
      });
      expect(request?.body).toContain('<tns:CreateInvoiceV3>');
      expect(request?.body).toContain('<invoicexml><![CDATA[');
    });

    it('should send a custom user agent', async () => {
      const http = new MockHttpClient().respondWith(createSoapResponse('CreateInvoiceV3', 'WP20260002;6827'));
      const client = new CetustekClient({
        endpoint: ENDPOINT,
        rentId: '12345678',
        siteCode: 'S01',
        apiPassword: 'test-secret',
        httpClient: http,
        userAgent: 'shop-backend/2.0',
        logger: createLogger({ level: 'silent' }),
      });

      await client.createInvoice(VALID_INPUT);

      expect(http.requests[0]?.headers['User-Agent']).toBe('shop-backend/2.0');
    });

    it('should reject an unknown invoice type without sending a request', async () => {
      const http = new MockHttpClient();
      const client = createClient(http);
      // Untyped callers can pass codes outside the union
      const input: CreateInvoiceInput = Object.assign({ ...VALID_INPUT }, { invoiceType: '09' });

      await expect(client.createInvoice(input)).rejects.toThrow(ValidationError);
      expect(http.requests).toHaveLength(0);
    });

    it('should reject empty items without sending a request', async () => {
      const http = new MockHttpClient();
      const client = createClient(http);

      const error: unknown = await client.createInvoice({ ...VALID_INPUT, items: [] }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual([
          { field: 'items', code: 'EMPTY_ITEMS', message: 'items must contain at least one item' },
        ]);
        expect(error.message).toBe('Invalid createInvoice input: items must contain at least one item');
      }
      expect(http.requests).toHaveLength(0);
    });

    it('should raise ApiError when the service returns an error code', async () => {
      const http = new MockHttpClient().respondWith(createSoapResponse('CreateInvoiceV3', 'E0401'));
      const client = createClient(http);

      const error: unknown = await client.createInvoice(VALID_INPUT).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.vendorCode).toBe('E0401');
        expect(error.message).toBe('API Error: E0401');
      }
    });

    it('should raise ApiError for a return value with extra separators', async () => {
      const http = new MockHttpClient().respondWith(createSoapResponse('CreateInvoiceV3', 'WP20260002;6827;X'));
      const client = createClient(http);

      await expect(client.createInvoice(VALID_INPUT)).rejects.toThrow(
        'API Error: WP20260002;6827;X - Unexpected response format',
      );
    });

    it('should log the issued invoice', async () => {
      const lines: string[] = [];
      const http = new MockHttpClient().respondWith(createSoapResponse('CreateInvoiceV3', 'WP20260002;6827'));
      const client = createClient(http, (level, line) => {
        if (level === 'info') lines.push(line);
      });

      await client.createInvoice(VALID_INPUT);

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(
        /Invoice issued \{"correlationId":"cor-[0-9a-z-]+","action":"CreateInvoiceV3","orderId":"A20260105001","invoiceNumber":"WP20260002"\}$/,
      );
    });
  });

  describe('queryInvoice', () => {
    it('should parse the invoice and keep the raw XML verbatim', async () => {
      const http = new MockHttpClient().respondWith(loadFixture('query-success.xml'));
      const client = createClient(http);

      const result = await client.queryInvoice({ invoiceNumber: 'WP20260002', invoiceYear: '2026' });

      expect(result).toEqual({
        invoiceNumber: 'WP20260002',
        invoiceDate: '2026/01/05',
        invoiceTime: '10:15:00',
        orderId: 'A20260105001',
        randomCode: '6827',
        buyerIdentifier: '12345678',
        buyerName: '測試公司 & 分公司',
        sellerIdentifier: '87654321',
        sellerName: '範例商店',
        invoiceStatus: '1',
        donateMark: '0',
        taxType: '1',
        salesAmount: 2000,
        taxAmount: 100,
        totalAmount: 2100,
        rawXml: loadFixture('query-raw.txt'),
      });
    });

    it('should send invoice number, year and credentials', async () => {
      const http = new MockHttpClient().respondWith(loadFixture('query-success.xml'));
      const client = createClient(http);

      await client.queryInvoice({ invoiceNumber: 'WP20260002', invoiceYear: '2026' });

      const parsed: unknown = envelopeParser.parse(http.requests[0]?.body ?? '');
      expect(parsed).toMatchObject({
        Envelope: {
          Body: {
            QueryInvoice: {
              invoicenumber: 'WP20260002',
              invoiceyear: '2026',
              rentid: '12345678',
              source: 'S01test-secret',
            },
          },
        },
      });
    });

    it('should raise ApiError when the service returns an error code', async () => {
      const http = new MockHttpClient().respondWith(loadFixture('query-error.xml'));
      const client = createClient(http);

      await expect(client.queryInvoice({ invoiceNumber: 'WP20260002', invoiceYear: '2026' })).rejects.toThrow(
        'API Error: E0002',
      );
    });

    it('should reject a malformed invoice number', async () => {
      const http = new MockHttpClient();
      const client = createClient(http);

      await expect(client.queryInvoice({ invoiceNumber: 'wp2026', invoiceYear: '2026' })).rejects.toThrow(
        'Invalid queryInvoice input: invoiceNumber must be two uppercase letters followed by eight digits',
      );
      expect(http.requests).toHaveLength(0);
    });
  });

  describe('cancelInvoice', () => {
    it('should report success for C0', async () => {
      const http = new MockHttpClient().respondWith(createSoapResponse('CancelInvoice', 'C0'));
      const client = createClient(http);

      const result = await client.cancelInvoice({
        invoiceNumber: 'WP20260002',
        invoiceYear: '2026',
        remark: 'Order refunded',
      });

      expect(result).toEqual({ success: true, code: 'C0' });
    });

    it('should report failure with the vendor message for other codes', async () => {
      const http = new MockHttpClient().respondWith(createSoapResponse('CancelInvoice', 'C5'));
      const client = createClient(http);

      const result = await client.cancelInvoice({ invoiceNumber: 'WP20260002', invoiceYear: '2026' });

      expect(result).toEqual({ success: false, code: 'C5', message: 'C5' });
    });

    it('should send the cancel document with an empty remark when none is given', async () => {
      const http = new MockHttpClient().respondWith(createSoapResponse('CancelInvoice', 'C0'));
      const client = createClient(http);

      await client.cancelInvoice({ invoiceNumber: 'WP20260002', invoiceYear: '2026' });

      const parsed: unknown = envelopeParser.parse(http.requests[0]?.body ?? '');
      const invoiceXml = valueAt(parsed, ['Envelope', 'Body', 'CancelInvoice', 'invoicexml', '__cdata']);
      expect(typeof invoiceXml).toBe('string');
      expect(envelopeParser.parse(String(invoiceXml))).toEqual({
        Invoice: {
          InvoiceNumber: 'WP20260002',
          InvoiceYear: '2026',
          ReturnTaxDocumentNumber: '',
          Remark: '',
        },
      });
    });

    it('should use CancelInvoiceNoCheck when noCheck is set', async () => {
      const http = new MockHttpClient().respondWith(createSoapResponse('CancelInvoiceNoCheck', 'C0'));
      const client = createClient(http);

      const result = await client.cancelInvoice(
        { invoiceNumber: 'WP20260002', invoiceYear: '2026' },
        { noCheck: true },
      );

      expect(result.success).toBe(true);
      expect(http.requests[0]?.body).toContain('<tns:CancelInvoiceNoCheck>');
    });
  });

  describe('transport failures', () => {
    it('should wrap a refused connection in TransportError', async () => {
      const cause = new Error('connect ECONNREFUSED 127.0.0.1:443');
      const http = new MockHttpClient().failWith(cause);
      const client = createClient(http);

      const error: unknown = await client
        .queryInvoice({ invoiceNumber: 'WP20260002', invoiceYear: '2026' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SdkError);
      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.message).toBe('QueryInvoice request failed: connect ECONNREFUSED 127.0.0.1:443');
        expect(error.cause).toBe(cause);
        expect(error.status).toBeUndefined();
      }
    });

    it('should raise TransportError with the status and fault for an HTTP error', async () => {
      const http = new MockHttpClient().respondWith(loadFixture('soap-fault.xml'), {
        status: 500,
        statusText: 'Internal Server Error',
      });
      const client = createClient(http);

      const error: unknown = await client.createInvoice(VALID_INPUT).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.status).toBe(500);
        expect(error.message).toBe(
          'CreateInvoiceV3 returned HTTP 500 Internal Server Error: Internal processing error',
        );
        expect(error.code).toBe('TRANSPORT_ERROR');
      }
    });

    it('should raise INVALID_RESPONSE when the body has no return element', async () => {
      const http = new MockHttpClient().respondWith('<html><body>Service Unavailable</body></html>');
      const client = createClient(http);

      const error: unknown = await client
        .cancelInvoice({ invoiceNumber: 'WP20260002', invoiceYear: '2026' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SdkError);
      if (error instanceof SdkError) {
        expect(error.code).toBe('INVALID_RESPONSE');
        expect(error.message).toBe('Invalid response: missing <return> element');
      }
    });
  });
});
