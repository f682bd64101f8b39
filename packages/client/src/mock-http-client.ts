import { XMLBuilder } from 'fast-xml-parser';
import type { HttpClient, HttpRequestOptions, HttpResponse, SoapAction } from '@einvoice-tw/contracts';
import { CETUSTEK_NAMESPACE, SOAP_ENVELOPE_NAMESPACE } from './soap/envelope.js';

/**
 * A request captured by MockHttpClient
 */
export interface RecordedRequest {
  url: string;
  body: string;
  headers: Record<string, string>;
}

export interface MockResponseInit {
  /** @default 200 */
  status?: number;
  statusText?: string;
}

/**
 * MockHttpClient answers requests from a queue of canned responses
 * and records every request it receives. For tests and local development.
 *
 * @example
 * ```typescript
 * const http = new MockHttpClient().respondWith(createSoapResponse('CancelInvoice', 'C0'));
 * const client = new CetustekClient({ ...credentials, httpClient: http });
 * ```
 */
export class MockHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  private readonly queue: (() => Promise<HttpResponse>)[] = [];

  /**
   * Queue a response body
   */
  respondWith(body: string, init: MockResponseInit = {}): this {
    const status = init.status ?? 200;

    this.queue.push(() =>
      Promise.resolve({
        ok: status >= 200 && status < 300,
        status,
        statusText: init.statusText ?? (status === 200 ? 'OK' : ''),
        text: () => Promise.resolve(body),
      }),
    );
    return this;
  }

  /**
   * Queue a transport failure, e.g. a refused connection
   */
  failWith(error: Error): this {
    this.queue.push(() => Promise.reject(error));
    return this;
  }

  /** Number of queued responses not yet consumed */
  get pending(): number {
    return this.queue.length;
  }

  post(url: string, body: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, body, headers: { ...options?.headers } });

    const next = this.queue.shift();
    if (!next) {
      return Promise.reject(new Error('MockHttpClient: no response queued'));
    }
    return next();
  }
}

const responseBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: false,
  processEntities: true,
});

/**
 * Build a SOAP response envelope the way the service answers.
 * The return value is XML-escaped.
 */
export function createSoapResponse(action: SoapAction, returnValue: string): string {
  const xml: string = responseBuilder.build({
    'S:Envelope': {
      '@_xmlns:S': SOAP_ENVELOPE_NAMESPACE,
      'S:Body': {
        [`ns2:${action}Response`]: {
          '@_xmlns:ns2': CETUSTEK_NAMESPACE,
          return: returnValue,
        },
      },
    },
  });
  return `<?xml version="1.0" encoding="UTF-8"?>${xml}`;
}
