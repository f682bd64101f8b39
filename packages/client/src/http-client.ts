import type { HttpClient } from '@einvoice-tw/contracts';

/**
 * Default HTTP client using the global fetch.
 * Used when no custom httpClient is provided.
 */
export function createDefaultHttpClient(): HttpClient {
  return {
    async post(url, body, options) {
      const init: RequestInit = { method: 'POST', body };
      if (options?.headers !== undefined) {
        init.headers = options.headers;
      }
      return globalThis.fetch(url, init);
    },
  };
}
