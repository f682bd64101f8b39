/**
 * HTTP client interface for pluggable transports.
 * The SDK never calls fetch() directly; tests inject a mock.
 */
export interface HttpClient {
  post(url: string, body: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
}

/**
 * HTTP response interface (a subset of the Fetch API Response)
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}
