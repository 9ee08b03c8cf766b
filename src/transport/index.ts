/**
 * HTTP transport for the Bulk API client.
 *
 * The transport only moves bytes: it never interprets status codes. Turning
 * a status >= 400 into an error is done by {@link BulkClient}.
 */

import { NetworkError, RequestTimeoutError } from '../errors/index.js';

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: 'GET' | 'POST';
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: string;
}

/**
 * HTTP response with text body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers, lower-cased names */
  headers: Record<string, string>;
  /** Response body */
  body: string;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Fetch-based HTTP transport using the global fetch of Node 20.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      throw this.handleError(error, controller.signal);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Maps fetch failures to Bulk errors
   */
  private handleError(error: unknown, signal: AbortSignal): Error {
    if (signal.aborted) {
      return new RequestTimeoutError(this.options.timeoutMs);
    }
    if (error instanceof Error) {
      return new NetworkError(error.message, error);
    }
    return new NetworkError(String(error));
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeoutMs: number = 30000): HttpTransport {
  return new FetchTransport({ timeoutMs });
}
