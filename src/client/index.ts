/**
 * HTTP client for the Bulk API async endpoint.
 */

import { buildAsyncEndpoint, type SessionProvider } from '../auth/index.js';
import { DEFAULT_USER_AGENT } from '../config/index.js';
import { ApiError } from '../errors/index.js';
import { MetricNames, createNoopObservability, type Logger, type Observability } from '../observability/index.js';
import type { HttpRequest, HttpTransport } from '../transport/index.js';
import { parseBulkApiError } from '../xml/index.js';

export const XML_CONTENT_TYPE = 'application/xml; charset=UTF-8';
export const CSV_CONTENT_TYPE = 'text/csv; charset=UTF-8';

/**
 * Options for creating a BulkClient.
 */
export interface BulkClientOptions {
  sessionProvider: SessionProvider;
  transport: HttpTransport;
  apiVersion: string;
  userAgent?: string;
  observability?: Observability;
}

/**
 * Thin request layer: adds session headers, resolves paths against the async
 * endpoint and raises {@link ApiError} for any status >= 400.
 */
export class BulkClient {
  readonly logger: Logger;
  private readonly observability: Observability;
  private readonly sessionProvider: SessionProvider;
  private readonly transport: HttpTransport;
  private readonly apiVersion: string;
  private readonly userAgent: string;

  constructor(options: BulkClientOptions) {
    this.sessionProvider = options.sessionProvider;
    this.transport = options.transport;
    this.apiVersion = options.apiVersion;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.observability = options.observability ?? createNoopObservability();
    this.logger = this.observability.logger;
  }

  get metrics(): Observability['metrics'] {
    return this.observability.metrics;
  }

  /**
   * Issues a GET and returns the response body.
   */
  async get(path: string): Promise<string> {
    return this.send('GET', path);
  }

  /**
   * Issues a POST and returns the response body.
   */
  async post(path: string, body: string, contentType: string = XML_CONTENT_TYPE): Promise<string> {
    return this.send('POST', path, body, contentType);
  }

  private async send(
    method: HttpRequest['method'],
    path: string,
    body?: string,
    contentType: string = XML_CONTENT_TYPE
  ): Promise<string> {
    const session = await this.sessionProvider.getSession();
    const url = buildAsyncEndpoint(session.instanceUrl, this.apiVersion) + path;

    this.logger.trace('Bulk API request', { method, path });
    const started = Date.now();
    const response = await this.transport.send({
      method,
      url,
      headers: {
        'X-SFDC-Session': session.sessionId,
        'Content-Type': contentType,
        'User-Agent': this.userAgent,
      },
      body,
    });

    this.metrics.increment(MetricNames.REQUESTS_TOTAL, 1, { method });
    this.metrics.timing(MetricNames.REQUEST_LATENCY, Date.now() - started, { method });

    if (response.status >= 400) {
      this.metrics.increment(MetricNames.ERRORS_TOTAL, 1, { status: String(response.status) });
      const fault = parseBulkApiError(response.body);
      const error = new ApiError({
        statusCode: response.status,
        body: response.body,
        method,
        path,
        exceptionCode: fault?.exceptionCode,
        exceptionMessage: fault?.exceptionMessage,
      });
      this.logger.error(error.message, { method, path, statusCode: response.status });
      if (response.status === 401 || fault?.exceptionCode === 'InvalidSessionId') {
        // the next request acquires a fresh session
        this.sessionProvider.invalidate?.();
      }
      throw error;
    }

    return response.body;
  }
}
