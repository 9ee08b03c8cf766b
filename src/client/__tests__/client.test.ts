import { describe, it, expect, vi } from 'vitest';
import { BulkClient, CSV_CONTENT_TYPE } from '../index.js';
import { DEFAULT_USER_AGENT } from '../../config/index.js';
import { ApiError } from '../../errors/index.js';
import { LogLevel, MetricNames, createInMemoryObservability } from '../../observability/index.js';
import { FakeBulkApi, type FakeBulkApiOptions } from '../../testing/index.js';
import type { HttpRequest } from '../../transport/index.js';

function setup(fakeOptions?: FakeBulkApiOptions) {
  const fake = new FakeBulkApi(fakeOptions);
  const send = vi.fn((request: HttpRequest) => fake.send(request));
  const observability = createInMemoryObservability();
  const sessionProvider = {
    getSession: vi.fn(async () => ({ sessionId: 'test-session', instanceUrl: 'na1.salesforce.com' })),
    invalidate: vi.fn(),
  };
  const client = new BulkClient({
    sessionProvider,
    transport: { send },
    apiVersion: '37.0',
    observability,
  });
  return { fake, send, sessionProvider, client, ...observability };
}

describe('BulkClient', () => {
  it('resolves paths against the async endpoint with session headers', async () => {
    const { send, client } = setup();

    await client.post('/job', '<jobInfo><operation>insert</operation><object>Account</object></jobInfo>');

    const [[request]] = send.mock.calls;
    expect(request.method).toBe('POST');
    expect(request.url).toBe('https://na1-api.salesforce.com/services/async/37.0/job');
    expect(request.headers).toEqual({
      'X-SFDC-Session': 'test-session',
      'Content-Type': 'application/xml; charset=UTF-8',
      'User-Agent': DEFAULT_USER_AGENT,
    });
  });

  it('sends the given content type', async () => {
    const { send, client } = setup();

    await client.post(
      '/job',
      '<jobInfo><operation>query</operation><object>Account</object></jobInfo>',
      CSV_CONTENT_TYPE
    );

    expect(send.mock.calls[0][0].headers['Content-Type']).toBe('text/csv; charset=UTF-8');
  });

  it('returns the response body', async () => {
    const { client } = setup();

    const body = await client.post('/job', '<jobInfo><operation>insert</operation><object>Account</object></jobInfo>');

    expect(body).toContain('<id>750FAKE00000001</id>');
  });

  it('raises ApiError for an error status and records it', async () => {
    const { fake, client, metrics, logger } = setup();
    fake.failNext(503, 'Service Unavailable');

    const error = await client.get('/job/750FAKE00000001').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: '[503] Bulk API HTTP Error result: Service Unavailable',
      statusCode: 503,
      retryable: true,
      exceptionCode: undefined,
    });
    expect(metrics.getCounter(MetricNames.ERRORS_TOTAL, { status: '503' })).toBe(1);
    expect(logger.getEntriesAtLevel(LogLevel.ERROR).map((e) => e.message)).toEqual([
      '[503] Bulk API HTTP Error result: Service Unavailable',
    ]);
  });

  it('drops the session when the server rejects it', async () => {
    const { client, sessionProvider } = setup({ sessionId: 'another-session' });

    const error = await client.get('/job/750FAKE00000001').catch((e: unknown) => e);

    expect(error).toMatchObject({ statusCode: 400, exceptionCode: 'InvalidSessionId' });
    expect(sessionProvider.invalidate).toHaveBeenCalledTimes(1);
  });

  it('keeps the session for other errors', async () => {
    const { fake, client, sessionProvider } = setup();
    fake.failNextWithException(400, 'InvalidJob', 'Unable to find job');

    await expect(client.get('/job/750NOPE')).rejects.toThrow(ApiError);
    expect(sessionProvider.invalidate).not.toHaveBeenCalled();
  });

  it('counts requests by method', async () => {
    const { client, metrics } = setup();

    await client.post('/job', '<jobInfo><operation>query</operation><object>Account</object></jobInfo>');
    await client.get('/job/750FAKE00000001');

    expect(metrics.getCounter(MetricNames.REQUESTS_TOTAL, { method: 'POST' })).toBe(1);
    expect(metrics.getCounter(MetricNames.REQUESTS_TOTAL, { method: 'GET' })).toBe(1);
  });
});
