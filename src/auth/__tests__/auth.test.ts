import { describe, it, expect, vi } from 'vitest';
import {
  RefreshTokenSessionProvider,
  SoapLoginSessionProvider,
  StaticSessionProvider,
  buildAsyncEndpoint,
  createSessionProvider,
  instanceFromServerUrl,
} from '../index.js';
import { AuthenticationError } from '../../errors/index.js';
import { FakeBulkApi } from '../../testing/index.js';
import type { HttpRequest, HttpTransport } from '../../transport/index.js';

const LOGIN_FAULT =
  '<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/">' +
  '<soapenv:Body><soapenv:Fault><faultcode>sf:INVALID_LOGIN</faultcode>' +
  '<faultstring>INVALID_LOGIN: Invalid username</faultstring>' +
  '</soapenv:Fault></soapenv:Body></soapenv:Envelope>';

/**
 * Fake server behind a spy, so tests can see full request URLs.
 */
function spiedFake() {
  const fake = new FakeBulkApi();
  const send = vi.fn((request: HttpRequest) => fake.send(request));
  return { fake, send, transport: { send } };
}

describe('buildAsyncEndpoint', () => {
  it('derives the api host from a bare instance host', () => {
    expect(buildAsyncEndpoint('na1.salesforce.com', '37.0')).toBe(
      'https://na1-api.salesforce.com/services/async/37.0'
    );
  });

  it('keeps the scheme and drops trailing slashes', () => {
    expect(buildAsyncEndpoint('https://cs5.salesforce.com/', '39.0')).toBe(
      'https://cs5-api.salesforce.com/services/async/39.0'
    );
  });

  it('leaves other hosts unchanged', () => {
    expect(buildAsyncEndpoint('http://localhost:8080', '37.0')).toBe('http://localhost:8080/services/async/37.0');
  });
});

describe('instanceFromServerUrl', () => {
  it('reduces a SOAP server URL to the instance origin', () => {
    expect(instanceFromServerUrl('https://na1-api.salesforce.com/services/Soap/u/37.0/00D000000000001')).toBe(
      'https://na1.salesforce.com'
    );
  });

  it('only strips the suffix of the first host label', () => {
    expect(instanceFromServerUrl('https://acme-api.my.salesforce.com/services/Soap/u/37.0/00D000000000001')).toBe(
      'https://acme.my.salesforce.com'
    );
    expect(instanceFromServerUrl('https://my-apiorg.my.salesforce.com/services/Soap/u/37.0/00D000000000001')).toBe(
      'https://my-apiorg.my.salesforce.com'
    );
  });
});

describe('StaticSessionProvider', () => {
  it('returns the configured session', async () => {
    const provider = new StaticSessionProvider('test-session', 'na1.salesforce.com');
    expect(await provider.getSession()).toEqual({ sessionId: 'test-session', instanceUrl: 'na1.salesforce.com' });
  });
});

describe('SoapLoginSessionProvider', () => {
  function provider(transport: HttpTransport, sandbox = false) {
    return new SoapLoginSessionProvider({
      username: 'user@example.com',
      password: 'test-password',
      securityToken: 'test-token',
      sandbox,
      apiVersion: '37.0',
      clientName: 'bulk-client',
      transport,
    });
  }

  it('logs in and derives the instance from the server URL', async () => {
    const { send, transport } = spiedFake();

    const session = await provider(transport).getSession();

    expect(session).toEqual({ sessionId: 'test-session', instanceUrl: 'https://na1.salesforce.com' });
    const [[request]] = send.mock.calls;
    expect(request.url).toBe('https://login.salesforce.com/services/Soap/u/37.0');
    expect(request.headers.SOAPAction).toBe('login');
    expect(request.body).toContain('<urn:password>test-passwordtest-token</urn:password>');
  });

  it('uses the sandbox login host', async () => {
    const { send, transport } = spiedFake();

    await provider(transport, true).getSession();

    expect(send.mock.calls[0][0].url).toBe('https://test.salesforce.com/services/Soap/u/37.0');
  });

  it('caches the session until invalidated', async () => {
    const { send, transport } = spiedFake();
    const soap = provider(transport);

    await soap.getSession();
    await soap.getSession();
    expect(send).toHaveBeenCalledTimes(1);

    soap.invalidate();
    await soap.getSession();
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('shares one login between concurrent callers', async () => {
    const { send, transport } = spiedFake();
    const soap = provider(transport);

    await Promise.all([soap.getSession(), soap.getSession()]);

    expect(send).toHaveBeenCalledTimes(1);
  });

  it('turns a login fault into an AuthenticationError', async () => {
    const { fake, transport } = spiedFake();
    fake.setLoginResponse(500, LOGIN_FAULT);

    const error = await provider(transport).getSession().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ message: 'sf:INVALID_LOGIN: INVALID_LOGIN: Invalid username' });
  });
});

describe('RefreshTokenSessionProvider', () => {
  function provider(fake: FakeBulkApi, initial: { accessToken?: string; instanceUrl?: string } = {}) {
    return new RefreshTokenSessionProvider({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      refreshToken: 'test-refresh',
      transport: fake,
      ...initial,
    });
  }

  it('exchanges the refresh token for an access token', async () => {
    const fake = new FakeBulkApi();

    const session = await provider(fake).getSession();

    expect(session).toEqual({ sessionId: 'test-access-token', instanceUrl: 'https://na1.salesforce.com' });
    expect(fake.requests[0].path).toBe('/services/oauth2/token');
    expect(fake.requests[0].body).toContain('grant_type=refresh_token');
  });

  it('uses an initial access token without a request', async () => {
    const fake = new FakeBulkApi();

    const session = await provider(fake, {
      accessToken: 'test-initial',
      instanceUrl: 'https://na2.salesforce.com',
    }).getSession();

    expect(session.sessionId).toBe('test-initial');
    expect(fake.requests).toEqual([]);
  });

  it('reports a rejected refresh', async () => {
    const fake = new FakeBulkApi().setTokenResponse(400, '{"error":"invalid_grant"}');
    await expect(provider(fake).getSession()).rejects.toThrow('Token refresh failed: 400');
  });

  it('reports a malformed token response', async () => {
    const fake = new FakeBulkApi().setTokenResponse(200, '{"token_type":"Bearer"}');
    await expect(provider(fake).getSession()).rejects.toThrow(AuthenticationError);
  });
});

describe('createSessionProvider', () => {
  const options = { apiVersion: '37.0', clientName: 'bulk-client', transport: new FakeBulkApi() };

  it('creates the provider for each auth method', () => {
    expect(
      createSessionProvider({ type: 'session', sessionId: 'test-session', instanceUrl: 'na1.salesforce.com' }, options)
    ).toBeInstanceOf(StaticSessionProvider);
    expect(
      createSessionProvider(
        { type: 'password', username: 'user@example.com', password: 'test-password', sandbox: false },
        options
      )
    ).toBeInstanceOf(SoapLoginSessionProvider);
    expect(
      createSessionProvider(
        { type: 'refresh_token', clientId: 'test-client', clientSecret: 'test-secret', refreshToken: 'test-refresh' },
        options
      )
    ).toBeInstanceOf(RefreshTokenSessionProvider);
  });
});
