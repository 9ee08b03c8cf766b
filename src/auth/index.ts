/**
 * Session providers for the Bulk API client.
 *
 * The async API authenticates every request with an `X-SFDC-Session` header.
 * A provider yields that session id together with the instance it belongs
 * to; the client derives the async endpoint from the instance host.
 */

import { AuthMethod, SecretString } from '../config/index.js';
import { AuthenticationError, ConfigurationError } from '../errors/index.js';
import { Logger, NoopLogger } from '../observability/index.js';
import type { HttpTransport } from '../transport/index.js';
import { buildLoginEnvelope, parseLoginResponse } from '../xml/index.js';

// ============================================================================
// Session Provider Interface
// ============================================================================

/**
 * An authenticated session.
 */
export interface BulkSession {
  /** Value of the X-SFDC-Session header */
  sessionId: string;
  /** Instance URL or bare host, e.g. "https://na1.salesforce.com" */
  instanceUrl: string;
}

/**
 * Session provider interface.
 */
export interface SessionProvider {
  /** Returns a session, acquiring one if needed */
  getSession(): Promise<BulkSession>;
  /** Drops any cached session so the next call acquires a fresh one */
  invalidate?(): void;
}

/**
 * Derives the async API root from an instance URL or host.
 *
 * @example
 * buildAsyncEndpoint('na1.salesforce.com', '37.0');
 * // 'https://na1-api.salesforce.com/services/async/37.0'
 */
export function buildAsyncEndpoint(instanceUrl: string, apiVersion: string): string {
  let host = instanceUrl.trim().replace(/\/+$/, '');
  if (!/^https?:\/\//i.test(host)) {
    host = `https://${host}`;
  }
  return `${host.replace('.salesforce.com', '-api.salesforce.com')}/services/async/${apiVersion}`;
}

// ============================================================================
// Static Session
// ============================================================================

/**
 * Session supplied by the caller.
 */
export class StaticSessionProvider implements SessionProvider {
  private readonly sessionId: SecretString;
  private readonly instanceUrl: string;

  constructor(sessionId: string, instanceUrl: string) {
    this.sessionId = new SecretString(sessionId);
    this.instanceUrl = instanceUrl;
  }

  async getSession(): Promise<BulkSession> {
    return { sessionId: this.sessionId.expose(), instanceUrl: this.instanceUrl };
  }
}

// ============================================================================
// SOAP Username/Password Login
// ============================================================================

/**
 * Logs in through the partner SOAP API with username and password.
 *
 * The session is cached until {@link invalidate} is called. Concurrent
 * callers share one in-flight login.
 */
export class SoapLoginSessionProvider implements SessionProvider {
  private readonly username: string;
  private readonly password: SecretString;
  private readonly organizationId?: string;
  private readonly loginUrl: string;
  private readonly apiVersion: string;
  private readonly clientName: string;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private session: BulkSession | null = null;
  private loginPromise: Promise<BulkSession> | null = null;

  constructor(options: {
    username: string;
    password: string;
    securityToken?: string;
    organizationId?: string;
    sandbox?: boolean;
    loginUrl?: string;
    apiVersion: string;
    clientName: string;
    transport: HttpTransport;
    logger?: Logger;
  }) {
    this.username = options.username;
    this.password = new SecretString(options.password + (options.securityToken ?? ''));
    this.organizationId = options.organizationId;
    this.loginUrl =
      options.loginUrl ?? (options.sandbox ? 'https://test.salesforce.com' : 'https://login.salesforce.com');
    this.apiVersion = options.apiVersion;
    this.clientName = options.clientName;
    this.transport = options.transport;
    this.logger = options.logger ?? new NoopLogger();
  }

  async getSession(): Promise<BulkSession> {
    if (this.session) {
      return this.session;
    }
    if (!this.loginPromise) {
      this.loginPromise = this.login();
    }
    try {
      this.session = await this.loginPromise;
      return this.session;
    } finally {
      this.loginPromise = null;
    }
  }

  invalidate(): void {
    this.session = null;
  }

  private async login(): Promise<BulkSession> {
    const url = `${this.loginUrl}/services/Soap/u/${this.apiVersion}`;
    this.logger.debug('Logging in through SOAP API', { username: this.username, url });

    const response = await this.transport.send({
      method: 'POST',
      url,
      headers: {
        'Content-Type': 'text/xml; charset=UTF-8',
        SOAPAction: 'login',
      },
      body: buildLoginEnvelope({
        username: this.username,
        password: this.password.expose(),
        clientName: this.clientName,
        organizationId: this.organizationId,
      }),
    });

    const parsed = parseLoginResponse(response.body);
    if (!parsed.ok) {
      this.logger.error('SOAP login failed', { status: response.status, faultCode: parsed.faultCode });
      throw new AuthenticationError(`${parsed.faultCode}: ${parsed.faultString}`, {
        status: response.status,
        faultCode: parsed.faultCode,
      });
    }

    const instanceUrl = instanceFromServerUrl(parsed.serverUrl);
    this.logger.info('SOAP login succeeded', { instanceUrl });
    return { sessionId: parsed.sessionId, instanceUrl };
  }
}

/**
 * Reduces a SOAP serverUrl to the instance origin, dropping an "-api" suffix
 * from the first host label.
 */
export function instanceFromServerUrl(serverUrl: string): string {
  const parsed = new URL(serverUrl);
  return `${parsed.protocol}//${parsed.host.replace(/^([^.]+)-api\./, '$1.')}`;
}

// ============================================================================
// Refresh Token Session
// ============================================================================

interface OAuthTokenState {
  accessToken: string;
  instanceUrl: string;
  expiresAt: number;
}

function isTokenResponse(value: unknown): value is { access_token: string; instance_url: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'access_token' in value &&
    typeof value.access_token === 'string' &&
    'instance_url' in value &&
    typeof value.instance_url === 'string'
  );
}

/**
 * OAuth 2.0 Refresh Token session provider.
 *
 * The access token doubles as the async API session id.
 */
export class RefreshTokenSessionProvider implements SessionProvider {
  private readonly clientId: string;
  private readonly clientSecret: SecretString;
  private readonly refreshToken: SecretString;
  private readonly tokenUrl: string;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private tokenState: OAuthTokenState | null = null;
  private refreshPromise: Promise<void> | null = null;

  constructor(options: {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    accessToken?: string;
    instanceUrl?: string;
    tokenUrl?: string;
    transport: HttpTransport;
    logger?: Logger;
  }) {
    this.clientId = options.clientId;
    this.clientSecret = new SecretString(options.clientSecret);
    this.refreshToken = new SecretString(options.refreshToken);
    this.tokenUrl = options.tokenUrl ?? 'https://login.salesforce.com/services/oauth2/token';
    this.transport = options.transport;
    this.logger = options.logger ?? new NoopLogger();

    if (options.accessToken && options.instanceUrl) {
      this.tokenState = {
        accessToken: options.accessToken,
        instanceUrl: options.instanceUrl,
        expiresAt: Date.now() + 3600 * 1000, // Assume 1 hour if not specified
      };
    }
  }

  async getSession(): Promise<BulkSession> {
    if (!this.isValid()) {
      await this.refresh();
    }

    if (!this.tokenState) {
      throw new AuthenticationError('No valid OAuth token available');
    }

    return { sessionId: this.tokenState.accessToken, instanceUrl: this.tokenState.instanceUrl };
  }

  invalidate(): void {
    this.tokenState = null;
  }

  isValid(): boolean {
    if (!this.tokenState) return false;
    // Consider token invalid if it expires within 60 seconds
    return this.tokenState.expiresAt > Date.now() + 60000;
  }

  async refresh(): Promise<void> {
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    this.refreshPromise = this.doRefresh();
    try {
      await this.refreshPromise;
    } finally {
      this.refreshPromise = null;
    }
  }

  private async doRefresh(): Promise<void> {
    this.logger.debug('Refreshing OAuth token');

    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.clientId,
      client_secret: this.clientSecret.expose(),
      refresh_token: this.refreshToken.expose(),
    });

    const response = await this.transport.send({
      method: 'POST',
      url: this.tokenUrl,
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });

    if (response.status >= 400) {
      this.logger.error('OAuth token refresh failed', { status: response.status, error: response.body });
      throw new AuthenticationError(`Token refresh failed: ${response.status}`, { status: response.status });
    }

    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch (error) {
      throw new AuthenticationError(
        `Token refresh returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!isTokenResponse(data)) {
      throw new AuthenticationError('Token refresh response is missing access_token or instance_url');
    }

    // Access tokens typically last 2 hours
    const expiresIn = 7200;

    this.tokenState = {
      accessToken: data.access_token,
      instanceUrl: data.instance_url,
      expiresAt: Date.now() + expiresIn * 1000,
    };

    this.logger.info('OAuth token refreshed successfully');
  }
}

// ============================================================================
// Session Provider Factory
// ============================================================================

/**
 * Creates a session provider from an auth method configuration.
 */
export function createSessionProvider(
  auth: AuthMethod,
  options: { apiVersion: string; clientName: string; transport: HttpTransport; logger?: Logger }
): SessionProvider {
  switch (auth.type) {
    case 'session':
      return new StaticSessionProvider(auth.sessionId, auth.instanceUrl);

    case 'password':
      return new SoapLoginSessionProvider({
        username: auth.username,
        password: auth.password,
        securityToken: auth.securityToken,
        organizationId: auth.organizationId,
        sandbox: auth.sandbox,
        loginUrl: auth.loginUrl,
        apiVersion: options.apiVersion,
        clientName: options.clientName,
        transport: options.transport,
        logger: options.logger,
      });

    case 'refresh_token':
      return new RefreshTokenSessionProvider({
        clientId: auth.clientId,
        clientSecret: auth.clientSecret,
        refreshToken: auth.refreshToken,
        accessToken: auth.accessToken,
        instanceUrl: auth.instanceUrl,
        tokenUrl: auth.tokenUrl,
        transport: options.transport,
        logger: options.logger,
      });

    default: {
      const unknown: never = auth;
      throw new ConfigurationError(`Unknown authentication method: ${JSON.stringify(unknown)}`);
    }
  }
}
