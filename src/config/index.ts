/**
 * Bulk API client configuration and builder.
 */

import { ConfigurationError, NoSessionError } from '../errors/index.js';

// ============================================================================
// Wait Configuration
// ============================================================================

/**
 * Timeout and polling interval for a wait loop.
 */
export interface WaitConfig {
  /** Give up waiting after this long (ms) */
  timeoutMs: number;
  /** Sleep between status checks (ms) */
  intervalMs: number;
}

// ============================================================================
// Authentication Types
// ============================================================================

/**
 * A session obtained elsewhere.
 */
export interface SessionAuth {
  type: 'session';
  /** Session id sent as X-SFDC-Session */
  sessionId: string;
  /** Instance URL or host the session belongs to */
  instanceUrl: string;
}

/**
 * Partner SOAP API username/password login.
 */
export interface PasswordAuth {
  type: 'password';
  username: string;
  password: string;
  /** Appended to the password when present */
  securityToken?: string;
  /** Sent as LoginScopeHeader for self-service users */
  organizationId?: string;
  /** Log in against test.salesforce.com */
  sandbox: boolean;
  /** Custom login host, overrides the sandbox flag */
  loginUrl?: string;
}

/**
 * OAuth 2.0 Refresh Token flow.
 */
export interface RefreshTokenAuth {
  type: 'refresh_token';
  /** OAuth client ID (Connected App consumer key) */
  clientId: string;
  /** OAuth client secret (Connected App consumer secret) */
  clientSecret: string;
  /** OAuth refresh token */
  refreshToken: string;
  /** Optional initial access token */
  accessToken?: string;
  /** Instance URL for the initial access token */
  instanceUrl?: string;
  /** Optional custom token endpoint URL */
  tokenUrl?: string;
}

/**
 * Authentication method types.
 */
export type AuthMethod = SessionAuth | PasswordAuth | RefreshTokenAuth;

// ============================================================================
// Main Configuration Interface
// ============================================================================

/**
 * Bulk API client configuration.
 */
export interface BulkConfig {
  /** Async API version (e.g., "37.0"). Default: "37.0" */
  apiVersion: string;
  /** Authentication method */
  auth: AuthMethod;
  /** Maximum rows per submitted batch. Default: 5000 */
  batchSize: number;
  /** Wait loop settings for single batches */
  batchWait: WaitConfig;
  /** Wait loop settings for whole jobs */
  jobWait: WaitConfig;
  /** Request timeout in milliseconds. Default: 30000 */
  requestTimeoutMs: number;
  /** User agent string */
  userAgent: string;
}

// ============================================================================
// Default Configurations
// ============================================================================

export const DEFAULT_API_VERSION = '37.0';

export const DEFAULT_BATCH_SIZE = 5000;

/**
 * Default batch wait: 10 minutes, checking every 10 seconds.
 */
export const DEFAULT_BATCH_WAIT: WaitConfig = {
  timeoutMs: 10 * 60 * 1000,
  intervalMs: 10 * 1000,
};

/**
 * Default job wait: 1 hour, checking every 30 seconds.
 */
export const DEFAULT_JOB_WAIT: WaitConfig = {
  timeoutMs: 60 * 60 * 1000,
  intervalMs: 30 * 1000,
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const DEFAULT_USER_AGENT = 'salesforce-bulk-jobs/0.1.0';

// ============================================================================
// SecretString
// ============================================================================

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Configuration Builder
// ============================================================================

function requireNonEmpty(value: string | undefined, what: string): string {
  if (!value || value.trim().length === 0) {
    throw new ConfigurationError(`${what} cannot be empty`);
  }
  return value.trim();
}

/**
 * Applies the defined fields of `overrides` to `base` and validates the result.
 * @throws ConfigurationError for a negative or non-finite timeout or a non-positive interval
 */
export function mergeWait(base: WaitConfig, overrides: Partial<WaitConfig>, what: string): WaitConfig {
  return validateWait(
    {
      timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
      intervalMs: overrides.intervalMs ?? base.intervalMs,
    },
    what
  );
}

function validateWait(wait: WaitConfig, what: string): WaitConfig {
  if (!Number.isFinite(wait.timeoutMs) || wait.timeoutMs < 0) {
    throw new ConfigurationError(`${what} timeout must be finite and non-negative`);
  }
  if (!Number.isFinite(wait.intervalMs) || wait.intervalMs <= 0) {
    throw new ConfigurationError(`${what} interval must be finite and positive`);
  }
  return wait;
}

/**
 * Builder for Bulk API client configuration.
 */
export class BulkConfigBuilder {
  private apiVersion: string = DEFAULT_API_VERSION;
  private auth?: AuthMethod;
  private batchSize: number = DEFAULT_BATCH_SIZE;
  private batchWait: WaitConfig = { ...DEFAULT_BATCH_WAIT };
  private jobWait: WaitConfig = { ...DEFAULT_JOB_WAIT };
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;

  /**
   * Uses an existing session.
   * @param sessionId - Session id (or OAuth access token)
   * @param instanceUrl - Instance URL or bare host, e.g. "na1.salesforce.com"
   */
  withSession(sessionId: string, instanceUrl: string): this {
    this.auth = {
      type: 'session',
      sessionId: requireNonEmpty(sessionId, 'Session id'),
      instanceUrl: requireNonEmpty(instanceUrl, 'Instance URL'),
    };
    return this;
  }

  /**
   * Logs in with username and password through the partner SOAP API.
   */
  withPassword(options: {
    username: string;
    password: string;
    securityToken?: string;
    organizationId?: string;
    sandbox?: boolean;
    loginUrl?: string;
  }): this {
    if (options.loginUrl !== undefined) {
      assertHttpUrl(options.loginUrl, 'Login URL');
    }
    this.auth = {
      type: 'password',
      username: requireNonEmpty(options.username, 'Username'),
      password: requireNonEmpty(options.password, 'Password'),
      securityToken: options.securityToken?.trim() || undefined,
      organizationId: options.organizationId?.trim() || undefined,
      sandbox: options.sandbox ?? false,
      loginUrl: options.loginUrl?.replace(/\/$/, ''),
    };
    return this;
  }

  /**
   * Sets Refresh Token Flow authentication.
   *
   * @param clientId - OAuth client ID (Connected App consumer key)
   * @param clientSecret - OAuth client secret (Connected App consumer secret)
   * @param refreshToken - OAuth refresh token
   * @param accessToken - Optional initial access token
   * @param instanceUrl - Instance the initial access token belongs to
   */
  withRefreshToken(
    clientId: string,
    clientSecret: string,
    refreshToken: string,
    accessToken?: string,
    instanceUrl?: string
  ): this {
    this.auth = {
      type: 'refresh_token',
      clientId: requireNonEmpty(clientId, 'Refresh Token client ID'),
      clientSecret: requireNonEmpty(clientSecret, 'Refresh Token client secret'),
      refreshToken: requireNonEmpty(refreshToken, 'Refresh Token'),
      accessToken: accessToken?.trim() || undefined,
      instanceUrl: instanceUrl?.trim() || undefined,
    };
    return this;
  }

  /**
   * Sets the async API version.
   * @param version - API version (e.g., "37.0")
   */
  withApiVersion(version: string): this {
    const trimmed = requireNonEmpty(version, 'API version');
    if (!/^\d+\.\d+$/.test(trimmed)) {
      throw new ConfigurationError('API version must be in format "XX.X" (e.g., "37.0")');
    }
    this.apiVersion = trimmed;
    return this;
  }

  /**
   * Sets the maximum number of rows per batch.
   */
  withBatchSize(batchSize: number): this {
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ConfigurationError('Batch size must be a positive integer');
    }
    this.batchSize = batchSize;
    return this;
  }

  /**
   * Sets the wait loop used for single batches.
   */
  withBatchWait(config: Partial<WaitConfig>): this {
    this.batchWait = mergeWait(this.batchWait, config, 'Batch wait');
    return this;
  }

  /**
   * Sets the wait loop used for whole jobs.
   */
  withJobWait(config: Partial<WaitConfig>): this {
    this.jobWait = mergeWait(this.jobWait, config, 'Job wait');
    return this;
  }

  /**
   * Sets the request timeout.
   * @param timeoutMs - Timeout in milliseconds
   */
  withRequestTimeout(timeoutMs: number): this {
    if (timeoutMs <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Sets the user agent string.
   */
  withUserAgent(userAgent: string): this {
    this.userAgent = requireNonEmpty(userAgent, 'User agent');
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - SF_AUTH_METHOD: session, password or refresh_token. Default: password
   * - SF_SESSION_ID, SF_INSTANCE_URL: for session
   * - SF_USERNAME, SF_PASSWORD, SF_SECURITY_TOKEN, SF_ORGANIZATION_ID, SF_SANDBOX: for password
   * - SF_CLIENT_ID, SF_CLIENT_SECRET, SF_REFRESH_TOKEN, SF_ACCESS_TOKEN, SF_INSTANCE_URL: for refresh_token
   * - SF_API_VERSION: API version (default: 37.0)
   * - SF_BATCH_SIZE: rows per batch
   * - SF_TIMEOUT_SECONDS: Request timeout in seconds
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): BulkConfigBuilder {
    const builder = new BulkConfigBuilder();

    const authMethod = env.SF_AUTH_METHOD ?? 'password';
    switch (authMethod) {
      case 'session': {
        const sessionId = env.SF_SESSION_ID;
        const instanceUrl = env.SF_INSTANCE_URL;
        if (sessionId && instanceUrl) {
          builder.withSession(sessionId, instanceUrl);
        }
        break;
      }
      case 'password': {
        const username = env.SF_USERNAME;
        const password = env.SF_PASSWORD;
        if (username && password) {
          builder.withPassword({
            username,
            password,
            securityToken: env.SF_SECURITY_TOKEN,
            organizationId: env.SF_ORGANIZATION_ID,
            sandbox: env.SF_SANDBOX?.toLowerCase() === 'true',
          });
        }
        break;
      }
      case 'refresh_token': {
        const clientId = env.SF_CLIENT_ID;
        const clientSecret = env.SF_CLIENT_SECRET;
        const refreshToken = env.SF_REFRESH_TOKEN;
        if (clientId && clientSecret && refreshToken) {
          builder.withRefreshToken(clientId, clientSecret, refreshToken, env.SF_ACCESS_TOKEN, env.SF_INSTANCE_URL);
        }
        break;
      }
      default:
        throw new ConfigurationError(`Unknown auth method: ${authMethod}`);
    }

    if (env.SF_API_VERSION) {
      builder.withApiVersion(env.SF_API_VERSION);
    }

    const batchSize = env.SF_BATCH_SIZE;
    if (batchSize) {
      const batchSizeNum = parseInt(batchSize, 10);
      if (!isNaN(batchSizeNum)) {
        builder.withBatchSize(batchSizeNum);
      }
    }

    const timeout = env.SF_TIMEOUT_SECONDS;
    if (timeout) {
      const timeoutNum = parseInt(timeout, 10);
      if (!isNaN(timeoutNum)) {
        builder.withRequestTimeout(timeoutNum * 1000);
      }
    }

    return builder;
  }

  /**
   * Builds the configuration.
   * @throws NoSessionError if no authentication method was set
   */
  build(): BulkConfig {
    if (!this.auth) {
      throw new NoSessionError();
    }

    return {
      apiVersion: this.apiVersion,
      auth: this.auth,
      batchSize: this.batchSize,
      batchWait: { ...this.batchWait },
      jobWait: { ...this.jobWait },
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
    };
  }
}

function assertHttpUrl(url: string, what: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid ${what.toLowerCase()} format`);
  }
  if (!['https:', 'http:'].includes(parsed.protocol)) {
    throw new ConfigurationError(`${what} must use HTTP or HTTPS protocol`);
  }
}
