/**
 * Salesforce Bulk API (async) job client - Main Entry Point
 *
 * Creates query and DML jobs, splits datasets into batches, polls batch and
 * job completion and assembles CSV results into row datasets.
 *
 * @module salesforce-bulk-jobs
 */

// ============================================================================
// Error Classes and Utilities
// ============================================================================

export {
  // Error Codes
  BulkErrorCode,

  // Base Error
  BulkError,

  // Configuration Errors
  ConfigurationError,
  NoSessionError,

  // Authentication Errors
  AuthenticationError,

  // Remote API Errors
  ApiError,
  ResponseParseError,

  // Network Errors
  NetworkError,
  RequestTimeoutError,

  // Lifecycle Errors
  BatchFailedError,
  WaitTimeoutError,

  // Bookkeeping Errors
  UnknownJobError,
  UnknownBatchError,
  DuplicateJobError,
  DuplicateBatchError,
  JobHasNoBatchesError,

  // Error Utilities
  isBulkError,
  isRetryableError,
} from './errors/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  BulkConfigBuilder,
  SecretString,
  DEFAULT_API_VERSION,
  DEFAULT_BATCH_SIZE,
  DEFAULT_BATCH_WAIT,
  DEFAULT_JOB_WAIT,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from './config/index.js';

export type {
  BulkConfig,
  WaitConfig,
  AuthMethod,
  SessionAuth,
  PasswordAuth,
  RefreshTokenAuth,
} from './config/index.js';

// ============================================================================
// Transport, Authentication and Client
// ============================================================================

export { FetchTransport, createFetchTransport, getHeader } from './transport/index.js';
export type { HttpRequest, HttpResponse, HttpTransport, FetchTransportOptions } from './transport/index.js';

export {
  StaticSessionProvider,
  SoapLoginSessionProvider,
  RefreshTokenSessionProvider,
  buildAsyncEndpoint,
  createSessionProvider,
} from './auth/index.js';
export type { BulkSession, SessionProvider } from './auth/index.js';

export { BulkClient, XML_CONTENT_TYPE, CSV_CONTENT_TYPE } from './client/index.js';
export type { BulkClientOptions } from './client/index.js';

// ============================================================================
// Codecs
// ============================================================================

export { recordsToCSV, parseCSVResults } from './csv/index.js';
export type { DataRow, Dataset } from './csv/index.js';

export { buildJobInfoDocument, parseFlatRecord, parseResultIds, parseBulkApiError } from './xml/index.js';

// ============================================================================
// Jobs and Batches
// ============================================================================

export * from './bulk/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  MetricNames,
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
} from './observability/index.js';

export type { Logger, LogEntry, MetricsCollector, MetricEntry, Observability } from './observability/index.js';

// ============================================================================
// Convenience API Factory
// ============================================================================

import { createSessionProvider, type SessionProvider } from './auth/index.js';
import { JobOrchestrator, ResultAssembler, type Sleep } from './bulk/index.js';
import { BulkClient } from './client/index.js';
import { BulkConfigBuilder, type BulkConfig } from './config/index.js';
import { createNoopObservability, type Observability } from './observability/index.js';
import { createFetchTransport, type HttpTransport } from './transport/index.js';

/**
 * Bulk API client with its job orchestrator and result assembler wired to
 * one session.
 */
export interface BulkApi {
  /** The underlying request layer */
  client: BulkClient;
  /** Job creation, batch submission, status and waits */
  jobs: JobOrchestrator;
  /** Result retrieval */
  results: ResultAssembler;
}

/**
 * Overrides for {@link createBulkApi}.
 */
export interface CreateBulkApiOptions {
  /** HTTP transport. Default: fetch with the configured request timeout */
  transport?: HttpTransport;
  /** Session source. Default: derived from the configured auth method */
  sessionProvider?: SessionProvider;
  observability?: Observability;
  /** Sleep used between completion checks */
  sleep?: Sleep;
}

/**
 * Creates a Bulk API client from a configuration.
 *
 * @example
 * ```typescript
 * const config = new BulkConfigBuilder()
 *   .withSession(sessionId, 'na1.salesforce.com')
 *   .withBatchSize(2000)
 *   .build();
 *
 * const api = createBulkApi(config);
 * const jobId = await api.jobs.createInsertJob({ object: 'Contact', contentType: 'CSV' });
 * await api.jobs.submitData(jobId, rows);
 * const results = await api.results.collectOperationResults(jobId);
 * ```
 */
export function createBulkApi(config: BulkConfig, options: CreateBulkApiOptions = {}): BulkApi {
  const observability = options.observability ?? createNoopObservability();
  const transport = options.transport ?? createFetchTransport(config.requestTimeoutMs);
  const sessionProvider =
    options.sessionProvider ??
    createSessionProvider(config.auth, {
      apiVersion: config.apiVersion,
      clientName: config.userAgent,
      transport,
      logger: observability.logger,
    });

  const client = new BulkClient({
    sessionProvider,
    transport,
    apiVersion: config.apiVersion,
    userAgent: config.userAgent,
    observability,
  });

  const jobs = new JobOrchestrator({
    client,
    batchSize: config.batchSize,
    batchWait: config.batchWait,
    jobWait: config.jobWait,
    sleep: options.sleep,
  });

  return { client, jobs, results: new ResultAssembler(jobs) };
}

/**
 * Creates a Bulk API client from SF_* environment variables.
 */
export function createBulkApiFromEnv(options: CreateBulkApiOptions = {}): BulkApi {
  return createBulkApi(BulkConfigBuilder.fromEnv().build(), options);
}
