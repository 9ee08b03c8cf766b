/**
 * Error types for the Bulk API job client.
 *
 * Every failure surfaces as a subclass of {@link BulkError}. Remote HTTP
 * failures are {@link ApiError}; batches that reach an error state are
 * {@link BatchFailedError}; bookkeeping mistakes (unknown ids) are local
 * consistency errors and are never retryable.
 */

/**
 * Error codes for Bulk API errors.
 */
export enum BulkErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  NoSession = 'NO_SESSION',

  // Authentication errors
  AuthenticationError = 'AUTHENTICATION_ERROR',

  // Remote API errors
  ApiError = 'API_ERROR',
  ResponseParseError = 'RESPONSE_PARSE_ERROR',

  // Network errors
  NetworkError = 'NETWORK_ERROR',
  RequestTimeout = 'REQUEST_TIMEOUT',

  // Job/batch lifecycle errors
  BatchFailed = 'BATCH_FAILED',
  WaitTimeout = 'WAIT_TIMEOUT',

  // Local bookkeeping errors
  UnknownJob = 'UNKNOWN_JOB',
  UnknownBatch = 'UNKNOWN_BATCH',
  DuplicateJob = 'DUPLICATE_JOB',
  DuplicateBatch = 'DUPLICATE_BATCH',
  JobHasNoBatches = 'JOB_HAS_NO_BATCHES',
}

/**
 * Base Bulk API error class.
 */
export class BulkError extends Error {
  /** Error code */
  readonly code: BulkErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Whether repeating the same call could succeed */
  readonly retryable: boolean;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: BulkErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BulkError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors (Non-Retryable)
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends BulkError {
  constructor(message: string) {
    super({
      code: BulkErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      retryable: false,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * No session source configured.
 */
export class NoSessionError extends BulkError {
  constructor() {
    super({
      code: BulkErrorCode.NoSession,
      message: 'No session configured (session id, username/password, or refresh token required)',
      retryable: false,
    });
    this.name = 'NoSessionError';
  }
}

// ============================================================================
// Authentication Errors
// ============================================================================

/**
 * Session acquisition failed.
 */
export class AuthenticationError extends BulkError {
  constructor(message: string = 'Authentication failed', details?: Record<string, unknown>) {
    super({
      code: BulkErrorCode.AuthenticationError,
      message,
      retryable: false,
      details,
    });
    this.name = 'AuthenticationError';
  }
}

// ============================================================================
// Remote API Errors
// ============================================================================

/**
 * HTTP-level failure (status >= 400) from the Bulk API.
 *
 * Carries the raw response body. When the body is a Bulk API error document
 * the remote exception code and message are exposed as well.
 */
export class ApiError extends BulkError {
  readonly body: string;
  readonly exceptionCode?: string;
  readonly exceptionMessage?: string;

  constructor(options: {
    statusCode: number;
    body: string;
    method?: string;
    path?: string;
    exceptionCode?: string;
    exceptionMessage?: string;
  }) {
    super({
      code: BulkErrorCode.ApiError,
      message: `[${options.statusCode}] Bulk API HTTP Error result: ${options.body}`,
      statusCode: options.statusCode,
      retryable: options.statusCode === 429 || options.statusCode >= 500,
      details: {
        method: options.method,
        path: options.path,
        exceptionCode: options.exceptionCode,
      },
    });
    this.name = 'ApiError';
    this.body = options.body;
    this.exceptionCode = options.exceptionCode;
    this.exceptionMessage = options.exceptionMessage;
  }
}

/**
 * A response body could not be decoded.
 */
export class ResponseParseError extends BulkError {
  constructor(message: string, cause?: unknown) {
    super({
      code: BulkErrorCode.ResponseParseError,
      message: `Failed to parse response: ${message}`,
      retryable: false,
      cause,
    });
    this.name = 'ResponseParseError';
  }
}

// ============================================================================
// Network Errors (Retryable)
// ============================================================================

/**
 * Network error.
 */
export class NetworkError extends BulkError {
  constructor(message: string, cause?: unknown) {
    super({
      code: BulkErrorCode.NetworkError,
      message: `Network error: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * A single HTTP request exceeded its timeout.
 */
export class RequestTimeoutError extends BulkError {
  constructor(timeoutMs: number) {
    super({
      code: BulkErrorCode.RequestTimeout,
      message: `Request timed out after ${timeoutMs}ms`,
      retryable: true,
      details: { timeoutMs },
    });
    this.name = 'RequestTimeoutError';
  }
}

// ============================================================================
// Lifecycle Errors (Non-Retryable)
// ============================================================================

/**
 * A batch reached a terminal error state.
 */
export class BatchFailedError extends BulkError {
  readonly jobId: string;
  readonly batchId: string;
  readonly state: string;
  readonly stateMessage: string;

  constructor(jobId: string, batchId: string, state: string, stateMessage: string) {
    super({
      code: BulkErrorCode.BatchFailed,
      message: `Batch ${batchId} of job ${jobId} failed: ${stateMessage}`,
      retryable: false,
      details: { jobId, batchId, state, stateMessage },
    });
    this.name = 'BatchFailedError';
    this.jobId = jobId;
    this.batchId = batchId;
    this.state = state;
    this.stateMessage = stateMessage;
  }
}

/**
 * A wait loop ran out of time before the job or batch completed.
 */
export class WaitTimeoutError extends BulkError {
  constructor(kind: 'job' | 'batch', id: string, waitedMs: number) {
    super({
      code: BulkErrorCode.WaitTimeout,
      message: `${kind === 'job' ? 'Job' : 'Batch'} ${id} did not complete within ${waitedMs}ms`,
      retryable: true,
      details: { kind, id, waitedMs },
    });
    this.name = 'WaitTimeoutError';
  }
}

// ============================================================================
// Bookkeeping Errors (Non-Retryable)
// ============================================================================

/**
 * Job id was never registered.
 */
export class UnknownJobError extends BulkError {
  constructor(jobId: string) {
    super({
      code: BulkErrorCode.UnknownJob,
      message: `Job id '${jobId}' is unknown`,
      retryable: false,
      details: { jobId },
    });
    this.name = 'UnknownJobError';
  }
}

/**
 * Batch id does not belong to any registered job.
 */
export class UnknownBatchError extends BulkError {
  constructor(batchId: string) {
    super({
      code: BulkErrorCode.UnknownBatch,
      message: `Batch id '${batchId}' is unknown, can't retrieve job id`,
      retryable: false,
      details: { batchId },
    });
    this.name = 'UnknownBatchError';
  }
}

/**
 * Job id registered twice.
 */
export class DuplicateJobError extends BulkError {
  constructor(jobId: string) {
    super({
      code: BulkErrorCode.DuplicateJob,
      message: `Job id '${jobId}' is already registered`,
      retryable: false,
      details: { jobId },
    });
    this.name = 'DuplicateJobError';
  }
}

/**
 * Batch id already registered under a job.
 */
export class DuplicateBatchError extends BulkError {
  constructor(batchId: string, ownerJobId: string) {
    super({
      code: BulkErrorCode.DuplicateBatch,
      message: `Batch id '${batchId}' is already registered under job '${ownerJobId}'`,
      retryable: false,
      details: { batchId, ownerJobId },
    });
    this.name = 'DuplicateBatchError';
  }
}

/**
 * Job-level done-check on a job without batches.
 */
export class JobHasNoBatchesError extends BulkError {
  constructor(jobId: string) {
    super({
      code: BulkErrorCode.JobHasNoBatches,
      message: `Job id '${jobId}' does not have any batches`,
      retryable: false,
      details: { jobId },
    });
    this.name = 'JobHasNoBatchesError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Checks if an error is a Bulk API error.
 */
export function isBulkError(error: unknown): error is BulkError {
  return error instanceof BulkError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  return isBulkError(error) && error.retryable;
}
