/**
 * Job and batch types for the Bulk API async surface.
 */

/**
 * The type of operation for a Bulk API job.
 */
export type BulkOperation = 'query' | 'insert' | 'upsert' | 'update' | 'delete' | 'hardDelete';

export const BULK_OPERATIONS: readonly BulkOperation[] = [
  'query',
  'insert',
  'upsert',
  'update',
  'delete',
  'hardDelete',
];

/**
 * The concurrency mode for a Bulk API job.
 */
export type ConcurrencyMode = 'Parallel' | 'Serial';

/**
 * The content type of job data.
 */
export type ContentType = 'CSV' | 'XML' | 'JSON' | 'ZIP_CSV' | 'ZIP_XML' | 'ZIP_JSON';

/**
 * The state of a Bulk API job.
 */
export type JobState = 'Open' | 'Closed' | 'Aborted' | 'Failed';

/**
 * The state of a batch. Queued and InProcess are pending; Completed is the
 * only success state; Failed and Not Processed are error states.
 */
export type BatchState = 'Queued' | 'InProcess' | 'Completed' | 'Failed' | 'Not Processed';

export const PENDING_STATES: ReadonlySet<string> = new Set(['Queued', 'InProcess']);
export const COMPLETED_STATES: ReadonlySet<string> = new Set(['Completed']);
export const ERROR_STATES: ReadonlySet<string> = new Set(['Failed', 'Not Processed']);

/**
 * Settings for a new job.
 *
 * Fields are written to the jobInfo document in the order
 * operation, object, externalIdFieldName, concurrencyMode, contentType,
 * followed by `extraFields` in insertion order.
 */
export interface JobConfig {
  /** The type of operation to perform */
  operation: BulkOperation;
  /** The API name of the SObject to process */
  object: string;
  /** The external ID field name (required for upsert, rejected otherwise) */
  externalIdFieldName?: string;
  /** Parallel (default on the server) or Serial batch processing */
  concurrencyMode?: ConcurrencyMode;
  /** Content type of the batches */
  contentType?: ContentType;
  /** Other jobInfo fields, e.g. assignmentRuleId */
  extraFields?: Record<string, string>;
}

/**
 * Job config without its operation, for the per-operation creators.
 */
export type JobOptions = Omit<JobConfig, 'operation'>;

/**
 * Field map returned by a job or batch status query.
 */
export type StatusRecord = Readonly<Record<string, string>>;

/**
 * Which status namespace an id lives in.
 */
export type StatusKind = 'job' | 'batch';

/**
 * Result of one batch completion check.
 */
export type BatchCheck =
  | { status: 'completed'; batchId: string; cached: boolean }
  | { status: 'pending'; batchId: string; state: string }
  | { status: 'failed'; jobId: string; batchId: string; state: string; stateMessage: string };

/**
 * Result of one job completion check. A pending job names the first batch
 * that was not yet done; batches after it were not checked.
 */
export type JobCheck =
  | { status: 'completed'; jobId: string; batchCount: number }
  | { status: 'pending'; jobId: string; pendingBatchId: string; checkedBatches: number }
  | { status: 'failed'; jobId: string; batchId: string; state: string; stateMessage: string };

/**
 * Outcome of a wait loop. A timed out wait returns normally; the job or batch
 * is still unfinished and must be checked again by the caller.
 */
export type WaitOutcome =
  | { status: 'completed'; waitedMs: number; checks: number }
  | { status: 'timedOut'; waitedMs: number; checks: number };

/**
 * Overrides for a single wait.
 */
export interface WaitOptions {
  timeoutMs?: number;
  intervalMs?: number;
}
