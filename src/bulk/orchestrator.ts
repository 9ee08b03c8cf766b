/**
 * Job lifecycle: creation, batch submission, closing and aborting.
 */

import { CSV_CONTENT_TYPE, type BulkClient } from '../client/index.js';
import { DEFAULT_BATCH_SIZE, DEFAULT_BATCH_WAIT, DEFAULT_JOB_WAIT, type WaitConfig } from '../config/index.js';
import { recordsToCSV, type DataRow } from '../csv/index.js';
import { ConfigurationError, ResponseParseError } from '../errors/index.js';
import { MetricNames, type Logger, type MetricsCollector } from '../observability/index.js';
import { buildJobInfoDocument, parseFlatRecord } from '../xml/index.js';
import { chunkDataset } from './chunker.js';
import { Poller, type Sleep } from './poller.js';
import { JobRegistry } from './registry.js';
import { StatusCache } from './status-cache.js';
import {
  BULK_OPERATIONS,
  type JobConfig,
  type JobOptions,
  type StatusKind,
  type StatusRecord,
  type WaitOptions,
  type WaitOutcome,
} from './types.js';

/** jobInfo fields written before any extra field, in this order */
const JOB_FIELD_ORDER = ['operation', 'object', 'externalIdFieldName', 'concurrencyMode', 'contentType'] as const;

const XML_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export interface JobOrchestratorOptions {
  client: BulkClient;
  batchSize?: number;
  batchWait?: WaitConfig;
  jobWait?: WaitConfig;
  sleep?: Sleep;
}

export interface SubmitDataOptions {
  /** Close the job after the last batch. Default: true */
  closeJob?: boolean;
  /** Rows per batch, overriding the configured batch size */
  batchSize?: number;
}

/**
 * Validates a job config and returns its jobInfo fields in document order.
 */
export function jobInfoFields(config: JobConfig): Array<[string, string]> {
  if (!BULK_OPERATIONS.includes(config.operation)) {
    throw new ConfigurationError(`Unknown bulk operation: ${String(config.operation)}`);
  }
  if (!config.object || config.object.trim().length === 0) {
    throw new ConfigurationError('Object name is required');
  }
  if (config.operation === 'upsert' && !config.externalIdFieldName) {
    throw new ConfigurationError('externalIdFieldName is required for upsert operations');
  }
  if (config.operation !== 'upsert' && config.externalIdFieldName) {
    throw new ConfigurationError('externalIdFieldName is only valid for upsert operations');
  }

  const values: Record<(typeof JOB_FIELD_ORDER)[number], string | undefined> = {
    operation: config.operation,
    object: config.object.trim(),
    externalIdFieldName: config.externalIdFieldName,
    concurrencyMode: config.concurrencyMode,
    contentType: config.contentType,
  };

  const fields: Array<[string, string]> = [];
  for (const name of JOB_FIELD_ORDER) {
    const value = values[name];
    if (value !== undefined) {
      fields.push([name, value]);
    }
  }

  const reserved = new Set<string>([...JOB_FIELD_ORDER, 'state', 'id']);
  for (const [name, value] of Object.entries(config.extraFields ?? {})) {
    if (reserved.has(name)) {
      throw new ConfigurationError(`Extra job field '${name}' collides with a recognised field`);
    }
    if (!XML_NAME.test(name)) {
      throw new ConfigurationError(`Extra job field name '${name}' is not a valid element name`);
    }
    fields.push([name, value]);
  }

  return fields;
}

/**
 * Creates jobs, submits their batches in order and changes job state.
 *
 * Owns the job registry, the status cache and the poller for its jobs; two
 * orchestrators never share bookkeeping.
 */
export class JobOrchestrator {
  readonly client: BulkClient;
  readonly registry: JobRegistry;
  readonly statusCache: StatusCache;
  readonly poller: Poller;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: JobOrchestratorOptions) {
    this.client = options.client;
    this.logger = options.client.logger;
    this.metrics = options.client.metrics;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.registry = new JobRegistry();
    this.statusCache = new StatusCache((id, kind) => this.fetchStatus(id, kind));
    this.poller = new Poller({
      registry: this.registry,
      cache: this.statusCache,
      logger: this.logger,
      metrics: this.metrics,
      batchWait: options.batchWait ?? DEFAULT_BATCH_WAIT,
      jobWait: options.jobWait ?? DEFAULT_JOB_WAIT,
      sleep: options.sleep,
    });
  }

  // --------------------------------------------------------------------------
  // Job creation
  // --------------------------------------------------------------------------

  /**
   * Creates a job and registers it with an empty batch list.
   * @returns the job id assigned by the server
   */
  async createJob(config: JobConfig): Promise<string> {
    const document = buildJobInfoDocument(jobInfoFields(config));
    const response = await this.client.post('/job', document);

    const jobId = requireId(parseFlatRecord(response), 'job creation');
    this.registry.registerJob(jobId);
    this.metrics.increment(MetricNames.JOBS_CREATED, 1, { operation: config.operation });

    this.logger.debug(`Created ${config.operation} job for ${config.object} object.  Job id ${jobId}.`, {
      jobId,
      operation: config.operation,
      object: config.object,
    });
    return jobId;
  }

  createQueryJob(options: JobOptions): Promise<string> {
    return this.createJob({ ...options, operation: 'query' });
  }

  createInsertJob(options: JobOptions): Promise<string> {
    return this.createJob({ ...options, operation: 'insert' });
  }

  createUpsertJob(options: JobOptions): Promise<string> {
    return this.createJob({ ...options, operation: 'upsert' });
  }

  createUpdateJob(options: JobOptions): Promise<string> {
    return this.createJob({ ...options, operation: 'update' });
  }

  createDeleteJob(options: JobOptions): Promise<string> {
    return this.createJob({ ...options, operation: 'delete' });
  }

  createHardDeleteJob(options: JobOptions): Promise<string> {
    return this.createJob({ ...options, operation: 'hardDelete' });
  }

  // --------------------------------------------------------------------------
  // Batch submission
  // --------------------------------------------------------------------------

  /**
   * Submits a SOQL query as the job's single batch and closes the job.
   * @returns the batch id
   */
  async submitQuery(jobId: string, soql: string): Promise<string> {
    this.registry.batchesOf(jobId);

    const response = await this.client.post(`/job/${jobId}/batch`, soql, CSV_CONTENT_TYPE);
    const batchId = requireId(parseFlatRecord(response), 'query submission');
    this.logger.debug(`Job id for query is ${jobId}. Batch id is ${batchId}.`, { jobId, batchId });

    await this.closeJob(jobId);

    this.registry.appendBatch(jobId, batchId);
    this.metrics.increment(MetricNames.BATCHES_SUBMITTED);
    return batchId;
  }

  /**
   * Creates a query job for the object named in the FROM clause and submits
   * the query.
   * @returns the job id
   */
  async query(soql: string): Promise<string> {
    this.logger.debug(`SOQL query to execute: ${soql}`);

    const match = /FROM\s+(\w+)/i.exec(soql);
    if (!match) {
      throw new ConfigurationError('Query has no FROM clause to take the object name from');
    }

    const jobId = await this.createQueryJob({ object: match[1], contentType: 'CSV' });
    await this.submitQuery(jobId, soql);
    return jobId;
  }

  /**
   * Splits the rows into batches, submits them in order and, by default,
   * closes the job after the last one.
   * @returns every batch id of the job, in submission order
   */
  async submitData(jobId: string, rows: readonly DataRow[], options: SubmitDataOptions = {}): Promise<string[]> {
    this.registry.batchesOf(jobId);
    const chunks = chunkDataset(rows, options.batchSize ?? this.batchSize);

    for (let i = 0; i < chunks.length; i++) {
      const response = await this.client.post(`/job/${jobId}/batch`, recordsToCSV(chunks[i]), CSV_CONTENT_TYPE);
      const batchId = requireId(parseFlatRecord(response), 'batch submission');

      this.registry.appendBatch(jobId, batchId);
      this.metrics.increment(MetricNames.BATCHES_SUBMITTED);
      this.logger.debug(`Added batch id ${batchId} (#${i + 1}) to job id ${jobId}...`, {
        jobId,
        batchId,
        rows: chunks[i].length,
      });
    }

    if (options.closeJob ?? true) {
      await this.closeJob(jobId);
    }

    return this.registry.batchesOf(jobId);
  }

  // --------------------------------------------------------------------------
  // Job state changes
  // --------------------------------------------------------------------------

  async closeJob(jobId: string): Promise<void> {
    await this.changeState(jobId, 'Closed');
    this.metrics.increment(MetricNames.JOBS_CLOSED);
    this.logger.debug(`Closed job id ${jobId}.`, { jobId });
  }

  async abortJob(jobId: string): Promise<void> {
    await this.changeState(jobId, 'Aborted');
    this.metrics.increment(MetricNames.JOBS_ABORTED);
    this.logger.debug(`Aborted job id ${jobId}.`, { jobId });
  }

  private async changeState(jobId: string, state: 'Closed' | 'Aborted'): Promise<void> {
    await this.client.post(`/job/${jobId}`, buildJobInfoDocument([['state', state]]));
    this.statusCache.invalidate(jobId, 'job');
  }

  // --------------------------------------------------------------------------
  // Status and completion
  // --------------------------------------------------------------------------

  getJobStatus(jobId: string, options: { reload?: boolean } = {}): Promise<StatusRecord> {
    return this.statusCache.get(jobId, 'job', options.reload ?? false);
  }

  getBatchStatus(batchId: string, options: { reload?: boolean } = {}): Promise<StatusRecord> {
    return this.statusCache.get(batchId, 'batch', options.reload ?? false);
  }

  isBatchDone(batchId: string): Promise<boolean> {
    return this.poller.isBatchDone(batchId);
  }

  isJobDone(jobId: string): Promise<boolean> {
    return this.poller.isJobDone(jobId);
  }

  waitForBatch(batchId: string, options?: WaitOptions): Promise<WaitOutcome> {
    return this.poller.waitForBatch(batchId, options);
  }

  waitForJob(jobId: string, options?: WaitOptions): Promise<WaitOutcome> {
    return this.poller.waitForJob(jobId, options);
  }

  private async fetchStatus(id: string, kind: StatusKind): Promise<StatusRecord> {
    const path = kind === 'job' ? `/job/${id}` : `/job/${this.registry.lookupJobForBatch(id)}/batch/${id}`;
    return parseFlatRecord(await this.client.get(path));
  }
}

function requireId(record: Record<string, string>, context: string): string {
  const id = record.id;
  if (!id) {
    throw new ResponseParseError(`${context} response has no id`);
  }
  return id;
}
