/**
 * Completion checks and wait loops for batches and jobs.
 */

import { mergeWait, type WaitConfig } from '../config/index.js';
import { BatchFailedError, JobHasNoBatchesError } from '../errors/index.js';
import { MetricNames, type Logger, type MetricsCollector } from '../observability/index.js';
import type { JobRegistry } from './registry.js';
import type { StatusCache } from './status-cache.js';
import {
  COMPLETED_STATES,
  ERROR_STATES,
  PENDING_STATES,
  type BatchCheck,
  type JobCheck,
  type WaitOptions,
  type WaitOutcome,
} from './types.js';

export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep utility for polling.
 */
export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PollerOptions {
  registry: JobRegistry;
  cache: StatusCache;
  logger: Logger;
  metrics: MetricsCollector;
  batchWait: WaitConfig;
  jobWait: WaitConfig;
  sleep?: Sleep;
}

/**
 * Decides batch and job completion from remote status and drives the wait
 * loops.
 *
 * The `check*` methods report failure as a value. The `is*Done` and `wait*`
 * methods throw {@link BatchFailedError} instead, which ends any wait in
 * progress.
 */
export class Poller {
  private readonly registry: JobRegistry;
  private readonly cache: StatusCache;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly batchWait: WaitConfig;
  private readonly jobWait: WaitConfig;
  private readonly sleep: Sleep;

  constructor(options: PollerOptions) {
    this.registry = options.registry;
    this.cache = options.cache;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.batchWait = options.batchWait;
    this.jobWait = options.jobWait;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Checks one batch. A batch already cached as completed is not queried
   * again; anything else is reloaded from the remote side.
   */
  async checkBatch(batchId: string): Promise<BatchCheck> {
    const cached = this.cache.peek(batchId, 'batch');
    if (cached !== undefined && COMPLETED_STATES.has(cached.state ?? '')) {
      this.logger.debug(`Batch id ${batchId} completed previously.`, { batchId });
      return { status: 'completed', batchId, cached: true };
    }

    const jobId = this.registry.lookupJobForBatch(batchId);
    const status = await this.cache.get(batchId, 'batch', true);
    this.metrics.increment(MetricNames.STATUS_POLLS, 1, { kind: 'batch' });
    const state = status.state ?? '';

    if (ERROR_STATES.has(state)) {
      this.metrics.increment(MetricNames.BATCHES_FAILED);
      return { status: 'failed', jobId, batchId, state, stateMessage: status.stateMessage ?? '' };
    }

    if (COMPLETED_STATES.has(state)) {
      this.logger.debug(`Batch id ${batchId} is complete.`, { batchId, jobId });
      return { status: 'completed', batchId, cached: false };
    }

    if (!PENDING_STATES.has(state)) {
      this.logger.warn(`Batch id ${batchId} reported unrecognised state '${state}'`, { batchId, jobId });
    }
    this.logger.debug(`Batch id ${batchId} is not complete.`, { batchId, jobId, state });
    return { status: 'pending', batchId, state };
  }

  /**
   * Checks a job's batches in submission order, stopping at the first one
   * that is not done. Later batches are not queried in the same call.
   */
  async checkJob(jobId: string): Promise<JobCheck> {
    const batches = this.registry.batchesOf(jobId);
    if (batches.length === 0) {
      throw new JobHasNoBatchesError(jobId);
    }

    for (let i = 0; i < batches.length; i++) {
      const batchId = batches[i];
      this.logger.debug(`Checking status of batch id ${batchId}... (${i + 1}/${batches.length})`, { jobId });
      const check = await this.checkBatch(batchId);
      if (check.status === 'failed') {
        return check;
      }
      if (check.status === 'pending') {
        this.logger.debug('Exiting loop.', { jobId, batchId });
        return { status: 'pending', jobId, pendingBatchId: batchId, checkedBatches: i + 1 };
      }
    }

    return { status: 'completed', jobId, batchCount: batches.length };
  }

  /**
   * @throws BatchFailedError when the batch reached an error state
   */
  async isBatchDone(batchId: string): Promise<boolean> {
    return this.settle(await this.checkBatch(batchId));
  }

  /**
   * @throws BatchFailedError when any checked batch reached an error state
   * @throws JobHasNoBatchesError when no batch was registered for the job
   */
  async isJobDone(jobId: string): Promise<boolean> {
    return this.settle(await this.checkJob(jobId));
  }

  /**
   * Polls a batch until it completes or the timeout passes. A timeout is
   * reported in the outcome, not thrown.
   * @throws ConfigurationError when the wait options are invalid
   */
  async waitForBatch(batchId: string, options: WaitOptions = {}): Promise<WaitOutcome> {
    const wait = mergeWait(this.batchWait, options, 'Batch wait');
    return this.waitUntil('batch', batchId, () => this.isBatchDone(batchId), wait);
  }

  /**
   * Polls every batch of a job until all complete or the timeout passes.
   */
  async waitForJob(jobId: string, options: WaitOptions = {}): Promise<WaitOutcome> {
    const wait = mergeWait(this.jobWait, options, 'Job wait');
    return this.waitUntil('job', jobId, () => this.isJobDone(jobId), wait);
  }

  private settle(check: BatchCheck | JobCheck): boolean {
    if (check.status === 'failed') {
      const error = new BatchFailedError(check.jobId, check.batchId, check.state, check.stateMessage);
      this.logger.error(error.message, { jobId: check.jobId, batchId: check.batchId, state: check.state });
      throw error;
    }
    return check.status === 'completed';
  }

  private async waitUntil(
    kind: 'job' | 'batch',
    id: string,
    isDone: () => Promise<boolean>,
    wait: WaitConfig
  ): Promise<WaitOutcome> {
    let waitedMs = 0;
    let checks = 0;

    for (;;) {
      checks++;
      if (await isDone()) {
        this.metrics.timing(MetricNames.WAIT_DURATION, waitedMs, { kind });
        return { status: 'completed', waitedMs, checks };
      }
      if (waitedMs >= wait.timeoutMs) {
        this.logger.warn(`Stopped waiting for ${kind} ${id} after ${waitedMs}ms`, { kind, id, checks });
        return { status: 'timedOut', waitedMs, checks };
      }
      this.logger.debug('Waiting...', { kind, id, waitedMs });
      await this.sleep(wait.intervalMs);
      waitedMs += wait.intervalMs;
    }
  }
}
