/**
 * Result retrieval for query and DML jobs.
 */

import { parseCSVResults, type Dataset } from '../csv/index.js';
import { JobHasNoBatchesError, WaitTimeoutError } from '../errors/index.js';
import { MetricNames, type Logger } from '../observability/index.js';
import { parseResultIds } from '../xml/index.js';
import type { JobOrchestrator } from './orchestrator.js';
import type { StatusRecord, WaitOptions } from './types.js';

/**
 * Waits for jobs to finish and assembles their result datasets.
 *
 * Query results are concatenated in the order the server lists the result
 * segments; DML results in batch submission order.
 */
export class ResultAssembler {
  private readonly orchestrator: JobOrchestrator;
  private readonly logger: Logger;

  constructor(orchestrator: JobOrchestrator) {
    this.orchestrator = orchestrator;
    this.logger = orchestrator.client.logger;
  }

  /**
   * Waits for the query batch and lists its result segment ids.
   * @throws WaitTimeoutError when the batch did not complete in time
   */
  async getResultIdsForQuery(jobId: string, options?: WaitOptions): Promise<string[]> {
    const batchId = this.queryBatchOf(jobId);
    const outcome = await this.orchestrator.waitForBatch(batchId, options);
    if (outcome.status === 'timedOut') {
      throw new WaitTimeoutError('batch', batchId, outcome.waitedMs);
    }

    const resultIds = parseResultIds(await this.orchestrator.client.get(`/job/${jobId}/batch/${batchId}/result`));
    this.logger.debug(`Query result split across ${resultIds.length} results: ${resultIds.join(', ')}`, {
      jobId,
      batchId,
    });
    return resultIds;
  }

  /**
   * Downloads one result segment of a query batch.
   */
  async getQueryResult(jobId: string, batchId: string, resultId: string): Promise<Dataset> {
    const body = await this.orchestrator.client.get(`/job/${jobId}/batch/${batchId}/result/${resultId}`);
    return parseCSVResults(body);
  }

  /**
   * Waits for a query job and returns every result row.
   */
  async collectQueryResults(jobId: string, options?: WaitOptions): Promise<Dataset> {
    const batchId = this.queryBatchOf(jobId);
    const resultIds = await this.getResultIdsForQuery(jobId, options);

    const rows: Dataset = [];
    for (const resultId of resultIds) {
      this.logger.debug(`Retrieving result id ${resultId}...`, { jobId, batchId });
      const segment = await this.getQueryResult(jobId, batchId, resultId);
      rows.push(...segment);
    }

    this.orchestrator.client.metrics.increment(MetricNames.RESULT_ROWS, rows.length, { operation: 'query' });
    await this.logJobSummary(jobId);
    return rows;
  }

  /**
   * Downloads the per-row results of one DML batch.
   */
  async getOperationResult(jobId: string, batchId: string): Promise<Dataset> {
    const status = await this.orchestrator.getBatchStatus(batchId);
    this.logSummary(`Results summary for batch id ${batchId}:`, status);

    const body = await this.orchestrator.client.get(`/job/${jobId}/batch/${batchId}/result`);
    return parseCSVResults(body);
  }

  /**
   * Waits for every batch of a DML job and returns the per-row results in
   * submission order.
   * @throws WaitTimeoutError when the job did not complete in time
   */
  async collectOperationResults(jobId: string, options?: WaitOptions): Promise<Dataset> {
    const outcome = await this.orchestrator.waitForJob(jobId, options);
    if (outcome.status === 'timedOut') {
      throw new WaitTimeoutError('job', jobId, outcome.waitedMs);
    }

    const rows: Dataset = [];
    for (const batchId of this.orchestrator.registry.batchesOf(jobId)) {
      rows.push(...(await this.getOperationResult(jobId, batchId)));
    }

    this.orchestrator.client.metrics.increment(MetricNames.RESULT_ROWS, rows.length, { operation: 'dml' });
    await this.logJobSummary(jobId);
    return rows;
  }

  private queryBatchOf(jobId: string): string {
    const batches = this.orchestrator.registry.batchesOf(jobId);
    if (batches.length === 0) {
      throw new JobHasNoBatchesError(jobId);
    }
    return batches[0];
  }

  private async logJobSummary(jobId: string): Promise<void> {
    const status = await this.orchestrator.getJobStatus(jobId, { reload: true });
    this.logSummary(`Results summary for job id ${jobId}:`, status);
  }

  private logSummary(heading: string, status: StatusRecord): void {
    this.logger.debug(heading);
    for (const [key, value] of Object.entries(status)) {
      this.logger.debug(`${key}: ${value}`);
    }
  }
}
