import { DuplicateBatchError, DuplicateJobError, UnknownBatchError, UnknownJobError } from '../errors/index.js';

/**
 * Known jobs and, per job, the batch ids submitted to it in submission order.
 *
 * Batch lists are append-only. A reverse index answers batch-to-job lookups;
 * a batch id can belong to at most one job.
 */
export class JobRegistry {
  private readonly batchesByJob = new Map<string, string[]>();
  private readonly jobByBatch = new Map<string, string>();

  registerJob(jobId: string): void {
    if (this.batchesByJob.has(jobId)) {
      throw new DuplicateJobError(jobId);
    }
    this.batchesByJob.set(jobId, []);
  }

  hasJob(jobId: string): boolean {
    return this.batchesByJob.has(jobId);
  }

  appendBatch(jobId: string, batchId: string): void {
    const batches = this.batchesByJob.get(jobId);
    if (!batches) {
      throw new UnknownJobError(jobId);
    }
    const owner = this.jobByBatch.get(batchId);
    if (owner !== undefined) {
      throw new DuplicateBatchError(batchId, owner);
    }
    batches.push(batchId);
    this.jobByBatch.set(batchId, jobId);
  }

  lookupJobForBatch(batchId: string): string {
    const jobId = this.jobByBatch.get(batchId);
    if (jobId === undefined) {
      throw new UnknownBatchError(batchId);
    }
    return jobId;
  }

  /**
   * Batch ids of a job, in submission order. Returns a copy.
   */
  batchesOf(jobId: string): string[] {
    const batches = this.batchesByJob.get(jobId);
    if (!batches) {
      throw new UnknownJobError(jobId);
    }
    return [...batches];
  }

  jobIds(): string[] {
    return Array.from(this.batchesByJob.keys());
  }
}
