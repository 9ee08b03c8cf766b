import { describe, it, expect } from 'vitest';
import { BatchFailedError, JobHasNoBatchesError, WaitTimeoutError } from '../../errors/index.js';
import { MetricNames } from '../../observability/index.js';
import { createHarness } from './helpers.js';

describe('ResultAssembler', () => {
  describe('collectQueryResults', () => {
    it('concatenates result segments in the order the server lists them', async () => {
      const { fake, jobs, results } = createHarness();
      fake.setQueryResults([
        { id: '752B', csv: 'Id,Name\n003B,Beta\n' },
        { id: '752A', csv: 'Id,Name\n003A,Alpha\n003C,Gamma\n' },
      ]);
      const jobId = await jobs.query('SELECT Id, Name FROM Contact');
      const [batchId] = jobs.registry.batchesOf(jobId);

      const rows = await results.collectQueryResults(jobId);

      expect(rows).toEqual([
        { Id: '003B', Name: 'Beta' },
        { Id: '003A', Name: 'Alpha' },
        { Id: '003C', Name: 'Gamma' },
      ]);
      expect(fake.requestsTo('GET', /\/result/).map((r) => r.path)).toEqual([
        `/job/${jobId}/batch/${batchId}/result`,
        `/job/${jobId}/batch/${batchId}/result/752B`,
        `/job/${jobId}/batch/${batchId}/result/752A`,
      ]);
    });

    it('returns no rows for a query without result segments', async () => {
      const { jobs, results } = createHarness();
      const jobId = await jobs.query('SELECT Id FROM Lead');

      expect(await results.collectQueryResults(jobId)).toEqual([]);
    });

    it('waits for the query batch before listing results', async () => {
      const { fake, jobs, results, sleep } = createHarness();
      fake.scriptBatch(1, ['Queued', 'InProcess', 'Completed']);
      fake.setQueryResults([{ id: '752A', csv: 'Id\n003A\n' }]);
      const jobId = await jobs.query('SELECT Id FROM Contact');

      expect(await results.collectQueryResults(jobId)).toEqual([{ Id: '003A' }]);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('throws WaitTimeoutError when the batch does not complete in time', async () => {
      const { fake, jobs, results } = createHarness();
      fake.scriptBatch(1, ['InProcess']);
      const jobId = await jobs.query('SELECT Id FROM Contact');
      const [batchId] = jobs.registry.batchesOf(jobId);

      const error = await results
        .collectQueryResults(jobId, { timeoutMs: 20, intervalMs: 10 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WaitTimeoutError);
      expect(error).toMatchObject({ message: `Batch ${batchId} did not complete within 20ms` });
      expect(fake.requestsTo('GET', /\/result/)).toEqual([]);
    });

    it('throws BatchFailedError for a failed query batch', async () => {
      const { fake, jobs, results } = createHarness();
      fake.scriptBatch(1, [{ state: 'Failed', stateMessage: 'InvalidBatch : MALFORMED_QUERY' }]);
      const jobId = await jobs.query('SELECT Id FROM Contact');

      await expect(results.collectQueryResults(jobId)).rejects.toThrow(BatchFailedError);
    });

    it('logs the final job status field by field', async () => {
      const { jobs, results, logger } = createHarness();
      const jobId = await jobs.query('SELECT Id FROM Contact');

      await results.collectQueryResults(jobId);

      const messages = logger.getMessages();
      expect(messages).toContain(`Results summary for job id ${jobId}:`);
      expect(messages).toContain('state: Closed');
      expect(messages).toContain('object: Contact');
    });

    it('rejects a job without a batch', async () => {
      const { jobs, results } = createHarness();
      const jobId = await jobs.createQueryJob({ object: 'Contact' });

      await expect(results.getResultIdsForQuery(jobId)).rejects.toThrow(JobHasNoBatchesError);
    });
  });

  describe('collectOperationResults', () => {
    it('returns per-row results of every batch in submission order', async () => {
      const { fake, jobs, results, metrics, sleep } = createHarness({
        batchSize: 5,
        fake: { resultFor: (row) => ({ Name: row.Name, Success: 'true' }) },
      });
      fake.scriptBatch(2, ['Queued', 'Completed']);
      const jobId = await jobs.createInsertJob({ object: 'Account', contentType: 'CSV' });
      const rows = Array.from({ length: 12 }, (_, i) => ({ Name: `Acme ${i}` }));
      const batchIds = await jobs.submitData(jobId, rows);

      const output = await results.collectOperationResults(jobId);

      expect(output).toEqual(rows.map((row) => ({ Name: row.Name, Success: true })));
      expect(batchIds.map((id) => fake.statusPolls(id))).toEqual([1, 2, 1]);
      expect(sleep.mock.calls).toEqual([[10]]);
      expect(metrics.getCounter(MetricNames.RESULT_ROWS, { operation: 'dml' })).toBe(12);
    });

    it('parses the default Bulk API result columns', async () => {
      const { jobs, results } = createHarness();
      const jobId = await jobs.createInsertJob({ object: 'Account' });
      await jobs.submitData(jobId, [{ Name: 'Acme' }]);

      expect(await results.collectOperationResults(jobId)).toEqual([
        { Id: '001FAKE00000001', Success: true, Created: true, Error: null },
      ]);
    });

    it('logs the batch status before downloading its results', async () => {
      const { jobs, results, logger } = createHarness();
      const jobId = await jobs.createInsertJob({ object: 'Account' });
      const [batchId] = await jobs.submitData(jobId, [{ Name: 'Acme' }]);

      await results.collectOperationResults(jobId);

      const messages = logger.getMessages();
      const summary = messages.indexOf(`Results summary for batch id ${batchId}:`);
      expect(summary).toBeGreaterThanOrEqual(0);
      expect(messages[summary + 1]).toBe(`id: ${batchId}`);
      expect(messages[summary + 2]).toBe(`jobId: ${jobId}`);
      expect(messages[summary + 3]).toBe('state: Completed');
    });

    it('throws WaitTimeoutError when the job does not complete in time', async () => {
      const { fake, jobs, results } = createHarness();
      fake.scriptBatch(1, ['InProcess']);
      const jobId = await jobs.createInsertJob({ object: 'Account' });
      await jobs.submitData(jobId, [{ Name: 'Acme' }]);

      const error = await results.collectOperationResults(jobId, { timeoutMs: 0 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WaitTimeoutError);
      expect(error).toMatchObject({ message: `Job ${jobId} did not complete within 0ms` });
    });

    it('rejects a job without batches', async () => {
      const { jobs, results } = createHarness();
      const jobId = await jobs.createInsertJob({ object: 'Account' });

      await expect(results.collectOperationResults(jobId)).rejects.toThrow(JobHasNoBatchesError);
    });
  });
});
