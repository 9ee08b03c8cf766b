import { vi } from 'vitest';
import { StaticSessionProvider } from '../../auth/index.js';
import { BulkClient } from '../../client/index.js';
import { createInMemoryObservability } from '../../observability/index.js';
import { FakeBulkApi, type FakeBulkApiOptions } from '../../testing/index.js';
import { JobOrchestrator } from '../orchestrator.js';
import { ResultAssembler } from '../results.js';

/**
 * Orchestrator and result assembler over an in-process fake server.
 */
export function createHarness(options: { batchSize?: number; fake?: FakeBulkApiOptions } = {}) {
  const fake = new FakeBulkApi(options.fake);
  const observability = createInMemoryObservability();
  const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);

  const client = new BulkClient({
    sessionProvider: new StaticSessionProvider('test-session', 'na1.salesforce.com'),
    transport: fake,
    apiVersion: '37.0',
    observability,
  });
  const jobs = new JobOrchestrator({
    client,
    batchSize: options.batchSize,
    batchWait: { timeoutMs: 100, intervalMs: 10 },
    jobWait: { timeoutMs: 100, intervalMs: 10 },
    sleep,
  });

  return {
    fake,
    logger: observability.logger,
    metrics: observability.metrics,
    sleep,
    client,
    jobs,
    results: new ResultAssembler(jobs),
  };
}

export const JOB_INFO_PREFIX =
  '<?xml version="1.0" encoding="UTF-8"?><jobInfo xmlns="http://www.force.com/2009/06/asyncapi/dataload">';
