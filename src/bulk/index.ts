/**
 * Bulk API job lifecycle: registry, status cache, polling, submission and
 * result assembly.
 */

export { chunkDataset } from './chunker.js';
export { JobRegistry } from './registry.js';
export { StatusCache } from './status-cache.js';
export type { StatusFetcher } from './status-cache.js';
export { Poller, defaultSleep } from './poller.js';
export type { PollerOptions, Sleep } from './poller.js';
export { JobOrchestrator, jobInfoFields } from './orchestrator.js';
export type { JobOrchestratorOptions, SubmitDataOptions } from './orchestrator.js';
export { ResultAssembler } from './results.js';
export { BULK_OPERATIONS, PENDING_STATES, COMPLETED_STATES, ERROR_STATES } from './types.js';
export type {
  BulkOperation,
  ConcurrencyMode,
  ContentType,
  JobState,
  BatchState,
  JobConfig,
  JobOptions,
  StatusRecord,
  StatusKind,
  BatchCheck,
  JobCheck,
  WaitOutcome,
  WaitOptions,
} from './types.js';
