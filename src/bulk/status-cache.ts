import type { StatusKind, StatusRecord } from './types.js';

/**
 * Issues the remote status query for a job or batch id.
 */
export type StatusFetcher = (id: string, kind: StatusKind) => Promise<StatusRecord>;

/**
 * Last-observed status of each job and batch.
 *
 * Job and batch records are kept in separate maps so that an id from one
 * namespace never shadows the other. Each remote query replaces the whole
 * record for its id.
 */
export class StatusCache {
  private readonly jobs = new Map<string, StatusRecord>();
  private readonly batches = new Map<string, StatusRecord>();
  private readonly fetcher: StatusFetcher;

  constructor(fetcher: StatusFetcher) {
    this.fetcher = fetcher;
  }

  /**
   * Returns the cached record, or queries the remote side when there is none
   * or `forceReload` is set.
   */
  async get(id: string, kind: StatusKind, forceReload: boolean = false): Promise<StatusRecord> {
    const cache = this.mapFor(kind);
    if (!forceReload) {
      const cached = cache.get(id);
      if (cached !== undefined) {
        return cached;
      }
    }

    const record = await this.fetcher(id, kind);
    cache.set(id, record);
    return record;
  }

  /**
   * Cached record without any remote call.
   */
  peek(id: string, kind: StatusKind): StatusRecord | undefined {
    return this.mapFor(kind).get(id);
  }

  invalidate(id: string, kind: StatusKind): void {
    this.mapFor(kind).delete(id);
  }

  private mapFor(kind: StatusKind): Map<string, StatusRecord> {
    return kind === 'job' ? this.jobs : this.batches;
  }
}
