import { ConfigurationError } from '../errors/index.js';

/**
 * Splits rows into contiguous chunks of at most `batchSize` rows.
 *
 * Yields ceil(rows.length / batchSize) chunks; an empty input yields none.
 * The input array is not modified.
 */
export function chunkDataset<T>(rows: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new ConfigurationError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const chunks: T[][] = [];
  for (let start = 0; start < rows.length; start += batchSize) {
    chunks.push(rows.slice(start, start + batchSize));
  }
  return chunks;
}
