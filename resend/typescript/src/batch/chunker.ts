/**
 * Splits oversized batches into provider-sized chunks
 */
import { deriveChunkKey } from '../idempotency/keys.js';
import type { DispatchOutcome } from '../types/outcome.js';

export const DEFAULT_CHUNK_SIZE = 100;

/**
 * A contiguous run of a batch, submitted as one atomic request
 */
export interface BatchChunk<T> {
  index: number;
  startIndex: number;
  /**
   * Exclusive
   */
  endIndex: number;
  requests: T[];
  idempotencyKey?: string;
}

/**
 * Splits a batch into contiguous chunks, preserving order.
 *
 * Chunk keys are `baseKey/chunk-<index>`; a batch that fits in one chunk
 * keeps `baseKey` unchanged.
 *
 * @example
 * ```typescript
 * const chunks = chunkBatch(emails, 'batch-digest/2024-05-01');
 * // 250 emails -> keys .../chunk-0, .../chunk-1, .../chunk-2
 * ```
 */
export function chunkBatch<T>(
  batch: readonly T[],
  baseKey?: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): BatchChunk<T>[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const chunks: BatchChunk<T>[] = [];
  for (let start = 0; start < batch.length; start += chunkSize) {
    const end = Math.min(start + chunkSize, batch.length);
    chunks.push({
      index: chunks.length,
      startIndex: start,
      endIndex: end,
      requests: batch.slice(start, end),
      idempotencyKey: baseKey,
    });
  }

  if (baseKey !== undefined && chunks.length > 1) {
    for (const chunk of chunks) {
      chunk.idempotencyKey = deriveChunkKey(baseKey, chunk.index);
    }
  }

  return chunks;
}

/**
 * Number of chunks a batch of the given length splits into
 */
export function countChunks(length: number, chunkSize: number = DEFAULT_CHUNK_SIZE): number {
  return Math.ceil(length / chunkSize);
}

/**
 * Reassembles provider ids in original order.
 *
 * Returns undefined unless every chunk was accepted with one id per request.
 */
export function reassembleIds<T>(
  chunks: readonly BatchChunk<T>[],
  outcomes: readonly DispatchOutcome[]
): string[] | undefined {
  if (chunks.length !== outcomes.length) {
    return undefined;
  }

  const ids: string[] = [];
  for (let i = 0; i < chunks.length; i++) {
    const chunk = chunks[i];
    const outcome = outcomes[i];
    if (chunk === undefined || outcome === undefined || outcome.kind !== 'accepted') {
      return undefined;
    }
    if (outcome.ids.length !== chunk.requests.length) {
      return undefined;
    }
    ids.push(...outcome.ids);
  }

  return ids;
}
