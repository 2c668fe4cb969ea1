/**
 * Idempotency key shapes
 *
 * Keys are opaque to the provider. These helpers produce the documented
 * shapes so that keys stay readable in logs and dashboards.
 */

export const MAX_IDEMPOTENCY_KEY_LENGTH = 256;

/**
 * Key for a single send, e.g. `welcome-user/123`
 */
export function buildIdempotencyKey(eventType: string, entityId: string): string {
  return `${eventType}/${entityId}`;
}

/**
 * Key for a batch send, e.g. `batch-orders/2024-05-01`
 */
export function buildBatchIdempotencyKey(eventType: string, batchId: string): string {
  return `batch-${eventType}/${batchId}`;
}

/**
 * Key of one chunk of a split batch
 */
export function deriveChunkKey(baseKey: string, index: number): string {
  return `${baseKey}/chunk-${index}`;
}
