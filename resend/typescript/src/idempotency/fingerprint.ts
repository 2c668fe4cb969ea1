/**
 * Stable payload fingerprints for idempotency conflict detection
 */
import { createHash } from 'crypto';

/**
 * Recursively sorts object keys so that equal payloads serialize identically
 */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }

  if (typeof value !== 'object' || value === null) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    const entry: unknown = Reflect.get(value, key);
    if (entry !== undefined) {
      sorted[key] = sortKeys(entry);
    }
  }
  return sorted;
}

/**
 * SHA-256 over the key-sorted JSON form of a payload
 */
export function fingerprint(payload: unknown): string {
  const canonical = JSON.stringify(sortKeys(payload)) ?? 'undefined';
  return createHash('sha256').update(canonical).digest('hex');
}
