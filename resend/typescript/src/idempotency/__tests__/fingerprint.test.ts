/**
 * Tests for payload fingerprints and key helpers
 */

import { describe, it, expect } from 'vitest';
import { fingerprint } from '../fingerprint.js';
import { buildBatchIdempotencyKey, buildIdempotencyKey, deriveChunkKey } from '../keys.js';

describe('fingerprint', () => {
  it('should ignore key order', () => {
    expect(fingerprint({ a: 1, b: { c: 2, d: 3 } })).toBe(fingerprint({ b: { d: 3, c: 2 }, a: 1 }));
  });

  it('should ignore undefined fields', () => {
    expect(fingerprint({ a: 1, b: undefined })).toBe(fingerprint({ a: 1 }));
  });

  it('should distinguish different payloads', () => {
    expect(fingerprint({ subject: 'Hello' })).not.toBe(fingerprint({ subject: 'Hello!' }));
  });

  it('should keep array order significant', () => {
    expect(fingerprint(['a', 'b'])).not.toBe(fingerprint(['b', 'a']));
  });

  it('should produce a sha-256 hex digest', () => {
    expect(fingerprint({ a: 1 })).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('idempotency keys', () => {
  it('should build the documented shapes', () => {
    expect(buildIdempotencyKey('welcome-user', '123')).toBe('welcome-user/123');
    expect(buildBatchIdempotencyKey('digest', '2024-05-01')).toBe('batch-digest/2024-05-01');
    expect(deriveChunkKey('batch-digest/2024-05-01', 2)).toBe('batch-digest/2024-05-01/chunk-2');
  });
});
