/**
 * Tests for the webhook signature scheme
 */

import { createHmac } from 'crypto';
import { describe, it, expect } from 'vitest';
import {
  computeSignature,
  decodeSecret,
  parseSignatureHeader,
  secureCompare,
  signPayload,
} from '../signature.js';
import { VerificationError } from '../../errors/categories.js';
import { TEST_WEBHOOK_SECRET } from '../../__mocks__/index.js';

describe('decodeSecret', () => {
  it('should strip the prefix and decode base64', () => {
    expect(decodeSecret(TEST_WEBHOOK_SECRET).toString('utf8')).toBe('test-secret');
  });

  it('should reject an empty secret', () => {
    expect(() => decodeSecret('whsec_')).toThrow(VerificationError);
  });
});

describe('computeSignature', () => {
  it('should sign id, timestamp and body with HMAC-SHA256', () => {
    const expected = createHmac('sha256', 'test-secret')
      .update('msg_1.1714564800.{"a":1}')
      .digest('base64');

    expect(computeSignature('msg_1', 1714564800, '{"a":1}', decodeSecret(TEST_WEBHOOK_SECRET))).toBe(expected);
  });

  it('should treat string and buffer bodies alike', () => {
    const key = decodeSecret(TEST_WEBHOOK_SECRET);

    expect(computeSignature('msg_1', 1, Buffer.from('héllo', 'utf8'), key)).toBe(
      computeSignature('msg_1', 1, 'héllo', key)
    );
  });
});

describe('parseSignatureHeader', () => {
  it('should keep only v1 candidates', () => {
    expect(parseSignatureHeader('v1,abc= v2,def= v1,ghi=')).toEqual([
      { version: 'v1', signature: 'abc=' },
      { version: 'v1', signature: 'ghi=' },
    ]);
  });

  it('should reject a header without v1 candidates', () => {
    const error = (() => {
      try {
        parseSignatureHeader('v2,abc');
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(VerificationError);
    expect(error).toMatchObject({ reason: 'invalid_signature_header' });
  });
});

describe('secureCompare', () => {
  it('should compare decoded signatures', () => {
    expect(secureCompare('YWJj', 'YWJj')).toBe(true);
    expect(secureCompare('YWJj', 'YWJk')).toBe(false);
    expect(secureCompare('YWJj', 'YWJjZA==')).toBe(false);
    expect(secureCompare('', '')).toBe(false);
  });
});

describe('signPayload', () => {
  it('should produce the three signature headers', () => {
    const headers = signPayload({ id: 'msg_1', payload: '{}', secret: TEST_WEBHOOK_SECRET, timestamp: 1714564800 });

    expect(headers['svix-id']).toBe('msg_1');
    expect(headers['svix-timestamp']).toBe('1714564800');
    expect(headers['svix-signature']).toBe(
      `v1,${computeSignature('msg_1', 1714564800, '{}', decodeSecret(TEST_WEBHOOK_SECRET))}`
    );
  });
});
