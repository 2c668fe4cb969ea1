/**
 * Tests for InMemoryReplayCache
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryReplayCache } from '../replay-cache.js';
import { parseWebhookPayload } from '../payload.js';
import { VirtualClock } from '../../__mocks__/index.js';
import { DELIVERED_PAYLOAD } from './fixtures.js';
import type { VerifiedEvent } from '../../types/webhook.js';

const HOUR = 60 * 60 * 1000;

describe('InMemoryReplayCache', () => {
  let clock: VirtualClock;
  let cache: InMemoryReplayCache;

  function verified(id: string): VerifiedEvent {
    return { id, timestamp: 1714564800, receivedAt: clock.now(), event: parseWebhookPayload(DELIVERED_PAYLOAD) };
  }

  beforeEach(() => {
    clock = new VirtualClock();
    cache = new InMemoryReplayCache({ retention: 48 * HOUR, clock });
  });

  it('should store an unseen id and return the original for a repeat', async () => {
    const first = verified('msg_1');

    expect(await cache.putIfAbsent(first)).toBeUndefined();
    expect(await cache.putIfAbsent(verified('msg_1'))).toBe(first);
  });

  it('should forget deleted ids', async () => {
    await cache.putIfAbsent(verified('msg_1'));
    await cache.delete('msg_1');

    expect(await cache.get('msg_1')).toBeUndefined();
  });

  it('should drop entries older than the retention', async () => {
    await cache.putIfAbsent(verified('msg_1'));
    clock.advance(24 * HOUR);
    await cache.putIfAbsent(verified('msg_2'));
    clock.advance(24 * HOUR);

    expect(await cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
    expect(await cache.get('msg_2')).toBeDefined();
  });
});
