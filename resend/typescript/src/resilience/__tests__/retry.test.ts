/**
 * Tests for RetryScheduler
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RetryScheduler, classifyError, type RetryState } from '../retry.js';
import {
  AuthenticationError,
  CancelledError,
  ConflictError,
  ExhaustedRetriesError,
  NetworkError,
  RateLimitError,
  ServerError,
  ValidationError,
} from '../../errors/categories.js';
import { VirtualClock } from '../../__mocks__/index.js';

describe('RetryScheduler', () => {
  let clock: VirtualClock;
  let scheduler: RetryScheduler;

  beforeEach(() => {
    clock = new VirtualClock();
    scheduler = new RetryScheduler({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 60000 }, clock);
  });

  describe('execute', () => {
    it('should succeed on first attempt', async () => {
      const operation = vi.fn().mockResolvedValue(42);

      const outcome = await scheduler.execute(operation);

      expect(outcome).toEqual({ status: 'succeeded', value: 42, attempts: 1 });
      expect(operation).toHaveBeenCalledWith(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('should retry transient errors with exponential backoff', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new ServerError('Bad gateway', 502))
        .mockRejectedValueOnce(new NetworkError('socket hang up'))
        .mockResolvedValueOnce('ok');

      const outcome = await scheduler.execute(operation);

      expect(outcome).toEqual({ status: 'succeeded', value: 'ok', attempts: 3 });
      expect(clock.sleeps).toEqual([1000, 2000]);
    });

    it('should exhaust after exactly maxRetries retries on repeated 429s', async () => {
      const error = new RateLimitError('Too many requests');
      const operation = vi.fn().mockRejectedValue(error);

      const outcome = await scheduler.execute(operation);

      expect(outcome).toEqual({ status: 'exhausted', error, attempts: 4 });
      expect(operation).toHaveBeenCalledTimes(4);
      expect(clock.sleeps).toEqual([1000, 2000, 4000]);
    });

    it('should not retry when maxRetries is zero', async () => {
      const noRetry = new RetryScheduler({ maxRetries: 0 }, clock);
      const operation = vi.fn().mockRejectedValue(new ServerError('Unavailable', 503));

      const outcome = await noRetry.execute(operation);

      expect(outcome.status).toBe('exhausted');
      expect(outcome.attempts).toBe(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('should not retry validation failures', async () => {
      const error = new ValidationError('Invalid `to` field', [{ field: 'to', message: 'invalid' }], 422);
      const operation = vi.fn().mockRejectedValue(error);

      const outcome = await scheduler.execute(operation);

      expect(outcome).toEqual({ status: 'rejected', error, attempts: 1 });
    });

    it('should report provider conflicts without retrying', async () => {
      const error = new ConflictError('Key in use', 'welcome/1');
      const operation = vi.fn().mockRejectedValue(error);

      const outcome = await scheduler.execute(operation);

      expect(outcome).toEqual({ status: 'conflict', error, attempts: 1 });
    });

    it('should cancel before the first attempt when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn();

      const outcome = await scheduler.execute(operation, { signal: controller.signal });

      expect(outcome).toEqual({ status: 'cancelled', attempts: 0 });
      expect(operation).not.toHaveBeenCalled();
    });

    it('should stop retrying once aborted during backoff', async () => {
      const controller = new AbortController();
      const operation = vi.fn().mockImplementation(async () => {
        controller.abort();
        throw new ServerError('Unavailable', 503);
      });

      const outcome = await scheduler.execute(operation, { signal: controller.signal });

      expect(outcome).toEqual({ status: 'cancelled', attempts: 1 });
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should cap delays at maxDelayMs', () => {
      const capped = new RetryScheduler({ baseDelayMs: 1000, maxDelayMs: 5000 }, clock);

      expect([1, 2, 3, 4, 5].map((retry) => capped.delayFor(retry))).toEqual([1000, 2000, 4000, 5000, 5000]);
    });

    it('should honour Retry-After only when enabled', () => {
      const error = new RateLimitError('Too many requests', 10);
      const respecting = new RetryScheduler({ respectRetryAfter: true }, clock);

      expect(scheduler.delayFor(1, error)).toBe(1000);
      expect(respecting.delayFor(1, error)).toBe(10000);
    });

    it('should emit state transitions', async () => {
      const states: RetryState['state'][] = [];
      const operation = vi.fn()
        .mockRejectedValueOnce(new ServerError('Unavailable', 503))
        .mockResolvedValueOnce('ok');

      await scheduler.execute(operation, { onStateChange: (s) => states.push(s.state) });

      expect(states).toEqual(['attempting', 'waiting', 'attempting', 'succeeded']);
    });

    it('should propagate errors that are not provider errors', async () => {
      const operation = vi.fn().mockRejectedValue(new TypeError('bug'));

      await expect(scheduler.execute(operation)).rejects.toThrow(TypeError);
    });
  });

  describe('run', () => {
    it('should return the value', async () => {
      await expect(scheduler.run(async () => 'ok')).resolves.toBe('ok');
    });

    it('should throw the rejection error', async () => {
      const error = new AuthenticationError('Invalid API key');

      await expect(scheduler.run(async () => Promise.reject(error))).rejects.toBe(error);
    });

    it('should wrap exhaustion', async () => {
      const error = await scheduler
        .run(async () => Promise.reject(new ServerError('Unavailable', 503)))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExhaustedRetriesError);
      expect(error).toMatchObject({ attempts: 4, status: 503 });
    });

    it('should throw CancelledError when aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        scheduler.run(async () => 'ok', { signal: controller.signal, operation: 'emails.get' })
      ).rejects.toThrow(CancelledError);
    });
  });
});

describe('classifyError', () => {
  it('should classify provider errors', () => {
    expect(classifyError(new ValidationError('bad', [], 400))).toBe('rejected');
    expect(classifyError(new AuthenticationError('no'))).toBe('rejected');
    expect(classifyError(new ConflictError('dup'))).toBe('conflict');
    expect(classifyError(new RateLimitError('slow down'))).toBe('retryable');
    expect(classifyError(new ServerError('oops', 500))).toBe('retryable');
    expect(classifyError(new CancelledError('stop', false))).toBe('cancelled');
  });
});
