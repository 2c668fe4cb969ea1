/**
 * Tests for Semaphore
 */

import { describe, it, expect } from 'vitest';
import { Semaphore } from '../semaphore.js';

describe('Semaphore', () => {
  it('should never run more tasks than permits', async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    };

    await Promise.all(Array.from({ length: 6 }, () => semaphore.withPermit(task)));

    expect(peak).toBe(2);
    expect(semaphore.available).toBe(2);
  });

  it('should release the permit when a task fails', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.withPermit(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(semaphore.available).toBe(1);
  });

  it('should reject fewer than one permit', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});
