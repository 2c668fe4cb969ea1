import type { Clock } from '../resilience/clock.js';

/**
 * Clock whose sleeps return immediately and advance virtual time
 */
export class VirtualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start: number = Date.UTC(2024, 4, 1, 12, 0, 0)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    if (!signal?.aborted) {
      this.current += ms;
    }
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function createVirtualClock(start?: number): VirtualClock {
  return new VirtualClock(start);
}
