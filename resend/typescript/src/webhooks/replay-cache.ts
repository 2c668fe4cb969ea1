/**
 * Replay cache for verified webhook deliveries
 */
import { systemClock, type Clock } from '../resilience/clock.js';
import type { VerifiedEvent } from '../types/webhook.js';

/**
 * Remembers delivery ids; `putIfAbsent` must be atomic
 */
export interface ReplayCache {
  /**
   * Stores the event unless its id is already known.
   * Returns the stored event when it was, undefined otherwise.
   */
  putIfAbsent(event: VerifiedEvent): Promise<VerifiedEvent | undefined>;

  get(id: string): Promise<VerifiedEvent | undefined>;

  /**
   * Forgets an id so a redelivery is processed again
   */
  delete(id: string): Promise<void>;

  /**
   * Removes entries older than the retention, returning how many were removed
   */
  sweep(): Promise<number>;
}

export interface InMemoryReplayCacheOptions {
  /**
   * Retention in milliseconds
   */
  retention: number;
  clock?: Clock;
}

/**
 * Process-local replay cache
 */
export class InMemoryReplayCache implements ReplayCache {
  private readonly entries = new Map<string, VerifiedEvent>();
  private readonly retention: number;
  private readonly clock: Clock;

  constructor(options: InMemoryReplayCacheOptions) {
    this.retention = options.retention;
    this.clock = options.clock ?? systemClock;
  }

  async putIfAbsent(event: VerifiedEvent): Promise<VerifiedEvent | undefined> {
    const existing = this.lookup(event.id);
    if (existing) {
      return existing;
    }
    this.entries.set(event.id, event);
    return undefined;
  }

  async get(id: string): Promise<VerifiedEvent | undefined> {
    return this.lookup(id);
  }

  async delete(id: string): Promise<void> {
    this.entries.delete(id);
  }

  async sweep(): Promise<number> {
    let removed = 0;
    for (const [id, event] of this.entries) {
      if (this.isExpired(event)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  private lookup(id: string): VerifiedEvent | undefined {
    const event = this.entries.get(id);
    if (event && this.isExpired(event)) {
      this.entries.delete(id);
      return undefined;
    }
    return event;
  }

  private isExpired(event: VerifiedEvent): boolean {
    return this.clock.now() - event.receivedAt >= this.retention;
  }
}
