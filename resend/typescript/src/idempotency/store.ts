/**
 * Idempotency key store
 *
 * Maps a caller-supplied key to the outcome of the operation it guards.
 * `reserve` is the atomic check-and-set: of several callers racing on one
 * key exactly one observes `fresh`; the others wait for it to finish.
 */
import { systemClock, type Clock } from '../resilience/clock.js';
import type { DispatchOutcome } from '../types/outcome.js';

export const DEFAULT_IDEMPOTENCY_TTL = 24 * 60 * 60 * 1000;

/**
 * Result of reserving a key
 */
export type Reservation =
  | { status: 'fresh' }
  | { status: 'duplicate'; outcome: DispatchOutcome }
  | { status: 'conflict'; existingOutcome?: DispatchOutcome };

/**
 * Store abstraction; implementations must make `reserve` atomic
 */
export interface IdempotencyStore {
  /**
   * Claims a key for a payload fingerprint.
   * Waits while another caller holds the key in flight.
   */
  reserve(key: string, fingerprint: string): Promise<Reservation>;

  /**
   * Records the terminal outcome of a fresh reservation
   */
  commit(key: string, outcome: DispatchOutcome): Promise<void>;

  /**
   * Forgets a reservation for which no network attempt was made
   */
  release(key: string): Promise<void>;

  /**
   * Ends a reservation that was attempted without a terminal outcome.
   * The fingerprint stays bound to the key, so only the same payload may
   * be dispatched again under it.
   */
  abandon(key: string): Promise<void>;

  /**
   * Removes expired entries, returning how many were removed
   */
  expire(): Promise<number>;
}

type EntryState = 'pending' | 'committed' | 'open';

interface StoreEntry {
  fingerprint: string;
  state: EntryState;
  outcome?: DispatchOutcome;
  createdAt: number;
  settled?: Promise<void>;
  settle?: () => void;
}

/**
 * Options for the in-memory store
 */
export interface InMemoryIdempotencyStoreOptions {
  /**
   * Entry lifetime in milliseconds
   * @default 86400000 (24 hours)
   */
  ttl?: number;
  clock?: Clock;
}

/**
 * Process-local idempotency store
 */
export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly entries = new Map<string, StoreEntry>();
  private readonly ttl: number;
  private readonly clock: Clock;

  constructor(options: InMemoryIdempotencyStoreOptions = {}) {
    this.ttl = options.ttl ?? DEFAULT_IDEMPOTENCY_TTL;
    this.clock = options.clock ?? systemClock;
  }

  async reserve(key: string, fingerprint: string): Promise<Reservation> {
    for (;;) {
      const entry = this.liveEntry(key);

      if (entry === undefined) {
        this.entries.set(key, this.pendingEntry(fingerprint, this.clock.now()));
        return { status: 'fresh' };
      }

      if (entry.fingerprint !== fingerprint) {
        return { status: 'conflict', existingOutcome: entry.outcome };
      }

      switch (entry.state) {
        case 'pending':
          await entry.settled;
          continue;
        case 'committed':
          if (entry.outcome !== undefined) {
            return { status: 'duplicate', outcome: entry.outcome };
          }
          break;
        case 'open':
          break;
      }

      this.entries.set(key, this.pendingEntry(fingerprint, entry.createdAt));
      return { status: 'fresh' };
    }
  }

  async commit(key: string, outcome: DispatchOutcome): Promise<void> {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return;
    }
    entry.state = 'committed';
    entry.outcome = outcome;
    this.settle(entry);
  }

  async release(key: string): Promise<void> {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return;
    }
    this.entries.delete(key);
    this.settle(entry);
  }

  async abandon(key: string): Promise<void> {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return;
    }
    entry.state = 'open';
    this.settle(entry);
  }

  async expire(): Promise<number> {
    const now = this.clock.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.state !== 'pending' && this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Number of keys currently tracked
   */
  get size(): number {
    return this.entries.size;
  }

  private liveEntry(key: string): StoreEntry | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (entry.state !== 'pending' && this.isExpired(entry, this.clock.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private isExpired(entry: StoreEntry, now: number): boolean {
    return now - entry.createdAt >= this.ttl;
  }

  private pendingEntry(fingerprint: string, createdAt: number): StoreEntry {
    const entry: StoreEntry = { fingerprint, state: 'pending', createdAt };
    entry.settled = new Promise<void>((resolve) => {
      entry.settle = resolve;
    });
    return entry;
  }

  private settle(entry: StoreEntry): void {
    entry.settle?.();
    entry.settle = undefined;
    entry.settled = undefined;
  }
}

/**
 * Creates an in-memory idempotency store
 */
export function createIdempotencyStore(
  options?: InMemoryIdempotencyStoreOptions
): IdempotencyStore {
  return new InMemoryIdempotencyStore(options);
}
