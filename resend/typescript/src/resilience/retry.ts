/**
 * Retry scheduling with exponential backoff
 */
import { ResendError } from '../errors/error.js';
import { CancelledError, ConflictError, ExhaustedRetriesError } from '../errors/categories.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { systemClock, type Clock } from './clock.js';

export const DEFAULT_MAX_RETRIES = 3;
export const MAX_ALLOWED_RETRIES = 10;
export const DEFAULT_BASE_DELAY_MS = 1000;
export const DEFAULT_MAX_DELAY_MS = 60000;

/**
 * Retry policy
 */
export interface RetryPolicy {
  /**
   * Retries after the initial attempt
   */
  maxRetries: number;
  /**
   * Delay before the first retry; doubles for every further retry
   */
  baseDelayMs: number;
  maxDelayMs: number;
  /**
   * Wait at least as long as a 429 response's Retry-After header asks
   */
  respectRetryAfter: boolean;
}

/**
 * Default retry policy
 */
export function createDefaultRetryPolicy(): RetryPolicy {
  return {
    maxRetries: DEFAULT_MAX_RETRIES,
    baseDelayMs: DEFAULT_BASE_DELAY_MS,
    maxDelayMs: DEFAULT_MAX_DELAY_MS,
    respectRetryAfter: false,
  };
}

/**
 * States an execution moves through
 */
export type RetryState =
  | { state: 'attempting'; attempt: number }
  | { state: 'waiting'; retry: number; delayMs: number; until: number; error: ResendError }
  | { state: 'succeeded'; attempts: number }
  | { state: 'rejected'; attempts: number; error: ResendError }
  | { state: 'conflict'; attempts: number; error: ConflictError }
  | { state: 'exhausted'; attempts: number; error: ResendError }
  | { state: 'cancelled'; attempts: number };

/**
 * Terminal result of an execution
 */
export type RetryOutcome<T> =
  | { status: 'succeeded'; value: T; attempts: number }
  | { status: 'rejected'; error: ResendError; attempts: number }
  | { status: 'conflict'; error: ConflictError; attempts: number }
  | { status: 'exhausted'; error: ResendError; attempts: number }
  | { status: 'cancelled'; attempts: number };

/**
 * How a failed attempt is treated
 */
export type ErrorClass = 'rejected' | 'conflict' | 'retryable' | 'cancelled';

/**
 * Per-execution options
 */
export interface ExecuteOptions {
  signal?: AbortSignal;
  onStateChange?: (state: RetryState) => void;
  /**
   * Name used in log lines
   */
  operation?: string;
}

/**
 * A single idempotent network call; receives the 1-based attempt number
 */
export type RetryableOperation<T> = (attempt: number) => Promise<T>;

/**
 * Classifies a provider error.
 *
 * 400/401/403/404/422 are rejections, 409 is a conflict, and
 * 429/5xx/network/timeout failures are retryable.
 */
export function classifyError(error: ResendError): ErrorClass {
  if (error instanceof CancelledError) return 'cancelled';
  if (error instanceof ConflictError) return 'conflict';
  if (error.isRetryable) return 'retryable';
  return 'rejected';
}

/**
 * Executes operations under a retry policy
 */
export class RetryScheduler {
  private readonly policy: RetryPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(policy: Partial<RetryPolicy> = {}, clock: Clock = systemClock, logger: Logger = new NoopLogger()) {
    this.policy = { ...createDefaultRetryPolicy(), ...policy };
    this.clock = clock;
    this.logger = logger;
  }

  /**
   * Delay before retry `retry` (1-based): `baseDelayMs * 2^(retry - 1)`, capped
   */
  delayFor(retry: number, error?: ResendError): number {
    const exponential = this.policy.baseDelayMs * Math.pow(2, retry - 1);
    let delay = Math.min(exponential, this.policy.maxDelayMs);

    if (this.policy.respectRetryAfter && error?.retryAfter !== undefined) {
      delay = Math.max(delay, error.retryAfter * 1000);
    }

    return delay;
  }

  /**
   * Runs the operation until it succeeds, fails terminally, runs out of
   * retries or is cancelled. Errors that are not provider errors propagate.
   */
  async execute<T>(operation: RetryableOperation<T>, options: ExecuteOptions = {}): Promise<RetryOutcome<T>> {
    const { signal, onStateChange } = options;
    const name = options.operation ?? 'operation';
    const emit = (state: RetryState): void => onStateChange?.(state);

    let attempts = 0;

    for (;;) {
      if (signal?.aborted) {
        emit({ state: 'cancelled', attempts });
        return { status: 'cancelled', attempts };
      }

      attempts++;
      emit({ state: 'attempting', attempt: attempts });

      let error: ResendError;
      try {
        const value = await operation(attempts);
        emit({ state: 'succeeded', attempts });
        return { status: 'succeeded', value, attempts };
      } catch (caught) {
        if (!(caught instanceof ResendError)) {
          throw caught;
        }
        error = caught;
      }

      if (error instanceof CancelledError) {
        emit({ state: 'cancelled', attempts });
        return { status: 'cancelled', attempts };
      }

      if (error instanceof ConflictError) {
        emit({ state: 'conflict', attempts, error });
        return { status: 'conflict', error, attempts };
      }

      if (classifyError(error) === 'rejected') {
        this.logger.debug('Request rejected', { operation: name, attempts, status: error.status });
        emit({ state: 'rejected', attempts, error });
        return { status: 'rejected', error, attempts };
      }

      const retry = attempts;
      if (retry > this.policy.maxRetries) {
        this.logger.warn('Retries exhausted', {
          operation: name,
          attempts,
          errorType: error.type,
          status: error.status,
        });
        emit({ state: 'exhausted', attempts, error });
        return { status: 'exhausted', error, attempts };
      }

      const delayMs = this.delayFor(retry, error);
      this.logger.info('Retrying after transient failure', {
        operation: name,
        retry,
        delayMs,
        errorType: error.type,
        status: error.status,
      });
      emit({ state: 'waiting', retry, delayMs, until: this.clock.now() + delayMs, error });
      await this.clock.sleep(delayMs, signal);
    }
  }

  /**
   * Like `execute`, but returns the value or throws a typed error
   */
  async run<T>(operation: RetryableOperation<T>, options: ExecuteOptions = {}): Promise<T> {
    const outcome = await this.execute(operation, options);

    switch (outcome.status) {
      case 'succeeded':
        return outcome.value;
      case 'rejected':
      case 'conflict':
        throw outcome.error;
      case 'exhausted':
        throw new ExhaustedRetriesError(outcome.error, outcome.attempts);
      case 'cancelled':
        throw new CancelledError(
          `${options.operation ?? 'Operation'} was cancelled`,
          outcome.attempts > 0
        );
    }
  }

  getPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }
}
