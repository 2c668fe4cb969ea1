/**
 * Dispatch outcome types
 */
import type { UnexpectedResponseError } from '../errors/categories.js';
import type { ResendError } from '../errors/error.js';
import type { Violation } from './validation.js';

/**
 * The provider accepted the request; one id per email in submission order
 */
export interface AcceptedOutcome {
  kind: 'accepted';
  ids: string[];
}

/**
 * The request itself is wrong, locally or according to the provider
 */
export interface ValidationRejectedOutcome {
  kind: 'validation_rejected';
  reason: string;
  violations: Violation[];
  status?: number;
}

/**
 * The idempotency key was already used with a different payload
 */
export interface ConflictOutcome {
  kind: 'conflict';
  reason: string;
  existingOutcome?: DispatchOutcome;
}

/**
 * A retryable failure on an operation that was allowed no retries
 */
export interface TransientFailureOutcome {
  kind: 'transient_failure';
  statusCode?: number;
  error: ResendError;
}

/**
 * Every permitted attempt failed with a retryable error
 */
export interface ExhaustedOutcome {
  kind: 'exhausted';
  lastError: ResendError;
  attempts: number;
}

/**
 * The provider answered 2xx with a body that could not be read. The email
 * may have been accepted, so the same payload may be re-sent under the same
 * key and the provider deduplicates it.
 */
export interface UnexpectedResponseOutcome {
  kind: 'unexpected_response';
  reason: string;
  error: UnexpectedResponseError;
}

/**
 * Dispatch of a batch chunk threw outside the provider call, e.g. in the
 * idempotency store
 */
export interface ChunkErrorOutcome {
  kind: 'chunk_error';
  reason: string;
  error: Error;
}

/**
 * The caller aborted before the operation reached a terminal state
 */
export interface CancelledOutcome {
  kind: 'cancelled';
  /**
   * Whether any network attempt was made
   */
  attempted: boolean;
}

export type DispatchOutcome =
  | AcceptedOutcome
  | ValidationRejectedOutcome
  | ConflictOutcome
  | TransientFailureOutcome
  | ExhaustedOutcome
  | UnexpectedResponseOutcome
  | ChunkErrorOutcome
  | CancelledOutcome;

export type DispatchOutcomeKind = DispatchOutcome['kind'];

/**
 * Outcome of one chunk of a batch, with the original index range it covers
 */
export interface ChunkReport {
  index: number;
  /**
   * First original index covered by the chunk
   */
  startIndex: number;
  /**
   * One past the last original index covered by the chunk
   */
  endIndex: number;
  idempotencyKey?: string;
  outcome: DispatchOutcome;
}

export type BatchStatus = 'accepted' | 'partial' | 'failed' | 'rejected' | 'cancelled';

/**
 * Aggregated result of a batch send
 */
export interface BatchDispatchResult {
  status: BatchStatus;
  /**
   * One report per chunk, in chunk order
   */
  chunks: ChunkReport[];
  /**
   * Provider ids in original order; present only when every chunk was accepted
   */
  ids?: string[];
  /**
   * Original index ranges `[start, end)` that were not accepted
   */
  failedRanges: Array<{ start: number; end: number }>;
  /**
   * Set when the whole batch was rejected before any network call
   */
  rejection?: ValidationRejectedOutcome;
}
