import { ResendError } from './error.js';
import type { Violation } from '../types/validation.js';

/**
 * Error thrown when the client is misconfigured
 */
export class ConfigurationError extends ResendError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'configuration_error',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error raised when a request fails validation, either locally or at the provider
 */
export class ValidationError extends ResendError {
  readonly violations: Violation[];

  constructor(
    message: string,
    violations: Violation[] = [],
    status?: number,
    requestId?: string,
    details?: Record<string, unknown>
  ) {
    super({
      type: 'validation_error',
      message,
      status,
      isRetryable: false,
      requestId,
      details,
    });
    this.name = 'ValidationError';
    this.violations = violations;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), violations: this.violations };
  }
}

/**
 * Error returned when the provider understood the request but refused its content (422)
 */
export class UnprocessableEntityError extends ValidationError {
  constructor(
    message: string,
    violations: Violation[] = [],
    requestId?: string,
    details?: Record<string, unknown>
  ) {
    super(message, violations, 422, requestId, details);
    this.name = 'UnprocessableEntityError';
  }
}

/**
 * Error thrown when authentication fails (missing or invalid API key)
 */
export class AuthenticationError extends ResendError {
  constructor(message: string, requestId?: string, details?: Record<string, unknown>) {
    super({
      type: 'authentication_error',
      message,
      status: 401,
      isRetryable: false,
      requestId,
      details,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when the API key lacks access to the resource or sender domain
 */
export class PermissionError extends ResendError {
  constructor(message: string, requestId?: string, details?: Record<string, unknown>) {
    super({
      type: 'permission_error',
      message,
      status: 403,
      isRetryable: false,
      requestId,
      details,
    });
    this.name = 'PermissionError';
  }
}

/**
 * Error thrown when a requested resource is not found
 */
export class NotFoundError extends ResendError {
  constructor(message: string, resourceId?: string, requestId?: string) {
    super({
      type: 'not_found_error',
      message,
      status: 404,
      isRetryable: false,
      requestId,
      details: { resourceId },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when an idempotency key is reused with a different payload
 */
export class ConflictError extends ResendError {
  constructor(message: string, idempotencyKey?: string, requestId?: string) {
    super({
      type: 'conflict_error',
      message,
      status: 409,
      isRetryable: false,
      requestId,
      details: { idempotencyKey },
    });
    this.name = 'ConflictError';
  }
}

/**
 * Error thrown when rate limits are exceeded
 */
export class RateLimitError extends ResendError {
  constructor(message: string, retryAfter?: number, requestId?: string) {
    super({
      type: 'rate_limit_error',
      message,
      status: 429,
      retryAfter,
      isRetryable: true,
      requestId,
    });
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when the API server returns a 5xx error
 */
export class ServerError extends ResendError {
  constructor(message: string, status: number, requestId?: string) {
    super({
      type: 'api_error',
      message,
      status,
      isRetryable: true,
      requestId,
    });
    this.name = 'ServerError';
  }
}

/**
 * Error thrown when network-level failures occur
 */
export class NetworkError extends ResendError {
  constructor(message: string, cause?: Error) {
    super({
      type: 'network_error',
      message,
      isRetryable: true,
      details: { cause: cause?.message },
    });
    this.name = 'NetworkError';
  }
}

/**
 * Error thrown when a request attempt times out
 */
export class TimeoutError extends ResendError {
  constructor(message: string, timeoutMs: number) {
    super({
      type: 'timeout_error',
      message,
      isRetryable: true,
      details: { timeoutMs },
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when a successful response does not have the documented shape
 */
export class UnexpectedResponseError extends ResendError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super({
      type: 'unexpected_response_error',
      message,
      status,
      isRetryable: false,
      details,
    });
    this.name = 'UnexpectedResponseError';
  }
}

/**
 * Retryable provider-side failures
 */
export type TransientProviderError = RateLimitError | ServerError | NetworkError | TimeoutError;

/**
 * Error thrown once the retry budget of an operation is spent
 */
export class ExhaustedRetriesError extends ResendError {
  readonly lastError: ResendError;
  readonly attempts: number;

  constructor(lastError: ResendError, attempts: number) {
    super({
      type: 'exhausted_retries_error',
      message: `Operation failed after ${attempts} attempt(s): ${lastError.message}`,
      status: lastError.status,
      isRetryable: false,
      requestId: lastError.requestId,
      details: { attempts, lastErrorType: lastError.type },
    });
    this.name = 'ExhaustedRetriesError';
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

/**
 * Error thrown when the caller aborts an operation
 */
export class CancelledError extends ResendError {
  constructor(message: string, attempted: boolean) {
    super({
      type: 'cancelled_error',
      message,
      isRetryable: false,
      details: { attempted },
    });
    this.name = 'CancelledError';
  }
}

/**
 * Reasons an inbound webhook delivery can fail verification
 */
export type VerificationFailureReason =
  | 'missing_secret'
  | 'missing_headers'
  | 'invalid_timestamp'
  | 'timestamp_out_of_tolerance'
  | 'invalid_signature_header'
  | 'signature_mismatch'
  | 'malformed_payload';

/**
 * Error raised when an inbound webhook delivery cannot be trusted
 */
export class VerificationError extends ResendError {
  readonly reason: VerificationFailureReason;

  /**
   * Whether redelivering the same bytes can never succeed
   */
  readonly permanent: boolean;

  constructor(
    reason: VerificationFailureReason,
    message: string,
    details?: Record<string, unknown>
  ) {
    super({
      type: 'verification_error',
      message,
      status: reason === 'malformed_payload' ? 400 : 401,
      isRetryable: false,
      details,
    });
    this.name = 'VerificationError';
    this.reason = reason;
    this.permanent = reason === 'malformed_payload';
  }
}

/**
 * Error raised when one or more webhook handlers fail for an event
 */
export class WebhookProcessingError extends ResendError {
  readonly eventId: string;

  constructor(message: string, eventId: string, details?: Record<string, unknown>) {
    super({
      type: 'webhook_processing_error',
      message,
      status: 500,
      isRetryable: true,
      details: { eventId, ...details },
    });
    this.name = 'WebhookProcessingError';
    this.eventId = eventId;
  }
}
