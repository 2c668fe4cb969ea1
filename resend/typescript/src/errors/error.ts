/**
 * Base error class for email dispatch client errors
 */
export interface ResendErrorParams {
  type: string;
  message: string;
  status?: number;
  code?: string;
  retryAfter?: number;
  isRetryable: boolean;
  requestId?: string;
  details?: Record<string, unknown>;
}

/**
 * The API call an error came from
 */
export interface RequestContext {
  method: string;
  path: string;
  /**
   * Key the call was sent with; re-sending under it is deduplicated
   */
  idempotencyKey?: string;
}

/**
 * Base error class for all errors raised by the client
 */
export class ResendError extends Error {
  readonly type: string;
  readonly status?: number;
  readonly code?: string;
  readonly retryAfter?: number;
  readonly isRetryable: boolean;
  readonly requestId?: string;
  readonly details?: Record<string, unknown>;
  private context?: RequestContext;

  constructor(params: ResendErrorParams) {
    super(params.message);
    this.name = 'ResendError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.retryAfter = params.retryAfter;
    this.isRetryable = params.isRetryable;
    this.requestId = params.requestId;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ResendError);
    }
  }

  /**
   * The API call that failed, when the error came from the transport
   */
  get requestContext(): RequestContext | undefined {
    return this.context;
  }

  /**
   * Records the API call the error came from; the first call wins
   */
  withRequest(context: RequestContext): this {
    if (this.context === undefined) {
      this.context = context;
    }
    return this;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      retryAfter: this.retryAfter,
      isRetryable: this.isRetryable,
      requestId: this.requestId,
      details: this.details,
      request: this.context,
    };
  }
}
