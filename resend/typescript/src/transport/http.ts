/**
 * HTTP transport layer for the emails API
 */
import {
  AuthenticationError,
  CancelledError,
  ConflictError,
  NetworkError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  ServerError,
  TimeoutError,
  UnexpectedResponseError,
  UnprocessableEntityError,
  ValidationError,
} from '../errors/categories.js';
import { ResendError } from '../errors/error.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { AuthManager } from '../auth/auth-manager.js';

/**
 * Request options for HTTP calls
 */
export interface HttpRequestOptions {
  timeout?: number;
  headers?: Record<string, string>;
  idempotencyKey?: string;
  signal?: AbortSignal;
}

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

/**
 * HTTP transport interface. Responses are returned unparsed; callers check
 * their shape.
 */
export interface HttpTransport {
  post(path: string, body?: unknown, options?: HttpRequestOptions): Promise<unknown>;

  get(
    path: string,
    params?: Record<string, string | number | undefined>,
    options?: HttpRequestOptions
  ): Promise<unknown>;

  patch(path: string, body?: unknown, options?: HttpRequestOptions): Promise<unknown>;
}

/**
 * Error body returned by the API
 */
interface ApiErrorBody {
  name?: string;
  message?: string;
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  return typeof value === 'object' && value !== null;
}

function readString(body: ApiErrorBody, key: keyof ApiErrorBody): string | undefined {
  const value: unknown = body[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Implementation of HttpTransport using the Fetch API
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly baseUrl: string;
  private readonly authManager: AuthManager;
  private readonly defaultTimeout: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(
    baseUrl: string,
    authManager: AuthManager,
    defaultTimeout: number,
    fetchImpl: typeof fetch = globalThis.fetch,
    logger: Logger = new NoopLogger()
  ) {
    this.baseUrl = baseUrl;
    this.authManager = authManager;
    this.defaultTimeout = defaultTimeout;
    this.fetchImpl = fetchImpl;
    this.logger = logger;
  }

  async post(path: string, body?: unknown, options?: HttpRequestOptions): Promise<unknown> {
    return this.request('POST', path, body, options);
  }

  async get(
    path: string,
    params?: Record<string, string | number | undefined>,
    options?: HttpRequestOptions
  ): Promise<unknown> {
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) {
        query.set(key, String(value));
      }
    }
    const queryString = query.toString();
    return this.request('GET', queryString ? `${path}?${queryString}` : path, undefined, options);
  }

  async patch(path: string, body?: unknown, options?: HttpRequestOptions): Promise<unknown> {
    return this.request('PATCH', path, body, options);
  }

  /**
   * Core request implementation
   */
  private async request(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options?: HttpRequestOptions
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const timeout = options?.timeout ?? this.defaultTimeout;
    const callerSignal = options?.signal;

    if (callerSignal?.aborted) {
      throw new CancelledError(`${method} ${path} was cancelled before it was sent`, false);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onCallerAbort = (): void => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const headers = this.authManager.getHeaders();
    if (options?.idempotencyKey) {
      headers['Idempotency-Key'] = options.idempotencyKey;
    }
    if (options?.headers) {
      Object.assign(headers, options.headers);
    }

    const startedAt = Date.now();
    this.logger.debug('Outgoing request', {
      method,
      path,
      idempotencyKey: options?.idempotencyKey,
    });

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      const requestId = response.headers.get('x-request-id') ?? undefined;
      const text = await response.text();

      this.logger.debug('Incoming response', {
        method,
        path,
        status: response.status,
        durationMs: Date.now() - startedAt,
      });

      if (!response.ok) {
        throw this.errorFromResponse(response, text, requestId);
      }

      if (text.length === 0) {
        return {};
      }

      try {
        return JSON.parse(text);
      } catch {
        throw new UnexpectedResponseError(
          `${method} ${path} returned a body that is not JSON`,
          response.status,
          { requestId }
        );
      }
    } catch (error) {
      const context = { method, path, idempotencyKey: options?.idempotencyKey };

      if (error instanceof ResendError) {
        throw error.withRequest(context);
      }

      if (timedOut) {
        throw new TimeoutError(`Request timeout after ${timeout}ms`, timeout).withRequest(context);
      }

      if (callerSignal?.aborted) {
        throw new CancelledError(`${method} ${path} was cancelled in flight`, true).withRequest(context);
      }

      throw new NetworkError(
        `Network request failed: ${method} ${path}`,
        error instanceof Error ? error : undefined
      ).withRequest(context);
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /**
   * Maps an error response to a typed error
   */
  private errorFromResponse(response: Response, text: string, requestId?: string): ResendError {
    const status = response.status;

    let parsed: unknown;
    try {
      parsed = text.length > 0 ? JSON.parse(text) : undefined;
    } catch {
      parsed = undefined;
    }

    const errorBody: ApiErrorBody = isApiErrorBody(parsed) ? parsed : {};
    const message = readString(errorBody, 'message') ?? `HTTP ${status} error`;
    const code = readString(errorBody, 'name');

    switch (status) {
      case 400:
        return new ValidationError(
          message,
          [{ field: code ?? 'request', message }],
          status,
          requestId,
          { code }
        );

      case 422:
        return new UnprocessableEntityError(
          message,
          [{ field: code ?? 'request', message }],
          requestId,
          { code }
        );

      case 401:
        return new AuthenticationError(message, requestId, { code });

      case 403:
        return new PermissionError(message, requestId, { code });

      case 404:
        return new NotFoundError(message, undefined, requestId);

      case 409:
        return new ConflictError(message, undefined, requestId);

      case 429: {
        const retryAfterHeader = response.headers.get('retry-after');
        const retryAfter = retryAfterHeader ? Number.parseInt(retryAfterHeader, 10) : undefined;
        return new RateLimitError(
          message,
          retryAfter !== undefined && Number.isFinite(retryAfter) ? retryAfter : undefined,
          requestId
        );
      }
    }

    if (status >= 500) {
      return new ServerError(message, status, requestId);
    }

    return new ValidationError(
      `Unexpected error: ${message}`,
      [{ field: 'request', message }],
      status,
      requestId,
      { code }
    );
  }
}

/**
 * Creates an HTTP transport instance
 */
export function createHttpTransport(
  baseUrl: string,
  authManager: AuthManager,
  defaultTimeout: number,
  fetchImpl?: typeof fetch,
  logger?: Logger
): HttpTransport {
  return new FetchHttpTransport(baseUrl, authManager, defaultTimeout, fetchImpl, logger);
}
