import { describe, it, expect } from 'vitest';
import { ResendError } from '../error.js';
import { RateLimitError, ValidationError } from '../categories.js';

describe('ResendError', () => {
  it('should serialize its fields', () => {
    const error = new RateLimitError('Too many requests', 2, 'req-1');

    expect(error.toJSON()).toMatchObject({
      name: 'RateLimitError',
      message: 'Too many requests',
      status: 429,
      retryAfter: 2,
      isRetryable: true,
      requestId: 'req-1',
    });
  });

  it('should keep the first request context it is given', () => {
    const error = new ResendError({ type: 'api_error', message: 'failed', isRetryable: false });

    error
      .withRequest({ method: 'POST', path: '/emails/batch', idempotencyKey: 'digest/1/chunk-0' })
      .withRequest({ method: 'GET', path: '/emails' });

    expect(error.requestContext).toEqual({
      method: 'POST',
      path: '/emails/batch',
      idempotencyKey: 'digest/1/chunk-0',
    });
    expect(error.toJSON().request).toEqual(error.requestContext);
  });

  it('should include violations for validation errors', () => {
    const error = new ValidationError('Invalid', [{ field: 'to', message: 'Required' }]);

    expect(error.toJSON()).toMatchObject({ violations: [{ field: 'to', message: 'Required' }] });
  });
});
