/**
 * resend-dispatch
 *
 * Transactional and batch email dispatch with idempotent retries and
 * verified webhook ingestion
 *
 * @example
 * ```typescript
 * import { createClient, buildIdempotencyKey } from 'resend-dispatch';
 *
 * const client = createClient({
 *   apiKey: process.env.RESEND_API_KEY ?? '',
 *   webhookSecret: process.env.RESEND_WEBHOOK_SECRET,
 * });
 *
 * const outcome = await client.emails.send(
 *   {
 *     from: 'Acme <hello@example.com>',
 *     to: 'user@example.com',
 *     subject: 'Welcome',
 *     html: '<p>Hi</p>',
 *   },
 *   { idempotencyKey: buildIdempotencyKey('welcome-user', '123') }
 * );
 * ```
 */

// Client exports
export {
  createClient,
  createClientFromEnv,
  ResendClientImpl,
  type ResendClient,
} from './client/index.js';

// Configuration exports
export {
  validateConfig,
  createConfigFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_BATCH_CONCURRENCY,
  MAX_BATCH_CONCURRENCY,
  DEFAULT_WEBHOOK_TOLERANCE,
  DEFAULT_REPLAY_RETENTION,
  MIN_REPLAY_RETENTION,
  DEFAULT_USER_AGENT,
  type ResendConfig,
  type NormalizedResendConfig,
  type MalformedPayloadPolicy,
} from './config/index.js';

// Error exports
export * from './errors/index.js';

// Observability exports
export * from './observability/index.js';

// Dispatch exports
export { DispatchClient, DEFAULT_DISPATCH_CONCURRENCY, type DispatchClientOptions } from './dispatch/client.js';
export { toWireEmail } from './dispatch/wire.js';
export { chunkBatch, countChunks, reassembleIds, DEFAULT_CHUNK_SIZE, type BatchChunk } from './batch/chunker.js';
export { Semaphore } from './batch/semaphore.js';
export {
  RequestValidator,
  createRequestValidator,
  MAX_RECIPIENTS,
  MAX_BATCH_SIZE,
  MAX_TAG_LENGTH,
  type BatchValidationOptions,
  type KeyValidationOptions,
} from './validation/validator.js';

// Idempotency exports
export {
  buildIdempotencyKey,
  buildBatchIdempotencyKey,
  deriveChunkKey,
  MAX_IDEMPOTENCY_KEY_LENGTH,
} from './idempotency/keys.js';
export { fingerprint } from './idempotency/fingerprint.js';
export {
  InMemoryIdempotencyStore,
  createIdempotencyStore,
  DEFAULT_IDEMPOTENCY_TTL,
  type IdempotencyStore,
  type InMemoryIdempotencyStoreOptions,
  type Reservation,
} from './idempotency/store.js';

// Resilience exports
export {
  RetryScheduler,
  classifyError,
  createDefaultRetryPolicy,
  DEFAULT_MAX_RETRIES,
  MAX_ALLOWED_RETRIES,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  type RetryPolicy,
  type RetryState,
  type RetryOutcome,
  type ExecuteOptions,
  type RetryableOperation,
} from './resilience/retry.js';
export { SystemClock, systemClock, type Clock } from './resilience/clock.js';

// Transport exports
export {
  FetchHttpTransport,
  createHttpTransport,
  type HttpTransport,
  type HttpRequestOptions,
} from './transport/http.js';
export { BearerAuthManager, createAuthManager, type AuthManager } from './auth/auth-manager.js';

// Service exports
export * from './services/emails/index.js';

// Webhook exports
export * from './webhooks/index.js';

// Type exports
export type * from './types/email.js';
export type * from './types/outcome.js';
export type * from './types/validation.js';
export type * from './types/webhook.js';
