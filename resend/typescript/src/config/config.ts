/**
 * Client configuration
 */
import { ConfigurationError } from '../errors/categories.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  MAX_ALLOWED_RETRIES,
} from '../resilience/retry.js';
import { DEFAULT_IDEMPOTENCY_TTL, type IdempotencyStore } from '../idempotency/store.js';
import type { ReplayCache } from '../webhooks/replay-cache.js';

/**
 * What to answer when a correctly signed delivery carries an unusable payload.
 * `reject` makes the provider redeliver; `drop` acknowledges and logs it.
 */
export type MalformedPayloadPolicy = 'reject' | 'drop';

export const DEFAULT_BASE_URL = 'https://api.resend.com';
export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_BATCH_CONCURRENCY = 2;
export const MAX_BATCH_CONCURRENCY = 10;
export const DEFAULT_WEBHOOK_TOLERANCE = 300; // 5 minutes in seconds
export const DEFAULT_REPLAY_RETENTION = 48 * 60 * 60 * 1000;
/**
 * The provider redelivers for roughly a day; a shorter retention would let
 * late redeliveries through as fresh events
 */
export const MIN_REPLAY_RETENTION = 24 * 60 * 60 * 1000;
export const DEFAULT_USER_AGENT = 'resend-dispatch-typescript/0.1.0';

/**
 * Client configuration interface
 */
export interface ResendConfig {
  /**
   * API key (re_...)
   */
  apiKey: string;

  /**
   * Webhook signing secret (whsec_...). Several secrets may be given while
   * a rotation is in progress; a delivery verifies against any of them.
   */
  webhookSecret?: string | string[];

  /**
   * Base URL for the API
   * @default 'https://api.resend.com'
   */
  baseUrl?: string;

  /**
   * Timeout of each network attempt in milliseconds
   * @default 30000
   */
  timeout?: number;

  /**
   * Retries after the initial attempt
   * @default 3
   */
  maxRetries?: number;

  /**
   * Delay before the first retry in milliseconds
   * @default 1000
   */
  baseDelayMs?: number;

  /**
   * Upper bound for a single backoff delay
   * @default 60000
   */
  maxDelayMs?: number;

  /**
   * Honour Retry-After on 429 responses
   * @default false
   */
  respectRetryAfter?: boolean;

  /**
   * Chunks of one batch send in flight at a time
   * @default 2
   */
  batchConcurrency?: number;

  /**
   * Webhook timestamp tolerance in seconds
   * @default 300 (5 minutes)
   */
  webhookTolerance?: number;

  /**
   * How long verified webhook ids are remembered, in milliseconds
   * @default 172800000 (48 hours)
   */
  replayRetention?: number;

  /**
   * Lifetime of idempotency keys in milliseconds
   * @default 86400000 (24 hours)
   */
  idempotencyTtl?: number;

  /**
   * @default 'reject'
   */
  malformedPayloadPolicy?: MalformedPayloadPolicy;

  /**
   * Custom headers to include in all requests
   */
  headers?: Record<string, string>;

  userAgent?: string;

  logger?: Logger;

  /**
   * Custom fetch implementation
   */
  fetch?: typeof fetch;

  clock?: Clock;

  /**
   * Shared idempotency store; defaults to a process-local one
   */
  idempotencyStore?: IdempotencyStore;

  /**
   * Shared replay cache; defaults to a process-local one
   */
  replayCache?: ReplayCache;
}

/**
 * Normalized configuration with all defaults applied
 */
export interface NormalizedResendConfig {
  apiKey: string;
  webhookSecrets: string[];
  baseUrl: string;
  timeout: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  respectRetryAfter: boolean;
  batchConcurrency: number;
  webhookTolerance: number;
  replayRetention: number;
  idempotencyTtl: number;
  malformedPayloadPolicy: MalformedPayloadPolicy;
  headers: Record<string, string>;
  userAgent: string;
  logger: Logger;
  fetch: typeof fetch;
  clock: Clock;
  idempotencyStore?: IdempotencyStore;
  replayCache?: ReplayCache;
}

function requireNonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number`, { [name]: value });
  }
  return value;
}

function requireIntegerInRange(name: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}`, {
      [name]: value,
    });
  }
  return value;
}

/**
 * Validates and normalizes the client configuration
 */
export function validateConfig(config: ResendConfig): NormalizedResendConfig {
  if (typeof config.apiKey !== 'string' || config.apiKey.trim().length === 0) {
    throw new ConfigurationError('API key is required and must be a non-empty string');
  }

  const apiKey = config.apiKey.trim();
  if (!apiKey.startsWith('re_')) {
    throw new ConfigurationError('Invalid API key format. Expected format: re_*');
  }

  const baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
  if (!baseUrl.startsWith('http://') && !baseUrl.startsWith('https://')) {
    throw new ConfigurationError('Base URL must start with http:// or https://');
  }

  const webhookSecrets = (
    typeof config.webhookSecret === 'string' ? [config.webhookSecret] : config.webhookSecret ?? []
  )
    .map((secret) => secret.trim())
    .filter((secret) => secret.length > 0);

  const replayRetention = requireNonNegative(
    'replayRetention',
    config.replayRetention ?? DEFAULT_REPLAY_RETENTION
  );
  if (replayRetention < MIN_REPLAY_RETENTION) {
    throw new ConfigurationError(
      `replayRetention must be at least ${MIN_REPLAY_RETENTION}ms to cover provider redeliveries`
    );
  }

  const baseDelayMs = requireNonNegative('baseDelayMs', config.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
  const maxDelayMs = requireNonNegative('maxDelayMs', config.maxDelayMs ?? DEFAULT_MAX_DELAY_MS);
  if (maxDelayMs < baseDelayMs) {
    throw new ConfigurationError('maxDelayMs must not be smaller than baseDelayMs');
  }

  return {
    apiKey,
    webhookSecrets,
    baseUrl,
    timeout: requireNonNegative('timeout', config.timeout ?? DEFAULT_TIMEOUT),
    maxRetries: requireIntegerInRange(
      'maxRetries',
      config.maxRetries ?? DEFAULT_MAX_RETRIES,
      0,
      MAX_ALLOWED_RETRIES
    ),
    baseDelayMs,
    maxDelayMs,
    respectRetryAfter: config.respectRetryAfter ?? false,
    batchConcurrency: requireIntegerInRange(
      'batchConcurrency',
      config.batchConcurrency ?? DEFAULT_BATCH_CONCURRENCY,
      1,
      MAX_BATCH_CONCURRENCY
    ),
    webhookTolerance: requireNonNegative(
      'webhookTolerance',
      config.webhookTolerance ?? DEFAULT_WEBHOOK_TOLERANCE
    ),
    replayRetention,
    idempotencyTtl: requireNonNegative('idempotencyTtl', config.idempotencyTtl ?? DEFAULT_IDEMPOTENCY_TTL),
    malformedPayloadPolicy: config.malformedPayloadPolicy ?? 'reject',
    headers: config.headers ?? {},
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    logger: config.logger ?? new NoopLogger(),
    fetch: config.fetch ?? globalThis.fetch,
    clock: config.clock ?? systemClock,
    idempotencyStore: config.idempotencyStore,
    replayCache: config.replayCache,
  };
}

function parseIntEnv(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number`, { [name]: raw });
  }
  return value;
}

/**
 * Creates a client config from environment variables
 */
export function createConfigFromEnv(
  overrides?: Partial<ResendConfig>,
  env: NodeJS.ProcessEnv = process.env
): ResendConfig {
  const apiKey = env.RESEND_API_KEY;

  if (!apiKey) {
    throw new ConfigurationError('RESEND_API_KEY environment variable is not set');
  }

  const secrets = env.RESEND_WEBHOOK_SECRET?.split(/\s+/).filter((s) => s.length > 0);

  return {
    apiKey,
    webhookSecret: secrets,
    baseUrl: env.RESEND_BASE_URL || undefined,
    timeout: parseIntEnv('RESEND_TIMEOUT', env),
    maxRetries: parseIntEnv('RESEND_MAX_RETRIES', env),
    batchConcurrency: parseIntEnv('RESEND_BATCH_CONCURRENCY', env),
    webhookTolerance: parseIntEnv('RESEND_WEBHOOK_TOLERANCE', env),
    ...overrides,
  };
}
