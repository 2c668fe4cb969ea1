/**
 * Tests for configuration
 */

import { describe, it, expect } from 'vitest';
import {
  createConfigFromEnv,
  validateConfig,
  DEFAULT_BASE_URL,
  DEFAULT_REPLAY_RETENTION,
} from '../config.js';
import { ConfigurationError } from '../../errors/categories.js';
import { TEST_API_KEY, TEST_WEBHOOK_SECRET } from '../../__mocks__/index.js';

describe('validateConfig', () => {
  it('should apply defaults', () => {
    const config = validateConfig({ apiKey: TEST_API_KEY });

    expect(config).toMatchObject({
      apiKey: TEST_API_KEY,
      webhookSecrets: [],
      baseUrl: DEFAULT_BASE_URL,
      timeout: 30000,
      maxRetries: 3,
      baseDelayMs: 1000,
      maxDelayMs: 60000,
      respectRetryAfter: false,
      batchConcurrency: 2,
      webhookTolerance: 300,
      replayRetention: DEFAULT_REPLAY_RETENTION,
      idempotencyTtl: 24 * 60 * 60 * 1000,
      malformedPayloadPolicy: 'reject',
      headers: {},
    });
  });

  it('should reject a missing or malformed API key', () => {
    expect(() => validateConfig({ apiKey: '' })).toThrow(ConfigurationError);
    expect(() => validateConfig({ apiKey: 'sk_test_123' })).toThrow('Invalid API key format');
  });

  it('should normalize webhook secrets to a list', () => {
    expect(validateConfig({ apiKey: TEST_API_KEY, webhookSecret: TEST_WEBHOOK_SECRET }).webhookSecrets).toEqual([
      TEST_WEBHOOK_SECRET,
    ]);
    expect(
      validateConfig({ apiKey: TEST_API_KEY, webhookSecret: [' whsec_a ', '', 'whsec_b'] }).webhookSecrets
    ).toEqual(['whsec_a', 'whsec_b']);
  });

  it('should strip a trailing slash from the base URL', () => {
    expect(validateConfig({ apiKey: TEST_API_KEY, baseUrl: 'https://api.resend.test/' }).baseUrl).toBe(
      'https://api.resend.test'
    );
  });

  it('should reject a base URL without a scheme', () => {
    expect(() => validateConfig({ apiKey: TEST_API_KEY, baseUrl: 'api.resend.test' })).toThrow(ConfigurationError);
  });

  it.each([
    [{ maxRetries: 11 }],
    [{ maxRetries: 1.5 }],
    [{ batchConcurrency: 0 }],
    [{ batchConcurrency: 11 }],
    [{ timeout: -1 }],
    [{ replayRetention: 60 * 60 * 1000 }],
    [{ baseDelayMs: 5000, maxDelayMs: 1000 }],
  ])('should reject %o', (overrides) => {
    expect(() => validateConfig({ apiKey: TEST_API_KEY, ...overrides })).toThrow(ConfigurationError);
  });
});

describe('createConfigFromEnv', () => {
  it('should read every supported variable', () => {
    const config = createConfigFromEnv(undefined, {
      RESEND_API_KEY: TEST_API_KEY,
      RESEND_WEBHOOK_SECRET: 'whsec_a whsec_b',
      RESEND_BASE_URL: 'https://api.resend.test',
      RESEND_TIMEOUT: '10000',
      RESEND_MAX_RETRIES: '5',
      RESEND_BATCH_CONCURRENCY: '4',
      RESEND_WEBHOOK_TOLERANCE: '120',
    });

    expect(config).toEqual({
      apiKey: TEST_API_KEY,
      webhookSecret: ['whsec_a', 'whsec_b'],
      baseUrl: 'https://api.resend.test',
      timeout: 10000,
      maxRetries: 5,
      batchConcurrency: 4,
      webhookTolerance: 120,
    });
  });

  it('should let overrides win', () => {
    const config = createConfigFromEnv({ maxRetries: 0 }, { RESEND_API_KEY: TEST_API_KEY, RESEND_MAX_RETRIES: '5' });

    expect(config.maxRetries).toBe(0);
  });

  it('should require the API key', () => {
    expect(() => createConfigFromEnv(undefined, {})).toThrow('RESEND_API_KEY environment variable is not set');
  });

  it('should reject non-numeric values', () => {
    expect(() => createConfigFromEnv(undefined, { RESEND_API_KEY: TEST_API_KEY, RESEND_TIMEOUT: 'soon' })).toThrow(
      ConfigurationError
    );
  });
});
