import type { ResendConfig } from '../config/config.js';
import type { EmailRequest } from '../types/email.js';

export * from './clock.mock.js';
export * from './fetch.mock.js';
export * from './http-transport.mock.js';
export * from './logger.mock.js';

export const TEST_API_KEY = 're_test_key_123456';
/**
 * `whsec_` followed by base64 of "test-secret"
 */
export const TEST_WEBHOOK_SECRET = 'whsec_dGVzdC1zZWNyZXQ=';

/**
 * Mock factory for creating test configurations
 */
export function mockConfig(overrides?: Partial<ResendConfig>): ResendConfig {
  return {
    apiKey: TEST_API_KEY,
    baseUrl: 'https://api.resend.test',
    timeout: 5000,
    maxRetries: 3,
    ...overrides,
  };
}

/**
 * Mock factory for a valid email request
 */
export function mockEmailRequest(overrides?: Partial<EmailRequest>): EmailRequest {
  return {
    from: 'Acme <hello@example.com>',
    to: 'user@example.com',
    subject: 'Hello',
    text: 'Hello there',
    ...overrides,
  };
}

/**
 * Mock factory for a batch of valid email requests, addressed user0..userN
 */
export function mockBatch(size: number): EmailRequest[] {
  return Array.from({ length: size }, (_, i) =>
    mockEmailRequest({ to: `user${i}@example.com`, subject: `Hello ${i}` })
  );
}
