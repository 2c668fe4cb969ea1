/**
 * Tests for the client facade
 */

import { describe, it, expect } from 'vitest';
import { createClient, createClientFromEnv } from '../client.js';
import { ConfigurationError } from '../../errors/categories.js';
import { signPayload } from '../../webhooks/signature.js';
import {
  createFetchMock,
  createMockLogger,
  jsonResponse,
  mockBatch,
  mockConfig,
  mockEmailRequest,
  TEST_API_KEY,
  TEST_WEBHOOK_SECRET,
  VirtualClock,
} from '../../__mocks__/index.js';

describe('ResendClient', () => {
  it('should send an email over the configured fetch', async () => {
    const { fetch, requests } = createFetchMock(jsonResponse(200, { id: 'email-1' }));
    const client = createClient(mockConfig({ fetch }));

    const outcome = await client.emails.send(mockEmailRequest(), { idempotencyKey: 'welcome-user/123' });

    expect(outcome).toEqual({ kind: 'accepted', ids: ['email-1'] });
    expect(requests[0]).toMatchObject({ url: 'https://api.resend.test/emails', method: 'POST' });
    expect(requests[0]?.headers['idempotency-key']).toBe('welcome-user/123');
  });

  it('should retry a 503 on the virtual clock and then succeed', async () => {
    const clock = new VirtualClock();
    const { fetch } = createFetchMock(
      jsonResponse(503, { name: 'internal_server_error', message: 'Unavailable' }),
      jsonResponse(200, { data: [{ id: 'a' }, { id: 'b' }] })
    );
    const client = createClient(mockConfig({ fetch, clock }));

    const result = await client.emails.sendBatch(mockBatch(2));

    expect(result).toMatchObject({ status: 'accepted', ids: ['a', 'b'] });
    expect(clock.sleeps).toEqual([1000]);
  });

  it('should require a webhook secret for webhooks()', () => {
    const client = createClient(mockConfig());

    expect(() => client.webhooks()).toThrow(ConfigurationError);
  });

  it('should verify webhooks with the configured secret and clock', async () => {
    const clock = new VirtualClock();
    const client = createClient(mockConfig({ webhookSecret: TEST_WEBHOOK_SECRET, clock }));
    const payload = JSON.stringify({
      type: 'domain.updated',
      created_at: '2024-05-01T12:00:00.000Z',
      data: { id: 'd-1', name: 'example.com', status: 'verified', created_at: '2024-04-01T00:00:00.000Z' },
    });
    const seen: string[] = [];
    client.webhooks().on('domain.updated', (event) => {
      seen.push(event.data.status);
    });

    const response = await client.webhooks().handle(
      payload,
      signPayload({ id: 'msg_1', payload, secret: TEST_WEBHOOK_SECRET, timestamp: clock.now() / 1000 })
    );

    expect(response.status).toBe(200);
    expect(seen).toEqual(['verified']);
  });

  it('should return a frozen copy of the configuration', () => {
    const client = createClient(mockConfig({ webhookSecret: TEST_WEBHOOK_SECRET }));

    const config = client.getConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(config.webhookSecrets).toEqual([TEST_WEBHOOK_SECRET]);
    expect(config.apiKey).toBe(TEST_API_KEY);
  });

  it('should not log the API key', () => {
    const logger = createMockLogger();

    createClient(mockConfig({ logger }));

    expect(logger.debug).toHaveBeenCalledWith('Client initialized', {
      baseUrl: 'https://api.resend.test',
      apiKeyHint: 're_...3456',
      webhooks: false,
    });
  });

  it('should surface configuration errors at construction', () => {
    expect(() => createClient(mockConfig({ batchConcurrency: 20 }))).toThrow(ConfigurationError);
  });

  it('should build from the environment', () => {
    const previous = process.env.RESEND_API_KEY;
    process.env.RESEND_API_KEY = TEST_API_KEY;
    try {
      expect(createClientFromEnv().getConfig().apiKey).toBe(TEST_API_KEY);
    } finally {
      if (previous === undefined) {
        delete process.env.RESEND_API_KEY;
      } else {
        process.env.RESEND_API_KEY = previous;
      }
    }
  });
});
