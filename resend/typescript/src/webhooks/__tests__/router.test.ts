/**
 * Tests for EventRouter
 */

import { describe, it, expect, vi } from 'vitest';
import { EventRouter } from '../router.js';
import { parseWebhookPayload } from '../payload.js';
import { WebhookProcessingError } from '../../errors/categories.js';
import { BOUNCED_PAYLOAD, DELIVERED_PAYLOAD } from './fixtures.js';
import type { VerifiedEvent } from '../../types/webhook.js';

function delivery(payload: string, id: string = 'msg_1'): VerifiedEvent {
  return { id, timestamp: 1714564800, receivedAt: 1714564800000, event: parseWebhookPayload(payload) };
}

describe('EventRouter', () => {
  it('should route an event to the handler for its type', async () => {
    const router = new EventRouter();
    const bounced = vi.fn();
    const delivered = vi.fn();
    router.on('email.bounced', bounced).on('email.delivered', delivered);

    const result = await router.route(delivery(BOUNCED_PAYLOAD));

    expect(result).toEqual({ status: 'handled', type: 'email.bounced', handlers: 1 });
    expect(bounced).toHaveBeenCalledTimes(1);
    expect(delivered).not.toHaveBeenCalled();
  });

  it('should hand the handler the narrowed event', async () => {
    const router = new EventRouter();
    const reasons: string[] = [];
    router.on('email.bounced', (event) => {
      reasons.push(event.data.bounce?.message ?? 'none');
    });

    await router.route(delivery(BOUNCED_PAYLOAD));

    expect(reasons).toEqual(['Mailbox does not exist']);
  });

  it('should report no_handler for unhandled types', async () => {
    const router = new EventRouter();
    router.on('email.bounced', vi.fn());

    expect(await router.route(delivery(DELIVERED_PAYLOAD))).toEqual({
      status: 'no_handler',
      type: 'email.delivered',
      handlers: 0,
    });
  });

  it('should route unrecognized types by their raw type to wildcard handlers', async () => {
    const router = new EventRouter();
    const all = vi.fn();
    router.onAll(all);
    const payload = JSON.stringify({ type: 'email.received', created_at: '2024-05-01T12:00:00.000Z', data: {} });

    const result = await router.route(delivery(payload));

    expect(result).toEqual({ status: 'handled', type: 'email.received', handlers: 1 });
    expect(all).toHaveBeenCalledTimes(1);
  });

  it('should run every handler and report failures together', async () => {
    const router = new EventRouter();
    const second = vi.fn();
    router
      .on('email.delivered', () => {
        throw new Error('db down');
      })
      .on('email.delivered', second);

    const error = await router.route(delivery(DELIVERED_PAYLOAD, 'msg_7')).catch((e: unknown) => e);

    expect(second).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(WebhookProcessingError);
    expect(error).toMatchObject({
      eventId: 'msg_7',
      message: '1 handler(s) failed for event email.delivered',
    });
  });

  it('should list registered event types', () => {
    const router = new EventRouter();
    router.on('email.opened', vi.fn()).on('contact.created', vi.fn());

    expect(router.getRegisteredEventTypes()).toEqual(['email.opened', 'contact.created']);
  });
});
