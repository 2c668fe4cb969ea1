/**
 * Tests for webhook payload parsing
 */

import { describe, it, expect } from 'vitest';
import { parseWebhookPayload, WEBHOOK_EVENT_TYPES } from '../payload.js';
import { VerificationError } from '../../errors/categories.js';
import { BOUNCED_PAYLOAD } from './fixtures.js';

function parseError(raw: string): unknown {
  try {
    parseWebhookPayload(raw);
    return undefined;
  } catch (error) {
    return error;
  }
}

describe('parseWebhookPayload', () => {
  it('should parse a known event with its data', () => {
    const event = parseWebhookPayload(BOUNCED_PAYLOAD);

    expect(event.type).toBe('email.bounced');
    expect(event).toMatchObject({
      data: { email_id: 'email-2', to: ['gone@example.com'], bounce: { type: 'Permanent' } },
    });
  });

  it('should reject invalid JSON', () => {
    const error = parseError('{not json');

    expect(error).toBeInstanceOf(VerificationError);
    expect(error).toMatchObject({ reason: 'malformed_payload', permanent: true });
  });

  it('should reject an envelope without a type', () => {
    expect(parseError(JSON.stringify({ created_at: 'x', data: {} }))).toMatchObject({
      reason: 'malformed_payload',
    });
  });

  it('should reject a known type with missing fields', () => {
    const error = parseError(
      JSON.stringify({ type: 'contact.created', created_at: 'x', data: { id: 'c-1' } })
    );

    expect(error).toMatchObject({ reason: 'malformed_payload', details: { eventType: 'contact.created' } });
  });

  it('should know the email, domain and contact events', () => {
    expect(WEBHOOK_EVENT_TYPES.has('email.delivery_delayed')).toBe(true);
    expect(WEBHOOK_EVENT_TYPES.has('domain.updated')).toBe(true);
    expect(WEBHOOK_EVENT_TYPES.has('contact.deleted')).toBe(true);
    expect(WEBHOOK_EVENT_TYPES.size).toBe(15);
  });
});
