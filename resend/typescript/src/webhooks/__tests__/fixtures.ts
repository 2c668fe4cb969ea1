/**
 * Shared webhook test fixtures
 */
import { signPayload } from '../signature.js';
import { TEST_WEBHOOK_SECRET } from '../../__mocks__/index.js';
import type { WebhookHeaders } from '../../types/webhook.js';

export const DELIVERED_PAYLOAD = JSON.stringify({
  type: 'email.delivered',
  created_at: '2024-05-01T12:00:00.000Z',
  data: {
    email_id: 'email-1',
    from: 'Acme <hello@example.com>',
    to: ['user@example.com'],
    subject: 'Hello',
    created_at: '2024-05-01T11:59:00.000Z',
  },
});

export const BOUNCED_PAYLOAD = JSON.stringify({
  type: 'email.bounced',
  created_at: '2024-05-01T12:00:00.000Z',
  data: {
    email_id: 'email-2',
    from: 'Acme <hello@example.com>',
    to: ['gone@example.com'],
    subject: 'Hello',
    created_at: '2024-05-01T11:59:00.000Z',
    bounce: { message: 'Mailbox does not exist', type: 'Permanent', subType: 'General' },
  },
});

/**
 * Signs a payload and returns the headers in their parsed form
 */
export function signedHeaders(
  payload: string,
  timestampSeconds: number,
  id: string = 'msg_1',
  secret: string = TEST_WEBHOOK_SECRET
): WebhookHeaders {
  const headers = signPayload({ id, payload, secret, timestamp: timestampSeconds });
  return {
    id: headers['svix-id'],
    timestamp: headers['svix-timestamp'],
    signature: headers['svix-signature'],
  };
}
