/**
 * Webhook event payloads
 */
import { z } from 'zod';
import { VerificationError } from '../errors/categories.js';

const EmailEventDataSchema = z.object({
  email_id: z.string(),
  from: z.string(),
  to: z.array(z.string()),
  subject: z.string(),
  created_at: z.string(),
  bounce: z
    .object({
      message: z.string(),
      type: z.string(),
      subType: z.string().optional(),
    })
    .optional(),
  click: z
    .object({
      link: z.string(),
      timestamp: z.string(),
      ipAddress: z.string().optional(),
      userAgent: z.string().optional(),
    })
    .optional(),
  failed: z.object({ reason: z.string() }).optional(),
  tags: z.record(z.string()).optional(),
});

const DomainEventDataSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.string(),
  created_at: z.string(),
  region: z.string().optional(),
});

const ContactEventDataSchema = z.object({
  id: z.string(),
  audience_id: z.string(),
  email: z.string(),
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  unsubscribed: z.boolean(),
  created_at: z.string(),
  updated_at: z.string().optional(),
});

function emailEvent<T extends string>(type: T) {
  return z.object({ type: z.literal(type), created_at: z.string(), data: EmailEventDataSchema });
}

function domainEvent<T extends string>(type: T) {
  return z.object({ type: z.literal(type), created_at: z.string(), data: DomainEventDataSchema });
}

function contactEvent<T extends string>(type: T) {
  return z.object({ type: z.literal(type), created_at: z.string(), data: ContactEventDataSchema });
}

export const KnownWebhookEventSchema = z.discriminatedUnion('type', [
  emailEvent('email.sent'),
  emailEvent('email.scheduled'),
  emailEvent('email.delivered'),
  emailEvent('email.delivery_delayed'),
  emailEvent('email.complained'),
  emailEvent('email.bounced'),
  emailEvent('email.opened'),
  emailEvent('email.clicked'),
  emailEvent('email.failed'),
  domainEvent('domain.created'),
  domainEvent('domain.updated'),
  domainEvent('domain.deleted'),
  contactEvent('contact.created'),
  contactEvent('contact.updated'),
  contactEvent('contact.deleted'),
]);

const EnvelopeSchema = z.object({
  type: z.string().min(1),
  created_at: z.string(),
  data: z.record(z.unknown()),
});

export type EmailEventData = z.infer<typeof EmailEventDataSchema>;
export type DomainEventData = z.infer<typeof DomainEventDataSchema>;
export type ContactEventData = z.infer<typeof ContactEventDataSchema>;

export type KnownWebhookEvent = z.infer<typeof KnownWebhookEventSchema>;
export type WebhookEventType = KnownWebhookEvent['type'];

/**
 * Well-formed event of a type this library does not model
 */
export interface UnrecognizedWebhookEvent {
  type: 'unrecognized';
  rawType: string;
  created_at: string;
  data: Record<string, unknown>;
}

export type WebhookEvent = KnownWebhookEvent | UnrecognizedWebhookEvent;

export type WebhookEventOf<K extends WebhookEventType> = Extract<KnownWebhookEvent, { type: K }>;

export const WEBHOOK_EVENT_TYPES: ReadonlySet<string> = new Set<string>(
  KnownWebhookEventSchema.options.map((option) => option.shape.type.value)
);

export function isEventOf<K extends WebhookEventType>(
  event: WebhookEvent,
  type: K
): event is WebhookEventOf<K> {
  return event.type === type;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

/**
 * Parses a verified payload.
 *
 * Known event types must match their schema; other types are returned as
 * `unrecognized` so new provider events do not fail deliveries.
 *
 * @throws {VerificationError} with reason `malformed_payload`
 */
export function parseWebhookPayload(raw: string): WebhookEvent {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new VerificationError('malformed_payload', 'Webhook payload is not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new VerificationError(
      'malformed_payload',
      `Webhook payload has an invalid envelope: ${describeIssues(envelope.error)}`
    );
  }

  if (!WEBHOOK_EVENT_TYPES.has(envelope.data.type)) {
    return {
      type: 'unrecognized',
      rawType: envelope.data.type,
      created_at: envelope.data.created_at,
      data: envelope.data.data,
    };
  }

  const known = KnownWebhookEventSchema.safeParse(json);
  if (!known.success) {
    throw new VerificationError(
      'malformed_payload',
      `Webhook payload does not match ${envelope.data.type}: ${describeIssues(known.error)}`,
      { eventType: envelope.data.type }
    );
  }
  return known.data;
}
