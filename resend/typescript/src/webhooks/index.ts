export {
  EXPECTED_SCHEME,
  parseSignatureHeader,
  decodeSecret,
  computeSignature,
  secureCompare,
  signPayload,
  type SignatureCandidate,
  type SignPayloadInput,
} from './signature.js';

export {
  KnownWebhookEventSchema,
  WEBHOOK_EVENT_TYPES,
  isEventOf,
  parseWebhookPayload,
  type EmailEventData,
  type DomainEventData,
  type ContactEventData,
  type KnownWebhookEvent,
  type UnrecognizedWebhookEvent,
  type WebhookEvent,
  type WebhookEventOf,
  type WebhookEventType,
} from './payload.js';

export { InMemoryReplayCache, type ReplayCache, type InMemoryReplayCacheOptions } from './replay-cache.js';
export {
  WebhookVerifier,
  extractWebhookHeaders,
  DEFAULT_TOLERANCE_SECONDS,
  type WebhookVerifierOptions,
} from './verifier.js';
export { EventRouter, type RouteResult, type WebhookHandler } from './router.js';
export { WebhookService, type WebhookResponse, type WebhookServiceOptions } from './service.js';
