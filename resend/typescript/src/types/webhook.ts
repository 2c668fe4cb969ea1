/**
 * Webhook types
 */
import type { VerificationError } from '../errors/categories.js';
import type { WebhookEvent } from '../webhooks/payload.js';

/**
 * Signature headers of one delivery; absent headers are undefined
 */
export interface WebhookHeaders {
  id?: string;
  timestamp?: string;
  signature?: string;
}

/**
 * Raw headers as Node's `IncomingHttpHeaders` or a plain record carry them
 */
export type RawHeaders = Record<string, string | string[] | undefined>;

/**
 * A delivery that passed signature and timestamp checks
 */
export interface VerifiedEvent {
  /**
   * Delivery id (`svix-id`), stable across redeliveries
   */
  id: string;
  /**
   * Signing time in seconds since the epoch
   */
  timestamp: number;
  /**
   * Local verification time in milliseconds since the epoch
   */
  receivedAt: number;
  event: WebhookEvent;
}

export type VerificationResult =
  | { ok: true; event: VerifiedEvent; duplicate: boolean }
  | { ok: false; error: VerificationError };
