/**
 * Email request and resource types as per the provider's emails API
 */

/**
 * One address or an ordered list of addresses.
 * Addresses are `user@example.com` or `Display Name <user@example.com>`.
 */
export type AddressList = string | string[];

/**
 * File attached to a single send
 */
export interface Attachment {
  filename: string;
  /**
   * Base64-encoded string or raw bytes
   */
  content?: string | Uint8Array;
  /**
   * URL the provider fetches the attachment from
   */
  path?: string;
  content_type?: string;
}

/**
 * Email send request
 */
export interface EmailRequest {
  from: string;
  to: AddressList;
  subject: string;
  html?: string;
  text?: string;
  cc?: AddressList;
  bcc?: AddressList;
  reply_to?: AddressList;
  /**
   * Not allowed inside a batch
   */
  attachments?: Attachment[];
  /**
   * ISO-8601 timestamp or natural language ("in 1 hour"). Not allowed inside a batch.
   */
  scheduled_at?: string;
  tags?: Record<string, string>;
  headers?: Record<string, string>;
}

/**
 * Tag as sent on the wire
 */
export interface WireTag {
  name: string;
  value: string;
}

/**
 * Request body for POST /emails and the elements of POST /emails/batch
 */
export interface WireEmail {
  from: string;
  to: string[];
  subject: string;
  html?: string;
  text?: string;
  cc?: string[];
  bcc?: string[];
  reply_to?: string[];
  attachments?: Array<{
    filename: string;
    content?: string;
    path?: string;
    content_type?: string;
  }>;
  scheduled_at?: string;
  tags?: WireTag[];
  headers?: Record<string, string>;
}

/**
 * Response of POST /emails
 */
export interface CreateEmailResponse {
  id: string;
}

/**
 * Response of POST /emails/batch
 */
export interface CreateBatchResponse {
  data: CreateEmailResponse[];
}

/**
 * Last known delivery status of an email
 */
export type EmailStatus =
  | 'scheduled'
  | 'queued'
  | 'sent'
  | 'delivered'
  | 'delivery_delayed'
  | 'bounced'
  | 'complained'
  | 'opened'
  | 'clicked'
  | 'canceled'
  | 'failed';

/**
 * Email resource returned by GET /emails/:id and GET /emails
 */
export interface Email {
  object: 'email';
  id: string;
  from: string;
  to: string[];
  subject: string;
  created_at: string;
  html?: string | null;
  text?: string | null;
  cc?: string[] | null;
  bcc?: string[] | null;
  reply_to?: string[] | null;
  scheduled_at?: string | null;
  last_event?: EmailStatus;
  tags?: WireTag[];
}

/**
 * Query parameters for GET /emails
 */
export interface ListEmailsParams {
  limit?: number;
  cursor?: string;
}

/**
 * Page returned by GET /emails
 */
export interface EmailPage {
  data: Email[];
  cursor?: string;
}

/**
 * Request body for PATCH /emails/:id
 */
export interface UpdateEmailRequest {
  scheduled_at: string;
}

/**
 * Response of PATCH /emails/:id and POST /emails/:id/cancel
 */
export interface EmailMutationResponse {
  object: 'email';
  id: string;
}

/**
 * Per-call options
 */
export interface RequestOptions {
  /**
   * Timeout of each network attempt in milliseconds
   */
  timeout?: number;
  /**
   * Aborts the call; accepted sends are never undone
   */
  signal?: AbortSignal;
}

/**
 * Options for a single send
 */
export interface SendOptions extends RequestOptions {
  idempotencyKey?: string;
}

/**
 * Options for a batch send
 */
export interface SendBatchOptions extends SendOptions {
  /**
   * Maximum number of chunks in flight
   */
  concurrency?: number;
}
