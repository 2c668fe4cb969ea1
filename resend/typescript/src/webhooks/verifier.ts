/**
 * Webhook verification
 */
import { VerificationError } from '../errors/categories.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import { parseWebhookPayload } from './payload.js';
import { computeSignature, decodeSecret, parseSignatureHeader, secureCompare } from './signature.js';
import type { ReplayCache } from './replay-cache.js';
import type {
  RawHeaders,
  VerificationResult,
  VerifiedEvent,
  WebhookHeaders,
} from '../types/webhook.js';

export const DEFAULT_TOLERANCE_SECONDS = 300;

const HEADER_ID = 'svix-id';
const HEADER_TIMESTAMP = 'svix-timestamp';
const HEADER_SIGNATURE = 'svix-signature';

/**
 * Reads the signature headers from a Node-style header record or a fetch `Headers`
 */
export function extractWebhookHeaders(headers: RawHeaders | Headers): WebhookHeaders {
  if (headers instanceof Headers) {
    return {
      id: headers.get(HEADER_ID) ?? undefined,
      timestamp: headers.get(HEADER_TIMESTAMP) ?? undefined,
      signature: headers.get(HEADER_SIGNATURE) ?? undefined,
    };
  }

  const lowered = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    const first = Array.isArray(value) ? value[0] : value;
    if (first !== undefined) {
      lowered.set(name.toLowerCase(), first);
    }
  }

  return {
    id: lowered.get(HEADER_ID),
    timestamp: lowered.get(HEADER_TIMESTAMP),
    signature: lowered.get(HEADER_SIGNATURE),
  };
}

export interface WebhookVerifierOptions {
  /**
   * Accepted signing secrets; more than one during a rotation
   */
  secrets: string[];
  /**
   * Allowed distance between the signing time and now, in seconds
   * @default 300
   */
  tolerance?: number;
  /**
   * Without a cache every delivery is reported as new
   */
  replayCache?: ReplayCache;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Verifies signature, timestamp and payload of inbound deliveries
 */
export class WebhookVerifier {
  private readonly secrets: string[];
  private readonly tolerance: number;
  private readonly replayCache?: ReplayCache;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: WebhookVerifierOptions) {
    this.secrets = options.secrets;
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE_SECONDS;
    this.replayCache = options.replayCache;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Verifies one delivery against the raw request body.
   *
   * The body must be the exact bytes received; re-serialized JSON does not
   * verify. A `secret` argument replaces the configured secrets for this call.
   */
  async verify(
    rawPayload: string | Buffer,
    headers: WebhookHeaders,
    secret?: string | string[]
  ): Promise<VerificationResult> {
    let verified: VerifiedEvent;
    try {
      verified = this.check(rawPayload, headers, secret);
    } catch (error) {
      if (error instanceof VerificationError) {
        this.logger.warn('Webhook verification failed', {
          reason: error.reason,
          webhookId: headers.id,
        });
        return { ok: false, error };
      }
      throw error;
    }

    if (this.replayCache) {
      const existing = await this.replayCache.putIfAbsent(verified);
      if (existing) {
        this.logger.debug('Webhook delivery already seen', { webhookId: verified.id });
        return { ok: true, event: existing, duplicate: true };
      }
    }

    return { ok: true, event: verified, duplicate: false };
  }

  private check(
    rawPayload: string | Buffer,
    headers: WebhookHeaders,
    secret?: string | string[]
  ): VerifiedEvent {
    const secrets = secret === undefined ? this.secrets : typeof secret === 'string' ? [secret] : secret;
    if (secrets.length === 0) {
      throw new VerificationError('missing_secret', 'No webhook secret is configured');
    }
    const keys = this.decodeKeys(secrets);

    const { id, timestamp: rawTimestamp, signature } = headers;
    if (!id || !rawTimestamp || !signature) {
      throw new VerificationError('missing_headers', 'Missing webhook signature headers', {
        id: id !== undefined,
        timestamp: rawTimestamp !== undefined,
        signature: signature !== undefined,
      });
    }

    if (!/^\d+$/.test(rawTimestamp)) {
      throw new VerificationError('invalid_timestamp', 'Webhook timestamp is not a number of seconds');
    }
    const timestamp = Number.parseInt(rawTimestamp, 10);

    const now = Math.floor(this.clock.now() / 1000);
    const timeDiff = now - timestamp;
    if (Math.abs(timeDiff) > this.tolerance) {
      throw new VerificationError(
        'timestamp_out_of_tolerance',
        timeDiff > 0
          ? `Webhook was signed ${timeDiff} seconds ago, but tolerance is ${this.tolerance} seconds`
          : `Webhook timestamp is ${-timeDiff} seconds in the future`,
        { timestamp, now, tolerance: this.tolerance }
      );
    }

    const candidates = parseSignatureHeader(signature);
    const matched = keys.some((key) => {
      const expected = computeSignature(id, rawTimestamp, rawPayload, key);
      return candidates.some((candidate) => secureCompare(candidate.signature, expected));
    });

    if (!matched) {
      throw new VerificationError(
        'signature_mismatch',
        'Webhook signature does not match the expected value',
        { signatureCount: candidates.length }
      );
    }

    const text = typeof rawPayload === 'string' ? rawPayload : rawPayload.toString('utf8');
    const event = parseWebhookPayload(text);

    return { id, timestamp, receivedAt: this.clock.now(), event };
  }

  /**
   * Decodes every usable secret; unusable ones are skipped so a rotation
   * still verifies against the rest
   */
  private decodeKeys(secrets: string[]): Buffer[] {
    const keys: Buffer[] = [];
    secrets.forEach((secret, position) => {
      try {
        keys.push(decodeSecret(secret));
      } catch (error) {
        if (!(error instanceof VerificationError)) {
          throw error;
        }
        this.logger.warn('Skipping unusable webhook secret', { position });
      }
    });

    if (keys.length === 0) {
      throw new VerificationError('missing_secret', 'No usable webhook secret is configured');
    }
    return keys;
  }
}
