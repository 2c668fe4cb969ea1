/**
 * Webhook signature scheme
 *
 * Deliveries are signed with HMAC-SHA256 over `${id}.${timestamp}.${body}`,
 * keyed with the base64 part of a `whsec_` secret. The signature header
 * carries space-separated `v1,<base64>` candidates.
 */
import { createHmac, timingSafeEqual } from 'crypto';
import { VerificationError } from '../errors/categories.js';

/**
 * Signature scheme version this library verifies
 */
export const EXPECTED_SCHEME = 'v1';

const SECRET_PREFIX = 'whsec_';

export interface SignatureCandidate {
  version: string;
  signature: string;
}

/**
 * Parses the signature header into candidates of the supported version
 */
export function parseSignatureHeader(header: string): SignatureCandidate[] {
  const candidates: SignatureCandidate[] = [];

  for (const part of header.trim().split(/\s+/)) {
    const separator = part.indexOf(',');
    if (separator <= 0) {
      continue;
    }
    const version = part.slice(0, separator);
    const signature = part.slice(separator + 1);
    if (version === EXPECTED_SCHEME && signature.length > 0) {
      candidates.push({ version, signature });
    }
  }

  if (candidates.length === 0) {
    throw new VerificationError(
      'invalid_signature_header',
      `No ${EXPECTED_SCHEME} signatures found in header`
    );
  }

  return candidates;
}

/**
 * Decodes a signing secret into its HMAC key
 */
export function decodeSecret(secret: string): Buffer {
  const encoded = secret.startsWith(SECRET_PREFIX) ? secret.slice(SECRET_PREFIX.length) : secret;
  const key = Buffer.from(encoded, 'base64');

  if (key.length === 0) {
    throw new VerificationError('missing_secret', 'Webhook secret is empty or not base64');
  }

  return key;
}

/**
 * Computes the base64 signature of a delivery
 */
export function computeSignature(
  id: string,
  timestamp: number | string,
  payload: string | Buffer,
  key: Buffer
): string {
  return createHmac('sha256', key)
    .update(`${id}.${timestamp}.`, 'utf8')
    .update(typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload)
    .digest('base64');
}

/**
 * Compares two base64 signatures in constant time
 */
export function secureCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'base64');
  const bufB = Buffer.from(b, 'base64');

  if (bufA.length === 0 || bufA.length !== bufB.length) {
    return false;
  }

  return timingSafeEqual(bufA, bufB);
}

export interface SignPayloadInput {
  id: string;
  payload: string | Buffer;
  secret: string;
  /**
   * Seconds since the epoch; defaults to now
   */
  timestamp?: number;
}

/**
 * Produces the headers of a correctly signed delivery, for tests and local tooling
 */
export function signPayload(input: SignPayloadInput): Record<string, string> {
  const timestamp = input.timestamp ?? Math.floor(Date.now() / 1000);
  const signature = computeSignature(input.id, timestamp, input.payload, decodeSecret(input.secret));

  return {
    'svix-id': input.id,
    'svix-timestamp': String(timestamp),
    'svix-signature': `${EXPECTED_SCHEME},${signature}`,
  };
}
