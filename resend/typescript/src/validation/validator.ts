/**
 * Client-side request validation
 *
 * The provider fails a whole batch when any element is invalid, so every
 * request is checked here before a network call is made. Checks run in
 * stages; the first stage that finds a problem ends validation of that
 * request.
 */
import { isValidAddress, toAddressArray } from './addresses.js';
import { deriveChunkKey, MAX_IDEMPOTENCY_KEY_LENGTH } from '../idempotency/keys.js';
import type { EmailRequest } from '../types/email.js';
import type { ValidationContext, ValidationResult, Violation } from '../types/validation.js';

export const MAX_RECIPIENTS = 50;
export const MAX_BATCH_SIZE = 100;
export const MAX_TAG_LENGTH = 256;

const TAG_PATTERN = /^[A-Za-z0-9_-]+$/;

const RECIPIENT_FIELDS = ['to', 'cc', 'bcc', 'reply_to'] as const;

/**
 * Options for batch validation
 */
export interface BatchValidationOptions {
  /**
   * Accept more than one chunk worth of emails; the client splits them
   */
  allowChunking?: boolean;
}

/**
 * Options for idempotency key validation
 */
export interface KeyValidationOptions {
  /**
   * Number of chunks the key will be derived for
   */
  chunkCount?: number;
}

type Stage = (request: EmailRequest, context: ValidationContext) => Violation[];

function result(violations: Violation[]): ValidationResult {
  return { valid: violations.length === 0, violations };
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

/**
 * Validates email requests, batches and idempotency keys
 */
export class RequestValidator {
  private readonly stages: Stage[] = [
    (request) => this.checkRequired(request),
    (request) => this.checkCardinality(request),
    (request) => this.checkAddresses(request),
    (request, context) => this.checkContext(request, context),
    (request) => this.checkTags(request),
  ];

  /**
   * Validates one email request
   */
  validateEmail(request: EmailRequest, context: ValidationContext = 'single'): ValidationResult {
    for (const stage of this.stages) {
      const violations = stage(request, context);
      if (violations.length > 0) {
        return result(violations);
      }
    }
    return result([]);
  }

  /**
   * Validates every element of a batch, then the batch size
   */
  validateBatch(batch: EmailRequest[], options: BatchValidationOptions = {}): ValidationResult {
    if (batch.length === 0) {
      return result([{ field: 'batch', message: 'Batch must contain at least one email' }]);
    }

    const violations: Violation[] = [];
    batch.forEach((request, index) => {
      for (const violation of this.validateEmail(request, 'batch').violations) {
        violations.push({ ...violation, index });
      }
    });
    if (violations.length > 0) {
      return result(violations);
    }

    if (!options.allowChunking && batch.length > MAX_BATCH_SIZE) {
      return result([
        {
          field: 'batch',
          message: `Batch contains ${batch.length} emails; at most ${MAX_BATCH_SIZE} are allowed`,
        },
      ]);
    }

    return result([]);
  }

  /**
   * Validates an idempotency key and the chunk keys derived from it
   */
  validateIdempotencyKey(key: string, options: KeyValidationOptions = {}): ValidationResult {
    if (key.length === 0) {
      return result([{ field: 'idempotencyKey', message: 'Idempotency key must not be empty' }]);
    }
    if (key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      return result([
        {
          field: 'idempotencyKey',
          message: `Idempotency key must be at most ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
        },
      ]);
    }

    const chunkCount = options.chunkCount ?? 1;
    if (chunkCount > 1) {
      const longest = deriveChunkKey(key, chunkCount - 1);
      if (longest.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
        return result([
          {
            field: 'idempotencyKey',
            message: `Derived chunk key "${longest}" exceeds ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
          },
        ]);
      }
    }

    return result([]);
  }

  private checkRequired(request: EmailRequest): Violation[] {
    const violations: Violation[] = [];

    if (isBlank(request.from)) {
      violations.push({ field: 'from', message: 'Sender address is required' });
    }
    if (toAddressArray(request.to).length === 0) {
      violations.push({ field: 'to', message: 'At least one recipient is required' });
    }
    if (isBlank(request.subject)) {
      violations.push({ field: 'subject', message: 'Subject must not be empty' });
    }
    if (isBlank(request.html) && isBlank(request.text)) {
      violations.push({ field: 'body', message: 'Either html or text content is required' });
    }

    return violations;
  }

  private checkCardinality(request: EmailRequest): Violation[] {
    const violations: Violation[] = [];

    for (const field of RECIPIENT_FIELDS) {
      const count = toAddressArray(request[field]).length;
      if (count > MAX_RECIPIENTS) {
        violations.push({
          field,
          message: `${count} addresses given; at most ${MAX_RECIPIENTS} are allowed`,
        });
      }
    }

    return violations;
  }

  private checkAddresses(request: EmailRequest): Violation[] {
    const violations: Violation[] = [];

    if (!isValidAddress(request.from)) {
      violations.push({ field: 'from', message: `Invalid address "${request.from}"` });
    }

    for (const field of RECIPIENT_FIELDS) {
      toAddressArray(request[field]).forEach((address, position) => {
        if (!isValidAddress(address)) {
          violations.push({
            field: `${field}[${position}]`,
            message: `Invalid address "${address}"`,
          });
        }
      });
    }

    return violations;
  }

  private checkContext(request: EmailRequest, context: ValidationContext): Violation[] {
    if (context === 'batch') {
      const violations: Violation[] = [];
      if (request.attachments !== undefined) {
        violations.push({ field: 'attachments', message: 'Attachments are not supported in batch sends' });
      }
      if (request.scheduled_at !== undefined) {
        violations.push({ field: 'scheduled_at', message: 'Scheduling is not supported in batch sends' });
      }
      return violations;
    }

    const violations: Violation[] = [];

    request.attachments?.forEach((attachment, position) => {
      const field = `attachments[${position}]`;
      if (isBlank(attachment.filename)) {
        violations.push({ field: `${field}.filename`, message: 'Attachment filename is required' });
      }
      const hasContent = attachment.content !== undefined;
      const hasPath = attachment.path !== undefined;
      if (hasContent === hasPath) {
        violations.push({ field, message: 'Attachment needs exactly one of content or path' });
      }
    });

    if (request.scheduled_at !== undefined && isBlank(request.scheduled_at)) {
      violations.push({ field: 'scheduled_at', message: 'scheduled_at must not be empty' });
    }

    return violations;
  }

  private checkTags(request: EmailRequest): Violation[] {
    const violations: Violation[] = [];

    for (const [name, value] of Object.entries(request.tags ?? {})) {
      if (!TAG_PATTERN.test(name) || name.length > MAX_TAG_LENGTH) {
        violations.push({
          field: `tags.${name}`,
          message: 'Tag names may only contain ASCII letters, numbers, underscores or dashes',
        });
      }
      if (!TAG_PATTERN.test(value) || value.length > MAX_TAG_LENGTH) {
        violations.push({
          field: `tags.${name}`,
          message: 'Tag values may only contain ASCII letters, numbers, underscores or dashes',
        });
      }
    }

    return violations;
  }
}

/**
 * Creates a request validator
 */
export function createRequestValidator(): RequestValidator {
  return new RequestValidator();
}
