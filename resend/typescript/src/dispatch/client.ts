/**
 * Email dispatch: validation, chunking, idempotent reservation and retried
 * submission of single and batch sends
 */
import { chunkBatch, countChunks, reassembleIds, type BatchChunk } from '../batch/chunker.js';
import { Semaphore } from '../batch/semaphore.js';
import { UnexpectedResponseError, ValidationError } from '../errors/categories.js';
import { fingerprint } from '../idempotency/fingerprint.js';
import { logError, NoopLogger, type Logger } from '../observability/logging.js';
import {
  CreateBatchResponseSchema,
  CreateEmailResponseSchema,
  parseResponse,
} from '../services/emails/schemas.js';
import { RequestValidator } from '../validation/validator.js';
import { toWireEmail } from './wire.js';
import type { IdempotencyStore } from '../idempotency/store.js';
import type { RetryOutcome, RetryScheduler } from '../resilience/retry.js';
import type { HttpTransport } from '../transport/http.js';
import type {
  EmailRequest,
  SendBatchOptions,
  SendOptions,
  WireEmail,
} from '../types/email.js';
import type {
  BatchDispatchResult,
  BatchStatus,
  ChunkReport,
  DispatchOutcome,
  ValidationRejectedOutcome,
} from '../types/outcome.js';
import type { ValidationResult } from '../types/validation.js';

export const DEFAULT_DISPATCH_CONCURRENCY = 2;

/**
 * Dependencies of the dispatch client
 */
export interface DispatchClientOptions {
  transport: HttpTransport;
  store: IdempotencyStore;
  scheduler: RetryScheduler;
  validator?: RequestValidator;
  logger?: Logger;
  /**
   * Chunks in flight per batch when the call does not say otherwise
   */
  concurrency?: number;
}

/**
 * One submission to the API
 */
interface Submission {
  path: string;
  body: WireEmail | WireEmail[];
  idempotencyKey?: string;
  operation: string;
  parseIds(data: unknown): string[];
}

/**
 * Terminal outcomes are stored against their key; the rest leave the key
 * open for a same-payload retry
 */
function isSettled(outcome: DispatchOutcome): boolean {
  return (
    outcome.kind === 'accepted' ||
    outcome.kind === 'validation_rejected' ||
    outcome.kind === 'conflict'
  );
}

function rejectedFromValidation(result: ValidationResult, reason: string): ValidationRejectedOutcome {
  return { kind: 'validation_rejected', reason, violations: result.violations };
}

/**
 * Dispatches single and batch sends
 */
export class DispatchClient {
  private readonly transport: HttpTransport;
  private readonly store: IdempotencyStore;
  private readonly scheduler: RetryScheduler;
  private readonly validator: RequestValidator;
  private readonly logger: Logger;
  private readonly concurrency: number;

  constructor(options: DispatchClientOptions) {
    this.transport = options.transport;
    this.store = options.store;
    this.scheduler = options.scheduler;
    this.validator = options.validator ?? new RequestValidator();
    this.logger = options.logger ?? new NoopLogger();
    this.concurrency = options.concurrency ?? DEFAULT_DISPATCH_CONCURRENCY;
  }

  /**
   * Sends one email
   *
   * @example
   * ```typescript
   * const outcome = await dispatcher.sendSingle(
   *   { from: 'Billing <billing@example.com>', to: 'user@example.com', subject: 'Receipt', text: '...' },
   *   { idempotencyKey: buildIdempotencyKey('receipt', order.id) }
   * );
   * if (outcome.kind === 'accepted') console.log(outcome.ids[0]);
   * ```
   */
  async sendSingle(request: EmailRequest, options: SendOptions = {}): Promise<DispatchOutcome> {
    const validation = this.validator.validateEmail(request, 'single');
    if (!validation.valid) {
      return rejectedFromValidation(validation, 'Email request is invalid');
    }

    if (options.idempotencyKey !== undefined) {
      const keyValidation = this.validator.validateIdempotencyKey(options.idempotencyKey);
      if (!keyValidation.valid) {
        return rejectedFromValidation(keyValidation, 'Idempotency key is invalid');
      }
    }

    return this.submit(
      {
        path: '/emails',
        body: toWireEmail(request),
        idempotencyKey: options.idempotencyKey,
        operation: 'emails.send',
        parseIds: (data) => [parseResponse(CreateEmailResponseSchema, data, 'emails.send').id],
      },
      options
    );
  }

  /**
   * Sends a batch, split into chunks of at most 100 emails.
   *
   * The whole batch is validated before anything is sent. Each chunk is
   * atomic at the provider; across chunks there is no atomicity, so the
   * result reports every chunk with the original index range it covers.
   */
  async sendBatch(batch: EmailRequest[], options: SendBatchOptions = {}): Promise<BatchDispatchResult> {
    const validation = this.validator.validateBatch(batch, { allowChunking: true });
    if (!validation.valid) {
      return this.rejectBatch(batch, rejectedFromValidation(validation, 'Batch contains invalid emails'));
    }

    const key = options.idempotencyKey;
    if (key !== undefined) {
      const keyValidation = this.validator.validateIdempotencyKey(key, {
        chunkCount: countChunks(batch.length),
      });
      if (!keyValidation.valid) {
        return this.rejectBatch(batch, rejectedFromValidation(keyValidation, 'Idempotency key is invalid'));
      }
    }

    const chunks = chunkBatch(batch, key);
    const semaphore = new Semaphore(options.concurrency ?? this.concurrency);

    this.logger.debug('Dispatching batch', {
      emails: batch.length,
      chunks: chunks.length,
      idempotencyKey: key,
    });

    // A chunk that throws is reported as failed; its siblings still run
    const reports = await Promise.all(
      chunks.map((chunk) =>
        semaphore
          .withPermit(() => this.dispatchChunk(chunk, options))
          .catch((reason: unknown) => this.failedChunk(chunk, reason))
      )
    );

    const result = this.aggregate(chunks, reports);
    const level = result.status === 'accepted' ? 'info' : 'warn';
    this.logger[level]('Batch dispatch finished', {
      status: result.status,
      chunks: chunks.length,
      failedRanges: result.failedRanges,
    });
    return result;
  }

  private failedChunk(chunk: BatchChunk<EmailRequest>, reason: unknown): ChunkReport {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logError(this.logger, error, `emails.batch[${chunk.index}]`);
    return {
      index: chunk.index,
      startIndex: chunk.startIndex,
      endIndex: chunk.endIndex,
      idempotencyKey: chunk.idempotencyKey,
      outcome: { kind: 'chunk_error', reason: error.message, error },
    };
  }

  private async dispatchChunk(
    chunk: BatchChunk<EmailRequest>,
    options: SendBatchOptions
  ): Promise<ChunkReport> {
    const expected = chunk.requests.length;
    const operation = `emails.batch[${chunk.index}]`;

    const outcome = await this.submit(
      {
        path: '/emails/batch',
        body: chunk.requests.map(toWireEmail),
        idempotencyKey: chunk.idempotencyKey,
        operation,
        parseIds: (data) => {
          const ids = parseResponse(CreateBatchResponseSchema, data, operation).data.map((e) => e.id);
          if (ids.length !== expected) {
            throw new UnexpectedResponseError(
              `${operation} returned ${ids.length} ids for ${expected} emails`,
              200
            );
          }
          return ids;
        },
      },
      options
    );

    return {
      index: chunk.index,
      startIndex: chunk.startIndex,
      endIndex: chunk.endIndex,
      idempotencyKey: chunk.idempotencyKey,
      outcome,
    };
  }

  /**
   * Reserves the key, runs the submission under the retry policy and
   * records the outcome
   */
  private async submit(submission: Submission, options: SendOptions): Promise<DispatchOutcome> {
    const key = submission.idempotencyKey;

    if (options.signal?.aborted) {
      return { kind: 'cancelled', attempted: false };
    }

    if (key === undefined) {
      const { outcome } = await this.attempt(submission, options);
      return outcome;
    }

    const reservation = await this.store.reserve(key, fingerprint(submission.body));
    switch (reservation.status) {
      case 'duplicate':
        this.logger.debug('Returning stored outcome for idempotency key', {
          idempotencyKey: key,
          kind: reservation.outcome.kind,
        });
        return reservation.outcome;

      case 'conflict':
        this.logger.warn('Idempotency key reused with a different payload', { idempotencyKey: key });
        return {
          kind: 'conflict',
          reason: `Idempotency key "${key}" was already used with a different payload`,
          existingOutcome: reservation.existingOutcome,
        };

      case 'fresh':
        break;
    }

    let result: { outcome: DispatchOutcome; attempts: number };
    try {
      result = await this.attempt(submission, options);
    } catch (error) {
      await this.store.abandon(key);
      throw error;
    }

    if (isSettled(result.outcome)) {
      await this.store.commit(key, result.outcome);
    } else if (result.attempts === 0) {
      await this.store.release(key);
    } else {
      await this.store.abandon(key);
    }

    return result.outcome;
  }

  private async attempt(
    submission: Submission,
    options: SendOptions
  ): Promise<{ outcome: DispatchOutcome; attempts: number }> {
    const retryOutcome = await this.scheduler.execute(
      async () => {
        const data = await this.transport.post(submission.path, submission.body, {
          idempotencyKey: submission.idempotencyKey,
          signal: options.signal,
          timeout: options.timeout,
        });
        return submission.parseIds(data);
      },
      { signal: options.signal, operation: submission.operation }
    );

    return { outcome: this.toDispatchOutcome(retryOutcome), attempts: retryOutcome.attempts };
  }

  private toDispatchOutcome(outcome: RetryOutcome<string[]>): DispatchOutcome {
    switch (outcome.status) {
      case 'succeeded':
        return { kind: 'accepted', ids: outcome.value };

      case 'rejected':
        if (outcome.error instanceof UnexpectedResponseError) {
          return { kind: 'unexpected_response', reason: outcome.error.message, error: outcome.error };
        }
        return {
          kind: 'validation_rejected',
          reason: outcome.error.message,
          violations: outcome.error instanceof ValidationError ? outcome.error.violations : [],
          status: outcome.error.status,
        };

      case 'conflict':
        return { kind: 'conflict', reason: outcome.error.message };

      case 'exhausted':
        if (outcome.attempts === 1) {
          return { kind: 'transient_failure', statusCode: outcome.error.status, error: outcome.error };
        }
        return { kind: 'exhausted', lastError: outcome.error, attempts: outcome.attempts };

      case 'cancelled':
        return { kind: 'cancelled', attempted: outcome.attempts > 0 };
    }
  }

  private rejectBatch(batch: EmailRequest[], rejection: ValidationRejectedOutcome): BatchDispatchResult {
    this.logger.debug('Batch rejected before dispatch', { violations: rejection.violations.length });
    return {
      status: 'rejected',
      chunks: [],
      failedRanges: [{ start: 0, end: batch.length }],
      rejection,
    };
  }

  private aggregate(
    chunks: BatchChunk<EmailRequest>[],
    reports: ChunkReport[]
  ): BatchDispatchResult {
    const outcomes = reports.map((report) => report.outcome);
    const failed = reports.filter((report) => report.outcome.kind !== 'accepted');

    let status: BatchStatus;
    if (failed.length === 0) {
      status = 'accepted';
    } else if (failed.length < reports.length) {
      status = 'partial';
    } else if (failed.every((report) => report.outcome.kind === 'cancelled')) {
      status = 'cancelled';
    } else {
      status = 'failed';
    }

    return {
      status,
      chunks: reports,
      ids: reassembleIds(chunks, outcomes),
      failedRanges: failed.map((report) => ({ start: report.startIndex, end: report.endIndex })),
    };
  }
}
