/**
 * Emails service implementation
 */
import {
  EmailMutationResponseSchema,
  EmailPageSchema,
  EmailSchema,
  parseResponse,
} from './schemas.js';
import type { DispatchClient } from '../../dispatch/client.js';
import type { RetryScheduler } from '../../resilience/retry.js';
import type { HttpRequestOptions, HttpTransport } from '../../transport/http.js';
import type {
  Email,
  EmailMutationResponse,
  EmailPage,
  EmailRequest,
  ListEmailsParams,
  RequestOptions,
  SendBatchOptions,
  SendOptions,
  UpdateEmailRequest,
} from '../../types/email.js';
import type { BatchDispatchResult, DispatchOutcome } from '../../types/outcome.js';

/**
 * Emails service interface
 */
export interface EmailsService {
  /**
   * Sends one email; failures are reported in the outcome, not thrown
   */
  send(request: EmailRequest, options?: SendOptions): Promise<DispatchOutcome>;

  /**
   * Sends any number of emails in chunks of up to 100
   */
  sendBatch(batch: EmailRequest[], options?: SendBatchOptions): Promise<BatchDispatchResult>;

  /**
   * Retrieves a sent or scheduled email
   */
  get(id: string, options?: RequestOptions): Promise<Email>;

  /**
   * Lists one page of emails
   */
  list(params?: ListEmailsParams, options?: RequestOptions): Promise<EmailPage>;

  /**
   * Iterates over every page, starting afresh on each iteration
   */
  listAll(params?: ListEmailsParams, options?: RequestOptions): AsyncIterable<Email[]>;

  /**
   * Reschedules a scheduled email
   */
  update(id: string, request: UpdateEmailRequest, options?: RequestOptions): Promise<EmailMutationResponse>;

  /**
   * Cancels a scheduled email
   */
  cancel(id: string, options?: RequestOptions): Promise<EmailMutationResponse>;
}

function toHttpOptions(options?: RequestOptions): HttpRequestOptions {
  return { timeout: options?.timeout, signal: options?.signal };
}

/**
 * Emails service implementation
 */
export class EmailsServiceImpl implements EmailsService {
  private readonly transport: HttpTransport;
  private readonly scheduler: RetryScheduler;
  private readonly dispatcher: DispatchClient;

  constructor(transport: HttpTransport, scheduler: RetryScheduler, dispatcher: DispatchClient) {
    this.transport = transport;
    this.scheduler = scheduler;
    this.dispatcher = dispatcher;
  }

  async send(request: EmailRequest, options?: SendOptions): Promise<DispatchOutcome> {
    return this.dispatcher.sendSingle(request, options);
  }

  async sendBatch(batch: EmailRequest[], options?: SendBatchOptions): Promise<BatchDispatchResult> {
    return this.dispatcher.sendBatch(batch, options);
  }

  async get(id: string, options?: RequestOptions): Promise<Email> {
    return this.scheduler.run(
      async () => {
        const data = await this.transport.get(`/emails/${encodeURIComponent(id)}`, undefined, toHttpOptions(options));
        return parseResponse(EmailSchema, data, 'emails.get');
      },
      { signal: options?.signal, operation: 'emails.get' }
    );
  }

  async list(params: ListEmailsParams = {}, options?: RequestOptions): Promise<EmailPage> {
    return this.scheduler.run(
      async () => {
        const data = await this.transport.get(
          '/emails',
          { limit: params.limit, cursor: params.cursor },
          toHttpOptions(options)
        );
        return parseResponse(EmailPageSchema, data, 'emails.list');
      },
      { signal: options?.signal, operation: 'emails.list' }
    );
  }

  listAll(params: ListEmailsParams = {}, options?: RequestOptions): AsyncIterable<Email[]> {
    return {
      [Symbol.asyncIterator]: () => this.pages(params, options),
    };
  }

  async update(
    id: string,
    request: UpdateEmailRequest,
    options?: RequestOptions
  ): Promise<EmailMutationResponse> {
    return this.scheduler.run(
      async () => {
        const data = await this.transport.patch(
          `/emails/${encodeURIComponent(id)}`,
          { scheduled_at: request.scheduled_at },
          toHttpOptions(options)
        );
        return parseResponse(EmailMutationResponseSchema, data, 'emails.update');
      },
      { signal: options?.signal, operation: 'emails.update' }
    );
  }

  async cancel(id: string, options?: RequestOptions): Promise<EmailMutationResponse> {
    return this.scheduler.run(
      async () => {
        const data = await this.transport.post(
          `/emails/${encodeURIComponent(id)}/cancel`,
          undefined,
          toHttpOptions(options)
        );
        return parseResponse(EmailMutationResponseSchema, data, 'emails.cancel');
      },
      { signal: options?.signal, operation: 'emails.cancel' }
    );
  }

  private async *pages(params: ListEmailsParams, options?: RequestOptions): AsyncGenerator<Email[]> {
    let cursor = params.cursor;
    do {
      const page = await this.list({ ...params, cursor }, options);
      yield page.data;
      cursor = page.cursor;
    } while (cursor !== undefined);
  }
}
