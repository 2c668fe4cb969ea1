/**
 * Webhook ingestion service
 */
import { logError, NoopLogger, type Logger } from '../observability/logging.js';
import { EventRouter, type RouteResult, type WebhookHandler } from './router.js';
import { extractWebhookHeaders, type WebhookVerifier } from './verifier.js';
import type { MalformedPayloadPolicy } from '../config/config.js';
import type { RawHeaders } from '../types/webhook.js';
import type { WebhookEventOf, WebhookEventType } from './payload.js';
import type { ReplayCache } from './replay-cache.js';

/**
 * HTTP answer for one delivery
 */
export interface WebhookResponse {
  status: 200 | 400 | 401 | 500;
  body: {
    received: boolean;
    duplicate?: boolean;
    error?: string;
  };
  route?: RouteResult;
}

export interface WebhookServiceOptions {
  verifier: WebhookVerifier;
  router?: EventRouter;
  /**
   * The cache the verifier writes to; failed deliveries are removed from it
   */
  replayCache?: ReplayCache;
  malformedPayloadPolicy?: MalformedPayloadPolicy;
  logger?: Logger;
}

/**
 * Verifies, de-duplicates and routes inbound deliveries
 *
 * @example
 * ```typescript
 * const webhooks = client.webhooks();
 * webhooks.on('email.bounced', async (event) => suppress(event.data.to));
 *
 * app.post('/webhooks/resend', express.raw({ type: 'application/json' }), async (req, res) => {
 *   const { status, body } = await webhooks.handle(req.body, req.headers);
 *   res.status(status).json(body);
 * });
 * ```
 */
export class WebhookService {
  private readonly verifier: WebhookVerifier;
  private readonly router: EventRouter;
  private readonly replayCache?: ReplayCache;
  private readonly malformedPayloadPolicy: MalformedPayloadPolicy;
  private readonly logger: Logger;

  constructor(options: WebhookServiceOptions) {
    this.verifier = options.verifier;
    this.logger = options.logger ?? new NoopLogger();
    this.router = options.router ?? new EventRouter(this.logger);
    this.replayCache = options.replayCache;
    this.malformedPayloadPolicy = options.malformedPayloadPolicy ?? 'reject';
  }

  on<K extends WebhookEventType>(type: K, handler: WebhookHandler<WebhookEventOf<K>>): this {
    this.router.on(type, handler);
    return this;
  }

  onAll(handler: WebhookHandler): this {
    this.router.onAll(handler);
    return this;
  }

  /**
   * Handles one delivery.
   *
   * 200 acknowledges it; 401 and 400 tell the provider the delivery is not
   * acceptable; 500 asks for a redelivery after a handler failed.
   */
  async handle(rawBody: string | Buffer, headers: RawHeaders | Headers): Promise<WebhookResponse> {
    const result = await this.verifier.verify(rawBody, extractWebhookHeaders(headers));

    if (!result.ok) {
      const { error } = result;
      if (!error.permanent) {
        return { status: 401, body: { received: false, error: error.message } };
      }
      if (this.malformedPayloadPolicy === 'drop') {
        this.logger.warn('Dropping webhook with malformed payload', { reason: error.message });
        return { status: 200, body: { received: true } };
      }
      return { status: 400, body: { received: false, error: error.message } };
    }

    const delivery = result.event;
    if (result.duplicate) {
      return { status: 200, body: { received: true, duplicate: true } };
    }

    try {
      const route = await this.router.route(delivery);
      this.logger.info('Webhook processed', {
        webhookId: delivery.id,
        type: route.type,
        status: route.status,
      });
      return { status: 200, body: { received: true }, route };
    } catch (error) {
      await this.replayCache?.delete(delivery.id);
      const failure = error instanceof Error ? error : new Error(String(error));
      logError(this.logger, failure, `webhook ${delivery.id}`);
      return { status: 500, body: { received: false, error: failure.message } };
    }
  }
}
