/**
 * Main client implementation
 */
import { validateConfig, createConfigFromEnv } from '../config/config.js';
import type { NormalizedResendConfig, ResendConfig } from '../config/config.js';
import { createAuthManager, type AuthManager } from '../auth/auth-manager.js';
import { DispatchClient } from '../dispatch/client.js';
import { ConfigurationError } from '../errors/categories.js';
import { createIdempotencyStore, type IdempotencyStore } from '../idempotency/store.js';
import { RetryScheduler } from '../resilience/retry.js';
import { EmailsServiceImpl, type EmailsService } from '../services/index.js';
import { createHttpTransport, type HttpTransport } from '../transport/http.js';
import { RequestValidator } from '../validation/validator.js';
import { InMemoryReplayCache } from '../webhooks/replay-cache.js';
import { WebhookService } from '../webhooks/service.js';
import { WebhookVerifier } from '../webhooks/verifier.js';

/**
 * Main client interface
 */
export interface ResendClient {
  /**
   * Emails API
   */
  readonly emails: EmailsService;

  /**
   * Webhook ingestion; requires a webhook secret
   */
  webhooks(): WebhookService;

  /**
   * Gets the current configuration
   */
  getConfig(): Readonly<NormalizedResendConfig>;

  getTransport(): HttpTransport;

  getAuthManager(): AuthManager;

  getIdempotencyStore(): IdempotencyStore;

  getRetryScheduler(): RetryScheduler;
}

/**
 * Client implementation
 */
export class ResendClientImpl implements ResendClient {
  private readonly config: NormalizedResendConfig;
  private readonly authManager: AuthManager;
  private readonly transport: HttpTransport;
  private readonly idempotencyStore: IdempotencyStore;
  private readonly scheduler: RetryScheduler;
  private readonly webhookService?: WebhookService;

  readonly emails: EmailsService;

  constructor(config: ResendConfig) {
    this.config = validateConfig(config);
    const { logger, clock } = this.config;

    this.authManager = createAuthManager(this.config);

    this.transport = createHttpTransport(
      this.config.baseUrl,
      this.authManager,
      this.config.timeout,
      this.config.fetch,
      logger
    );

    this.idempotencyStore =
      this.config.idempotencyStore ?? createIdempotencyStore({ ttl: this.config.idempotencyTtl, clock });

    this.scheduler = new RetryScheduler(
      {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.baseDelayMs,
        maxDelayMs: this.config.maxDelayMs,
        respectRetryAfter: this.config.respectRetryAfter,
      },
      clock,
      logger
    );

    const dispatcher = new DispatchClient({
      transport: this.transport,
      store: this.idempotencyStore,
      scheduler: this.scheduler,
      validator: new RequestValidator(),
      logger,
      concurrency: this.config.batchConcurrency,
    });

    this.emails = new EmailsServiceImpl(this.transport, this.scheduler, dispatcher);

    if (this.config.webhookSecrets.length > 0) {
      const replayCache =
        this.config.replayCache ?? new InMemoryReplayCache({ retention: this.config.replayRetention, clock });

      this.webhookService = new WebhookService({
        verifier: new WebhookVerifier({
          secrets: this.config.webhookSecrets,
          tolerance: this.config.webhookTolerance,
          replayCache,
          clock,
          logger,
        }),
        replayCache,
        malformedPayloadPolicy: this.config.malformedPayloadPolicy,
        logger,
      });
    }

    logger.debug('Client initialized', {
      baseUrl: this.config.baseUrl,
      apiKeyHint: this.authManager.getRedactedApiKey(),
      webhooks: this.webhookService !== undefined,
    });
  }

  webhooks(): WebhookService {
    if (!this.webhookService) {
      throw new ConfigurationError('Webhook secret not configured. Provide webhookSecret in config.');
    }
    return this.webhookService;
  }

  getConfig(): Readonly<NormalizedResendConfig> {
    return Object.freeze({ ...this.config, webhookSecrets: [...this.config.webhookSecrets] });
  }

  getTransport(): HttpTransport {
    return this.transport;
  }

  getAuthManager(): AuthManager {
    return this.authManager;
  }

  getIdempotencyStore(): IdempotencyStore {
    return this.idempotencyStore;
  }

  getRetryScheduler(): RetryScheduler {
    return this.scheduler;
  }
}

/**
 * Creates a new client with the provided configuration
 */
export function createClient(config: ResendConfig): ResendClient {
  return new ResendClientImpl(config);
}

/**
 * Creates a new client using environment variables
 */
export function createClientFromEnv(overrides?: Partial<ResendConfig>): ResendClient {
  return createClient(createConfigFromEnv(overrides));
}
