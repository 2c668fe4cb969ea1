/**
 * Webhook handler registry and event dispatch
 */
import { WebhookProcessingError } from '../errors/categories.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { isEventOf, type WebhookEvent, type WebhookEventOf, type WebhookEventType } from './payload.js';
import type { VerifiedEvent } from '../types/webhook.js';

export type WebhookHandler<E extends WebhookEvent = WebhookEvent> = (
  event: E,
  delivery: VerifiedEvent
) => void | Promise<void>;

export interface RouteResult {
  status: 'handled' | 'no_handler';
  /**
   * Event type as sent by the provider
   */
  type: string;
  handlers: number;
}

function typeOf(event: WebhookEvent): string {
  return event.type === 'unrecognized' ? event.rawType : event.type;
}

/**
 * Routes verified events to handlers registered by event type
 */
export class EventRouter {
  private readonly handlers = new Map<string, WebhookHandler[]>();
  private readonly wildcardHandlers: WebhookHandler[] = [];
  private readonly logger: Logger;

  constructor(logger: Logger = new NoopLogger()) {
    this.logger = logger;
  }

  /**
   * Registers a handler for one event type
   */
  on<K extends WebhookEventType>(type: K, handler: WebhookHandler<WebhookEventOf<K>>): this {
    const existing = this.handlers.get(type) ?? [];
    existing.push((event, delivery) =>
      isEventOf(event, type) ? handler(event, delivery) : undefined
    );
    this.handlers.set(type, existing);
    return this;
  }

  /**
   * Registers a handler for every event, including unrecognized types
   */
  onAll(handler: WebhookHandler): this {
    this.wildcardHandlers.push(handler);
    return this;
  }

  /**
   * Event types with at least one specific handler
   */
  getRegisteredEventTypes(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Runs every matching handler in registration order.
   *
   * All handlers run even when one fails; failures are then reported
   * together.
   *
   * @throws {WebhookProcessingError} when any handler failed
   */
  async route(delivery: VerifiedEvent): Promise<RouteResult> {
    const type = typeOf(delivery.event);
    const handlers = [...(this.handlers.get(type) ?? []), ...this.wildcardHandlers];

    if (handlers.length === 0) {
      this.logger.debug('No handler for webhook event', { type, webhookId: delivery.id });
      return { status: 'no_handler', type, handlers: 0 };
    }

    const errors: Error[] = [];
    for (const handler of handlers) {
      try {
        await handler(delivery.event, delivery);
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    if (errors.length > 0) {
      throw new WebhookProcessingError(
        `${errors.length} handler(s) failed for event ${type}`,
        delivery.id,
        { eventType: type, errors: errors.map((e) => e.message) }
      );
    }

    return { status: 'handled', type, handlers: handlers.length };
  }
}
