import { InvalidSignatureError, errorMessage } from '../utils/errors';
import { isUuid } from '../utils/helpers';
import { logger } from '../utils/logger';
import { recordWebhookEvent, recordWebhookRejected } from '../utils/metrics';
import { DEFAULT_RETRY_CONFIG, retryWithBackoff, type RetryConfig } from '../utils/retry';
import type { Order, OrderStore } from './orders';
import type { PaymentEventAudit } from './paymentEventAudit';
import {
  parseWebhookEvent,
  type PaymentFailedEvent,
  type PaymentGateway,
  type PaymentSucceededEvent,
  type SessionCompletedEvent,
  type SessionExpiredEvent,
  type WebhookEvent,
} from './payments';
import type { ProcessedEventStore } from './processedEventStore';

export type WebhookOutcome =
  | 'confirmed'
  | 'already_confirmed'
  | 'order_not_found'
  | 'not_paid'
  | 'payment_failed'
  | 'session_expired'
  | 'unhandled'
  | 'duplicate';

export interface WebhookReceipt {
  received: true;
  outcome: WebhookOutcome;
  orderId: string | null;
}

interface Dispatched {
  outcome: WebhookOutcome;
  orderId: string | null;
}

export interface WebhookIngestorDeps {
  gateway: PaymentGateway;
  orders: OrderStore;
  processedEvents: ProcessedEventStore;
  audit: PaymentEventAudit;
  retry?: RetryConfig;
}

function assertNever(event: never): never {
  throw new Error(`Unexpected webhook event: ${JSON.stringify(event)}`);
}

/**
 * Webhook Ingestor
 *
 * Verifies provider deliveries, drops redeliveries of events already handled,
 * and routes each event to the order transition it implies. Every recognised
 * outcome is acknowledged; only a persistent storage failure is surfaced so
 * the provider retries.
 */
export class WebhookIngestor {
  private readonly gateway: PaymentGateway;
  private readonly orders: OrderStore;
  private readonly processedEvents: ProcessedEventStore;
  private readonly audit: PaymentEventAudit;
  private readonly retry: RetryConfig;

  constructor(deps: WebhookIngestorDeps) {
    this.gateway = deps.gateway;
    this.orders = deps.orders;
    this.processedEvents = deps.processedEvents;
    this.audit = deps.audit;
    this.retry = deps.retry ?? DEFAULT_RETRY_CONFIG;
  }

  async ingest(body: Buffer | string, signatureHeader: string | undefined): Promise<WebhookReceipt> {
    const payload = this.verify(body, signatureHeader);
    const event = parseWebhookEvent(payload);

    logger.info('stripe.webhook received', { eventId: event.eventId, type: event.rawType });

    if (event.eventId && (await this.processedEvents.isProcessed(event.eventId))) {
      logger.info('stripe.webhook duplicate', { eventId: event.eventId, type: event.rawType });
      recordWebhookEvent(event.kind, 'duplicate');
      await this.audit.record({
        providerEventId: event.eventId,
        eventType: event.rawType,
        orderId: null,
        outcome: 'duplicate',
        payload,
      });
      return { received: true, outcome: 'duplicate', orderId: null };
    }

    let dispatched: Dispatched;
    try {
      dispatched = await retryWithBackoff(() => this.dispatch(event), this.retry);
    } catch (error) {
      recordWebhookEvent(event.kind, 'error');
      logger.error('stripe.webhook processing failed', {
        eventId: event.eventId,
        type: event.rawType,
        error: errorMessage(error),
      });
      throw error;
    }

    recordWebhookEvent(event.kind, dispatched.outcome);
    if (event.eventId) {
      await this.processedEvents.markProcessed(event.eventId);
    }
    await this.audit.record({
      providerEventId: event.eventId,
      eventType: event.rawType,
      orderId: dispatched.orderId,
      outcome: dispatched.outcome,
      payload,
    });

    return { received: true, ...dispatched };
  }

  private verify(body: Buffer | string, signatureHeader: string | undefined): unknown {
    try {
      return this.gateway.verifyWebhookSignature(body, signatureHeader);
    } catch (error) {
      recordWebhookRejected();
      const detail = error instanceof InvalidSignatureError ? error.detail : errorMessage(error);
      logger.warn('stripe.webhook signature rejected', { detail });
      throw error instanceof InvalidSignatureError ? error : new InvalidSignatureError(detail);
    }
  }

  private dispatch(event: WebhookEvent): Promise<Dispatched> {
    switch (event.kind) {
      case 'payment_succeeded':
        return this.onPaymentSucceeded(event);
      case 'session_completed':
        return this.onSessionCompleted(event);
      case 'payment_failed':
        return this.onPaymentFailed(event);
      case 'session_expired':
        return this.onSessionExpired(event);
      case 'unhandled':
        logger.debug('stripe.webhook unhandled type', { eventId: event.eventId, type: event.rawType });
        return Promise.resolve({ outcome: 'unhandled', orderId: null });
      default:
        return assertNever(event);
    }
  }

  private async onPaymentSucceeded(event: PaymentSucceededEvent): Promise<Dispatched> {
    const order =
      (await this.orders.findByPaymentReference(event.paymentReference)) ??
      (await this.findByMetadata(event.orderId));

    if (!order) {
      logger.warn('stripe.webhook order not found', {
        eventId: event.eventId,
        paymentReference: event.paymentReference,
      });
      return { outcome: 'order_not_found', orderId: null };
    }

    return this.confirm(order, event.eventId, event.paymentReference);
  }

  private async onSessionCompleted(event: SessionCompletedEvent): Promise<Dispatched> {
    const order =
      (await this.orders.findBySessionId(event.sessionId)) ??
      (await this.findByMetadata(event.orderId));

    if (!order) {
      logger.warn('stripe.webhook order not found', {
        eventId: event.eventId,
        sessionId: event.sessionId,
      });
      return { outcome: 'order_not_found', orderId: null };
    }

    if (event.paymentStatus !== 'paid') {
      logger.info('stripe.webhook session not paid', {
        eventId: event.eventId,
        orderId: order.id,
        paymentStatus: event.paymentStatus,
      });
      return { outcome: 'not_paid', orderId: order.id };
    }

    return this.confirm(order, event.eventId, event.paymentReference);
  }

  private async onPaymentFailed(event: PaymentFailedEvent): Promise<Dispatched> {
    const order =
      (await this.orders.findByPaymentReference(event.paymentReference)) ??
      (await this.findByMetadata(event.orderId));

    logger.info('stripe.webhook payment failed', {
      eventId: event.eventId,
      orderId: order?.id ?? null,
      failureMessage: event.failureMessage,
    });
    return { outcome: 'payment_failed', orderId: order?.id ?? null };
  }

  private async onSessionExpired(event: SessionExpiredEvent): Promise<Dispatched> {
    const order =
      (await this.orders.findBySessionId(event.sessionId)) ??
      (await this.findByMetadata(event.orderId));

    logger.info('stripe.webhook session expired', {
      eventId: event.eventId,
      orderId: order?.id ?? null,
    });
    return { outcome: 'session_expired', orderId: order?.id ?? null };
  }

  private async confirm(
    order: Order,
    eventId: string,
    paymentReference: string | null
  ): Promise<Dispatched> {
    const result = await this.orders.confirm(order, {
      eventId,
      source: 'webhook',
      paymentReference,
    });
    return {
      outcome: result.transitioned ? 'confirmed' : 'already_confirmed',
      orderId: result.order.id,
    };
  }

  private async findByMetadata(orderId: string | null): Promise<Order | null> {
    if (!isUuid(orderId)) {
      return null;
    }
    return this.orders.findById(orderId);
  }
}
