import { nanoid } from 'nanoid';
import type { AuthenticatedUser, OrderStatus } from '../types';
import { ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { Order, OrderStore } from './orders';
import type { PaymentGateway } from './payments';

export interface SyncResult {
  orderId: string;
  status: OrderStatus;
  confirmed: boolean;
}

function toResult(order: Order): SyncResult {
  return {
    orderId: order.id,
    status: order.status,
    confirmed: order.status === 'confirmed',
  };
}

/**
 * Reconciliation Service
 *
 * Buyer-initiated pull of payment status, for when the webhook is late or
 * lost. Confirms through the same OrderStore transition as the webhook path.
 * Provider trouble never fails a sync; the buyer just sees the current status.
 */
export class ReconciliationService {
  constructor(
    private readonly orders: OrderStore,
    private readonly gateway: PaymentGateway
  ) {}

  async sync(orderId: string, user: AuthenticatedUser): Promise<SyncResult> {
    const order = await this.orders.getOwned(orderId, user.id);

    if (order.status === 'confirmed') {
      return toResult(order);
    }

    try {
      return toResult(await this.reconcile(order));
    } catch (error) {
      if (error instanceof ProviderError) {
        logger.warn('sync.provider_error', {
          orderId: order.id,
          operation: error.operation,
          error: error.message,
        });
        return toResult(order);
      }
      throw error;
    }
  }

  private async reconcile(order: Order): Promise<Order> {
    if (order.paymentReference) {
      const intent = await this.gateway.getPaymentIntent(order.paymentReference);
      if (intent.status !== 'succeeded') {
        logger.info('sync.not_paid', { orderId: order.id, providerStatus: intent.status });
        return order;
      }
      const result = await this.orders.confirm(order, {
        eventId: `sync_${nanoid()}`,
        source: 'sync',
      });
      return result.order;
    }

    if (order.stripeSessionId) {
      const session = await this.gateway.getCheckoutSession(order.stripeSessionId);
      if (session.paymentStatus !== 'paid') {
        logger.info('sync.not_paid', { orderId: order.id, providerStatus: session.paymentStatus });
        return order;
      }
      const result = await this.orders.confirm(order, {
        eventId: `sync_${nanoid()}`,
        source: 'sync',
        paymentReference: session.paymentReference,
      });
      return result.order;
    }

    logger.info('sync.no_payment_reference', { orderId: order.id });
    return order;
  }
}
