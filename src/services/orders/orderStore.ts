import type { InventoryGuard } from '../inventoryService';
import { AccessDeniedError, NotFoundError } from '../../utils/errors';
import { isUuid } from '../../utils/helpers';
import { logger } from '../../utils/logger';
import { recordOrderConfirmed, recordOrderCreated } from '../../utils/metrics';
import type {
  ConfirmOptions,
  ConfirmResult,
  Order,
  OrderRepository,
  PaymentSessionRef,
  PendingOrderDraft,
} from './types';

/**
 * Order Store
 *
 * Owns the order lifecycle: pending orders are created under the inventory
 * guard, and the only transition is pending -> confirmed. Confirmation is
 * idempotent and safe to call from the webhook and sync paths at once.
 */
export class OrderStore {
  constructor(
    private readonly repository: OrderRepository,
    private readonly inventory: InventoryGuard,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async createPending(draft: PendingOrderDraft): Promise<Order> {
    const order = await this.repository.createPending(draft, (ticket, reserved) =>
      this.inventory.assertAvailable(ticket, draft.pricing.quantity, reserved)
    );

    recordOrderCreated(draft.pricing.pricingModel);
    logger.info('order.created', {
      orderId: order.id,
      ticketId: order.ticketId,
      quantity: order.quantity,
      totalCents: order.totalCents,
    });

    return order;
  }

  async attachPaymentSession(orderId: string, ref: PaymentSessionRef): Promise<Order> {
    const order = await this.repository.attachPaymentSession(orderId, ref);
    if (!order) {
      throw new NotFoundError('Order not found');
    }
    return order;
  }

  /**
   * Move an order to confirmed. Already-confirmed orders are returned as-is;
   * when two callers race, the loser re-reads and gets the winner's row.
   */
  async confirm(order: Order, options: ConfirmOptions): Promise<ConfirmResult> {
    if (order.status === 'confirmed') {
      logger.debug('order.already_confirmed', { orderId: order.id, eventId: options.eventId });
      return { order, transitioned: false };
    }

    const updated = await this.repository.confirmIfPending(order.id, {
      confirmedAt: this.clock(),
      paymentReference: options.paymentReference,
    });

    if (updated) {
      recordOrderConfirmed(options.source);
      logger.info('order.confirmed', {
        orderId: updated.id,
        eventId: options.eventId,
        source: options.source,
      });
      return { order: updated, transitioned: true };
    }

    const current = await this.repository.findById(order.id);
    if (!current) {
      throw new NotFoundError('Order not found');
    }
    logger.debug('order.already_confirmed', { orderId: current.id, eventId: options.eventId });
    return { order: current, transitioned: false };
  }

  /**
   * Load an order on behalf of a buyer. Only the owner may see it.
   */
  async getOwned(orderId: string, userId: string): Promise<Order> {
    const order = isUuid(orderId) ? await this.repository.findById(orderId) : null;
    if (!order) {
      throw new NotFoundError('Order not found');
    }
    if (order.userId !== userId) {
      throw new AccessDeniedError('Access denied');
    }
    return order;
  }

  findById(orderId: string): Promise<Order | null> {
    return this.repository.findById(orderId);
  }

  findByPaymentReference(paymentReference: string): Promise<Order | null> {
    return this.repository.findByPaymentReference(paymentReference);
  }

  findBySessionId(sessionId: string): Promise<Order | null> {
    return this.repository.findBySessionId(sessionId);
  }

  listForUser(userId: string): Promise<Order[]> {
    return this.repository.listForUser(userId);
  }
}
