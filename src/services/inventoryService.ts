import type { Ticket } from '../db/schema';
import { InventoryViolation } from '../utils/errors';
import { logger } from '../utils/logger';
import { recordCheckoutRejected } from '../utils/metrics';

export type InventoryTicket = Pick<Ticket, 'id' | 'quantity' | 'startsAt' | 'endsAt'>;

export interface InventoryGuardOptions {
  maxQuantityPerOrder: number;
  now?: () => Date;
}

/**
 * Inventory Guard
 *
 * Decides whether `quantity` more tickets may be reserved. `reservedQuantity`
 * is the sum over pending and confirmed orders for the ticket; callers must
 * read it under the same lock as the insert that follows (see
 * OrderRepository.createPending), otherwise two buyers can both pass the check.
 */
export class InventoryGuard {
  private readonly maxQuantityPerOrder: number;
  private readonly now: () => Date;

  constructor(options: InventoryGuardOptions) {
    this.maxQuantityPerOrder = options.maxQuantityPerOrder;
    this.now = options.now ?? (() => new Date());
  }

  remaining(ticket: InventoryTicket, reservedQuantity: number): number {
    return Math.max(0, ticket.quantity - reservedQuantity);
  }

  isOnSale(ticket: InventoryTicket): boolean {
    const now = this.now().getTime();
    if (ticket.startsAt && now < ticket.startsAt.getTime()) return false;
    if (ticket.endsAt && now > ticket.endsAt.getTime()) return false;
    return true;
  }

  /**
   * Throws InventoryViolation when the reservation must not go ahead.
   */
  assertAvailable(ticket: InventoryTicket, quantity: number, reservedQuantity: number): void {
    if (!this.isOnSale(ticket)) {
      this.reject(ticket, 'sale_not_active', 'Ticket is not currently on sale');
    }

    if (quantity > this.maxQuantityPerOrder) {
      this.reject(
        ticket,
        'per_order_limit_exceeded',
        `Maximum ${this.maxQuantityPerOrder} tickets per order`
      );
    }

    const remaining = this.remaining(ticket, reservedQuantity);
    if (quantity > remaining) {
      logger.info('inventory.sold_out', { ticketId: ticket.id, requested: quantity, remaining });
      this.reject(ticket, 'sold_out', 'Ticket is no longer available');
    }
  }

  private reject(
    ticket: InventoryTicket,
    reason: InventoryViolation['reason'],
    message: string
  ): never {
    recordCheckoutRejected(reason);
    logger.debug('inventory.rejected', { ticketId: ticket.id, reason });
    throw new InventoryViolation(reason, message);
  }
}
