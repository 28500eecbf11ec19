import type { Order, Ticket } from '../../db/schema';
import type { ConfirmationSource, PricingSnapshot } from '../../types';

export type { Order };

export interface PendingOrderDraft {
  userId: string;
  ticketId: string;
  eventId: string;
  pricing: PricingSnapshot;
}

/**
 * Runs inside the reservation transaction with the ticket row locked and the
 * quantity already held by pending and confirmed orders. Throw to abort.
 */
export type ReservationCheck = (ticket: Ticket, reservedQuantity: number) => void;

export interface PaymentSessionRef {
  sessionId: string;
  paymentReference: string | null;
}

export interface ConfirmChanges {
  confirmedAt: Date;
  paymentReference?: string | null;
}

export interface ConfirmOptions {
  eventId: string;
  source: ConfirmationSource;
  paymentReference?: string | null;
}

export interface ConfirmResult {
  order: Order;
  /** True only for the caller whose write moved the order to confirmed. */
  transitioned: boolean;
}

/**
 * Persistence boundary for orders. Implementations must make createPending
 * atomic with respect to other reservations of the same ticket, and
 * confirmIfPending a single conditional write.
 */
export interface OrderRepository {
  createPending(draft: PendingOrderDraft, check: ReservationCheck): Promise<Order>;
  attachPaymentSession(orderId: string, ref: PaymentSessionRef): Promise<Order | null>;
  /** Returns the updated row, or null when the order was not pending. */
  confirmIfPending(orderId: string, changes: ConfirmChanges): Promise<Order | null>;
  findById(orderId: string): Promise<Order | null>;
  findByPaymentReference(paymentReference: string): Promise<Order | null>;
  findBySessionId(sessionId: string): Promise<Order | null>;
  /** Newest first. */
  listForUser(userId: string): Promise<Order[]>;
}
