import { and, desc, eq, inArray, sql } from 'drizzle-orm';
import type { DbType } from '../../db';
import { orders, tickets, type Order } from '../../db/schema';
import { NotFoundError } from '../../utils/errors';
import type {
  ConfirmChanges,
  OrderRepository,
  PaymentSessionRef,
  PendingOrderDraft,
  ReservationCheck,
} from './types';

// Orders that hold inventory
const RESERVING_STATUSES: Array<Order['status']> = ['pending', 'confirmed'];

export class DrizzleOrderRepository implements OrderRepository {
  constructor(private readonly db: DbType) {}

  /**
   * Lock the ticket row, sum what is already reserved, run the check and
   * insert, all in one transaction. Concurrent reservations of the same ticket
   * serialize on the row lock.
   */
  async createPending(draft: PendingOrderDraft, check: ReservationCheck): Promise<Order> {
    return this.db.transaction(async (tx) => {
      const [ticket] = await tx
        .select()
        .from(tickets)
        .where(eq(tickets.id, draft.ticketId))
        .for('update');

      if (!ticket) {
        throw new NotFoundError('Ticket not found');
      }

      const [held] = await tx
        .select({ reserved: sql<number>`coalesce(sum(${orders.quantity}), 0)::int` })
        .from(orders)
        .where(and(eq(orders.ticketId, ticket.id), inArray(orders.status, RESERVING_STATUSES)));

      check(ticket, Number(held?.reserved ?? 0));

      const { pricing } = draft;
      const [order] = await tx
        .insert(orders)
        .values({
          userId: draft.userId,
          ticketId: draft.ticketId,
          eventId: draft.eventId,
          quantity: pricing.quantity,
          status: 'pending',
          pricingSnapshot: pricing,
          subtotalCents: pricing.subtotalCents,
          tipCents: pricing.tipCents,
          totalCents: pricing.totalCents,
          currency: pricing.currency,
        })
        .returning();

      return order;
    });
  }

  async attachPaymentSession(orderId: string, ref: PaymentSessionRef): Promise<Order | null> {
    const [order] = await this.db
      .update(orders)
      .set({
        stripeSessionId: ref.sessionId,
        paymentReference: sql`coalesce(${orders.paymentReference}, ${ref.paymentReference})`,
        updatedAt: new Date(),
      })
      .where(eq(orders.id, orderId))
      .returning();

    return order ?? null;
  }

  /**
   * Conditional pending -> confirmed write. Of any number of concurrent
   * callers, exactly one gets the row back.
   */
  async confirmIfPending(orderId: string, changes: ConfirmChanges): Promise<Order | null> {
    const paymentReference = changes.paymentReference ?? null;

    const [order] = await this.db
      .update(orders)
      .set({
        status: 'confirmed',
        confirmedAt: changes.confirmedAt,
        updatedAt: changes.confirmedAt,
        ...(paymentReference !== null && {
          paymentReference: sql`coalesce(${orders.paymentReference}, ${paymentReference})`,
        }),
      })
      .where(and(eq(orders.id, orderId), eq(orders.status, 'pending')))
      .returning();

    return order ?? null;
  }

  async findById(orderId: string): Promise<Order | null> {
    const [order] = await this.db.select().from(orders).where(eq(orders.id, orderId)).limit(1);
    return order ?? null;
  }

  async findByPaymentReference(paymentReference: string): Promise<Order | null> {
    const [order] = await this.db
      .select()
      .from(orders)
      .where(eq(orders.paymentReference, paymentReference))
      .limit(1);
    return order ?? null;
  }

  async findBySessionId(sessionId: string): Promise<Order | null> {
    const [order] = await this.db
      .select()
      .from(orders)
      .where(eq(orders.stripeSessionId, sessionId))
      .limit(1);
    return order ?? null;
  }

  async listForUser(userId: string): Promise<Order[]> {
    const rows = await this.db
      .select()
      .from(orders)
      .where(eq(orders.userId, userId))
      .orderBy(desc(orders.createdAt));
    return rows;
  }
}
