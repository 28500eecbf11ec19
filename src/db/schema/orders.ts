import { pgTable, uuid, varchar, timestamp, integer, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import type { PricingSnapshot } from '../../types';
import { tickets } from './tickets';
import { events } from './events';

/**
 * Orders
 *
 * One buyer's purchase of one ticket type. `status` only ever moves
 * pending -> confirmed, and `confirmed_at` is written together with that move.
 */
export const orders = pgTable(
  'orders',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: varchar('user_id', { length: 255 }).notNull(),
    ticketId: uuid('ticket_id')
      .notNull()
      .references(() => tickets.id),
    eventId: uuid('event_id')
      .notNull()
      .references(() => events.id),
    quantity: integer('quantity').notNull(),
    status: varchar('status', { length: 20, enum: ['pending', 'confirmed'] })
      .notNull()
      .default('pending'),
    pricingSnapshot: jsonb('pricing_snapshot').$type<PricingSnapshot>().notNull(),
    subtotalCents: integer('subtotal_cents').notNull(),
    tipCents: integer('tip_cents').notNull().default(0),
    totalCents: integer('total_cents').notNull(),
    currency: varchar('currency', { length: 3 }).notNull().default('usd'),
    paymentReference: varchar('payment_reference', { length: 255 }), // Stripe payment intent id
    stripeSessionId: varchar('stripe_session_id', { length: 255 }),
    confirmedAt: timestamp('confirmed_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    ticketStatusIdx: index('orders_ticket_id_status_idx').on(table.ticketId, table.status),
    userIdx: index('orders_user_id_idx').on(table.userId),
    paymentReferenceIdx: uniqueIndex('orders_payment_reference_idx').on(table.paymentReference),
    sessionIdx: uniqueIndex('orders_stripe_session_id_idx').on(table.stripeSessionId),
  })
);

export const ordersRelations = relations(orders, ({ one }) => ({
  ticket: one(tickets, { fields: [orders.ticketId], references: [tickets.id] }),
  event: one(events, { fields: [orders.eventId], references: [events.id] }),
}));

// Type exports for TypeScript
export type Order = typeof orders.$inferSelect;
export type NewOrder = typeof orders.$inferInsert;
