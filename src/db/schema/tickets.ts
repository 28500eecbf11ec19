import { pgTable, uuid, varchar, text, timestamp, integer, boolean, index } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import { events } from './events';

/**
 * Tickets
 *
 * Ticket types on sale for an event. Catalog-owned; this service reads them and
 * locks the row while it reserves inventory for a new order.
 */
export const tickets = pgTable(
  'tickets',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    eventId: uuid('event_id')
      .notNull()
      .references(() => events.id),
    title: varchar('title', { length: 255 }).notNull(),
    description: text('description'),
    basePriceCents: integer('base_price_cents').notNull(),
    pricingModel: varchar('pricing_model', { length: 20, enum: ['fixed', 'flexible'] })
      .notNull()
      .default('fixed'),
    minimumPriceCents: integer('minimum_price_cents'),
    suggestedPriceCents: integer('suggested_price_cents'),
    currency: varchar('currency', { length: 3 }).notNull().default('usd'),
    tippable: boolean('tippable').notNull().default(false),
    quantity: integer('quantity').notNull(), // total inventory for this ticket type
    startsAt: timestamp('starts_at', { withTimezone: true }),
    endsAt: timestamp('ends_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    eventIdx: index('tickets_event_id_idx').on(table.eventId),
  })
);

export const ticketsRelations = relations(tickets, ({ one }) => ({
  event: one(events, { fields: [tickets.eventId], references: [events.id] }),
}));

// Type exports for TypeScript
export type Ticket = typeof tickets.$inferSelect;
export type NewTicket = typeof tickets.$inferInsert;
