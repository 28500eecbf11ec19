import { pgTable, uuid, varchar, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

/**
 * Stripe Events
 *
 * Audit log of verified webhook deliveries and what the ingestor did with them.
 * Written best-effort; PII is redacted on write.
 */
export const stripeEvents = pgTable(
  'stripe_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    providerEventId: varchar('provider_event_id', { length: 255 }).notNull(), // evt_...
    eventType: varchar('event_type', { length: 100 }).notNull(),
    orderId: uuid('order_id'),
    outcome: varchar('outcome', { length: 50 }).notNull(),
    payload: jsonb('payload').notNull(), // Redacted payload (no raw PII)
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    providerEventIdx: index('stripe_events_provider_event_id_idx').on(table.providerEventId),
  })
);

// Type exports for TypeScript
export type StripeEvent = typeof stripeEvents.$inferSelect;
export type NewStripeEvent = typeof stripeEvents.$inferInsert;
