import type { Event, Order, Ticket } from '../../src/db/schema';
import type { PricingSnapshot } from '../../src/types';

export const TICKET_ID = '11111111-1111-4111-8111-111111111111';
export const EVENT_ID = '22222222-2222-4222-8222-222222222222';
export const BUYER_ID = 'user-buyer-1';

export function makeEvent(overrides: Partial<Event> = {}): Event {
  return {
    id: EVENT_ID,
    title: 'Spring Showcase',
    slug: 'spring-showcase',
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    id: TICKET_ID,
    eventId: EVENT_ID,
    title: 'General Admission',
    description: null,
    basePriceCents: 2500,
    pricingModel: 'fixed',
    minimumPriceCents: null,
    suggestedPriceCents: null,
    currency: 'usd',
    tippable: false,
    quantity: 100,
    startsAt: null,
    endsAt: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function makePricing(overrides: Partial<PricingSnapshot> = {}): PricingSnapshot {
  return {
    pricingModel: 'fixed',
    basePriceCents: 2500,
    minimumPriceCents: null,
    suggestedPriceCents: null,
    customPriceCents: null,
    unitPriceCents: 2500,
    quantity: 2,
    subtotalCents: 5000,
    tipCents: 0,
    totalCents: 5000,
    currency: 'usd',
    ticketTippable: false,
    ...overrides,
  };
}

export function makeOrder(overrides: Partial<Order> = {}): Order {
  const pricing = makePricing();
  return {
    id: '33333333-3333-4333-8333-333333333333',
    userId: BUYER_ID,
    ticketId: TICKET_ID,
    eventId: EVENT_ID,
    quantity: pricing.quantity,
    status: 'pending',
    pricingSnapshot: pricing,
    subtotalCents: pricing.subtotalCents,
    tipCents: pricing.tipCents,
    totalCents: pricing.totalCents,
    currency: pricing.currency,
    paymentReference: null,
    stripeSessionId: null,
    confirmedAt: null,
    createdAt: new Date('2026-03-01T12:00:00Z'),
    updatedAt: new Date('2026-03-01T12:00:00Z'),
    ...overrides,
  };
}
