import type { Ticket } from '../db/schema';
import type { PricingSnapshot } from '../types';
import { PricingViolation, ValidationError } from '../utils/errors';

export type PricedTicket = Pick<
  Ticket,
  | 'basePriceCents'
  | 'pricingModel'
  | 'minimumPriceCents'
  | 'suggestedPriceCents'
  | 'tippable'
  | 'currency'
>;

/** Largest amount Stripe accepts for a single charge, in cents. */
export const MAX_AMOUNT_CENTS = 99_999_999;

export interface PriceRequest {
  quantity: number;
  customPriceCents?: number | null;
  tipCents?: number | null;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function assertWithinLimit(label: string, cents: number): void {
  if (cents > MAX_AMOUNT_CENTS) {
    throw new ValidationError(`${label} exceeds the maximum of ${MAX_AMOUNT_CENTS} cents`);
  }
}

/**
 * Resolve the per-ticket price for the ticket's pricing model.
 */
function resolveUnitPrice(ticket: PricedTicket, customPriceCents: number | null): number {
  switch (ticket.pricingModel) {
    case 'fixed':
      if (customPriceCents !== null) {
        throw new ValidationError('Custom price is not allowed for fixed-price tickets');
      }
      return ticket.basePriceCents;

    case 'flexible': {
      if (customPriceCents === null) {
        throw new ValidationError('Custom price is required for flexible pricing');
      }
      if (!isNonNegativeInteger(customPriceCents)) {
        throw new ValidationError('Custom price must be a whole number of cents');
      }
      const minimum = ticket.minimumPriceCents ?? 0;
      if (customPriceCents < minimum) {
        throw new PricingViolation('Price is below minimum required amount');
      }
      return customPriceCents;
    }
  }
}

function resolveTip(ticket: PricedTicket, tipCents: number | null): number {
  if (tipCents === null || tipCents === 0) {
    return 0;
  }
  if (!isNonNegativeInteger(tipCents)) {
    throw new ValidationError('Tip must be a whole, non-negative number of cents');
  }
  if (!ticket.tippable) {
    throw new ValidationError('Tips are not accepted for this ticket');
  }
  return tipCents;
}

/**
 * Compute the pricing snapshot for an order.
 *
 * Pure: the result is frozen and stored verbatim on the order, so later changes
 * to the ticket's price never affect what the buyer was charged.
 */
export function calculatePricing(ticket: PricedTicket, request: PriceRequest): PricingSnapshot {
  const { quantity } = request;

  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new ValidationError('Quantity must be a positive whole number');
  }

  const customPriceCents = request.customPriceCents ?? null;
  const unitPriceCents = resolveUnitPrice(ticket, customPriceCents);
  const tipCents = resolveTip(ticket, request.tipCents ?? null);

  assertWithinLimit('Unit price', unitPriceCents);
  assertWithinLimit('Tip', tipCents);

  const subtotalCents = unitPriceCents * quantity;
  assertWithinLimit('Subtotal', subtotalCents);
  const totalCents = subtotalCents + tipCents;
  assertWithinLimit('Order total', totalCents);

  if (totalCents <= 0) {
    throw new ValidationError('Order total must be greater than zero');
  }

  return Object.freeze({
    pricingModel: ticket.pricingModel,
    basePriceCents: ticket.basePriceCents,
    minimumPriceCents: ticket.minimumPriceCents,
    suggestedPriceCents: ticket.suggestedPriceCents,
    customPriceCents,
    unitPriceCents,
    quantity,
    subtotalCents,
    tipCents,
    totalCents,
    currency: ticket.currency,
    ticketTippable: ticket.tippable,
  });
}
