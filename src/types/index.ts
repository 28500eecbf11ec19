export type PricingModel = 'fixed' | 'flexible';

export type OrderStatus = 'pending' | 'confirmed';

/**
 * Immutable record of how an order's price was computed at creation time.
 * Persisted verbatim in `orders.pricing_snapshot`.
 */
export interface PricingSnapshot {
  readonly pricingModel: PricingModel;
  readonly basePriceCents: number;
  readonly minimumPriceCents: number | null;
  readonly suggestedPriceCents: number | null;
  readonly customPriceCents: number | null;
  readonly unitPriceCents: number;
  readonly quantity: number;
  readonly subtotalCents: number;
  readonly tipCents: number;
  readonly totalCents: number;
  readonly currency: string;
  readonly ticketTippable: boolean;
}

export interface AuthenticatedUser {
  id: string;
  email?: string;
}

/** Where a confirmation signal came from. */
export type ConfirmationSource = 'webhook' | 'sync';
