import type { Event, Ticket } from '../db/schema';
import type { AuthenticatedUser, PricingSnapshot } from '../types';
import { NotFoundError, ProviderError, isAppError } from '../utils/errors';
import { isUuid } from '../utils/helpers';
import { logger } from '../utils/logger';
import { recordCheckoutRejected } from '../utils/metrics';
import type { EventCatalog, TicketCatalog } from './catalogService';
import type { OrderStore } from './orders';
import type { CheckoutSessionResult, LineItem, PaymentGateway } from './payments';
import { calculatePricing, type PriceRequest } from './pricingService';

export interface CheckoutRequest extends PriceRequest {
  ticketId: string;
}

export interface CheckoutResult {
  orderId: string;
  sessionId: string;
  checkoutUrl: string;
}

export interface CheckoutOptions {
  publicBaseUrl: string;
  sessionTtlMinutes: number;
  now?: () => Date;
}

export interface CheckoutServiceDeps {
  tickets: TicketCatalog;
  events: EventCatalog;
  orders: OrderStore;
  gateway: PaymentGateway;
  options: CheckoutOptions;
}

export function buildLineItems(ticket: Ticket, event: Event, pricing: PricingSnapshot): LineItem[] {
  const items: LineItem[] = [
    {
      name: `${event.title}: ${ticket.title}`,
      unitAmountCents: pricing.unitPriceCents,
      quantity: pricing.quantity,
    },
  ];

  if (pricing.tipCents > 0) {
    items.push({ name: 'Tip', unitAmountCents: pricing.tipCents, quantity: 1 });
  }

  return items;
}

/**
 * Checkout Service
 *
 * pricing -> inventory-guarded pending order -> provider session -> attach.
 * If the provider call fails the pending order stays behind unpaid.
 */
export class CheckoutService {
  private readonly now: () => Date;

  constructor(private readonly deps: CheckoutServiceDeps) {
    this.now = deps.options.now ?? (() => new Date());
  }

  async startCheckout(user: AuthenticatedUser, request: CheckoutRequest): Promise<CheckoutResult> {
    const { tickets, events, orders, gateway, options } = this.deps;

    const ticket = isUuid(request.ticketId) ? await tickets.getTicket(request.ticketId) : null;
    if (!ticket) {
      throw new NotFoundError('Ticket not found');
    }

    const event = await events.getEvent(ticket.eventId);
    if (!event) {
      throw new NotFoundError('Event not found');
    }

    const pricing = this.price(ticket, request);
    const order = await orders.createPending({
      userId: user.id,
      ticketId: ticket.id,
      eventId: event.id,
      pricing,
    });

    const baseUrl = options.publicBaseUrl.replace(/\/+$/, '');
    const metadata = {
      order_id: order.id,
      ticket_id: ticket.id,
      event_id: event.id,
      pricing_model: pricing.pricingModel,
    };

    let session: CheckoutSessionResult;
    try {
      session = await gateway.createCheckoutSession({
        orderId: order.id,
        currency: pricing.currency,
        lineItems: buildLineItems(ticket, event, pricing),
        metadata,
        successUrl: `${baseUrl}/orders/${order.id}/success?session_id={CHECKOUT_SESSION_ID}`,
        cancelUrl: `${baseUrl}/events/${event.slug}`,
        expiresAt: new Date(this.now().getTime() + options.sessionTtlMinutes * 60_000),
        customerEmail: user.email,
      });
    } catch (error) {
      if (error instanceof ProviderError) {
        logger.error('checkout.session_failed', {
          orderId: order.id,
          operation: error.operation,
          error: error.message,
        });
        throw new ProviderError(error.operation, 'Could not start payment');
      }
      throw error;
    }

    await orders.attachPaymentSession(order.id, {
      sessionId: session.sessionId,
      paymentReference: session.paymentReference,
    });

    logger.info('checkout.session_created', {
      orderId: order.id,
      sessionId: session.sessionId,
      totalCents: pricing.totalCents,
    });

    return {
      orderId: order.id,
      sessionId: session.sessionId,
      checkoutUrl: session.checkoutUrl,
    };
  }

  private price(ticket: Ticket, request: PriceRequest): PricingSnapshot {
    try {
      return calculatePricing(ticket, request);
    } catch (error) {
      if (isAppError(error)) {
        recordCheckoutRejected(error.code);
      }
      throw error;
    }
  }
}
