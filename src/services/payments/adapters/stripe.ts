import Stripe from 'stripe';
import { InvalidSignatureError, ProviderError, errorMessage } from '../../../utils/errors';
import { logger } from '../../../utils/logger';
import { recordProviderCall } from '../../../utils/metrics';
import type {
  CheckoutSessionResult,
  CheckoutSessionStatus,
  CreateCheckoutSessionInput,
  PaymentGateway,
  PaymentIntentResult,
} from '../types';

export interface StripeGatewayOptions {
  secretKey: string;
  webhookSecret: string;
  timeoutMs: number;
  maxNetworkRetries: number;
  webhookToleranceSeconds: number;
  /** Preconfigured SDK client, mainly for tests */
  client?: Stripe;
}

function expandableId(value: string | { id: string } | null): string | null {
  if (value === null) return null;
  return typeof value === 'string' ? value : value.id;
}

/**
 * Stripe Gateway
 *
 * PaymentGateway backed by the official SDK. Requests are bounded by the SDK
 * timeout; any SDK failure surfaces as ProviderError naming the operation.
 */
export class StripeGateway implements PaymentGateway {
  readonly name = 'stripe';
  private readonly stripe: Stripe;
  private readonly webhookSecret: string;
  private readonly toleranceSeconds: number;

  constructor(options: StripeGatewayOptions) {
    this.stripe =
      options.client ??
      new Stripe(options.secretKey, {
        timeout: options.timeoutMs,
        maxNetworkRetries: options.maxNetworkRetries,
      });
    this.webhookSecret = options.webhookSecret;
    this.toleranceSeconds = options.webhookToleranceSeconds;
  }

  async createCheckoutSession(input: CreateCheckoutSessionInput): Promise<CheckoutSessionResult> {
    const params: Stripe.Checkout.SessionCreateParams = {
      mode: 'payment',
      client_reference_id: input.orderId,
      line_items: input.lineItems.map((item) => ({
        quantity: item.quantity,
        price_data: {
          currency: input.currency,
          unit_amount: item.unitAmountCents,
          product_data: { name: item.name },
        },
      })),
      metadata: input.metadata,
      payment_intent_data: { metadata: input.metadata },
      success_url: input.successUrl,
      cancel_url: input.cancelUrl,
      expires_at: Math.floor(input.expiresAt.getTime() / 1000),
      ...(input.customerEmail ? { customer_email: input.customerEmail } : {}),
    };

    const session = await this.call('create_checkout_session', () =>
      this.stripe.checkout.sessions.create(params, {
        idempotencyKey: `order_${input.orderId}`,
      })
    );

    if (!session.url) {
      throw new ProviderError('create_checkout_session', 'Checkout session has no URL');
    }

    return {
      sessionId: session.id,
      checkoutUrl: session.url,
      paymentReference: expandableId(session.payment_intent),
    };
  }

  async getPaymentIntent(reference: string): Promise<PaymentIntentResult> {
    const intent = await this.call('get_payment_intent', () =>
      this.stripe.paymentIntents.retrieve(reference)
    );
    return { id: intent.id, status: intent.status };
  }

  async getCheckoutSession(sessionId: string): Promise<CheckoutSessionStatus> {
    const session = await this.call('get_checkout_session', () =>
      this.stripe.checkout.sessions.retrieve(sessionId)
    );
    return {
      sessionId: session.id,
      paymentStatus: session.payment_status,
      paymentReference: expandableId(session.payment_intent),
    };
  }

  verifyWebhookSignature(body: Buffer | string, signatureHeader: string | undefined): unknown {
    if (!signatureHeader) {
      throw new InvalidSignatureError('missing stripe-signature header');
    }
    if (!this.webhookSecret) {
      throw new InvalidSignatureError('webhook secret not configured');
    }

    try {
      return this.stripe.webhooks.constructEvent(
        body,
        signatureHeader,
        this.webhookSecret,
        this.toleranceSeconds
      );
    } catch (error) {
      throw new InvalidSignatureError(errorMessage(error));
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      const result = await fn();
      recordProviderCall(operation, true, Date.now() - startTime);
      return result;
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      recordProviderCall(operation, false, latencyMs);
      logger.warn('payments.provider_error', {
        provider: this.name,
        operation,
        latencyMs,
        error: errorMessage(error),
      });
      throw new ProviderError(operation, errorMessage(error));
    }
  }
}
