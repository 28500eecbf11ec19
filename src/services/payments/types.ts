export interface LineItem {
  name: string;
  unitAmountCents: number;
  quantity: number;
}

export interface CreateCheckoutSessionInput {
  orderId: string;
  currency: string;
  lineItems: LineItem[];
  /** Copied onto both the session and its payment intent */
  metadata: Record<string, string>;
  successUrl: string;
  cancelUrl: string;
  expiresAt: Date;
  customerEmail?: string;
}

export interface CheckoutSessionResult {
  sessionId: string;
  checkoutUrl: string;
  /** Payment intent id, when the provider already created one */
  paymentReference: string | null;
}

export interface PaymentIntentResult {
  id: string;
  /** Provider status, e.g. "succeeded", "processing", "requires_payment_method" */
  status: string;
}

export interface CheckoutSessionStatus {
  sessionId: string;
  /** "paid", "unpaid" or "no_payment_required" */
  paymentStatus: string;
  paymentReference: string | null;
}

/**
 * What the checkout core needs from a payment provider. Every method that
 * talks to the provider rejects with ProviderError on any failure.
 */
export interface PaymentGateway {
  readonly name: string;

  createCheckoutSession(input: CreateCheckoutSessionInput): Promise<CheckoutSessionResult>;

  getPaymentIntent(reference: string): Promise<PaymentIntentResult>;

  getCheckoutSession(sessionId: string): Promise<CheckoutSessionStatus>;

  /**
   * Check the signature header against the raw request body and return the
   * decoded event. Throws InvalidSignatureError.
   */
  verifyWebhookSignature(body: Buffer | string, signatureHeader: string | undefined): unknown;
}
