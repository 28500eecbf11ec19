import { Counter, Histogram, Registry, register as defaultRegister } from 'prom-client';
import { logger } from './logger';

// Use the default registry so /metrics also exposes process metrics when collected
export const metricsRegistry: Registry = defaultRegister;

export const ordersCreatedCounter = new Counter({
  name: 'checkout_orders_created_total',
  help: 'Total number of pending orders created',
  labelNames: ['pricingModel'],
  registers: [metricsRegistry],
});

export const checkoutRejectedCounter = new Counter({
  name: 'checkout_rejected_total',
  help: 'Checkout attempts rejected before an order was created',
  labelNames: ['reason'], // 'sold_out', 'per_order_limit_exceeded', 'sale_not_active', ...
  registers: [metricsRegistry],
});

/**
 * Orders moved to confirmed, by the channel that won the transition
 */
export const orderConfirmationsCounter = new Counter({
  name: 'checkout_order_confirmations_total',
  help: 'Orders transitioned from pending to confirmed',
  labelNames: ['source'], // 'webhook', 'sync'
  registers: [metricsRegistry],
});

export const webhookEventsCounter = new Counter({
  name: 'checkout_webhook_events_total',
  help: 'Verified webhook events by type and outcome',
  labelNames: ['kind', 'outcome'],
  registers: [metricsRegistry],
});

export const webhookRejectedCounter = new Counter({
  name: 'checkout_webhook_rejected_total',
  help: 'Webhook deliveries rejected because the signature could not be verified',
  registers: [metricsRegistry],
});

export const providerErrorsCounter = new Counter({
  name: 'checkout_provider_errors_total',
  help: 'Failed payment provider calls',
  labelNames: ['operation'],
  registers: [metricsRegistry],
});

export const providerLatencyHistogram = new Histogram({
  name: 'checkout_provider_latency_ms',
  help: 'Payment provider call latency in milliseconds',
  labelNames: ['operation', 'outcome'],
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [metricsRegistry],
});

// ===== Helper Functions =====

export function recordOrderCreated(pricingModel: string): void {
  try {
    ordersCreatedCounter.labels(pricingModel).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording order created', { error });
  }
}

export function recordCheckoutRejected(reason: string): void {
  try {
    checkoutRejectedCounter.labels(reason).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording checkout rejection', { error });
  }
}

export function recordOrderConfirmed(source: string): void {
  try {
    orderConfirmationsCounter.labels(source).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording order confirmation', { error });
  }
}

export function recordWebhookEvent(kind: string, outcome: string): void {
  try {
    webhookEventsCounter.labels(kind, outcome).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording webhook event', { error });
  }
}

export function recordWebhookRejected(): void {
  try {
    webhookRejectedCounter.inc();
  } catch (error) {
    logger.error('[Metrics] Error recording webhook rejection', { error });
  }
}

/**
 * Record a provider call; errors also bump the error counter
 */
export function recordProviderCall(operation: string, ok: boolean, latencyMs: number): void {
  try {
    providerLatencyHistogram.labels(operation, ok ? 'ok' : 'error').observe(latencyMs);
    if (!ok) {
      providerErrorsCounter.labels(operation).inc();
    }
  } catch (error) {
    logger.error('[Metrics] Error recording provider call', { error });
  }
}

/**
 * Get all metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
