import type { AppConfig } from '../../config';
import { StripeGateway } from './adapters/stripe';
import type { PaymentGateway } from './types';

export * from './types';
export * from './webhookEvents';
export { StripeGateway } from './adapters/stripe';

export function createPaymentGateway(stripeConfig: AppConfig['stripe']): PaymentGateway {
  return new StripeGateway({
    secretKey: stripeConfig.secretKey,
    webhookSecret: stripeConfig.webhookSecret,
    timeoutMs: stripeConfig.timeoutMs,
    maxNetworkRetries: stripeConfig.maxNetworkRetries,
    webhookToleranceSeconds: stripeConfig.webhookToleranceSeconds,
  });
}
