import type { DbType } from '../db';
import { stripeEvents } from '../db/schema';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { redactValue } from '../utils/redact';

export interface PaymentEventAuditEntry {
  providerEventId: string;
  eventType: string;
  orderId: string | null;
  outcome: string;
  payload: unknown;
}

export interface PaymentEventAudit {
  record(entry: PaymentEventAuditEntry): Promise<void>;
}

/**
 * Append-only audit of verified webhook deliveries. Payloads are redacted
 * before they are stored; a failed insert never fails the delivery.
 */
export class DrizzlePaymentEventAudit implements PaymentEventAudit {
  constructor(private readonly db: DbType) {}

  async record(entry: PaymentEventAuditEntry): Promise<void> {
    try {
      await this.db.insert(stripeEvents).values({
        providerEventId: entry.providerEventId || 'unknown',
        eventType: entry.eventType,
        orderId: entry.orderId,
        outcome: entry.outcome,
        payload: redactValue(entry.payload),
      });
    } catch (error) {
      logger.error('stripe.webhook audit persist failed', {
        eventId: entry.providerEventId,
        error: errorMessage(error),
      });
    }
  }
}
