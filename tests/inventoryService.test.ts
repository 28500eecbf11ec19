import { InventoryGuard } from '../src/services/inventoryService';
import { InventoryViolation } from '../src/utils/errors';
import { checkoutRejectedCounter, resetMetrics } from '../src/utils/metrics';
import { makeTicket } from './support/fixtures';

function violation(fn: () => void): InventoryViolation {
  try {
    fn();
  } catch (error) {
    if (error instanceof InventoryViolation) return error;
    throw error;
  }
  throw new Error('expected an InventoryViolation');
}

describe('Inventory Guard', () => {
  const now = new Date('2026-06-01T12:00:00Z');
  const guard = new InventoryGuard({ maxQuantityPerOrder: 10, now: () => now });

  beforeEach(() => {
    resetMetrics();
  });

  it('should allow a request within remaining inventory', () => {
    expect(() => guard.assertAvailable(makeTicket({ quantity: 10 }), 4, 6)).not.toThrow();
  });

  it('should report sold out when the request exceeds what remains', () => {
    const error = violation(() => guard.assertAvailable(makeTicket({ quantity: 2 }), 5, 0));

    expect(error.reason).toBe('sold_out');
    expect(error.message).toBe('Ticket is no longer available');
    expect(error.statusCode).toBe(422);
  });

  it('should count existing reservations against inventory', () => {
    const error = violation(() => guard.assertAvailable(makeTicket({ quantity: 10 }), 3, 8));
    expect(error.reason).toBe('sold_out');
  });

  it('should enforce the per-order cap', () => {
    const error = violation(() => guard.assertAvailable(makeTicket({ quantity: 100 }), 11, 0));

    expect(error.reason).toBe('per_order_limit_exceeded');
    expect(error.message).toBe('Maximum 10 tickets per order');
  });

  it('should reject before the sale starts', () => {
    const ticket = makeTicket({ startsAt: new Date('2026-06-02T00:00:00Z') });
    const error = violation(() => guard.assertAvailable(ticket, 1, 0));

    expect(error.reason).toBe('sale_not_active');
    expect(error.message).toBe('Ticket is not currently on sale');
  });

  it('should reject after the sale ends', () => {
    const ticket = makeTicket({ endsAt: new Date('2026-05-31T00:00:00Z') });
    expect(violation(() => guard.assertAvailable(ticket, 1, 0)).reason).toBe('sale_not_active');
  });

  it('should treat null bounds as open', () => {
    expect(guard.isOnSale(makeTicket({ startsAt: null, endsAt: null }))).toBe(true);
  });

  it('should never report negative remaining inventory', () => {
    expect(guard.remaining(makeTicket({ quantity: 2 }), 5)).toBe(0);
  });

  it('should count rejections by reason', async () => {
    violation(() => guard.assertAvailable(makeTicket({ quantity: 1 }), 2, 0));

    const metric = await checkoutRejectedCounter.get();
    expect(metric.values).toHaveLength(1);
    expect(metric.values[0]).toMatchObject({ value: 1, labels: { reason: 'sold_out' } });
  });
});
