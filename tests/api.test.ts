import request from 'supertest';
import { Express } from 'express';
import jwt, { type SignOptions } from 'jsonwebtoken';
import Stripe from 'stripe';
import { createApp } from '../src/app';
import type { Event, Ticket } from '../src/db/schema';
import type { EventCatalog, TicketCatalog } from '../src/services/catalogService';
import { CheckoutService } from '../src/services/checkoutService';
import { InventoryGuard } from '../src/services/inventoryService';
import { OrderStore } from '../src/services/orders';
import { StripeGateway } from '../src/services/payments';
import { ReconciliationService } from '../src/services/reconciliationService';
import { WebhookIngestor } from '../src/services/webhookService';
import { ProviderError } from '../src/utils/errors';
import { FakeGateway } from './support/fakeGateway';
import { BUYER_ID, TICKET_ID, makeEvent, makeOrder, makeTicket } from './support/fixtures';
import { InMemoryOrderRepository } from './support/inMemoryOrderRepository';
import { MemoryProcessedEventStore } from './support/memoryProcessedEventStore';

jest.mock('nanoid', () => ({
  nanoid: () => 'test-id-123',
}));

const JWT_SECRET = 'test-secret';
const WEBHOOK_SECRET = 'whsec_test_secret';
const auth = { jwtSecret: JWT_SECRET, issuer: 'ticket-checkout' };

const FLEX_TICKET_ID = '44444444-4444-4444-8444-444444444444';
const SCARCE_TICKET_ID = '55555555-5555-4555-8555-555555555555';
const ORDER_ID = makeOrder().id;

function tokenFor(userId: string, options: SignOptions = {}): string {
  return jwt.sign({ sub: userId, email: 'buyer@example.com' }, JWT_SECRET, {
    algorithm: 'HS256',
    issuer: 'ticket-checkout',
    expiresIn: '1h',
    ...options,
  });
}

class FakeCatalog implements TicketCatalog, EventCatalog {
  constructor(
    private readonly tickets: Ticket[],
    private readonly events: Event[]
  ) {}

  async getTicket(ticketId: string): Promise<Ticket | null> {
    return this.tickets.find((ticket) => ticket.id === ticketId) ?? null;
  }

  async getEvent(eventId: string): Promise<Event | null> {
    return this.events.find((event) => event.id === eventId) ?? null;
  }
}

describe('API Integration Tests', () => {
  const signer = new Stripe('sk_test_placeholder');
  let app: Express;
  let repository: InMemoryOrderRepository;
  let gateway: FakeGateway;

  beforeEach(() => {
    const tickets = [
      makeTicket(),
      makeTicket({
        id: FLEX_TICKET_ID,
        pricingModel: 'flexible',
        basePriceCents: 2000,
        minimumPriceCents: 1000,
      }),
      makeTicket({ id: SCARCE_TICKET_ID, quantity: 2 }),
    ];
    const catalog = new FakeCatalog(tickets, [makeEvent()]);
    repository = new InMemoryOrderRepository(tickets, [
      makeOrder({ paymentReference: 'pi_1', stripeSessionId: 'cs_1' }),
    ]);

    const stripeGateway = new StripeGateway({
      secretKey: 'sk_test_placeholder',
      webhookSecret: WEBHOOK_SECRET,
      timeoutMs: 1000,
      maxNetworkRetries: 0,
      webhookToleranceSeconds: 300,
    });
    gateway = new FakeGateway();
    gateway.verifyWebhookSignature.mockImplementation((body, header) =>
      stripeGateway.verifyWebhookSignature(body, header)
    );
    gateway.createCheckoutSession.mockResolvedValue({
      sessionId: 'cs_test_new',
      checkoutUrl: 'https://checkout.stripe.test/cs_test_new',
      paymentReference: null,
    });

    const orders = new OrderStore(repository, new InventoryGuard({ maxQuantityPerOrder: 10 }));

    app = createApp({
      auth,
      orders,
      checkout: new CheckoutService({
        tickets: catalog,
        events: catalog,
        orders,
        gateway,
        options: { publicBaseUrl: 'https://tickets.test', sessionTtlMinutes: 35 },
      }),
      reconciliation: new ReconciliationService(orders, gateway),
      webhooks: new WebhookIngestor({
        gateway,
        orders,
        processedEvents: new MemoryProcessedEventStore(),
        audit: { record: jest.fn().mockResolvedValue(undefined) },
        retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, useJitter: false },
      }),
    });
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body).toEqual({ status: 'ok', timestamp: expect.any(String) });
    });
  });

  describe('GET /metrics', () => {
    it('should expose checkout counters', async () => {
      const response = await request(app).get('/metrics').expect(200);

      expect(response.text).toContain('# TYPE checkout_orders_created_total counter');
    });
  });

  describe('authentication', () => {
    it('should reject a request without a token', async () => {
      const response = await request(app)
        .post('/api/checkout/sessions')
        .send({ ticket_id: TICKET_ID, quantity: 1 })
        .expect(401);

      expect(response.body).toEqual({ error: 'Authentication required' });
    });

    it('should reject a token signed with another secret', async () => {
      const forged = jwt.sign({ sub: BUYER_ID }, 'other-secret', { issuer: 'ticket-checkout' });

      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${forged}`)
        .send({ ticket_id: TICKET_ID, quantity: 1 })
        .expect(401);

      expect(response.body).toEqual({ error: 'Invalid token' });
    });

    it('should reject a token from another issuer', async () => {
      await request(app)
        .get(`/api/orders/${ORDER_ID}`)
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID, { issuer: 'someone-else' })}`)
        .expect(401);
    });
  });

  describe('POST /api/checkout/sessions', () => {
    it('should start a checkout', async () => {
      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .send({ ticket_id: TICKET_ID, quantity: 2 })
        .expect(200);

      expect(response.body).toEqual({
        success: true,
        checkout_url: 'https://checkout.stripe.test/cs_test_new',
        session_id: 'cs_test_new',
        order_id: expect.any(String),
      });
      const order = repository.orders.get(response.body.order_id);
      expect(order?.userId).toBe(BUYER_ID);
      expect(order?.totalCents).toBe(5000);
    });

    it('should return 404 for an unknown ticket', async () => {
      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .send({ ticket_id: 999, quantity: 1 })
        .expect(404);

      expect(response.body).toEqual({ error: 'Ticket not found' });
    });

    it('should return 422 below the minimum price', async () => {
      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .send({ ticket_id: FLEX_TICKET_ID, quantity: 1, custom_price_cents: 500 })
        .expect(422);

      expect(response.body).toEqual({ error: 'Price is below minimum required amount' });
    });

    it('should return 422 when not enough tickets remain', async () => {
      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .send({ ticket_id: SCARCE_TICKET_ID, quantity: 5 })
        .expect(422);

      expect(response.body).toEqual({ error: 'Ticket is no longer available' });
      expect(repository.orders.size).toBe(1);
    });

    it('should return 400 for a custom price above the limit', async () => {
      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .send({ ticket_id: FLEX_TICKET_ID, quantity: 1, custom_price_cents: 3_000_000_000 })
        .expect(400);

      expect(response.body).toEqual({ error: 'Unit price exceeds the maximum of 99999999 cents' });
      expect(repository.orders.size).toBe(1);
    });

    it('should return 400 for a non-numeric quantity', async () => {
      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .send({ ticket_id: TICKET_ID, quantity: 'two' })
        .expect(400);

      expect(response.body).toEqual({ error: 'Quantity must be a positive whole number' });
    });

    it('should return 400 for a malformed JSON body', async () => {
      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .set('Content-Type', 'application/json')
        .send('{"ticket_id":')
        .expect(400);

      expect(response.body).toEqual({ error: 'Invalid request body' });
    });

    it('should return 502 when the provider fails', async () => {
      gateway.createCheckoutSession.mockRejectedValue(
        new ProviderError('create_checkout_session', 'Request timed out')
      );

      const response = await request(app)
        .post('/api/checkout/sessions')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .send({ ticket_id: TICKET_ID, quantity: 1 })
        .expect(502);

      expect(response.body).toEqual({ error: 'Could not start payment' });
    });
  });

  describe('POST /api/checkout/sync/:order_id', () => {
    it('should confirm a paid order', async () => {
      gateway.getPaymentIntent.mockResolvedValue({ id: 'pi_1', status: 'succeeded' });

      const response = await request(app)
        .post(`/api/checkout/sync/${ORDER_ID}`)
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .expect(200);

      expect(response.body).toEqual({ order_id: ORDER_ID, status: 'confirmed', confirmed: true });
    });

    it('should report the current status when the provider fails', async () => {
      gateway.getPaymentIntent.mockRejectedValue(
        new ProviderError('get_payment_intent', 'Request timed out')
      );

      const response = await request(app)
        .post(`/api/checkout/sync/${ORDER_ID}`)
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .expect(200);

      expect(response.body).toEqual({ order_id: ORDER_ID, status: 'pending', confirmed: false });
      expect(repository.orders.get(ORDER_ID)?.status).toBe('pending');
    });

    it('should return 403 for another user', async () => {
      const response = await request(app)
        .post(`/api/checkout/sync/${ORDER_ID}`)
        .set('Authorization', `Bearer ${tokenFor('user-other')}`)
        .expect(403);

      expect(response.body).toEqual({ error: 'Access denied' });
    });

    it('should return 404 for an unknown order', async () => {
      const response = await request(app)
        .post('/api/checkout/sync/99999999-9999-4999-8999-999999999999')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .expect(404);

      expect(response.body).toEqual({ error: 'Order not found' });
    });
  });

  describe('GET /api/orders', () => {
    it('should list only the caller\'s orders, newest first', async () => {
      const newerId = '66666666-6666-4666-8666-666666666666';
      repository.orders.set(
        newerId,
        makeOrder({ id: newerId, status: 'confirmed', createdAt: new Date('2026-03-05T09:00:00Z') })
      );
      const otherId = '77777777-7777-4777-8777-777777777777';
      repository.orders.set(otherId, makeOrder({ id: otherId, userId: 'user-other' }));

      const response = await request(app)
        .get('/api/orders')
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .expect(200);

      expect(response.body.orders.map((order: { order_id: string }) => order.order_id)).toEqual([
        newerId,
        ORDER_ID,
      ]);
      expect(response.body.orders[0]).toMatchObject({
        status: 'confirmed',
        total_cents: 5000,
        created_at: '2026-03-05T09:00:00.000Z',
      });
    });

    it('should return an empty list for a buyer without orders', async () => {
      const response = await request(app)
        .get('/api/orders')
        .set('Authorization', `Bearer ${tokenFor('user-new')}`)
        .expect(200);

      expect(response.body).toEqual({ orders: [] });
    });

    it('should require authentication', async () => {
      await request(app).get('/api/orders').expect(401);
    });
  });

  describe('GET /api/orders/:order_id', () => {
    it('should return the order view to its owner', async () => {
      const response = await request(app)
        .get(`/api/orders/${ORDER_ID}`)
        .set('Authorization', `Bearer ${tokenFor(BUYER_ID)}`)
        .expect(200);

      expect(response.body).toMatchObject({
        order_id: ORDER_ID,
        status: 'pending',
        quantity: 2,
        subtotal_cents: 5000,
        tip_cents: 0,
        total_cents: 5000,
        currency: 'usd',
        confirmed_at: null,
        created_at: '2026-03-01T12:00:00.000Z',
      });
      expect(response.body.pricing_snapshot).toMatchObject({ unitPriceCents: 2500, quantity: 2 });
    });

    it('should return 403 for another user', async () => {
      await request(app)
        .get(`/api/orders/${ORDER_ID}`)
        .set('Authorization', `Bearer ${tokenFor('user-other')}`)
        .expect(403);
    });
  });

  describe('POST /webhooks/stripe', () => {
    const payload = JSON.stringify({
      id: 'evt_api_1',
      type: 'payment_intent.succeeded',
      data: { object: { id: 'pi_1' } },
    });

    it('should confirm the order for a signed delivery', async () => {
      const header = signer.webhooks.generateTestHeaderString({ payload, secret: WEBHOOK_SECRET });

      const response = await request(app)
        .post('/webhooks/stripe')
        .set('Content-Type', 'application/json')
        .set('stripe-signature', header)
        .send(payload)
        .expect(200);

      expect(response.body).toEqual({ received: true });
      expect(repository.orders.get(ORDER_ID)?.status).toBe('confirmed');
      expect(repository.orders.get(ORDER_ID)?.confirmedAt).toBeInstanceOf(Date);
    });

    it('should return 400 for an invalid signature and leave orders alone', async () => {
      const findSpy = jest.spyOn(repository, 'findByPaymentReference');

      const response = await request(app)
        .post('/webhooks/stripe')
        .set('Content-Type', 'application/json')
        .set('stripe-signature', 't=1700000000,v1=deadbeef')
        .send(payload)
        .expect(400);

      expect(response.body).toEqual({ error: 'Invalid signature format' });
      expect(findSpy).not.toHaveBeenCalled();
      expect(repository.orders.get(ORDER_ID)?.status).toBe('pending');
    });

    it('should return 400 when the signature header is missing', async () => {
      const response = await request(app)
        .post('/webhooks/stripe')
        .set('Content-Type', 'application/json')
        .send(payload)
        .expect(400);

      expect(response.body).toEqual({ error: 'Invalid signature format' });
    });

    it('should return 500 when storage stays unavailable', async () => {
      repository.failures = 3;
      const header = signer.webhooks.generateTestHeaderString({ payload, secret: WEBHOOK_SECRET });

      const response = await request(app)
        .post('/webhooks/stripe')
        .set('Content-Type', 'application/json')
        .set('stripe-signature', header)
        .send(payload)
        .expect(500);

      expect(response.body).toEqual({ error: 'Internal server error' });
    });
  });
});
