import 'dotenv/config';
import { config } from './config';
import { initializeRedis, closeRedis } from './config/redis';
import { db, closeDatabase } from './db';
import { createApp } from './app';
import { DrizzleCatalog } from './services/catalogService';
import { CheckoutService } from './services/checkoutService';
import { InventoryGuard } from './services/inventoryService';
import { DrizzleOrderRepository, OrderStore } from './services/orders';
import { DrizzlePaymentEventAudit } from './services/paymentEventAudit';
import { createPaymentGateway } from './services/payments';
import { RedisProcessedEventStore } from './services/processedEventStore';
import { ReconciliationService } from './services/reconciliationService';
import { WebhookIngestor } from './services/webhookService';
import { logger } from './utils/logger';

async function startServer() {
  try {
    const redis = await initializeRedis();

    if (!config.stripe.secretKey || !config.stripe.webhookSecret) {
      logger.warn('Stripe keys are not configured; checkout and webhooks will fail');
    }
    if (!config.auth.jwtSecret) {
      logger.warn('AUTH_JWT_SECRET is not set; every API request will be rejected');
    }

    const inventory = new InventoryGuard({
      maxQuantityPerOrder: config.checkout.maxQuantityPerOrder,
    });
    const orders = new OrderStore(new DrizzleOrderRepository(db), inventory);
    const catalog = new DrizzleCatalog(db);
    const gateway = createPaymentGateway(config.stripe);

    const app = createApp({
      auth: config.auth,
      orders,
      checkout: new CheckoutService({
        tickets: catalog,
        events: catalog,
        orders,
        gateway,
        options: {
          publicBaseUrl: config.checkout.publicBaseUrl,
          sessionTtlMinutes: config.checkout.sessionTtlMinutes,
        },
      }),
      reconciliation: new ReconciliationService(orders, gateway),
      webhooks: new WebhookIngestor({
        gateway,
        orders,
        processedEvents: new RedisProcessedEventStore(redis, config.checkout.processedEventTtlSeconds),
        audit: new DrizzlePaymentEventAudit(db),
      }),
    });

    const server = app.listen(config.port, () => {
      logger.info(`Ticket checkout server listening on port ${config.port}`);
      logger.info(`Environment: ${config.nodeEnv}`);
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} signal received: closing HTTP server`);
      server.close(() => {
        Promise.all([closeRedis(), closeDatabase()])
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error('Error during shutdown:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
