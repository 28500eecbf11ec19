import express, { Express } from 'express';
import morgan from 'morgan';
import { createApiRouter, type ApiDeps } from './api';
import { errorHandler } from './api/middleware/errorHandler';
import { createWebhooksRouter } from './api/routes/webhooks';
import type { WebhookIngestor } from './services/webhookService';
import { logger } from './utils/logger';
import { getMetrics } from './utils/metrics';

export interface AppDeps extends ApiDeps {
  webhooks: WebhookIngestor;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(morgan('combined', { skip: () => process.env.NODE_ENV === 'test' }));

  // Raw body for signature checks; must come before express.json()
  app.use('/webhooks', createWebhooksRouter(deps.webhooks));

  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Prometheus metrics endpoint
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', 'text/plain; version=0.0.4');
      const metrics = await getMetrics();
      res.send(metrics);
    } catch (error) {
      logger.error('Error generating metrics:', error);
      res.status(500).send('Error generating metrics');
    }
  });

  app.use('/api', createApiRouter(deps));

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
