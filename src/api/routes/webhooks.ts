import express, { Router, Request, Response, NextFunction } from 'express';
import type { Router as RouterType } from 'express';
import type { WebhookIngestor } from '../../services/webhookService';

/**
 * Provider webhooks. Mounted ahead of express.json() so the signature is
 * checked against the exact bytes that were signed.
 */
export function createWebhooksRouter(ingestor: WebhookIngestor): RouterType {
  const router: RouterType = Router();

  /**
   * POST /webhooks/stripe
   * 200 {received:true} for every recognised outcome, 400 on a bad signature,
   * 500 when the order store stays unavailable (the provider will redeliver)
   */
  router.post(
    '/stripe',
    express.raw({ type: '*/*' }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const signature = req.get('stripe-signature');
        const rawBody: unknown = req.body;
        const body = Buffer.isBuffer(rawBody) ? rawBody : Buffer.alloc(0);

        await ingestor.ingest(body, signature);

        res.status(200).json({ received: true });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
