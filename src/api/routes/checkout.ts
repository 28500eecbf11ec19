import { Router, Request, Response, NextFunction } from 'express';
import type { Router as RouterType } from 'express';
import type { CheckoutRequest, CheckoutService } from '../../services/checkoutService';
import type { ReconciliationService } from '../../services/reconciliationService';
import { ValidationError } from '../../utils/errors';
import { parseOptionalCents } from '../../utils/helpers';
import { currentUser } from '../middleware/requireUser';

export interface CheckoutRouterDeps {
  checkout: CheckoutService;
  reconciliation: ReconciliationService;
}

function parseCheckoutBody(body: unknown): CheckoutRequest {
  if (typeof body !== 'object' || body === null) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const fields: Record<string, unknown> = { ...body };

  const ticketId = fields.ticket_id;
  if (typeof ticketId !== 'string' && typeof ticketId !== 'number') {
    throw new ValidationError('ticket_id is required');
  }

  const quantity = parseOptionalCents(fields.quantity);
  if (quantity === undefined || quantity === null) {
    throw new ValidationError('Quantity must be a positive whole number');
  }

  const customPriceCents = parseOptionalCents(fields.custom_price_cents);
  if (customPriceCents === undefined) {
    throw new ValidationError('custom_price_cents must be a whole number of cents');
  }

  const tipCents = parseOptionalCents(fields.tip_cents);
  if (tipCents === undefined) {
    throw new ValidationError('tip_cents must be a whole number of cents');
  }

  return { ticketId: String(ticketId), quantity, customPriceCents, tipCents };
}

export function createCheckoutRouter(deps: CheckoutRouterDeps): RouterType {
  const router: RouterType = Router();

  /**
   * POST /api/checkout/sessions
   * Creates a pending order and a hosted checkout session for it
   */
  router.post('/sessions', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const result = await deps.checkout.startCheckout(user, parseCheckoutBody(req.body));

      res.json({
        success: true,
        checkout_url: result.checkoutUrl,
        session_id: result.sessionId,
        order_id: result.orderId,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/checkout/sync/:order_id
   * Pulls payment status from the provider and confirms the order if paid
   */
  router.post('/sync/:order_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const result = await deps.reconciliation.sync(req.params.order_id, user);

      res.json({
        order_id: result.orderId,
        status: result.status,
        confirmed: result.confirmed,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
