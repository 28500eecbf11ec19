import { Router, Request, Response, NextFunction } from 'express';
import type { Router as RouterType } from 'express';
import type { Order, OrderStore } from '../../services/orders';
import { currentUser } from '../middleware/requireUser';

export function toOrderView(order: Order) {
  return {
    order_id: order.id,
    ticket_id: order.ticketId,
    event_id: order.eventId,
    status: order.status,
    quantity: order.quantity,
    subtotal_cents: order.subtotalCents,
    tip_cents: order.tipCents,
    total_cents: order.totalCents,
    currency: order.currency,
    pricing_snapshot: order.pricingSnapshot,
    confirmed_at: order.confirmedAt ? order.confirmedAt.toISOString() : null,
    created_at: order.createdAt.toISOString(),
  };
}

export function createOrdersRouter(orders: OrderStore): RouterType {
  const router: RouterType = Router();

  /**
   * GET /api/orders
   * The buyer's orders, newest first
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const list = await orders.listForUser(user.id);

      res.json({ orders: list.map(toOrderView) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/orders/:order_id
   * Read-only view of the buyer's own order
   */
  router.get('/:order_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const order = await orders.getOwned(req.params.order_id, user.id);

      res.json(toOrderView(order));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
