import { Router } from 'express';
import type { AppConfig } from '../config';
import type { CheckoutService } from '../services/checkoutService';
import type { OrderStore } from '../services/orders';
import type { ReconciliationService } from '../services/reconciliationService';
import { requireUser } from './middleware/requireUser';
import { createCheckoutRouter } from './routes/checkout';
import { createOrdersRouter } from './routes/orders';

export interface ApiDeps {
  auth: AppConfig['auth'];
  checkout: CheckoutService;
  reconciliation: ReconciliationService;
  orders: OrderStore;
}

export function createApiRouter(deps: ApiDeps): Router {
  const router: Router = Router();

  router.use(requireUser(deps.auth));
  router.use(
    '/checkout',
    createCheckoutRouter({ checkout: deps.checkout, reconciliation: deps.reconciliation })
  );
  router.use('/orders', createOrdersRouter(deps.orders));

  return router;
}
