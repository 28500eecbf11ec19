export { OrderStore } from './orderStore';
export { DrizzleOrderRepository } from './drizzleOrderRepository';
export * from './types';
