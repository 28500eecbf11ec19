export * from './events';
export * from './tickets';
export * from './orders';
export * from './stripeEvents';
