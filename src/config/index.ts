export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '8000', 10),

  // Database configuration
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    database: process.env.DB_NAME || 'ticket_checkout',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || undefined,
    maxConnections: parseInt(process.env.DB_MAX_CONNECTIONS || '10', 10),
  },

  // Redis configuration
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD || undefined,
    db: parseInt(process.env.REDIS_DB || '0', 10),
  },

  // Stripe
  stripe: {
    secretKey: process.env.STRIPE_SECRET_KEY || '',
    webhookSecret: process.env.STRIPE_WEBHOOK_SECRET || '',
    timeoutMs: parseInt(process.env.STRIPE_TIMEOUT_MS || '10000', 10),
    maxNetworkRetries: parseInt(process.env.STRIPE_MAX_NETWORK_RETRIES || '1', 10),
    webhookToleranceSeconds: 300,
  },

  // Checkout
  checkout: {
    publicBaseUrl: process.env.PUBLIC_BASE_URL || 'http://localhost:3000',
    maxQuantityPerOrder: parseInt(process.env.CHECKOUT_MAX_PER_ORDER || '10', 10),
    sessionTtlMinutes: parseInt(process.env.CHECKOUT_SESSION_TTL_MINUTES || '35', 10),
    processedEventTtlSeconds: 86400, // 24 hours
  },

  // Bearer token verification
  auth: {
    jwtSecret: process.env.AUTH_JWT_SECRET || '',
    issuer: process.env.AUTH_JWT_ISSUER || 'ticket-checkout',
  },
};

export type AppConfig = typeof config;
