import winston from 'winston';

const isProduction = process.env.NODE_ENV === 'production';

// Human-readable output for local development
const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} [${level}] ${message} ${metaStr}`;
  })
);

// Structured JSON in production
const prodFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  format: isProduction ? prodFormat : devFormat,
  defaultMeta: {
    service: 'ticket-checkout',
  },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
  exitOnError: false,
});

