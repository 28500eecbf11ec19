import { AppError } from './errors';
import { logger } from './logger';

export interface RetryConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  useJitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 2000,
  useJitter: true,
};

export function calculateBackoff(attempt: number, config: RetryConfig): number {
  const { baseDelayMs, maxDelayMs, useJitter } = config;

  // 100ms, 200ms, 400ms...
  let delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);

  // ±25%
  if (useJitter) {
    const jitter = delay * 0.25 * (Math.random() * 2 - 1);
    delay = Math.max(0, delay + jitter);
  }

  return Math.floor(delay);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Domain errors are answers, not faults; only unexpected failures
 * (database, network) are worth another attempt.
 */
export function isTransientError(error: unknown): boolean {
  return !(error instanceof AppError);
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (error: unknown, attempt: number) => boolean = isTransientError
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt + 1 >= config.maxAttempts) {
        logger.warn(`Retry limit reached (${config.maxAttempts} attempts)`);
        break;
      }

      if (!shouldRetry(error, attempt)) {
        break;
      }

      const delayMs = calculateBackoff(attempt, config);
      logger.info(`Retry attempt ${attempt + 2}/${config.maxAttempts} after ${delayMs}ms`, {
        error: error instanceof Error ? error.message : String(error),
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}
