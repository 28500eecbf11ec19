import type { Redis } from 'ioredis';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const PROCESSED_KEY_PREFIX = 'webhook:processed:';

/**
 * Remembers which provider events were already handled so redeliveries can
 * be acknowledged without dispatch.
 */
export interface ProcessedEventStore {
  isProcessed(eventId: string): Promise<boolean>;
  markProcessed(eventId: string): Promise<void>;
}

/**
 * Redis-backed store with a TTL per event id. Redis being unavailable only
 * costs a redundant dispatch, so failures are logged and treated as "not seen".
 */
export class RedisProcessedEventStore implements ProcessedEventStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number
  ) {}

  async isProcessed(eventId: string): Promise<boolean> {
    try {
      return (await this.redis.exists(`${PROCESSED_KEY_PREFIX}${eventId}`)) === 1;
    } catch (error) {
      logger.warn('[Dedup] Processed-event lookup failed', { eventId, error: errorMessage(error) });
      return false;
    }
  }

  async markProcessed(eventId: string): Promise<void> {
    try {
      await this.redis.set(`${PROCESSED_KEY_PREFIX}${eventId}`, '1', 'EX', this.ttlSeconds);
    } catch (error) {
      logger.warn('[Dedup] Failed to mark event processed', { eventId, error: errorMessage(error) });
    }
  }
}
