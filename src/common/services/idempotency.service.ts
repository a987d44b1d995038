import { Inject, Injectable, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { createHash } from 'crypto';
import { REDIS_CLIENT } from '../redis/redis.provider';
import { errorMessage } from '../utils/error.util';

export interface IdempotencyResult<T> {
  isProcessed: boolean;
  result?: T;
  processedAt?: Date;
}

export interface IdempotencyConfig {
  ttl?: number; // seconds, default 24 hours
  keyPrefix?: string;
}

interface CachedEntry<T> {
  result: T;
  processedAt: string;
  eventId: string;
}

@Injectable()
export class IdempotencyService {
  private readonly logger = new Logger(IdempotencyService.name);
  private readonly defaultTtl = 24 * 60 * 60;
  private readonly keyPrefix = 'idempotency:';

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  generateIdempotencyKey(eventId: string, eventType?: string): string {
    const baseKey = eventType ? `${eventType}:${eventId}` : eventId;
    return this.keyPrefix + this.hashKey(baseKey);
  }

  async markAsProcessed<T>(eventId: string, result: T, config?: IdempotencyConfig): Promise<void> {
    const key = this.generateIdempotencyKey(eventId, config?.keyPrefix);
    const ttl = config?.ttl || this.defaultTtl;
    const entry: CachedEntry<T> = {
      result,
      processedAt: new Date().toISOString(),
      eventId,
    };

    await this.redis.setex(key, ttl, JSON.stringify(entry));
    this.logger.debug(`Marked event ${eventId} as processed with TTL ${ttl}s`);
  }

  async getIdempotencyInfo<T>(eventId: string, eventType?: string): Promise<IdempotencyResult<T>> {
    try {
      const key = this.generateIdempotencyKey(eventId, eventType);
      const cachedData = await this.redis.get(key);

      if (!cachedData) {
        return { isProcessed: false };
      }

      const parsed: CachedEntry<T> = JSON.parse(cachedData);
      return {
        isProcessed: true,
        result: parsed.result,
        processedAt: new Date(parsed.processedAt),
      };
    } catch (error) {
      this.logger.error(`Error getting idempotency info for event ${eventId}: ${errorMessage(error)}`);
      return { isProcessed: false };
    }
  }

  /**
   * Runs `operation` once per event id. A repeated event id returns the
   * cached result instead of running the operation again.
   */
  async executeWithIdempotency<T>(
    eventId: string,
    operation: () => Promise<T>,
    config?: IdempotencyConfig,
  ): Promise<{ result: T; cached: boolean }> {
    const existing = await this.getIdempotencyInfo<T>(eventId, config?.keyPrefix);
    if (existing.isProcessed && existing.result !== undefined) {
      this.logger.debug(`Returning cached result for event ${eventId}`);
      return { result: existing.result, cached: true };
    }

    const result = await operation();

    try {
      await this.markAsProcessed(eventId, result, config);
    } catch (error) {
      this.logger.error(`Error marking event ${eventId} as processed: ${errorMessage(error)}`);
    }

    return { result, cached: false };
  }

  private hashKey(key: string): string {
    return createHash('sha256').update(key).digest('hex').substring(0, 32);
  }
}
