import { Inject, Injectable, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from '../redis/redis.provider';
import { errorMessage } from '../utils/error.util';

export interface RateLimitDecision {
  allowed: boolean;
  count: number;
  limit: number;
  remaining: number;
  resetAt: Date;
}

/**
 * Fixed-window request counter kept in Redis, so every API instance sees
 * the same count for a client identity.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly keyPrefix = 'ratelimit:';

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async hit(identity: string, limit: number, windowSeconds: number, now: Date = new Date()): Promise<RateLimitDecision> {
    const windowMs = windowSeconds * 1000;
    const windowIndex = Math.floor(now.getTime() / windowMs);
    const resetAt = new Date((windowIndex + 1) * windowMs);
    const key = `${this.keyPrefix}${identity}:${windowIndex}`;

    try {
      const count = await this.redis.incr(key);
      if (count === 1) {
        await this.redis.expire(key, windowSeconds);
      }

      return {
        allowed: count <= limit,
        count,
        limit,
        remaining: Math.max(0, limit - count),
        resetAt,
      };
    } catch (error) {
      this.logger.error(`Rate limit counter unavailable for ${identity}: ${errorMessage(error)}`);
      return { allowed: true, count: 0, limit, remaining: limit, resetAt };
    }
  }
}
