import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT, redisProvider } from './redis/redis.provider';
import { IdempotencyService } from './services/idempotency.service';
import { RateLimiterService } from './services/rate-limiter.service';
import { RetryConfigService } from './services/retry-config.service';

/**
 * Shared infrastructure: Redis client, idempotency store, rate limiting
 * counters and retry settings.
 */
@Global()
@Module({
  providers: [redisProvider, IdempotencyService, RateLimiterService, RetryConfigService],
  exports: [REDIS_CLIENT, IdempotencyService, RateLimiterService, RetryConfigService],
})
export class CommonModule implements OnApplicationShutdown {
  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async onApplicationShutdown(): Promise<void> {
    await this.redis.quit();
  }
}
