import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RetryConfig } from '../interfaces/retry-config.interface';

@Injectable()
export class RetryConfigService {
  constructor(private readonly configService: ConfigService) {}

  getStripeConfig(): RetryConfig {
    return {
      maxAttempts: Number(this.configService.get('STRIPE_RETRY_MAX_ATTEMPTS', 3)),
      delay: Number(this.configService.get('STRIPE_RETRY_DELAY', 1000)),
      backoff: String(this.configService.get('STRIPE_RETRY_BACKOFF', 'true')) !== 'false',
      backoffFactor: Number(this.configService.get('STRIPE_RETRY_BACKOFF_FACTOR', 2)),
    };
  }
}
