import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { CreateRequestContext, MikroORM } from '@mikro-orm/core';
import { SubscriptionService } from './subscription.service';
import { errorMessage, errorStack } from '../../../common/utils/error.util';

@Injectable()
export class SubscriptionExpiryScheduler {
  private readonly logger = new Logger(SubscriptionExpiryScheduler.name);

  constructor(
    private readonly orm: MikroORM,
    private readonly subscriptionService: SubscriptionService,
  ) {}

  @Cron(CronExpression.EVERY_HOUR)
  @CreateRequestContext()
  async expireLapsedSubscriptions(): Promise<void> {
    try {
      const expired = await this.subscriptionService.expireLapsed(new Date());
      if (expired > 0) {
        this.logger.log(`Marked ${expired} subscriptions as expired`);
      }
    } catch (error) {
      this.logger.error(`Subscription expiry sweep failed: ${errorMessage(error)}`, errorStack(error));
    }
  }
}
