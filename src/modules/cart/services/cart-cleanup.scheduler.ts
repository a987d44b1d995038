import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { CreateRequestContext, MikroORM } from '@mikro-orm/core';
import { CartService } from './cart.service';
import { errorMessage, errorStack } from '../../../common/utils/error.util';

@Injectable()
export class CartCleanupScheduler {
  private readonly logger = new Logger(CartCleanupScheduler.name);

  constructor(
    private readonly orm: MikroORM,
    private readonly cartService: CartService,
  ) {}

  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  @CreateRequestContext()
  async pruneAbandonedCarts(): Promise<void> {
    try {
      const removed = await this.cartService.pruneAbandonedSessionCarts(new Date());
      this.logger.log(`Pruned ${removed} abandoned session carts`);
    } catch (error) {
      this.logger.error(`Cart cleanup failed: ${errorMessage(error)}`, errorStack(error));
    }
  }
}
