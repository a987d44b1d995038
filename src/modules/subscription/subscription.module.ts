import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { PackageSubscription } from './entities/package-subscription.entity';
import { SubscriptionService } from './services/subscription.service';
import { SubscriptionExpiryScheduler } from './services/subscription-expiry.scheduler';
import { SubscriptionController } from './controllers/subscription.controller';
import { PackageAccessGuard } from './guards/package-access.guard';
import { CatalogModule } from '../catalog/catalog.module';
import { ActivityModule } from '../activity/activity.module';

@Module({
  imports: [MikroOrmModule.forFeature([PackageSubscription]), CatalogModule, ActivityModule],
  controllers: [SubscriptionController],
  providers: [SubscriptionService, SubscriptionExpiryScheduler, PackageAccessGuard],
  exports: [SubscriptionService, PackageAccessGuard, CatalogModule, ActivityModule],
})
export class SubscriptionModule {}
