import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { PostgreSqlDriver } from '@mikro-orm/postgresql';
import { ScheduleModule } from '@nestjs/schedule';
import configuration, { DatabaseConfig } from './config/configuration';
import { CommonModule } from './common/common.module';
import { RateLimitGuard } from './common/guards/rate-limit.guard';
import { UserModule } from './modules/user/user.module';
import { AuthModule } from './modules/auth/auth.module';
import { ActivityModule } from './modules/activity/activity.module';
import { CatalogModule } from './modules/catalog/catalog.module';
import { SubscriptionModule } from './modules/subscription/subscription.module';
import { ContentModule } from './modules/content/content.module';
import { CouponModule } from './modules/coupon/coupon.module';
import { CartModule } from './modules/cart/cart.module';
import { PaymentModule } from './modules/payment/payment.module';
import { OrderModule } from './modules/order/order.module';
import { WebhookModule } from './modules/webhook/webhook.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    MikroOrmModule.forRootAsync({
      inject: [ConfigService],
      driver: PostgreSqlDriver,
      useFactory: (configService: ConfigService) => {
        const database = configService.getOrThrow<DatabaseConfig>('config.database');
        return {
          driver: PostgreSqlDriver,
          host: database.host,
          port: database.port,
          user: database.username,
          password: database.password,
          dbName: database.database,
          autoLoadEntities: true,
          debug: configService.get('NODE_ENV') === 'development',
        };
      },
    }),
    ScheduleModule.forRoot(),
    CommonModule,
    UserModule,
    AuthModule,
    ActivityModule,
    CatalogModule,
    SubscriptionModule,
    ContentModule,
    CouponModule,
    CartModule,
    PaymentModule,
    OrderModule,
    WebhookModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: RateLimitGuard }],
})
export class AppModule {}
