import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { ShoppingCart } from './entities/shopping-cart.entity';
import { CartItem } from './entities/cart-item.entity';
import { CartService } from './services/cart.service';
import { CartCleanupScheduler } from './services/cart-cleanup.scheduler';
import { CartController } from './controllers/cart.controller';
import { SubscriptionModule } from '../subscription/subscription.module';
import { CouponModule } from '../coupon/coupon.module';

@Module({
  imports: [MikroOrmModule.forFeature([ShoppingCart, CartItem]), SubscriptionModule, CouponModule],
  controllers: [CartController],
  providers: [CartService, CartCleanupScheduler],
  exports: [CartService],
})
export class CartModule {}
