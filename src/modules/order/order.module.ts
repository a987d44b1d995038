import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { Order } from './entities/order.entity';
import { OrderItem } from './entities/order-item.entity';
import { CheckoutService } from './services/checkout.service';
import { OrderService } from './services/order.service';
import { CheckoutController } from './controllers/checkout.controller';
import { OrderController } from './controllers/order.controller';
import { CartModule } from '../cart/cart.module';
import { CouponModule } from '../coupon/coupon.module';
import { PaymentModule } from '../payment/payment.module';
import { SubscriptionModule } from '../subscription/subscription.module';

@Module({
  imports: [
    MikroOrmModule.forFeature([Order, OrderItem]),
    CartModule,
    CouponModule,
    PaymentModule,
    SubscriptionModule,
  ],
  controllers: [CheckoutController, OrderController],
  providers: [CheckoutService, OrderService],
  exports: [OrderService],
})
export class OrderModule {}
