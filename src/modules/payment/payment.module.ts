import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { PaymentIntent } from './entities/payment-intent.entity';
import { StripeService } from './services/stripe.service';
import { PaymentIntentService } from './services/payment-intent.service';

@Module({
  imports: [MikroOrmModule.forFeature([PaymentIntent])],
  providers: [StripeService, PaymentIntentService],
  exports: [StripeService, PaymentIntentService],
})
export class PaymentModule {}
