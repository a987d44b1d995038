import { Module } from '@nestjs/common';
import { StripeWebhookController } from './controllers/stripe-webhook.controller';
import { StripeWebhookGuard } from './guards/stripe-webhook.guard';
import { StripeWebhookService } from './services/stripe-webhook.service';
import { PaymentIntentSucceededHandler } from './handlers/payment-intent-succeeded.handler';
import { PaymentIntentFailedHandler } from './handlers/payment-intent-failed.handler';
import { OrderModule } from '../order/order.module';
import { PaymentModule } from '../payment/payment.module';

@Module({
  imports: [OrderModule, PaymentModule],
  controllers: [StripeWebhookController],
  providers: [
    StripeWebhookGuard,
    StripeWebhookService,
    PaymentIntentSucceededHandler,
    PaymentIntentFailedHandler,
  ],
})
export class WebhookModule {}
