import { Injectable, Logger } from '@nestjs/common';
import Stripe from 'stripe';
import { OrderService } from '../../order/services/order.service';
import { WebhookHandlerResult } from './webhook-handler-result';

@Injectable()
export class PaymentIntentFailedHandler {
  private readonly logger = new Logger(PaymentIntentFailedHandler.name);

  constructor(private readonly orderService: OrderService) {}

  async handle(paymentIntent: Stripe.PaymentIntent): Promise<WebhookHandlerResult> {
    this.logger.log(`Processing payment_intent.payment_failed: ${paymentIntent.id}`);

    const orderId = paymentIntent.metadata?.order_id;
    if (!orderId) {
      this.logger.warn(`Payment intent ${paymentIntent.id} carries no order id`);
      return { handled: false, outcome: 'missing_order_id' };
    }

    const result = await this.orderService.markAsFailed(orderId, paymentIntent);
    if (result.status === 'not_found') {
      this.logger.warn(`Payment intent ${paymentIntent.id} references unknown order ${orderId}`);
      return { handled: false, outcome: 'order_not_found', orderId };
    }

    return { handled: result.status === 'failed', outcome: result.status, orderId };
  }
}
