import { Injectable, Logger } from '@nestjs/common';
import Stripe from 'stripe';
import { OrderService } from '../../order/services/order.service';
import { WebhookHandlerResult } from './webhook-handler-result';

@Injectable()
export class PaymentIntentSucceededHandler {
  private readonly logger = new Logger(PaymentIntentSucceededHandler.name);

  constructor(private readonly orderService: OrderService) {}

  /**
   * Settles the order named in the intent metadata. Unknown orders are
   * acknowledged so Stripe stops redelivering; anything else that fails
   * propagates and the delivery is retried.
   */
  async handle(paymentIntent: Stripe.PaymentIntent): Promise<WebhookHandlerResult> {
    this.logger.log(`Processing payment_intent.succeeded: ${paymentIntent.id}`);

    const orderId = paymentIntent.metadata?.order_id;
    if (!orderId) {
      this.logger.warn(`Payment intent ${paymentIntent.id} carries no order id`);
      return { handled: false, outcome: 'missing_order_id' };
    }

    const result = await this.orderService.markAsPaid(orderId, paymentIntent);
    if (result.status === 'not_found') {
      this.logger.warn(`Payment intent ${paymentIntent.id} references unknown order ${orderId}`);
      return { handled: false, outcome: 'order_not_found', orderId };
    }

    return { handled: result.status === 'paid', outcome: result.status, orderId };
  }
}
