import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from '@mikro-orm/core';
import Stripe from 'stripe';
import { PaymentIntent } from '../entities/payment-intent.entity';
import { Order } from '../../order/entities/order.entity';

@Injectable()
export class PaymentIntentService {
  private readonly logger = new Logger(PaymentIntentService.name);

  constructor(private readonly em: EntityManager) {}

  /**
   * Queues the tracking record for a freshly created intent. The caller's
   * transaction flushes it.
   */
  record(order: Order, intent: Stripe.PaymentIntent): PaymentIntent {
    const record = this.em.create(PaymentIntent, {
      stripePaymentIntentId: intent.id,
      order,
      amount: intent.amount,
      currency: intent.currency,
      status: intent.status,
    });
    this.em.persist(record);
    return record;
  }

  /**
   * Copies the provider status and raw callback onto the tracking record.
   * Returns false when no record exists for the intent.
   */
  async updateFromWebhook(intent: Stripe.PaymentIntent): Promise<boolean> {
    const record = await this.em.findOne(PaymentIntent, { stripePaymentIntentId: intent.id });
    if (!record) {
      this.logger.warn(`No payment intent record for ${intent.id}`);
      return false;
    }

    record.status = intent.status;
    record.paymentMethodType = intent.payment_method_types[0] ?? record.paymentMethodType;
    record.lastFour = cardLastFour(intent) ?? record.lastFour;
    record.webhookData = intent;
    this.em.persist(record);
    return true;
  }
}

function cardLastFour(intent: Stripe.PaymentIntent): string | undefined {
  const method = intent.payment_method;
  if (method && typeof method !== 'string') {
    return method.card?.last4;
  }
  return undefined;
}
