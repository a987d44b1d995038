import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Stripe from 'stripe';
import { Retry } from '../../../common/decorators/retry.decorator';
import { RetryConfigService } from '../../../common/services/retry-config.service';
import { errorMessage } from '../../../common/utils/error.util';

export type PaymentIntentMetadata = {
  order_id: string;
  order_number: string;
  user_id: string;
};

export interface CreatePaymentIntentParams {
  amount: number;
  currency: string;
  customerId?: string;
  receiptEmail?: string;
  description?: string;
  metadata: PaymentIntentMetadata;
  idempotencyKey: string;
}

@Injectable()
export class StripeService {
  private readonly logger = new Logger(StripeService.name);
  private readonly stripe: Stripe;

  constructor(
    private readonly configService: ConfigService,
    private readonly retryConfigService: RetryConfigService,
  ) {
    this.stripe = new Stripe(this.configService.get<string>('STRIPE_SECRET_KEY', ''), {
      apiVersion: '2023-08-16',
    });
  }

  get currency(): string {
    return this.configService.get<string>('STRIPE_CURRENCY', 'nok');
  }

  /**
   * The idempotency key makes a retried create return the intent from the
   * first attempt instead of authorizing twice.
   */
  @Retry()
  async createPaymentIntent(params: CreatePaymentIntentParams): Promise<Stripe.PaymentIntent> {
    try {
      return await this.stripe.paymentIntents.create(
        {
          amount: params.amount,
          currency: params.currency,
          customer: params.customerId,
          receipt_email: params.receiptEmail,
          description: params.description,
          metadata: { ...params.metadata },
          automatic_payment_methods: { enabled: true },
        },
        { idempotencyKey: params.idempotencyKey },
      );
    } catch (error) {
      this.logger.error(
        `Failed to create payment intent for order ${params.metadata.order_number}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }

  @Retry()
  async cancelPaymentIntent(paymentIntentId: string): Promise<Stripe.PaymentIntent> {
    try {
      return await this.stripe.paymentIntents.cancel(paymentIntentId);
    } catch (error) {
      this.logger.error(`Failed to cancel payment intent ${paymentIntentId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  @Retry()
  async createCustomer(email: string, name?: string): Promise<Stripe.Customer> {
    try {
      return await this.stripe.customers.create({ email, name });
    } catch (error) {
      this.logger.error(`Failed to create Stripe customer for ${email}: ${errorMessage(error)}`);
      throw error;
    }
  }

  constructEvent(payload: string | Buffer, signature: string, secret: string): Stripe.Event {
    return this.stripe.webhooks.constructEvent(payload, signature, secret);
  }
}
