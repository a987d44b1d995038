import { Injectable, Logger } from '@nestjs/common';
import Stripe from 'stripe';
import { IdempotencyService } from '../../../common/services/idempotency.service';
import { PaymentIntentSucceededHandler } from '../handlers/payment-intent-succeeded.handler';
import { PaymentIntentFailedHandler } from '../handlers/payment-intent-failed.handler';
import { WebhookHandlerResult } from '../handlers/webhook-handler-result';

export interface WebhookProcessResult {
  eventId: string;
  eventType: string;
  processed: boolean;
  cached: boolean;
  outcome: string;
}

const IDEMPOTENCY_TTL_SECONDS = 24 * 60 * 60;

@Injectable()
export class StripeWebhookService {
  private readonly logger = new Logger(StripeWebhookService.name);

  constructor(
    private readonly idempotencyService: IdempotencyService,
    private readonly succeededHandler: PaymentIntentSucceededHandler,
    private readonly failedHandler: PaymentIntentFailedHandler,
  ) {}

  /**
   * Runs the handler for a verified event once per event id. Redelivered
   * events return the stored outcome; handler errors are not stored and
   * reach the caller.
   */
  async handleEvent(event: Stripe.Event): Promise<WebhookProcessResult> {
    this.logger.log(`Processing Stripe webhook event: ${event.id} (${event.type})`);

    const { result, cached } = await this.idempotencyService.executeWithIdempotency(
      event.id,
      () => this.dispatch(event),
      { keyPrefix: 'stripe_webhook', ttl: IDEMPOTENCY_TTL_SECONDS },
    );

    if (cached) {
      this.logger.log(`Event ${event.id} already processed, returning cached result`);
    }

    return {
      eventId: event.id,
      eventType: event.type,
      processed: result.handled,
      cached,
      outcome: result.outcome,
    };
  }

  private async dispatch(event: Stripe.Event): Promise<WebhookHandlerResult> {
    switch (event.type) {
      case 'payment_intent.succeeded':
        return this.succeededHandler.handle(event.data.object as Stripe.PaymentIntent);
      case 'payment_intent.payment_failed':
        return this.failedHandler.handle(event.data.object as Stripe.PaymentIntent);
      default:
        this.logger.log(`Ignoring unhandled event type: ${event.type}`);
        return { handled: false, outcome: 'ignored' };
    }
  }
}
