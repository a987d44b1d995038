import { RawBodyRequest } from '@nestjs/common';
import { Request } from 'express';
import Stripe from 'stripe';

/** Set by `StripeWebhookGuard` once the signature has been verified. */
export interface StripeWebhookRequest extends RawBodyRequest<Request> {
  stripeEvent?: Stripe.Event;
}
