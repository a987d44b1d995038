import {
  BadRequestException,
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Stripe from 'stripe';
import { StripeService } from '../../payment/services/stripe.service';
import { StripeWebhookRequest } from '../interfaces/stripe-webhook-request.interface';
import { getClientIp } from '../../../common/utils/client-ip.util';
import { errorMessage } from '../../../common/utils/error.util';

@Injectable()
export class StripeWebhookGuard implements CanActivate {
  private readonly logger = new Logger(StripeWebhookGuard.name);
  private readonly webhookSecret: string;
  private readonly allowedIps: string[];

  constructor(
    private readonly configService: ConfigService,
    private readonly stripeService: StripeService,
  ) {
    const secret = this.configService.get<string>('STRIPE_WEBHOOK_SECRET');
    if (!secret) {
      this.logger.error('STRIPE_WEBHOOK_SECRET is not configured');
      throw new Error('Stripe webhook secret is required');
    }
    this.webhookSecret = secret;

    this.allowedIps = (this.configService.get<string>('STRIPE_WEBHOOK_ALLOWED_IPS') ?? '')
      .split(',')
      .map((ip) => ip.trim())
      .filter((ip) => ip.length > 0);
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<StripeWebhookRequest>();
    const signature = request.headers['stripe-signature'];

    if (typeof signature !== 'string' || signature.length === 0) {
      this.logger.warn('Missing Stripe signature header');
      throw new UnauthorizedException('Missing Stripe signature');
    }

    if (this.allowedIps.length > 0) {
      const clientIp = getClientIp(request);
      if (!this.allowedIps.includes(clientIp)) {
        this.logger.warn(`Webhook request from unauthorized IP: ${clientIp}`);
        throw new UnauthorizedException('Unauthorized source IP');
      }
    }

    // Signatures are computed over the exact bytes Stripe sent.
    const payload = request.rawBody ?? (typeof request.body === 'string' ? request.body : undefined);
    if (!payload) {
      this.logger.warn('Missing request body for signature verification');
      throw new BadRequestException('Missing request body');
    }

    let event: Stripe.Event;
    try {
      event = this.stripeService.constructEvent(payload, signature, this.webhookSecret);
    } catch (error) {
      this.logger.warn(`Stripe webhook signature verification failed: ${errorMessage(error)}`);
      if (error instanceof Error && error.name === 'StripeSignatureVerificationError') {
        throw new UnauthorizedException('Invalid Stripe signature');
      }
      throw new BadRequestException('Invalid webhook payload');
    }

    request.stripeEvent = event;
    this.logger.debug(`Verified Stripe webhook event: ${event.id} (${event.type})`);
    return true;
  }
}
