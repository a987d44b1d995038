import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { StripeWebhookService } from '../services/stripe-webhook.service';
import { StripeWebhookGuard } from '../guards/stripe-webhook.guard';
import { StripeWebhookRequest } from '../interfaces/stripe-webhook-request.interface';
import { SkipRateLimit } from '../../../common/decorators/skip-rate-limit.decorator';

export interface WebhookAcknowledgement {
  received: boolean;
  eventId: string;
  eventType: string;
  status: 'processed' | 'duplicate' | 'acknowledged';
}

@ApiExcludeController()
@SkipRateLimit()
@Controller('webhooks/stripe')
export class StripeWebhookController {
  private readonly logger = new Logger(StripeWebhookController.name);

  constructor(private readonly stripeWebhookService: StripeWebhookService) {}

  @Post()
  @UseGuards(StripeWebhookGuard)
  @HttpCode(HttpStatus.OK)
  async handleWebhook(@Req() request: StripeWebhookRequest): Promise<WebhookAcknowledgement> {
    const event = request.stripeEvent;
    if (!event) {
      throw new BadRequestException('Missing verified event');
    }

    const result = await this.stripeWebhookService.handleEvent(event);
    const status = result.cached ? 'duplicate' : result.processed ? 'processed' : 'acknowledged';
    this.logger.log(`Stripe event ${result.eventId} ${status} (${result.outcome})`);

    return { received: true, eventId: result.eventId, eventType: result.eventType, status };
  }
}
