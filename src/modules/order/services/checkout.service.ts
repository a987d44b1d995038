import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityManager, UniqueConstraintViolationException } from '@mikro-orm/core';
import { Order } from '../entities/order.entity';
import { OrderItem } from '../entities/order-item.entity';
import { User } from '../../user/entities/user.entity';
import { LegalPackage } from '../../catalog/entities/legal-package.entity';
import { CartService } from '../../cart/services/cart.service';
import { toCartLines } from '../../cart/domain/cart-totals';
import { CouponService } from '../../coupon/services/coupon.service';
import { StripeService } from '../../payment/services/stripe.service';
import { PaymentIntentService } from '../../payment/services/payment-intent.service';
import { ActivityLogService } from '../../activity/services/activity-log.service';
import { ActivityType } from '../../activity/entities/user-activity.entity';
import { computeOrderTotals, OrderTotals, parseTaxRate } from '../domain/order-totals';
import {
  assertOrderNumberPrefix,
  MAX_ORDER_NUMBER_SUFFIX,
  orderNumberBase,
  orderNumberCandidate,
} from '../domain/order-number';

const MAX_CHECKOUT_ATTEMPTS = 5;

export interface BillingDetails {
  email: string;
  name: string;
  organization?: string;
  address?: string;
  city?: string;
  postalCode?: string;
  country?: string;
  notes?: string;
}

export interface CheckoutResult extends OrderTotals {
  orderId: string;
  orderNumber: string;
  currency: string;
  couponCode?: string;
  paymentIntentId: string;
  clientSecret: string | null;
}

@Injectable()
export class CheckoutService implements OnModuleInit {
  private readonly logger = new Logger(CheckoutService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly configService: ConfigService,
    private readonly cartService: CartService,
    private readonly couponService: CouponService,
    private readonly stripeService: StripeService,
    private readonly paymentIntentService: PaymentIntentService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  onModuleInit(): void {
    assertOrderNumberPrefix(this.orderNumberPrefix);
  }

  /**
   * Turns the user's cart into a pending order with a Stripe
   * PaymentIntent. Order, items and intent record are written in one
   * transaction; a Stripe failure leaves nothing behind.
   */
  async checkout(
    user: User,
    billing: BillingDetails,
    couponCode?: string,
    now: Date = new Date(),
  ): Promise<CheckoutResult> {
    const cart = await this.cartService.getCart({ kind: 'user', userId: user.id });
    if (!cart || cart.items.getItems().length === 0) {
      throw new BadRequestException('Your cart is empty.');
    }

    const drift = await this.cartService.findPriceDrift(cart);
    if (drift.length > 0) {
      await this.cartService.refreshPrices(cart, drift);
      this.logger.warn(`Checkout for user ${user.id} stopped on ${drift.length} changed cart items`);
      throw new ConflictException({
        statusCode: 409,
        message: 'Some prices in your cart have changed. Please review your cart and check out again.',
        changes: drift,
      });
    }

    const items = cart.items.getItems();
    const lines = toCartLines(items);

    let discountAmount = 0;
    let appliedCode: string | undefined;
    if (couponCode) {
      const validation = await this.couponService.validateForCart(couponCode, lines, user.id, now);
      if (!validation.valid) {
        throw new BadRequestException(validation.message);
      }
      discountAmount = validation.discountAmount;
      appliedCode = validation.coupon.code;
    }

    const totals = computeOrderTotals(lines, discountAmount, this.taxRate);
    if (totals.finalAmount <= 0) {
      throw new BadRequestException('Order total must be greater than zero.');
    }

    const currency = this.stripeService.currency;
    let suffix = 0;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.em.transactional(async (em) => {
          const orderNumber = await this.reserveOrderNumber(em, now, suffix);

          const order = em.create(Order, {
            orderNumber,
            user: em.getReference(User, user.id),
            ...totals,
            currency,
            stripeCustomerId: user.stripeCustomerId,
            billingEmail: billing.email,
            billingName: billing.name,
            billingOrganization: billing.organization,
            billingAddress: billing.address,
            billingCity: billing.city,
            billingPostalCode: billing.postalCode,
            billingCountry: billing.country ?? 'NO',
            couponCode: appliedCode,
            customerNotes: billing.notes,
          });
          for (const item of items) {
            order.items.add(
              em.create(OrderItem, {
                order,
                package: em.getReference(LegalPackage, item.package.id),
                quantity: item.quantity,
                price: item.price,
              }),
            );
          }
          em.persist(order);
          await em.flush();

          const intent = await this.stripeService.createPaymentIntent({
            amount: totals.finalAmount,
            currency,
            customerId: user.stripeCustomerId,
            receiptEmail: billing.email,
            description: `Order ${orderNumber}`,
            metadata: { order_id: order.id, order_number: orderNumber, user_id: user.id },
            idempotencyKey: order.id,
          });

          order.stripePaymentIntentId = intent.id;
          this.paymentIntentService.record(order, intent);

          return {
            orderId: order.id,
            orderNumber,
            currency,
            couponCode: appliedCode,
            paymentIntentId: intent.id,
            clientSecret: intent.client_secret,
            ...totals,
          };
        });

        await this.activityLogService.record({
          userId: user.id,
          activityType: ActivityType.ORDER_CREATED,
          description: `Created order ${result.orderNumber}`,
          metadata: { orderId: result.orderId, finalAmount: result.finalAmount },
        });

        return result;
      } catch (error) {
        if (error instanceof UniqueConstraintViolationException && attempt < MAX_CHECKOUT_ATTEMPTS) {
          suffix++;
          this.logger.warn(`Order number collision for user ${user.id}, retrying (attempt ${attempt + 1})`);
          continue;
        }
        throw error;
      }
    }
  }

  private get taxRate(): number {
    return parseTaxRate(this.configService.get('ORDER_TAX_RATE', 0));
  }

  private get orderNumberPrefix(): string {
    return this.configService.get<string>('ORDER_NUMBER_PREFIX', 'ORD');
  }

  /**
   * First free candidate from `startSuffix` on. The unique constraint
   * stays the authority; a concurrent checkout taking the same number
   * makes the flush fail and the caller retries with the next suffix.
   */
  private async reserveOrderNumber(em: EntityManager, now: Date, startSuffix: number): Promise<string> {
    const base = orderNumberBase(this.orderNumberPrefix, now);

    for (let suffix = startSuffix; suffix <= MAX_ORDER_NUMBER_SUFFIX; suffix++) {
      const candidate = orderNumberCandidate(base, suffix);
      if ((await em.count(Order, { orderNumber: candidate })) === 0) {
        return candidate;
      }
    }

    throw new ConflictException('Could not allocate an order number, please retry.');
  }
}
