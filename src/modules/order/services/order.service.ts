import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EntityManager, LockMode } from '@mikro-orm/core';
import { isUUID } from 'class-validator';
import Stripe from 'stripe';
import { Order, OrderPaymentStatus, OrderStatus } from '../entities/order.entity';
import { calculateTotal, canBeCancelled } from '../domain/order-totals';
import { SubscriptionService, ActivationOutcome } from '../../subscription/services/subscription.service';
import { CouponService } from '../../coupon/services/coupon.service';
import { CartService } from '../../cart/services/cart.service';
import { StripeService } from '../../payment/services/stripe.service';
import { PaymentIntentService } from '../../payment/services/payment-intent.service';
import { ActivityLogService } from '../../activity/services/activity-log.service';
import { ActivityType } from '../../activity/entities/user-activity.entity';

export type MarkPaidResult =
  | { status: 'paid'; order: Order; activations: ActivationOutcome[] }
  | { status: 'already_paid'; order: Order }
  | { status: 'ignored'; order: Order; reason: string }
  | { status: 'not_found' };

export type MarkFailedResult =
  | { status: 'failed'; order: Order }
  | { status: 'ignored'; order: Order; reason: string }
  | { status: 'not_found' };

const CLOSED_STATUSES: ReadonlySet<OrderStatus> = new Set([OrderStatus.CANCELLED, OrderStatus.REFUNDED]);

@Injectable()
export class OrderService {
  private readonly logger = new Logger(OrderService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly subscriptionService: SubscriptionService,
    private readonly couponService: CouponService,
    private readonly cartService: CartService,
    private readonly stripeService: StripeService,
    private readonly paymentIntentService: PaymentIntentService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  /**
   * Settles a paid order: entitlements, coupon redemption, cart clearing
   * and the intent record all commit together. The order row is locked
   * and an order already marked succeeded is reported as `already_paid`
   * without side effects, so webhook redelivery is harmless.
   */
  async markAsPaid(orderId: string, intent?: Stripe.PaymentIntent, now: Date = new Date()): Promise<MarkPaidResult> {
    if (!isUUID(orderId)) {
      return { status: 'not_found' };
    }

    const result = await this.em.transactional(async (em): Promise<MarkPaidResult> => {
      const order = await em.findOne(Order, { id: orderId }, { lockMode: LockMode.PESSIMISTIC_WRITE });
      if (!order) {
        return { status: 'not_found' };
      }
      if (order.paymentStatus === OrderPaymentStatus.SUCCEEDED) {
        return { status: 'already_paid', order };
      }
      if (CLOSED_STATUSES.has(order.status) || order.paymentStatus === OrderPaymentStatus.REFUNDED) {
        return { status: 'ignored', order, reason: `order is ${order.status}` };
      }

      await em.populate(order, ['items']);
      const items = order.items.getItems();

      const totals = calculateTotal(order, items);
      order.totalAmount = totals.totalAmount;
      order.finalAmount = totals.finalAmount;

      if (intent && intent.amount_received !== order.finalAmount) {
        this.logger.warn(
          `Order ${order.orderNumber} captured ${intent.amount_received} but expected ${order.finalAmount}`,
        );
      }

      order.paymentStatus = OrderPaymentStatus.SUCCEEDED;
      order.status = OrderStatus.COMPLETED;
      order.paidAt = now;
      order.completedAt = now;
      if (intent?.payment_method_types.length) {
        order.paymentMethod = intent.payment_method_types[0];
      }

      const activations = await this.subscriptionService.activateForOrder(
        {
          userId: order.user.id,
          orderNumber: order.orderNumber,
          items: items.map((item) => ({ packageId: item.package.id, price: item.price })),
        },
        now,
      );

      if (order.couponCode) {
        await this.couponService.use(order.couponCode);
      }
      await this.cartService.clearForUser(order.user.id);
      if (intent) {
        await this.paymentIntentService.updateFromWebhook(intent);
      }

      return { status: 'paid', order, activations };
    });

    if (result.status === 'paid') {
      this.logger.log(`Order ${result.order.orderNumber} paid`);
      await this.activityLogService.record({
        userId: result.order.user.id,
        activityType: ActivityType.ORDER_PAID,
        description: `Paid order ${result.order.orderNumber}`,
        metadata: {
          orderId: result.order.id,
          finalAmount: result.order.finalAmount,
          packages: result.activations.map((activation) => activation.packageId),
        },
      });
    } else if (result.status !== 'not_found') {
      this.logger.log(`Order ${result.order.orderNumber} not settled again: ${result.status}`);
    }

    return result;
  }

  /** Records a failed attempt. The order stays open for another try. */
  async markAsFailed(orderId: string, intent?: Stripe.PaymentIntent): Promise<MarkFailedResult> {
    if (!isUUID(orderId)) {
      return { status: 'not_found' };
    }

    return this.em.transactional(async (em): Promise<MarkFailedResult> => {
      const order = await em.findOne(Order, { id: orderId }, { lockMode: LockMode.PESSIMISTIC_WRITE });
      if (!order) {
        return { status: 'not_found' };
      }
      if (order.paymentStatus === OrderPaymentStatus.SUCCEEDED) {
        return { status: 'ignored', order, reason: 'payment already succeeded' };
      }

      order.paymentStatus = OrderPaymentStatus.FAILED;
      if (intent) {
        await this.paymentIntentService.updateFromWebhook(intent);
      }

      this.logger.warn(
        `Payment failed for order ${order.orderNumber}: ${intent?.last_payment_error?.message ?? 'unknown reason'}`,
      );
      return { status: 'failed', order };
    });
  }

  async cancel(userId: string, orderId: string, now: Date = new Date()): Promise<Order> {
    const order = await this.em.transactional(async (em) => {
      const locked = await em.findOne(
        Order,
        { id: orderId, user: userId },
        { lockMode: LockMode.PESSIMISTIC_WRITE },
      );
      if (!locked) {
        throw new NotFoundException('Order not found');
      }
      if (!canBeCancelled(locked)) {
        throw new ConflictException('This order can no longer be cancelled.');
      }

      if (locked.stripePaymentIntentId) {
        await this.stripeService.cancelPaymentIntent(locked.stripePaymentIntentId);
      }

      locked.status = OrderStatus.CANCELLED;
      locked.paymentStatus = OrderPaymentStatus.CANCELLED;
      locked.cancelledAt = now;
      return locked;
    });

    await this.activityLogService.record({
      userId,
      activityType: ActivityType.ORDER_CANCELLED,
      description: `Cancelled order ${order.orderNumber}`,
      metadata: { orderId: order.id },
    });

    return order;
  }

  async listForUser(userId: string): Promise<Order[]> {
    return this.em.find(
      Order,
      { user: userId },
      { populate: ['items', 'items.package'], orderBy: { createdAt: 'desc' } },
    );
  }

  async findForUser(userId: string, orderId: string): Promise<Order> {
    const order = await this.em.findOne(
      Order,
      { id: orderId, user: userId },
      { populate: ['items', 'items.package'] },
    );
    if (!order) {
      throw new NotFoundException('Order not found');
    }
    return order;
  }
}
