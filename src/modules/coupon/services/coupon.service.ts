import { Injectable, Logger } from '@nestjs/common';
import { EntityManager, LockMode } from '@mikro-orm/core';
import { Coupon } from '../entities/coupon.entity';
import { Order, OrderPaymentStatus } from '../../order/entities/order.entity';
import {
  calculateDiscount,
  CouponRejection,
  isCouponValid,
  isWithinWindow,
  REJECTION_MESSAGES,
} from '../domain/coupon-rules';
import { CartLine, totalPrice } from '../../cart/domain/cart-totals';

export type CouponValidation =
  | {
      valid: true;
      coupon: Coupon;
      subtotal: number;
      /** Total of the lines the coupon applies to. */
      eligibleAmount: number;
      discountAmount: number;
    }
  | { valid: false; reason: CouponRejection; message: string };

export function normalizeCouponCode(code: string): string {
  return code.trim().toUpperCase();
}

@Injectable()
export class CouponService {
  private readonly logger = new Logger(CouponService.name);

  constructor(private readonly em: EntityManager) {}

  async findByCode(code: string): Promise<Coupon | null> {
    return this.em.findOne(
      Coupon,
      { code: normalizeCouponCode(code) },
      { populate: ['applicablePackages'] },
    );
  }

  async canBeUsedByUser(coupon: Coupon, userId: string, now: Date = new Date()): Promise<boolean> {
    if (!isCouponValid(coupon, now)) {
      return false;
    }
    return (await this.countPaidUses(coupon, userId)) < coupon.usageLimitPerUser;
  }

  /**
   * Checks a code against cart lines without consuming it. The per-user
   * limit is only checked when a user is known.
   */
  async validateForCart(
    code: string,
    lines: ReadonlyArray<CartLine>,
    userId?: string,
    now: Date = new Date(),
  ): Promise<CouponValidation> {
    const coupon = await this.findByCode(code);
    if (!coupon) {
      return this.reject('not_found', code);
    }
    if (!isCouponValid(coupon, now)) {
      return this.reject(isWithinWindow(coupon, now) ? 'exhausted' : 'inactive', coupon.code);
    }
    if (userId && !(await this.canBeUsedByUser(coupon, userId, now))) {
      return this.reject('already_used', coupon.code);
    }

    const applicable = new Set(coupon.applicablePackages.getItems().map((pkg) => pkg.id));
    const eligibleLines =
      applicable.size === 0 ? lines : lines.filter((line) => applicable.has(line.packageId));
    const eligibleAmount = totalPrice(eligibleLines);

    if (eligibleAmount === 0) {
      return this.reject('not_applicable', coupon.code);
    }
    if (eligibleAmount < coupon.minimumOrderAmount) {
      return this.reject('minimum_not_met', coupon.code);
    }

    return {
      valid: true,
      coupon,
      subtotal: totalPrice(lines),
      eligibleAmount,
      discountAmount: calculateDiscount(coupon, eligibleAmount),
    };
  }

  /**
   * Counts one redemption. Must run inside a transaction; the row lock
   * serializes concurrent redemptions and the caller flushes.
   */
  async use(code: string): Promise<boolean> {
    const coupon = await this.em.findOne(
      Coupon,
      { code: normalizeCouponCode(code) },
      { lockMode: LockMode.PESSIMISTIC_WRITE },
    );
    if (!coupon) {
      this.logger.warn(`Coupon ${code} vanished before it could be redeemed`);
      return false;
    }

    coupon.usedCount += 1;
    return true;
  }

  private async countPaidUses(coupon: Coupon, userId: string): Promise<number> {
    return this.em.count(Order, {
      user: userId,
      couponCode: coupon.code,
      paymentStatus: OrderPaymentStatus.SUCCEEDED,
    });
  }

  private reject(reason: CouponRejection, code: string): CouponValidation {
    this.logger.warn(`Coupon ${code} rejected: ${reason}`);
    return { valid: false, reason, message: REJECTION_MESSAGES[reason] };
  }
}
