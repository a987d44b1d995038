import { CouponType } from '../entities/coupon.entity';

export interface CouponTerms {
  couponType: CouponType;
  discountValue: number;
  minimumOrderAmount: number;
  maximumDiscountAmount?: number | null;
}

export interface CouponWindow {
  isActive: boolean;
  validFrom: Date;
  validUntil: Date;
  usageLimit?: number | null;
  usedCount: number;
}

export type CouponRejection =
  | 'not_found'
  | 'inactive'
  | 'exhausted'
  | 'already_used'
  | 'not_applicable'
  | 'minimum_not_met';

export const REJECTION_MESSAGES: Record<CouponRejection, string> = {
  not_found: 'Invalid coupon code.',
  inactive: 'This coupon is not active.',
  exhausted: 'This coupon has reached its usage limit.',
  already_used: 'You have already used this coupon.',
  not_applicable: 'This coupon does not apply to the packages in your cart.',
  minimum_not_met: 'The order total is below the minimum for this coupon.',
};

export function isWithinWindow(coupon: CouponWindow, now: Date): boolean {
  return (
    coupon.isActive &&
    coupon.validFrom.getTime() <= now.getTime() &&
    now.getTime() <= coupon.validUntil.getTime()
  );
}

export function hasUsesLeft(coupon: CouponWindow): boolean {
  return coupon.usageLimit === undefined || coupon.usageLimit === null || coupon.usedCount < coupon.usageLimit;
}

export function isCouponValid(coupon: CouponWindow, now: Date): boolean {
  return isWithinWindow(coupon, now) && hasUsesLeft(coupon);
}

/**
 * Discount for `amount` minor units, rounded to whole units. Never
 * negative, never above the amount and never above the coupon's cap.
 */
export function calculateDiscount(coupon: CouponTerms, amount: number): number {
  if (amount <= 0 || amount < coupon.minimumOrderAmount) {
    return 0;
  }

  let discount =
    coupon.couponType === CouponType.PERCENTAGE
      ? Math.round((amount * coupon.discountValue) / 100)
      : Math.round(coupon.discountValue);

  if (coupon.maximumDiscountAmount !== undefined && coupon.maximumDiscountAmount !== null) {
    discount = Math.min(discount, coupon.maximumDiscountAmount);
  }

  return Math.max(0, Math.min(discount, amount));
}
