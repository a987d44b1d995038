import { CouponType } from '../../entities/coupon.entity';
import { calculateDiscount, hasUsesLeft, isCouponValid } from '../coupon-rules';

describe('coupon rules', () => {
  const now = new Date('2025-03-01T12:00:00.000Z');

  const window = {
    isActive: true,
    validFrom: new Date('2025-01-01T00:00:00.000Z'),
    validUntil: new Date('2025-12-31T23:59:59.000Z'),
    usedCount: 0,
  };

  describe('isCouponValid', () => {
    it('should accept an active coupon inside its window', () => {
      expect(isCouponValid(window, now)).toBe(true);
    });

    it('should include both window boundaries', () => {
      expect(isCouponValid(window, window.validFrom)).toBe(true);
      expect(isCouponValid(window, window.validUntil)).toBe(true);
      expect(isCouponValid(window, new Date(window.validUntil.getTime() + 1))).toBe(false);
    });

    it('should reject an inactive coupon', () => {
      expect(isCouponValid({ ...window, isActive: false }, now)).toBe(false);
    });

    it('should reject a coupon that has hit its usage limit', () => {
      expect(isCouponValid({ ...window, usageLimit: 5, usedCount: 5 }, now)).toBe(false);
      expect(hasUsesLeft({ ...window, usageLimit: 5, usedCount: 4 })).toBe(true);
      expect(hasUsesLeft({ ...window, usageLimit: null, usedCount: 1000 })).toBe(true);
    });
  });

  describe('calculateDiscount', () => {
    const tenPercent = {
      couponType: CouponType.PERCENTAGE,
      discountValue: 10,
      minimumOrderAmount: 0,
    };

    it('should take 10 percent of 2500.00 as 250.00', () => {
      expect(calculateDiscount(tenPercent, 250000)).toBe(25000);
    });

    it('should round percentage discounts to whole minor units', () => {
      expect(calculateDiscount(tenPercent, 9995)).toBe(1000);
      expect(calculateDiscount({ ...tenPercent, discountValue: 15 }, 333)).toBe(50);
    });

    it('should apply fractional percentages', () => {
      const twelveAndAHalf = { ...tenPercent, discountValue: 12.5 };

      expect(calculateDiscount(twelveAndAHalf, 250000)).toBe(31250);
      expect(calculateDiscount(twelveAndAHalf, 333)).toBe(42);
    });

    it('should accept a total equal to the minimum and reject one just below', () => {
      const withMinimum = { ...tenPercent, minimumOrderAmount: 10000 };

      expect(calculateDiscount(withMinimum, 10000)).toBe(1000);
      expect(calculateDiscount(withMinimum, 9999)).toBe(0);
    });

    it('should cap the discount at the maximum discount amount', () => {
      expect(calculateDiscount({ ...tenPercent, maximumDiscountAmount: 20000 }, 250000)).toBe(20000);
    });

    it('should never discount more than the amount', () => {
      const fixed = { couponType: CouponType.FIXED, discountValue: 50000, minimumOrderAmount: 0 };

      expect(calculateDiscount(fixed, 30000)).toBe(30000);
      expect(calculateDiscount({ ...tenPercent, discountValue: 150 }, 1000)).toBe(1000);
    });

    it('should stay within [0, amount] for a spread of inputs', () => {
      const coupons = [
        tenPercent,
        { ...tenPercent, discountValue: 100 },
        { couponType: CouponType.FIXED, discountValue: 12345, minimumOrderAmount: 500 },
        { couponType: CouponType.FIXED, discountValue: 100, minimumOrderAmount: 0, maximumDiscountAmount: 50 },
      ];
      const amounts = [0, 1, 499, 500, 12344, 12345, 250000];

      for (const coupon of coupons) {
        for (const amount of amounts) {
          const discount = calculateDiscount(coupon, amount);
          expect(discount).toBeGreaterThanOrEqual(0);
          expect(discount).toBeLessThanOrEqual(amount);
        }
      }
    });
  });
});
