import { sumLineTotals } from '../../../common/utils/money.util';
import { OrderPaymentStatus, OrderStatus } from '../entities/order.entity';

export interface PricedLine {
  price: number;
  quantity: number;
}

export interface OrderTotals {
  totalAmount: number;
  discountAmount: number;
  taxAmount: number;
  finalAmount: number;
}

/** `ORDER_TAX_RATE` as a fraction; anything unset, negative or non-numeric means no tax. */
export function parseTaxRate(raw: unknown): number {
  const rate = Number(raw ?? 0);
  return Number.isFinite(rate) && rate > 0 ? rate : 0;
}

export function computeTax(taxableAmount: number, taxRate: number): number {
  if (taxableAmount <= 0 || taxRate <= 0) {
    return 0;
  }
  return Math.round(taxableAmount * taxRate);
}

/**
 * final = total - discount + tax, with tax charged on the discounted
 * amount. The discount is clamped to the total.
 */
export function computeOrderTotals(
  lines: ReadonlyArray<PricedLine>,
  discountAmount: number,
  taxRate: number,
): OrderTotals {
  const totalAmount = sumLineTotals(lines);
  const discount = Math.max(0, Math.min(discountAmount, totalAmount));
  const taxAmount = computeTax(totalAmount - discount, taxRate);

  return {
    totalAmount,
    discountAmount: discount,
    taxAmount,
    finalAmount: totalAmount - discount + taxAmount,
  };
}

/** Recomputes total and final amounts from the items and the stored tax and discount. */
export function calculateTotal(
  order: { taxAmount: number; discountAmount: number },
  items: ReadonlyArray<PricedLine>,
): Pick<OrderTotals, 'totalAmount' | 'finalAmount'> {
  const totalAmount = sumLineTotals(items);
  return {
    totalAmount,
    finalAmount: totalAmount - order.discountAmount + order.taxAmount,
  };
}

export function canBeCancelled(order: { status: OrderStatus; paymentStatus: OrderPaymentStatus }): boolean {
  return (
    (order.status === OrderStatus.PENDING || order.status === OrderStatus.PAID) &&
    order.paymentStatus !== OrderPaymentStatus.SUCCEEDED
  );
}
