import { sumLineTotals } from '../../../common/utils/money.util';

export interface CartLine {
  packageId: string;
  /** Unit price snapshot, minor currency units. */
  price: number;
  quantity: number;
}

export function totalPrice(lines: ReadonlyArray<CartLine>): number {
  return sumLineTotals(lines);
}

/** Number of distinct packages, not the sum of quantities. */
export function itemCount(lines: ReadonlyArray<CartLine>): number {
  return lines.length;
}

export interface CartItemLike {
  package: { id: string };
  price: number;
  quantity: number;
}

export function toCartLines(items: Iterable<CartItemLike>): CartLine[] {
  return Array.from(items, (item) => ({
    packageId: item.package.id,
    price: item.price,
    quantity: item.quantity,
  }));
}
