export const MAX_ORDER_NUMBER_SUFFIX = 99;

/** Column width of `Order.orderNumber`. */
export const ORDER_NUMBER_LENGTH = 32;

/** Prefix, twelve timestamp digits and a two-digit suffix must fit the column. */
export const MAX_ORDER_NUMBER_PREFIX_LENGTH = ORDER_NUMBER_LENGTH - 14;

export function assertOrderNumberPrefix(prefix: string): void {
  if (prefix.length === 0 || prefix.length > MAX_ORDER_NUMBER_PREFIX_LENGTH) {
    throw new Error(
      `ORDER_NUMBER_PREFIX must be 1 to ${MAX_ORDER_NUMBER_PREFIX_LENGTH} characters, got "${prefix}"`,
    );
  }
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/** `<prefix>YYYYMMDDHHmm` in UTC. */
export function orderNumberBase(prefix: string, now: Date): string {
  return (
    prefix +
    now.getUTCFullYear().toString() +
    pad2(now.getUTCMonth() + 1) +
    pad2(now.getUTCDate()) +
    pad2(now.getUTCHours()) +
    pad2(now.getUTCMinutes())
  );
}

/** Suffix 0 is the bare base; later suffixes append a two-digit counter. */
export function orderNumberCandidate(base: string, suffix: number): string {
  return suffix === 0 ? base : `${base}${pad2(suffix)}`;
}
