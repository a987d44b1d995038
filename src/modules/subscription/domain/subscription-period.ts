export const SUBSCRIPTION_TERM_DAYS = 365;

const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Expiry after one more paid term: a running subscription stacks onto its
 * current expiry, a lapsed one restarts from `now`.
 */
export function nextExpiry(currentExpiry: Date | undefined, now: Date): Date {
  if (currentExpiry && currentExpiry.getTime() > now.getTime()) {
    return addDays(currentExpiry, SUBSCRIPTION_TERM_DAYS);
  }
  return addDays(now, SUBSCRIPTION_TERM_DAYS);
}

export function hasActiveAccess(
  subscription: { isActive: boolean; expiresAt: Date },
  now: Date,
): boolean {
  return subscription.isActive && subscription.expiresAt.getTime() > now.getTime();
}

export function daysRemaining(expiresAt: Date, now: Date): number {
  const remaining = expiresAt.getTime() - now.getTime();
  return remaining > 0 ? Math.floor(remaining / DAY_MS) : 0;
}
