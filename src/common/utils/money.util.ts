/**
 * Amounts are integers in minor currency units (øre for NOK).
 */
export function formatMinorUnits(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  const absolute = Math.abs(Math.round(amount));
  const major = Math.floor(absolute / 100);
  const minor = absolute % 100;
  return `${sign}${major}.${minor.toString().padStart(2, '0')}`;
}

export function sumLineTotals(lines: ReadonlyArray<{ price: number; quantity: number }>): number {
  return lines.reduce((total, line) => total + line.price * line.quantity, 0);
}
