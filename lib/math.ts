import { Decimal } from 'decimal.js';

export { Decimal };

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);

/**
 * Converts input to Decimal. Decimal instances are passed through untouched.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  if (value instanceof Decimal) return value;
  return new Decimal(value);
}

/**
 * Aggregate helpers ensuring Decimal type return
 */
export const FinMath = {
  sum: (values: readonly Decimal.Value[]) =>
    values.reduce<Decimal>((acc, value) => acc.plus(value), ZERO),

  // Ratio, or null when the denominator is zero
  ratio: (numerator: Decimal.Value, denominator: Decimal.Value): Decimal | null => {
    const den = toDecimal(denominator);
    if (den.isZero()) return null;
    return toDecimal(numerator).dividedBy(den);
  },

  isClose: (a: Decimal.Value, b: Decimal.Value, tolerance: Decimal.Value = 1e-9) =>
    new Decimal(a).minus(b).abs().lessThanOrEqualTo(tolerance),
};
