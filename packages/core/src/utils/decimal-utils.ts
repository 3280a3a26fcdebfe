import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

// Ledger amounts are fixed-point with four fractional digits. Sums stay exact as long as
// balances fit in the significant digits below, far beyond what bounded input amounts reach.
Decimal.set({
  precision: 64,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/** Number of fractional digits carried by every amount */
export const AMOUNT_SCALE = 4;

/** What to do with an input amount that carries more than AMOUNT_SCALE fractional digits */
export type AmountPrecisionPolicy = 'reject' | 'round';

/** Largest number of integer digits an input amount may carry */
export const MAX_AMOUNT_INTEGER_DIGITS = 28;

export const ZERO = new Decimal(0);

// Plain positional notation only: no exponents, hex, Infinity or NaN
const PLAIN_DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse an amount string into a Decimal with at most AMOUNT_SCALE fractional digits.
 */
export function parseAmount(raw: string, policy: AmountPrecisionPolicy = 'reject'): Result<Decimal, Error> {
  const value = raw.trim();
  if (value === '') {
    return err(new Error('Amount is empty'));
  }
  if (!PLAIN_DECIMAL_PATTERN.test(value)) {
    return err(new Error(`Amount "${value}" is not a decimal number`));
  }

  const integerDigits = (value.replace(/^[+-]/, '').split('.')[0] ?? '').replace(/^0+/, '').length;
  if (integerDigits > MAX_AMOUNT_INTEGER_DIGITS) {
    return err(new Error(`Amount "${value}" has more than ${MAX_AMOUNT_INTEGER_DIGITS} integer digits`));
  }

  const amount = new Decimal(value);
  if (amount.decimalPlaces() <= AMOUNT_SCALE) {
    return ok(amount);
  }

  if (policy === 'round') {
    return ok(amount.toDecimalPlaces(AMOUNT_SCALE, Decimal.ROUND_HALF_UP));
  }

  return err(new Error(`Amount "${value}" has more than ${AMOUNT_SCALE} fractional digits`));
}

/**
 * Render an amount with exactly AMOUNT_SCALE fractional digits. Zero never renders with a sign.
 */
export function formatAmount(amount: Decimal): string {
  if (amount.isZero()) {
    return ZERO.toFixed(AMOUNT_SCALE);
  }
  return amount.toFixed(AMOUNT_SCALE, Decimal.ROUND_HALF_UP);
}
