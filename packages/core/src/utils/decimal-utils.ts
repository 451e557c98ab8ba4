import { Decimal } from 'decimal.js';

// Ledger amounts are fixed at four fractional digits; 28 significant digits leaves
// plenty of headroom for sums over long transaction logs.
Decimal.set({
  maxE: 9e15, // Maximum exponent
  minE: -9e15, // Minimum exponent
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7, // Use exponential notation for numbers smaller than 1e-7
  toExpPos: 21, // Use exponential notation for numbers larger than 1e+21
});

/**
 * Number of fractional digits kept for every amount in the ledger.
 */
export const AMOUNT_DECIMAL_PLACES = 4;

// Digits with an optional sign and fraction; no exponent or 0x/0b/0o radix prefix
const PLAIN_DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/**
 * Try to parse a plain decimal string to a Decimal.
 * Blank, missing, prefixed or exponent-notation input is rejected.
 */
export function tryParseDecimal(value: string | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null) return false;

  const trimmed = value.trim();
  if (!PLAIN_DECIMAL_PATTERN.test(trimmed)) return false;

  const decimal = new Decimal(trimmed);
  if (out) out.value = decimal;
  return true;
}

/**
 * Parse a raw amount field, rounding to ledger precision.
 * Returns undefined when the field is absent or malformed.
 */
export function parseAmount(value: string | undefined | null): Decimal | undefined {
  const result = { value: new Decimal(0) };
  if (!tryParseDecimal(value, result)) {
    return undefined;
  }
  return result.value.toDecimalPlaces(AMOUNT_DECIMAL_PLACES);
}

/**
 * Render an amount with exactly the ledger's fractional digits (no exponent notation).
 */
export function formatAmount(decimal: Decimal): string {
  return decimal.toFixed(AMOUNT_DECIMAL_PLACES);
}

/**
 * Convert Decimal to string with trailing zeros trimmed, for log context
 * (`1.5000` logs as `1.5`).
 */
export function formatDecimal(decimal: Decimal, maxDecimalPlaces = AMOUNT_DECIMAL_PLACES): string {
  const fixed = decimal.toFixed(maxDecimalPlaces);
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}
