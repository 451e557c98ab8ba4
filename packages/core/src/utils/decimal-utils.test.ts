import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatAmount, formatDecimal, parseAmount, tryParseDecimal } from './decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('tryParseDecimal', () => {
    it('should parse valid string to Decimal', () => {
      const out = { value: new Decimal(0) };
      const result = tryParseDecimal('123.456', out);

      expect(result).toBe(true);
      expect(out.value.toString()).toBe('123.456');
    });

    it('should reject undefined, null and blank input', () => {
      expect(tryParseDecimal(undefined)).toBe(false);
      expect(tryParseDecimal(null)).toBe(false);
      expect(tryParseDecimal('')).toBe(false);
      expect(tryParseDecimal('   ')).toBe(false);
    });

    it('should return false for invalid strings', () => {
      const out = { value: new Decimal(7) };
      expect(tryParseDecimal('invalid', out)).toBe(false);
      expect(tryParseDecimal('12.34.56', out)).toBe(false);
      expect(tryParseDecimal('abc123', out)).toBe(false);
      expect(out.value.toString()).toBe('7');
    });

    it('should reject non-finite values', () => {
      expect(tryParseDecimal('Infinity')).toBe(false);
      expect(tryParseDecimal('NaN')).toBe(false);
    });

    it('should reject radix prefixes and exponent notation', () => {
      expect(tryParseDecimal('0x10')).toBe(false);
      expect(tryParseDecimal('0b11')).toBe(false);
      expect(tryParseDecimal('0o7')).toBe(false);
      expect(tryParseDecimal('1e3')).toBe(false);
    });

    it('should accept a leading sign and bare fractions', () => {
      const out = { value: new Decimal(0) };

      expect(tryParseDecimal('+2.5', out)).toBe(true);
      expect(out.value.toString()).toBe('2.5');
      expect(tryParseDecimal('.75', out)).toBe(true);
      expect(out.value.toString()).toBe('0.75');
    });

    it('should handle negative numbers', () => {
      const out = { value: new Decimal(0) };
      expect(tryParseDecimal('-456.789', out)).toBe(true);
      expect(out.value.toString()).toBe('-456.789');
    });
  });

  describe('parseAmount', () => {
    it('should round to four fractional digits', () => {
      expect(parseAmount('1.23456')?.toString()).toBe('1.2346');
      expect(parseAmount('500.00005')?.toString()).toBe('500.0001');
    });

    it('should keep values already at ledger precision', () => {
      expect(parseAmount('500.0005')?.toString()).toBe('500.0005');
    });

    it('should return undefined for blank or malformed fields', () => {
      expect(parseAmount('')).toBeUndefined();
      expect(parseAmount(undefined)).toBeUndefined();
      expect(parseAmount('1,50')).toBeUndefined();
      expect(parseAmount('ten')).toBeUndefined();
    });

    it('should return undefined for hex, binary and scientific amounts', () => {
      expect(parseAmount('0x10')).toBeUndefined();
      expect(parseAmount('0b11')).toBeUndefined();
      expect(parseAmount('1e3')).toBeUndefined();
    });
  });

  describe('formatAmount', () => {
    it('should render exactly four fractional digits', () => {
      expect(formatAmount(new Decimal('1.5'))).toBe('1.5000');
      expect(formatAmount(new Decimal('0'))).toBe('0.0000');
      expect(formatAmount(new Decimal('-3.25'))).toBe('-3.2500');
    });

    it('should not switch to exponent notation for small values', () => {
      expect(formatAmount(new Decimal('0.0001'))).toBe('0.0001');
    });
  });

  describe('formatDecimal', () => {
    it('should remove trailing zeros', () => {
      expect(formatDecimal(new Decimal('123.4500'))).toBe('123.45');
    });

    it('should remove trailing decimal point', () => {
      expect(formatDecimal(new Decimal('123'))).toBe('123');
    });

    it('should keep integer digits when no fractional digits are requested', () => {
      expect(formatDecimal(new Decimal('100'), 0)).toBe('100');
    });

    it('should handle zero', () => {
      expect(formatDecimal(new Decimal('0'))).toBe('0');
    });
  });
});
