/**
 * Fixed-Point Arithmetic Tests
 *
 * 1 token = 10^18 base units; the accumulator uses the same scale.
 */

import {
  SCALE,
  UNITS_PER_TOKEN,
  parseTokens,
  formatTokens,
  parseUnits,
  mulDiv,
  checkedSub,
} from './fixedPoint';

describe('Fixed-Point Arithmetic', () => {
  it('should use 10^18 for both the accumulator and token units', () => {
    expect(SCALE).toBe(1_000_000_000_000_000_000n);
    expect(UNITS_PER_TOKEN).toBe(SCALE);
  });

  describe('parseTokens', () => {
    it('should convert whole tokens to base units', () => {
      expect(parseTokens('1')).toBe(1_000_000_000_000_000_000n);
      expect(parseTokens('80000000')).toBe(80_000_000n * SCALE);
    });

    it('should convert fractional tokens', () => {
      expect(parseTokens('1.5')).toBe(1_500_000_000_000_000_000n);
      expect(parseTokens('0.000000000000000001')).toBe(1n);
    });

    it('should ignore surrounding whitespace', () => {
      expect(parseTokens(' 2 ')).toBe(2n * SCALE);
    });

    it('should reject negative and malformed input', () => {
      expect(() => parseTokens('-1')).toThrow('Invalid token amount');
      expect(() => parseTokens('1.')).toThrow('Invalid token amount');
      expect(() => parseTokens('abc')).toThrow('Invalid token amount');
    });

    it('should reject more than 18 decimal places', () => {
      expect(() => parseTokens('0.0000000000000000001')).toThrow('Too many decimal places');
    });
  });

  describe('formatTokens', () => {
    it('should trim trailing zeros', () => {
      expect(formatTokens(1_500_000_000_000_000_000n)).toBe('1.5');
      expect(formatTokens(80_000_000n * SCALE)).toBe('80000000');
    });

    it('should handle zero and dust', () => {
      expect(formatTokens(0n)).toBe('0');
      expect(formatTokens(1n)).toBe('0.000000000000000001');
    });

    it('should format negative values', () => {
      expect(formatTokens(-SCALE)).toBe('-1');
    });

    it('should invert parseTokens', () => {
      expect(formatTokens(parseTokens('1234.000567'))).toBe('1234.000567');
    });
  });

  describe('parseUnits', () => {
    it('should parse integer strings', () => {
      expect(parseUnits('0')).toBe(0n);
      expect(parseUnits('123456789012345678901234567890')).toBe(123456789012345678901234567890n);
    });

    it('should reject decimals and signs', () => {
      expect(() => parseUnits('1.5')).toThrow('Invalid integer amount');
      expect(() => parseUnits('-5')).toThrow('Invalid integer amount');
      expect(() => parseUnits('')).toThrow('Invalid integer amount');
    });
  });

  describe('mulDiv', () => {
    it('should floor the result', () => {
      expect(mulDiv(7n, 3n, 2n)).toBe(10n);
      expect(mulDiv(1n, SCALE, 3n)).toBe(333_333_333_333_333_333n);
    });

    it('should throw on division by zero', () => {
      expect(() => mulDiv(1n, 1n, 0n)).toThrow('Division by zero');
    });

    it('should throw on negative operands', () => {
      expect(() => mulDiv(-1n, 1n, 1n)).toThrow('Negative operand');
    });
  });

  describe('checkedSub', () => {
    it('should subtract when the result is non-negative', () => {
      expect(checkedSub(5n, 3n)).toBe(2n);
      expect(checkedSub(5n, 5n)).toBe(0n);
    });

    it('should throw on underflow', () => {
      expect(() => checkedSub(3n, 5n, 'stake')).toThrow('Subtraction underflow on stake: 3 - 5');
    });
  });
});
