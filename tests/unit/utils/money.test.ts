/**
 * Money Helpers Unit Tests
 */

import { formatMinorUnits, InvalidMoneyError, toMinorUnits } from '../../../src/utils/money';

describe('toMinorUnits', () => {
  it('should parse decimal strings', () => {
    expect(toMinorUnits('100.50')).toBe(10050);
    expect(toMinorUnits('100.5')).toBe(10050);
    expect(toMinorUnits('100')).toBe(10000);
    expect(toMinorUnits('0.01')).toBe(1);
  });

  it('should parse JSON numbers without floating point drift', () => {
    expect(toMinorUnits(0.1)).toBe(10);
    expect(toMinorUnits(19.99)).toBe(1999);
    expect(toMinorUnits(30)).toBe(3000);
  });

  it('should keep the sign of negative amounts', () => {
    expect(toMinorUnits('-50.25')).toBe(-5025);
    expect(toMinorUnits('-0')).toBe(0);
  });

  it('should trim surrounding whitespace', () => {
    expect(toMinorUnits(' 12.30 ')).toBe(1230);
  });

  it('should reject more than two decimal places', () => {
    expect(() => toMinorUnits('1.005')).toThrow('Amount "1.005" has more than 2 decimal places');
  });

  it('should reject malformed input', () => {
    expect(() => toMinorUnits('abc')).toThrow(InvalidMoneyError);
    expect(() => toMinorUnits('1e3')).toThrow('Invalid amount format: "1e3"');
    expect(() => toMinorUnits('')).toThrow(InvalidMoneyError);
    expect(() => toMinorUnits(Number.NaN)).toThrow('Amount must be finite, got NaN');
  });

  it('should reject amounts beyond safe integer range', () => {
    expect(() => toMinorUnits('900719925474099.99')).toThrow('is out of range');
  });
});

describe('formatMinorUnits', () => {
  it('should format with exactly two decimals', () => {
    expect(formatMinorUnits(10050)).toBe('100.50');
    expect(formatMinorUnits(7000)).toBe('70.00');
    expect(formatMinorUnits(5)).toBe('0.05');
    expect(formatMinorUnits(0)).toBe('0.00');
  });

  it('should format negative values', () => {
    expect(formatMinorUnits(-5025)).toBe('-50.25');
    expect(formatMinorUnits(-1)).toBe('-0.01');
  });

  it('should reject non-integer input', () => {
    expect(() => formatMinorUnits(1.5)).toThrow('Minor units must be a safe integer, got 1.5');
  });
});
