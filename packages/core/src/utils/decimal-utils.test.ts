import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  atomicUnitFor,
  exactAdd,
  exactMultiply,
  exactSubtract,
  floorDivide,
  floorToPrecision,
  isValidPrecision,
  parseDecimal,
  sumDecimals,
} from './decimal-utils.js';

describe('parseDecimal', () => {
  it('should parse strings, numbers and decimals', () => {
    expect(parseDecimal('10.50')._unsafeUnwrap().toString()).toBe('10.5');
    expect(parseDecimal(3)._unsafeUnwrap().toString()).toBe('3');
    expect(parseDecimal(new Decimal('0.1'))._unsafeUnwrap().toString()).toBe('0.1');
  });

  it('should keep full precision without scientific notation for small values', () => {
    expect(parseDecimal('0.000000000000000001')._unsafeUnwrap().toString()).toBe('0.000000000000000001');
  });

  it('should return Err for unparseable input', () => {
    expect(parseDecimal('abc')._unsafeUnwrapErr().message).toBe('Not a decimal number: abc');
  });

  it('should return Err for NaN and infinities', () => {
    expect(parseDecimal(Number.NaN)._unsafeUnwrapErr().message).toBe('Not a finite number: NaN');
    expect(parseDecimal('Infinity').isErr()).toBe(true);
  });
});

describe('floorToPrecision', () => {
  it('should round toward negative infinity', () => {
    expect(floorToPrecision(new Decimal('10.559'), 2).toFixed(2)).toBe('10.55');
    expect(floorToPrecision(new Decimal('0.999'), 0).toString()).toBe('0');
  });

  it('should leave values already at precision unchanged', () => {
    expect(floorToPrecision(new Decimal('1.5'), 3).toString()).toBe('1.5');
  });
});

describe('atomicUnitFor', () => {
  it('should be 10^-precision', () => {
    expect(atomicUnitFor(0).toString()).toBe('1');
    expect(atomicUnitFor(2).toString()).toBe('0.01');
    expect(atomicUnitFor(4).toString()).toBe('0.0001');
  });
});

describe('exact arithmetic', () => {
  it('should add and subtract without a significant-digit limit', () => {
    const big = '1' + '0'.repeat(70);
    expect(exactAdd(big, '0.001').toFixed()).toBe(big + '.001');
    expect(exactSubtract(big, '0.001').toFixed()).toBe('9'.repeat(70) + '.999');
  });

  it('should multiply without rounding the product', () => {
    expect(exactMultiply('0.' + '9'.repeat(66), 1).toFixed()).toBe('0.' + '9'.repeat(66));
  });
});

describe('floorDivide', () => {
  it('should truncate a non-terminating quotient to the precision', () => {
    expect(floorDivide('10', 3, 2).toString()).toBe('3.33');
    expect(floorDivide('2', 3, 0).toString()).toBe('0');
  });

  it('should return terminating quotients unchanged', () => {
    expect(floorDivide('10.5', 2, 2).toString()).toBe('5.25');
  });
});

describe('sumDecimals', () => {
  it('should sum exactly', () => {
    expect(sumDecimals([new Decimal('0.1'), new Decimal('0.2')]).toString()).toBe('0.3');
  });

  it('should keep every digit of a long sum', () => {
    expect(sumDecimals([new Decimal('1e63'), new Decimal('0.01')]).toFixed()).toBe('1' + '0'.repeat(63) + '.01');
  });

  it('should sum an empty list to zero', () => {
    expect(sumDecimals([]).isZero()).toBe(true);
  });
});

describe('isValidPrecision', () => {
  it('should accept non-negative integers only', () => {
    expect(isValidPrecision(0)).toBe(true);
    expect(isValidPrecision(3)).toBe(true);
    expect(isValidPrecision(-1)).toBe(false);
    expect(isValidPrecision(1.5)).toBe(false);
  });
});
