import { describe, expect, it } from 'vitest';

import { INT64_MAX, INT64_MIN, MAX_NANOS, NANOS_PER_UNIT, signOf, zeroMoney } from '../money.js';

describe('signOf', () => {
  it('should follow units when they are non-zero', () => {
    expect(signOf({ units: 3n, nanos: 0 })).toBe(1);
    expect(signOf({ units: -3n, nanos: 0 })).toBe(-1);
    expect(signOf({ units: 3n, nanos: -1 })).toBe(1);
  });

  it('should fall back to nanos when units are zero', () => {
    expect(signOf({ units: 0n, nanos: 1 })).toBe(1);
    expect(signOf({ units: 0n, nanos: -1 })).toBe(-1);
  });

  it('should be zero for a zero amount', () => {
    expect(signOf({ units: 0n, nanos: 0 })).toBe(0);
  });
});

describe('constants', () => {
  it('should match the int64 and nanos ranges', () => {
    expect(INT64_MAX).toBe(9_223_372_036_854_775_807n);
    expect(INT64_MIN).toBe(-9_223_372_036_854_775_808n);
    expect(NANOS_PER_UNIT).toBe(1_000_000_000);
    expect(MAX_NANOS).toBe(999_999_999);
  });
});

describe('zeroMoney', () => {
  it('should build a zero amount in the given currency', () => {
    expect(zeroMoney('CHF')).toEqual({ currencyCode: 'CHF', units: 0n, nanos: 0 });
  });
});
