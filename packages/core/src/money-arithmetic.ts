import { err, ok, type Result } from 'neverthrow';

import { MoneyArithmeticError, type MoneyOverflowKind } from './errors.js';
import { INT64_MAX, INT64_MIN, MAX_NANOS, NANOS_PER_UNIT, signOf, type Money } from './money.js';

/**
 * Nanos sum split into the fractional remainder and the carry into units.
 */
export interface NanosSum {
  readonly sum: number;
  readonly carry: -1 | 0 | 1;
}

/**
 * Add two nanos fields, carrying into units only when the magnitude is
 * strictly greater than one billion. A sum of exactly ±1,000,000,000 is
 * returned as is with no carry.
 */
export function sumNanos(a: number, b: number): NanosSum {
  const sum = a + b;
  if (sum > NANOS_PER_UNIT) {
    return { sum: sum - NANOS_PER_UNIT, carry: 1 };
  }
  if (sum < -NANOS_PER_UNIT) {
    return { sum: sum + NANOS_PER_UNIT, carry: -1 };
  }
  return { sum, carry: 0 };
}

// Two's-complement int64 wrap-around
const wrapInt64 = (value: bigint): bigint => BigInt.asIntN(64, value);

/**
 * Value substituted for a sum that ran past the int64 range.
 */
export function overflowBound(currencyCode: string, kind: MoneyOverflowKind): Money {
  return kind === 'PositiveOverflow'
    ? { currencyCode, units: INT64_MAX, nanos: MAX_NANOS }
    : { currencyCode, units: INT64_MIN, nanos: -MAX_NANOS };
}

// Checked on the units sum before the sign borrow: borrowing from a wrapped
// INT64_MIN lands back on INT64_MAX.
function detectOverflow(
  a: Money,
  b: Money,
  unitSumNoCarry: bigint,
  unitSumWithCarry: bigint
): MoneyOverflowKind | undefined {
  const signOfA = signOf(a);
  const signOfB = signOf(b);

  if (signOfA > 0 && signOfB > 0 && (unitSumNoCarry < 0n || unitSumWithCarry < 0n)) {
    return 'PositiveOverflow';
  }
  if (signOfA < 0 && signOfB < 0 && (unitSumNoCarry >= 0n || unitSumWithCarry >= 0n)) {
    return 'NegativeOverflow';
  }
  return undefined;
}

/**
 * Add two money values of the same currency.
 *
 * Inputs are expected to be well-formed already (see `checkValid`); they are
 * not validated again here. Nanos carry into units, then units and nanos are
 * brought back to the same sign. A sum past the int64 range fails with
 * `PositiveOverflow` / `NegativeOverflow`, or, when `allowOverflow` is set,
 * is clamped to the largest or smallest representable amount.
 */
export function add(a: Money, b: Money, allowOverflow = false): Result<Money, MoneyArithmeticError> {
  if (a.currencyCode !== b.currencyCode) {
    return err(new MoneyArithmeticError('CurrencyMismatch', { left: a.currencyCode, right: b.currencyCode }));
  }

  const nanoSum = sumNanos(a.nanos, b.nanos);
  const unitSumNoCarry = wrapInt64(a.units + b.units);
  const unitSumWithCarry = wrapInt64(unitSumNoCarry + BigInt(nanoSum.carry));
  let unitSum = unitSumWithCarry;
  let nanos = nanoSum.sum;

  if (unitSum > 0n && nanos < 0) {
    unitSum = wrapInt64(unitSum - 1n);
    nanos += NANOS_PER_UNIT;
  } else if (unitSum < 0n && nanos > 0) {
    unitSum = wrapInt64(unitSum - 1n);
    nanos -= NANOS_PER_UNIT;
  }

  const overflow = detectOverflow(a, b, unitSumNoCarry, unitSumWithCarry);
  if (overflow === undefined) {
    return ok({ currencyCode: a.currencyCode, units: unitSum, nanos });
  }

  if (!allowOverflow) {
    return err(new MoneyArithmeticError(overflow, { currencyCode: a.currencyCode }));
  }
  return ok(overflowBound(a.currencyCode, overflow));
}
