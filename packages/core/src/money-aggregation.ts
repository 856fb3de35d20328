import { getLogger } from '@quotasum/logger';
import { err, ok, type Result } from 'neverthrow';

import type { MoneyArithmeticError, MoneyValidationError } from './errors.js';
import { zeroMoney, type Money, type MoneyInput } from './money.js';
import { add, overflowBound } from './money-arithmetic.js';
import { toValidMoney } from './money-validation.js';

export interface SumMoneyOptions {
  /** Clamp the running total instead of failing when it leaves the int64 range */
  allowOverflow?: boolean | undefined;
}

/**
 * Fold a sequence of money values into one total.
 *
 * Every value is validated before it is added. The first invalid value, or
 * the first value in another currency, stops the fold; the validation error
 * carries the element's `index` in its context. With `allowOverflow` an
 * overflowing total is clamped and the fold carries on from the bound.
 */
export function sumMoney(
  currencyCode: string,
  values: readonly MoneyInput[],
  options?: SumMoneyOptions
): Result<Money, MoneyValidationError | MoneyArithmeticError> {
  const logger = getLogger('money-aggregation');
  const allowOverflow = options?.allowOverflow ?? false;

  const seed = toValidMoney(zeroMoney(currencyCode));
  if (seed.isErr()) {
    return err(seed.error);
  }

  let total = seed.value;
  for (const [index, value] of values.entries()) {
    const money = toValidMoney(value);
    if (money.isErr()) {
      return err(money.error.withContext({ index }));
    }

    const sum = add(total, money.value);
    if (sum.isOk()) {
      total = sum.value;
      continue;
    }

    const error = sum.error;
    if (!allowOverflow || !error.isOverflow()) {
      return err(error);
    }

    logger.warn({ currencyCode, index, kind: error.kind }, 'Money total overflowed, clamping to bound');
    total = overflowBound(currencyCode, error.kind);
  }

  logger.debug({ count: values.length, currencyCode }, 'Summed money values');
  return ok(total);
}
