import { err, ok, type Result } from 'neverthrow';

import { MoneyValidationError } from './errors.js';
import { CURRENCY_CODE_LENGTH, INT64_MAX, INT64_MIN, MAX_NANOS, type Money, type MoneyInput } from './money.js';

/**
 * Validate a money value and return it typed as `Money`.
 *
 * Checks the currency code length, then that units and nanos do not carry
 * strictly opposite signs, then that nanos is an integer within range, then
 * that units fit in an int64. The code is not looked up in any currency
 * registry.
 */
export function toValidMoney(value: MoneyInput): Result<Money, MoneyValidationError> {
  const { currencyCode, units, nanos } = value;

  if (currencyCode === undefined || currencyCode === null || currencyCode.length !== CURRENCY_CODE_LENGTH) {
    return err(new MoneyValidationError('InvalidCurrencyCode', { currencyCode }));
  }

  if ((units > 0n && nanos < 0) || (units < 0n && nanos > 0)) {
    return err(new MoneyValidationError('SignMismatch', { nanos, units: units.toString() }));
  }

  if (!Number.isInteger(nanos) || Math.abs(nanos) > MAX_NANOS) {
    return err(new MoneyValidationError('NanosOutOfRange', { nanos }));
  }

  if (units > INT64_MAX || units < INT64_MIN) {
    return err(new MoneyValidationError('UnitsOutOfRange', { units: units.toString() }));
  }

  return ok({ currencyCode, units, nanos });
}

/**
 * Determine whether a money value is well-formed.
 */
export function checkValid(value: MoneyInput): Result<void, MoneyValidationError> {
  return toValidMoney(value).map((): void => undefined);
}
