/** Number of nanos in one whole unit. */
export const NANOS_PER_UNIT = 1_000_000_000;

/** Largest magnitude a well-formed nanos field may hold. */
export const MAX_NANOS = NANOS_PER_UNIT - 1;

export const INT64_MAX = 2n ** 63n - 1n;
export const INT64_MIN = -(2n ** 63n);

export const CURRENCY_CODE_LENGTH = 3;

/**
 * Monetary amount as a currency code plus a fixed-point magnitude.
 *
 * `units` holds the signed whole part (int64) and `nanos` the signed fractional
 * part in billionths (int32). A well-formed value never mixes a positive whole
 * part with a negative fraction or the other way round, and keeps
 * `|nanos| <= MAX_NANOS`. Nothing enforces that on construction; run
 * `checkValid` when the value comes from outside.
 */
export interface Money {
  readonly currencyCode: string;
  readonly units: bigint;
  readonly nanos: number;
}

/**
 * Money as handed over by callers before validation; the currency code may be missing.
 */
export type MoneyInput = Omit<Money, 'currencyCode'> & {
  readonly currencyCode?: string | null | undefined;
};

export type Sign = -1 | 0 | 1;

/**
 * Sign of the amount: decided by units when non-zero, by nanos otherwise.
 */
export function signOf(value: Pick<Money, 'units' | 'nanos'>): Sign {
  if (value.units > 0n) return 1;
  if (value.units < 0n) return -1;
  if (value.nanos > 0) return 1;
  if (value.nanos < 0) return -1;
  return 0;
}

export function zeroMoney(currencyCode: string): Money {
  return { currencyCode, units: 0n, nanos: 0 };
}
