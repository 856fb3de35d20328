/**
 * Error kinds for money validation and arithmetic.
 *
 * Operations never throw these; they come back as the `Err` side of a
 * neverthrow `Result`, and callers switch on `kind`.
 */

export type MoneyValidationErrorKind =
  | 'InvalidCurrencyCode'
  | 'SignMismatch'
  | 'NanosOutOfRange'
  | 'UnitsOutOfRange';

export type MoneyArithmeticErrorKind = 'CurrencyMismatch' | 'PositiveOverflow' | 'NegativeOverflow';

export type MoneyOverflowKind = Extract<MoneyArithmeticErrorKind, 'PositiveOverflow' | 'NegativeOverflow'>;

export type MoneyErrorKind = MoneyValidationErrorKind | MoneyArithmeticErrorKind;

const MESSAGES: Record<MoneyErrorKind, string> = {
  InvalidCurrencyCode: 'The currency code is not 3 letters long',
  SignMismatch: 'The signs of the units and nanos do not match',
  NanosOutOfRange: 'The nanos field must be between -999,999,999 and 999,999,999',
  UnitsOutOfRange: 'The units field must fit in a signed 64-bit integer',
  CurrencyMismatch: 'Money values need the same currency to be summed',
  PositiveOverflow: 'Addition failed due to positive overflow',
  NegativeOverflow: 'Addition failed due to negative overflow',
};

/**
 * Base error for money operations
 */
export abstract class MoneyError extends Error {
  abstract readonly kind: MoneyErrorKind;

  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.context = context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      context: this.context,
      kind: this.kind,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * A single money value is malformed
 */
export class MoneyValidationError extends MoneyError {
  constructor(
    public readonly kind: MoneyValidationErrorKind,
    context?: Record<string, unknown>
  ) {
    super(MESSAGES[kind], context);
  }

  /** Copy of this error with extra context merged in. */
  withContext(context: Record<string, unknown>): MoneyValidationError {
    return new MoneyValidationError(this.kind, { ...this.context, ...context });
  }
}

/**
 * Two money values cannot be combined
 */
export class MoneyArithmeticError extends MoneyError {
  constructor(
    public readonly kind: MoneyArithmeticErrorKind,
    context?: Record<string, unknown>
  ) {
    super(MESSAGES[kind], context);
  }

  isOverflow(): this is MoneyArithmeticError & { readonly kind: MoneyOverflowKind } {
    return this.kind === 'PositiveOverflow' || this.kind === 'NegativeOverflow';
  }
}
