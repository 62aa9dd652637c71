/**
 * Error types for money arithmetic and ledger operations
 *
 * Every fallible operation returns one of these inside a neverthrow Result.
 * Thrown errors are reserved for broken programming contracts.
 */

/**
 * Base domain error with a machine-readable code and structured context
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> | undefined }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.timestamp = new Date().toISOString();
    this.context = options?.context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      timestamp: this.timestamp,
    };
  }
}

export type MoneyErrorCode =
  /** Amount is negative or not a finite number */
  | 'INVALID_AMOUNT'
  /** Code missing from the currency catalog */
  | 'INVALID_CURRENCY_CODE'
  /** Operands hold different currencies */
  | 'CURRENCY_MISMATCH'
  /** Subtraction would go below zero */
  | 'NEGATIVE_RESULT'
  | 'INVALID_MULTIPLIER'
  | 'INVALID_DIVISOR'
  /** Nonzero result that rounds below the currency's atomic unit */
  | 'VALUE_TOO_LOW'
  | 'INSUFFICIENT_FUNDS'
  /** Deposit or withdrawal currency differs from the account currency */
  | 'UNSUPPORTED_CURRENCY'
  /** Weights are negative, non-numeric, misaligned or do not sum to 1 */
  | 'INVALID_DISTRIBUTION'
  /** Rate provider failed or has no usable rate for a currency */
  | 'RATE_UNAVAILABLE';

export class MoneyError extends DomainError {
  readonly code: MoneyErrorCode;

  constructor(
    code: MoneyErrorCode,
    message: string,
    options?: { cause?: unknown; context?: Record<string, unknown> | undefined }
  ) {
    super(message, options);
    this.code = code;
  }
}

export function isMoneyError(error: unknown, code?: MoneyErrorCode): error is MoneyError {
  return error instanceof MoneyError && (code === undefined || error.code === code);
}
