export type OptionAnalyticsErrorKind =
  | 'ValidationError'
  | 'InvalidQuoteError'
  | 'ConvergenceError'
  | 'DataUnavailableError';

export abstract class OptionAnalyticsError extends Error {
  abstract readonly kind: OptionAnalyticsErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends OptionAnalyticsError {
  readonly kind = 'ValidationError';

  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
  }
}

/**
 * A market price that lies outside the no-arbitrage band for the contract,
 * so no volatility can reproduce it.
 */
export class InvalidQuoteError extends OptionAnalyticsError {
  readonly kind = 'InvalidQuoteError';

  constructor(
    readonly marketPrice: number,
    readonly lowerBound: number,
    readonly upperBound: number
  ) {
    super(
      `Market price ${marketPrice} is outside the no-arbitrage bounds [${lowerBound.toFixed(6)}, ${upperBound.toFixed(6)}]`
    );
  }
}

export class ConvergenceError extends OptionAnalyticsError {
  readonly kind = 'ConvergenceError';

  constructor(
    message: string,
    readonly iterations: number
  ) {
    super(message);
  }
}

export class DataUnavailableError extends OptionAnalyticsError {
  readonly kind = 'DataUnavailableError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export const isOptionAnalyticsError = (error: unknown): error is OptionAnalyticsError =>
  error instanceof OptionAnalyticsError;
