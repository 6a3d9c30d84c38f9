/**
 * @fileoverview Error taxonomy for the market-data suite.
 *
 * Every error carries a machine-readable code, an optional structured data
 * payload and an ISO timestamp. Core functions return input errors as values;
 * provider adapters throw the provider-side kinds.
 *
 * @module @ashare/contracts/errors
 */

import type { Frequency } from './frequency.js';

/**
 * Machine-readable error codes.
 */
export const ErrorCodes = {
  EMPTY_INPUT: 'EMPTY_INPUT',
  UNRECOGNIZED_FORMAT: 'UNRECOGNIZED_FORMAT',
  EMPTY_SERIES: 'EMPTY_SERIES',
  PROVIDER_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  QUERY_FAILED: 'QUERY_FAILED',
  NO_DATA_IN_RANGE: 'NO_DATA_IN_RANGE',
  NO_REFERENCE_DATA: 'NO_REFERENCE_DATA',
} as const;

/**
 * Base error class for all market-data errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new MarketDataError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class MarketDataError extends Error {
  /** Machine-readable error code */
  readonly code: string;

  /** Structured context for logs */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 creation time */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'MarketDataError';
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Input was empty or whitespace-only.
 */
export class EmptyInputError extends MarketDataError {
  constructor(message = 'Ticker input is empty') {
    super(ErrorCodes.EMPTY_INPUT, message);
    this.name = 'EmptyInputError';
  }
}

/**
 * Input does not match any supported ticker shape.
 *
 * @example
 * ```typescript
 * new UnrecognizedFormatError('abc123');
 * ```
 */
export class UnrecognizedFormatError extends MarketDataError {
  readonly input: string;

  constructor(input: string) {
    super(ErrorCodes.UNRECOGNIZED_FORMAT, `Unrecognized ticker format: "${input}"`, { input });
    this.name = 'UnrecognizedFormatError';
    this.input = input;
  }
}

/**
 * A statistics routine was called with no bars. Callers must filter empty
 * results first, so this signals a programming error.
 */
export class EmptySeriesError extends MarketDataError {
  constructor(data: { ticker: string; frequency: Frequency }) {
    super(ErrorCodes.EMPTY_SERIES, `Cannot summarize an empty series for ${data.ticker}`, data);
    this.name = 'EmptySeriesError';
  }
}

/**
 * The provider could not be reached or rejected the login.
 */
export class ProviderUnavailableError extends MarketDataError {
  constructor(
    message: string,
    data: {
      provider: string;
      reason?: string;
      status?: number;
      [key: string]: unknown;
    }
  ) {
    super(ErrorCodes.PROVIDER_UNAVAILABLE, message, data);
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * A query inside an open session was rejected by the provider.
 */
export class QueryFailedError extends MarketDataError {
  constructor(
    message: string,
    data: {
      provider: string;
      operation: string;
      providerCode?: string;
      [key: string]: unknown;
    }
  ) {
    super(ErrorCodes.QUERY_FAILED, message, data);
    this.name = 'QueryFailedError';
  }
}

/**
 * A history query succeeded but returned no bars.
 */
export class NoDataInRangeError extends MarketDataError {
  constructor(data: { ticker: string; start: string; end: string; frequency?: Frequency }) {
    super(
      ErrorCodes.NO_DATA_IN_RANGE,
      `No data for ${data.ticker} between ${data.start} and ${data.end}`,
      data
    );
    this.name = 'NoDataInRangeError';
  }
}

/**
 * A reference lookup (company info, statements, constituents) came back empty.
 */
export class NoReferenceDataError extends MarketDataError {
  constructor(data: { subject: string; dataset: string; [key: string]: unknown }) {
    super(ErrorCodes.NO_REFERENCE_DATA, `No ${data.dataset} found for ${data.subject}`, data);
    this.name = 'NoReferenceDataError';
  }
}

export function isMarketDataError(error: unknown): error is MarketDataError {
  return error instanceof MarketDataError;
}

export function isEmptyInputError(error: unknown): error is EmptyInputError {
  return error instanceof EmptyInputError;
}

export function isUnrecognizedFormatError(error: unknown): error is UnrecognizedFormatError {
  return error instanceof UnrecognizedFormatError;
}

export function isEmptySeriesError(error: unknown): error is EmptySeriesError {
  return error instanceof EmptySeriesError;
}

export function isProviderUnavailableError(error: unknown): error is ProviderUnavailableError {
  return error instanceof ProviderUnavailableError;
}

export function isQueryFailedError(error: unknown): error is QueryFailedError {
  return error instanceof QueryFailedError;
}

export function isNoDataInRangeError(error: unknown): error is NoDataInRangeError {
  return error instanceof NoDataInRangeError;
}

export function isNoReferenceDataError(error: unknown): error is NoReferenceDataError {
  return error instanceof NoReferenceDataError;
}
