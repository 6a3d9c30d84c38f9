/**
 * Core types for ticker normalization
 */

import type { EmptyInputError, Exchange, Ticker, UnrecognizedFormatError } from '@ashare/contracts';

/**
 * Errors the normalizer can report
 */
export type NormalizeError = EmptyInputError | UnrecognizedFormatError;

/**
 * Outcome of normalizing raw user input. Failures are values, never thrown.
 */
export type NormalizeResult = { ok: true; ticker: Ticker } | { ok: false; error: NormalizeError };

/**
 * Exchange metadata
 */
export interface ExchangeInfo {
  /** Provider prefix */
  prefix: Exchange;

  /** Short display name, e.g. "SZSE" */
  name: string;

  /** Full name */
  fullName: string;

  /** Leading digits routed to this exchange */
  leadingDigits: readonly string[];
}

/**
 * External quote pages for one ticker
 */
export interface QuoteLinks {
  baiduQuote: string;
  eastmoney: string;
  baiduSearch: string;
}
