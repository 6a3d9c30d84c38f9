/**
 * @fileoverview Public API for @ashare/provider-baostock.
 *
 * @module @ashare/provider-baostock
 */

export { BaostockProvider } from './provider.js';
export { BaostockSession } from './session.js';
export { BaostockClient, SESSION_HEADER } from './client.js';
export type { QueryParams } from './client.js';

export {
  RowReader,
  readRows,
  formatIntradayTime,
  parseBar,
  parseBars,
  parseReferenceInfo,
  parseIndustry,
  parseProfit,
  parseBalance,
  parseCashFlow,
  parseConstituent,
} from './parser.js';

export { mapTransportError, PROVIDER_NAME } from './errors.js';

export {
  ENDPOINTS,
  ResultSetSchema,
  LoginResponseSchema,
  SUCCESS_CODE,
  GUEST_USER_ID,
  GUEST_PASSWORD,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from './types.js';
export type { BaostockProviderOptions, ResultSet, QueryOperation } from './types.js';
