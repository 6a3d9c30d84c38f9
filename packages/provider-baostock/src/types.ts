/**
 * @fileoverview Gateway payload schemas and provider options.
 *
 * The gateway exposes baostock result sets as JSON:
 * `{ error_code, error_msg, fields, rows }`, where `error_code === "0"` is success.
 *
 * @module @ashare/provider-baostock/types
 */

import { z } from 'zod';
import type { AxiosInstance } from 'axios';
import type { Logger } from '@ashare/logger';

/** Success code used by every gateway response. */
export const SUCCESS_CODE = '0';

/** Cells arrive as strings; numbers and nulls are tolerated and stringified. */
const CellSchema = z
  .union([z.string(), z.number(), z.null()])
  .transform((value) => (value === null ? '' : String(value)));

export const ResultSetSchema = z.object({
  error_code: z.string(),
  error_msg: z.string().default(''),
  fields: z.array(z.string()).default([]),
  rows: z.array(z.array(CellSchema)).default([]),
});

export type ResultSet = z.output<typeof ResultSetSchema>;

export const LoginResponseSchema = z.object({
  error_code: z.string(),
  error_msg: z.string().default(''),
  session_token: z.string().optional(),
});


/**
 * Query endpoints, keyed by the operation name used in logs and errors.
 */
export const ENDPOINTS = {
  login: '/login',
  logout: '/logout',
  bars: '/query_history_k_data_plus',
  referenceInfo: '/query_stock_basic',
  industry: '/query_stock_industry',
  profit: '/query_profit_data',
  balance: '/query_balance_data',
  cashFlow: '/query_cash_flow_data',
  sz50: '/query_sz50_stocks',
  hs300: '/query_hs300_stocks',
  zz500: '/query_zz500_stocks',
} as const;

export type QueryOperation = Exclude<keyof typeof ENDPOINTS, 'login' | 'logout'>;

/** Public guest account of the provider. */
export const GUEST_USER_ID = 'anonymous';
export const GUEST_PASSWORD = '123456';

export const DEFAULT_BASE_URL = 'http://127.0.0.1:8686';
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Provider configuration.
 *
 * @example
 * ```typescript
 * const options: BaostockProviderOptions = {
 *   baseUrl: 'http://127.0.0.1:8686',
 *   timeout: 10_000,
 * };
 * ```
 */
export interface BaostockProviderOptions {
  /** Gateway base URL */
  baseUrl?: string;

  /** @default 'anonymous' */
  userId?: string;

  /** @default '123456' */
  password?: string;

  /** Request timeout in milliseconds */
  timeout?: number;

  /** Preconfigured axios instance; tests pass one with an in-process adapter */
  httpClient?: AxiosInstance;

  logger?: Logger;
}
