/**
 * @fileoverview HTTP client for the baostock gateway.
 *
 * Every payload is validated with zod before it is used; provider error codes
 * become typed errors here, so callers only ever see valid result sets.
 *
 * @module @ashare/provider-baostock/client
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { ZodError } from 'zod';
import {
  ENDPOINTS,
  LoginResponseSchema,
  ResultSetSchema,
  SUCCESS_CODE,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from './types.js';
import type { QueryOperation, ResultSet } from './types.js';
import {
  PROVIDER_NAME,
  loginRejected,
  malformedResponse,
  mapTransportError,
  queryRejected,
} from './errors.js';
import { ProviderUnavailableError } from '@ashare/contracts';

export const SESSION_HEADER = 'X-Session-Token';

export type QueryParams = Record<string, string | number>;

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Thin wrapper over axios for the gateway endpoints.
 *
 * @internal
 */
export class BaostockClient {
  private readonly http: AxiosInstance;

  constructor(options: { baseUrl?: string; timeout?: number; httpClient?: AxiosInstance } = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
        timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      });
  }

  /**
   * Logs in and returns the session token.
   *
   * @throws ProviderUnavailableError when the gateway is down or rejects the credentials
   */
  async login(userId: string, password: string): Promise<string> {
    let data: unknown;
    try {
      ({ data } = await this.http.post(ENDPOINTS.login, { user_id: userId, password }));
    } catch (error) {
      throw mapTransportError(error, 'login');
    }

    const parsed = LoginResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderUnavailableError(`Malformed login response: ${describeIssues(parsed.error)}`, {
        provider: PROVIDER_NAME,
        operation: 'login',
      });
    }

    if (parsed.data.error_code !== SUCCESS_CODE) {
      throw loginRejected(parsed.data.error_code, parsed.data.error_msg);
    }

    // Some gateways keep a single implicit session and return no token
    return parsed.data.session_token ?? '';
  }

  /**
   * Ends the session. A rejection from the provider is reported, not thrown.
   *
   * @returns The provider's error message, or undefined on success
   */
  async logout(token: string): Promise<string | undefined> {
    let data: unknown;
    try {
      ({ data } = await this.http.post(ENDPOINTS.logout, {}, { headers: this.headers(token) }));
    } catch (error) {
      throw mapTransportError(error, 'logout');
    }

    const parsed = LoginResponseSchema.safeParse(data);
    if (!parsed.success) {
      return describeIssues(parsed.error);
    }
    return parsed.data.error_code === SUCCESS_CODE ? undefined : parsed.data.error_msg;
  }

  /**
   * Runs a query endpoint.
   *
   * @throws ProviderUnavailableError on transport failure
   * @throws QueryFailedError when the provider rejects the query or the payload is malformed
   */
  async query(operation: QueryOperation, params: QueryParams, token: string): Promise<ResultSet> {
    let data: unknown;
    try {
      ({ data } = await this.http.get(ENDPOINTS[operation], {
        params,
        headers: this.headers(token),
      }));
    } catch (error) {
      throw mapTransportError(error, operation);
    }

    const parsed = ResultSetSchema.safeParse(data);
    if (!parsed.success) {
      throw malformedResponse(operation, describeIssues(parsed.error));
    }

    if (parsed.data.error_code !== SUCCESS_CODE) {
      throw queryRejected(operation, parsed.data.error_code, parsed.data.error_msg);
    }

    return parsed.data;
  }

  private headers(token: string): Record<string, string> {
    return token ? { [SESSION_HEADER]: token } : {};
  }
}
