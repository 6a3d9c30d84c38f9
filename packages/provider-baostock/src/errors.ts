/**
 * @fileoverview Maps gateway failures onto the shared error taxonomy.
 *
 * - transport failures (refused, timeout, HTTP status) → ProviderUnavailableError
 * - login rejected by the provider → ProviderUnavailableError
 * - query rejected by the provider → QueryFailedError
 *
 * @module @ashare/provider-baostock/errors
 */

import axios from 'axios';
import { ProviderUnavailableError, QueryFailedError } from '@ashare/contracts';

export const PROVIDER_NAME = 'baostock';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Converts anything thrown by axios into a ProviderUnavailableError.
 */
export function mapTransportError(error: unknown, operation: string): ProviderUnavailableError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status !== undefined) {
      return new ProviderUnavailableError(`Gateway responded with HTTP ${status} during ${operation}`, {
        provider: PROVIDER_NAME,
        operation,
        status,
        reason: error.message,
      });
    }

    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new ProviderUnavailableError(`Gateway request timed out during ${operation}`, {
        provider: PROVIDER_NAME,
        operation,
        reason: error.code,
      });
    }

    return new ProviderUnavailableError(`Gateway unreachable during ${operation}: ${error.message}`, {
      provider: PROVIDER_NAME,
      operation,
      reason: error.code ?? error.message,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderUnavailableError(`Gateway request failed during ${operation}: ${message}`, {
    provider: PROVIDER_NAME,
    operation,
    reason: message,
  });
}

export function loginRejected(errorCode: string, errorMsg: string): ProviderUnavailableError {
  return new ProviderUnavailableError(`Login failed: ${errorMsg || `error code ${errorCode}`}`, {
    provider: PROVIDER_NAME,
    operation: 'login',
    reason: errorMsg,
    providerCode: errorCode,
  });
}

export function queryRejected(operation: string, errorCode: string, errorMsg: string): QueryFailedError {
  return new QueryFailedError(`Query ${operation} failed: ${errorMsg || `error code ${errorCode}`}`, {
    provider: PROVIDER_NAME,
    operation,
    providerCode: errorCode,
  });
}

export function malformedResponse(operation: string, issues: string): QueryFailedError {
  return new QueryFailedError(`Malformed gateway response for ${operation}: ${issues}`, {
    provider: PROVIDER_NAME,
    operation,
  });
}
