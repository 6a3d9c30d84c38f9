/**
 * Tests for command errors and exit codes
 */

import { describe, it, expect } from 'vitest';
import {
  EmptyInputError,
  NoDataInRangeError,
  NoReferenceDataError,
  ProviderUnavailableError,
  QueryFailedError,
  UnrecognizedFormatError,
} from '@ashare/contracts';
import {
  CommandError,
  ErrorCode,
  ERROR_MESSAGES,
  exitCodeFor,
  formatCommandError,
  wrapError,
} from '../../src/commands/errors.js';

describe('CommandError', () => {
  it('should default to the friendly message for its code', () => {
    expect(new CommandError(ErrorCode.EXPORT_ERROR).message).toBe(ERROR_MESSAGES[ErrorCode.EXPORT_ERROR]);
  });

  it('should show hints, and code and context only when verbose', () => {
    const error = new CommandError(ErrorCode.INVALID_ARGS, 'Unknown index "x"', {
      context: { index: 'x' },
      hints: ['Expected one of: sz50, hs300, zz500'],
    });

    expect(error.format()).toBe('Error: Unknown index "x"\n  Expected one of: sz50, hs300, zz500');
    expect(error.format(true).split('\n')).toEqual([
      'Error: Unknown index "x"',
      '  Expected one of: sz50, hs300, zz500',
      'Code: INVALID_ARGS',
      'Context:',
      '  index: "x"',
    ]);
  });

  it('should serialize for structured logs', () => {
    const error = new CommandError(ErrorCode.CONFIG_ERROR, 'bad', { cause: new Error('root') });

    expect(error.toJSON()).toMatchObject({
      name: 'CommandError',
      code: 'CONFIG_ERROR',
      message: 'bad',
      cause: { name: 'Error', message: 'root' },
    });
  });
});

describe('wrapError', () => {
  it('should map provider failures to PROVIDER_ERROR', () => {
    const login = wrapError(new ProviderUnavailableError('Login failed: down', { provider: 'baostock' }));
    const query = wrapError(new QueryFailedError('Query bars failed: bad code', { provider: 'baostock', operation: 'bars' }));

    expect(login.code).toBe(ErrorCode.PROVIDER_ERROR);
    expect(login.message).toBe('Login failed: down');
    expect(query.code).toBe(ErrorCode.PROVIDER_ERROR);
    expect(query.context).toMatchObject({ operation: 'bars' });
  });

  it('should map empty results to MISSING_DATA', () => {
    const bars = wrapError(new NoDataInRangeError({ ticker: 'sz.000001', start: '2024-01-01', end: '2024-01-05' }));
    const info = wrapError(new NoReferenceDataError({ subject: 'sz.000001', dataset: 'company info' }));

    expect(bars.code).toBe(ErrorCode.MISSING_DATA);
    expect(info.message).toBe('No company info found for sz.000001');
  });

  it('should map ticker input errors to INVALID_ARGS', () => {
    const empty = wrapError(new EmptyInputError());
    const format = wrapError(new UnrecognizedFormatError('abc'));

    expect(empty.code).toBe(ErrorCode.INVALID_ARGS);
    expect(empty.message).toBe('Ticker input is empty');
    expect(format.code).toBe(ErrorCode.INVALID_ARGS);
    expect(format.context).toEqual({ input: 'abc' });
  });

  it('should pass command errors through', () => {
    const original = new CommandError(ErrorCode.EXPORT_ERROR);
    expect(wrapError(original)).toBe(original);
  });

  it('should hide unknown errors behind the fallback message', () => {
    const wrapped = wrapError(new TypeError('x is undefined'));

    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('Internal command error');
    expect(wrapped.cause?.message).toBe('x is undefined');
  });
});

describe('exitCodeFor', () => {
  it('should exit 2 on usage errors', () => {
    expect(exitCodeFor(new CommandError(ErrorCode.INVALID_ARGS), false)).toBe(2);
    expect(exitCodeFor(new CommandError(ErrorCode.INVALID_ARGS), true)).toBe(2);
  });

  it('should exit 0 on provider failures and empty results unless strict', () => {
    expect(exitCodeFor(new CommandError(ErrorCode.PROVIDER_ERROR), false)).toBe(0);
    expect(exitCodeFor(new CommandError(ErrorCode.MISSING_DATA), false)).toBe(0);
    expect(exitCodeFor(new CommandError(ErrorCode.PROVIDER_ERROR), true)).toBe(1);
    expect(exitCodeFor(new CommandError(ErrorCode.MISSING_DATA), true)).toBe(1);
  });

  it('should exit 1 on everything else', () => {
    expect(exitCodeFor(new CommandError(ErrorCode.CONFIG_ERROR), false)).toBe(1);
    expect(exitCodeFor(new CommandError(ErrorCode.EXPORT_ERROR), false)).toBe(1);
    expect(exitCodeFor(new CommandError(ErrorCode.INTERNAL_ERROR), false)).toBe(1);
  });
});

describe('formatCommandError', () => {
  it('should format plain errors and other values', () => {
    expect(formatCommandError(new Error('boom'))).toBe('Error: boom');
    expect(formatCommandError('boom')).toBe('Error: boom');
  });
});
