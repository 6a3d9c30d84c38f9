/**
 * Session lifetime helper
 */

import type { MarketDataProvider, MarketDataSession } from '@ashare/contracts';
import type { Logger } from '@ashare/logger';

/**
 * Logs in, runs `fn`, and logs out on every exit path.
 *
 * A logout failure is logged and never replaces the callback's own outcome.
 *
 * @example
 * ```typescript
 * const series = await withSession(provider, (session) => session.queryBars(query), logger);
 * ```
 */
export async function withSession<T>(
  provider: MarketDataProvider,
  fn: (session: MarketDataSession) => Promise<T>,
  logger?: Logger
): Promise<T> {
  const session = await provider.login();

  try {
    return await fn(session);
  } finally {
    try {
      await session.logout();
    } catch (error) {
      logger?.warn('Logout failed', { provider: provider.name, error });
    }
  }
}
